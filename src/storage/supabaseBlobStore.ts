import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { AccountStatus } from "../types";
import { describeError, type SyncError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type { BlobStore, RemoteBlob } from "../domain/sync/blobStore";
import type { SupabaseConfig } from "../config";

export const DAY_RECORDS_TABLE = "day_records";

const remoteRowSchema = z.object({
  key: z.string().min(1),
  blob: z.string(),
});

function toSyncError(
  error: unknown,
  fallback: SyncError["type"] = "Unknown",
): SyncError {
  return {
    type: fallback,
    message: describeError(error, "Remote request failed."),
  };
}

function isNetworkError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  const name = "name" in error ? error.name : undefined;
  const message = "message" in error ? error.message : undefined;
  return (
    name === "AuthRetryableFetchError" ||
    name === "FetchError" ||
    (typeof message === "string" && message.includes("fetch failed"))
  );
}

function encodeBlob(blob: Uint8Array): string {
  return Buffer.from(blob).toString("base64");
}

function decodeBlob(encoded: string): Uint8Array {
  return new Uint8Array(Buffer.from(encoded, "base64"));
}

async function fetchAccountStatus(
  supabase: SupabaseClient,
  accessToken: string | undefined,
): Promise<Result<{ status: AccountStatus; userId: string | null }, SyncError>> {
  try {
    const { data, error } = await supabase.auth.getUser(accessToken);
    if (error) {
      if (error.name === "AuthSessionMissingError" || error.status === 401) {
        return ok({ status: AccountStatus.NoAccount, userId: null });
      }
      if (isNetworkError(error)) {
        return ok({ status: AccountStatus.Unavailable, userId: null });
      }
      return ok({ status: AccountStatus.CouldNotDetermine, userId: null });
    }
    if (!data.user) {
      return ok({ status: AccountStatus.NoAccount, userId: null });
    }
    return ok({ status: AccountStatus.Available, userId: data.user.id });
  } catch (error) {
    if (isNetworkError(error)) {
      return ok({ status: AccountStatus.Unavailable, userId: null });
    }
    return err(toSyncError(error));
  }
}

async function upsertRemoteBlob(
  supabase: SupabaseClient,
  userId: string,
  key: string,
  blob: Uint8Array,
  updatedAt: string,
): Promise<Result<void, SyncError>> {
  try {
    const { error } = await supabase.from(DAY_RECORDS_TABLE).upsert(
      {
        user_id: userId,
        key,
        blob: encodeBlob(blob),
        updated_at: updatedAt,
      },
      { onConflict: "user_id,key" },
    );
    if (error) {
      return err(toSyncError(error, "RemoteRejected"));
    }
    return ok(undefined);
  } catch (error) {
    return err(toSyncError(error));
  }
}

async function fetchRemoteBlobs(
  supabase: SupabaseClient,
  userId: string,
  predicate: ((key: string) => boolean) | undefined,
): Promise<Result<RemoteBlob[], SyncError>> {
  try {
    const { data, error } = await supabase
      .from(DAY_RECORDS_TABLE)
      .select("key, blob")
      .eq("user_id", userId);

    if (error) {
      return err(toSyncError(error, "RemoteRejected"));
    }

    const blobs: RemoteBlob[] = [];
    for (const row of data ?? []) {
      const parsed = remoteRowSchema.safeParse(row);
      if (!parsed.success) {
        console.warn("Skipped malformed remote row:", parsed.error.message);
        continue;
      }
      if (predicate && !predicate(parsed.data.key)) continue;
      blobs.push({ key: parsed.data.key, blob: decodeBlob(parsed.data.blob) });
    }
    return ok(blobs);
  } catch (error) {
    return err(toSyncError(error));
  }
}

async function deleteRemoteBlob(
  supabase: SupabaseClient,
  userId: string,
  key: string,
): Promise<Result<void, SyncError>> {
  try {
    const { error } = await supabase
      .from(DAY_RECORDS_TABLE)
      .delete()
      .eq("user_id", userId)
      .eq("key", key);
    if (error) {
      return err(toSyncError(error, "RemoteRejected"));
    }
    return ok(undefined);
  } catch (error) {
    return err(toSyncError(error));
  }
}

/**
 * Client for a server-side process: no session storage, and the user's
 * access token, when given, authorizes every table request.
 */
export function createSupabaseClient(config: SupabaseConfig): SupabaseClient {
  return createClient(config.url, config.anonKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: config.accessToken
      ? { headers: { Authorization: `Bearer ${config.accessToken}` } }
      : undefined,
  });
}

/**
 * Blob store over a Supabase table. Rows are scoped to the signed-in user,
 * whose id is resolved by the account status check.
 */
export function createSupabaseBlobStore(
  supabase: SupabaseClient,
  options?: { accessToken?: string; now?: () => Date },
): BlobStore {
  const now = options?.now ?? (() => new Date());
  let userId: string | null = null;

  const requireUser = (): Result<string, SyncError> =>
    userId
      ? ok(userId)
      : err({ type: "NotSignedIn", message: "No signed-in cloud user." });

  return {
    getAccountStatus: async () => {
      const result = await fetchAccountStatus(supabase, options?.accessToken);
      if (!result.ok) return result;
      userId = result.value.userId;
      return ok(result.value.status);
    },
    upsert: async (key, blob) => {
      const user = requireUser();
      if (!user.ok) return user;
      return upsertRemoteBlob(
        supabase,
        user.value,
        key,
        blob,
        now().toISOString(),
      );
    },
    fetchAll: async (predicate) => {
      const user = requireUser();
      if (!user.ok) return user;
      return fetchRemoteBlobs(supabase, user.value, predicate);
    },
    delete: async (key) => {
      const user = requireUser();
      if (!user.ok) return user;
      return deleteRemoteBlob(supabase, user.value, key);
    },
  };
}
