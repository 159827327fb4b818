import { AccountStatus } from "../types";
import type { SyncError } from "../domain/errors";
import { err, ok } from "../domain/result";
import type { BlobStore } from "../domain/sync/blobStore";

const UNAVAILABLE: SyncError = {
  type: "Unavailable",
  message: "Cloud sync is not configured.",
};

/**
 * Stand-in remote for installs without cloud configuration. Reports the
 * account as unavailable so the app stays local-only.
 */
export function createUnavailableBlobStore(): BlobStore {
  return {
    getAccountStatus: async () => ok(AccountStatus.Unavailable),
    upsert: async () => err(UNAVAILABLE),
    fetchAll: async () => err(UNAVAILABLE),
    delete: async () => err(UNAVAILABLE),
  };
}
