import type { AccountStatus } from "../../types";
import type { SyncError } from "../errors";
import type { Result } from "../result";

export interface RemoteBlob {
  key: string;
  blob: Uint8Array;
}

/**
 * Remote key-value store that mirrors day records across devices.
 * Implementations resolve every call to a Result and never reject.
 */
export interface BlobStore {
  getAccountStatus(): Promise<Result<AccountStatus, SyncError>>;
  upsert(key: string, blob: Uint8Array): Promise<Result<void, SyncError>>;
  fetchAll(
    predicate?: (key: string) => boolean,
  ): Promise<Result<RemoteBlob[], SyncError>>;
  delete(key: string): Promise<Result<void, SyncError>>;
}
