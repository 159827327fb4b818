import { describeError, type SyncError } from "../errors";
import type { Result } from "../result";

export interface SyncService {
  syncNow: () => Promise<void>;
  dispose: () => void;
}

/**
 * Runs one sync pass at a time. A request that arrives mid-pass queues a
 * single rerun; further requests fold into it.
 */
export function createSyncService<T>(
  runSync: () => Promise<Result<T, SyncError>>,
  options?: {
    onSyncError?: (error: SyncError) => void;
  },
): SyncService {
  let syncQueued = false;
  let disposed = false;
  let currentSyncPromise: Promise<void> | null = null;

  const runSyncLoop = async (): Promise<void> => {
    if (disposed) return;
    if (currentSyncPromise) {
      syncQueued = true;
      return currentSyncPromise;
    }

    currentSyncPromise = (async () => {
      try {
        while (true) {
          syncQueued = false;
          try {
            const result = await runSync();
            if (!result.ok) {
              options?.onSyncError?.(result.error);
              break;
            }
          } catch (error) {
            options?.onSyncError?.({
              type: "Unknown",
              message: describeError(error, "Sync failed."),
            });
            break;
          }
          if (!syncQueued || disposed) {
            break;
          }
        }
      } finally {
        currentSyncPromise = null;
      }
    })();

    return currentSyncPromise;
  };

  const dispose = () => {
    disposed = true;
    syncQueued = false;
  };

  return {
    syncNow: runSyncLoop,
    dispose,
  };
}
