import { createActor } from "xstate";
import {
  AccountStatus,
  ChangeReason,
  SyncStatus,
  type DayRecord,
} from "../../types";
import type { DayRecordStore } from "../records/dayRecordStore";
import { describeError, type StorageError, type SyncError } from "../errors";
import { err, ok, type Result } from "../result";
import { systemClock, type Clock } from "../runtime/clock";
import type { BlobStore } from "./blobStore";
import { syncStateMachine, type SyncPhase } from "./stateMachine";
import { createSyncService } from "./syncService";
import {
  createAutoSyncScheduler,
  DEFAULT_AUTO_SYNC_INTERVAL_MS,
} from "./autoSyncScheduler";
import {
  decodeDayRecordBlob,
  encodeDayRecordBlob,
} from "../../storage/dayRecordCodec";
import { timestampOf, toDateKey } from "../../utils/date";
import { formatSyncError } from "../../utils/syncError";

export interface CloudSyncStatus {
  phase: SyncPhase;
  enabled: boolean;
  available: boolean;
  signedIn: boolean;
  syncing: boolean;
  lastSyncAt: string | null;
  lastError: string | null;
}

export interface SyncSummary {
  pulled: number;
  skipped: number;
  merged: string[];
  pushed: number;
  removedRemote: number;
}

export interface CloudMergeServiceOptions {
  store: DayRecordStore;
  blobStore: BlobStore;
  clock?: Clock;
  enabled?: boolean;
  autoSync?: boolean;
  autoSyncIntervalMs?: number;
}

export interface CloudMergeService {
  /** Upserts one aggregate under its id. Never rejects. */
  push(dayRecord: DayRecord): Promise<Result<void, SyncError>>;
  /** Fetches every remote aggregate; undecodable blobs are skipped. */
  pull(): Promise<Result<DayRecord[], SyncError>>;
  /** Last-write-wins per day; remote replaces local only when strictly newer. */
  merge(remoteRecords: DayRecord[]): Result<string[], StorageError>;
  delete(remoteKey: string): Promise<Result<void, SyncError>>;
  /** One full pass: account check, pull, merge, push newer local copies. */
  runSync(): Promise<Result<SyncSummary, SyncError>>;
  /** Coalesced runSync for user and timer triggers. */
  syncNow(): Promise<void>;
  checkAccountStatus(): Promise<AccountStatus>;
  setEnabled(enabled: boolean): Promise<void>;
  setAutoSync(autoSync: boolean, intervalMs?: number): void;
  start(): Promise<void>;
  /** Resolves once pushes and deletes triggered by local edits settle. */
  whenIdle(): Promise<void>;
  getStatus(): CloudSyncStatus;
  onStatusChange(callback: (status: CloudSyncStatus) => void): () => void;
  dispose(): void;
}

const ACCOUNT_MESSAGES: Record<AccountStatus, string | null> = {
  [AccountStatus.Available]: null,
  [AccountStatus.NoAccount]: "Not signed in to the cloud account.",
  [AccountStatus.Unavailable]: "Cloud sync is unavailable.",
  [AccountStatus.CouldNotDetermine]: "Could not determine cloud account status.",
};

function isNewer(candidate: DayRecord, current: DayRecord): boolean {
  return timestampOf(candidate.updatedAt) > timestampOf(current.updatedAt);
}

// Picks one remote copy per day. Ties break on id so batch order can't
// change the outcome.
function newestByDate(dayRecords: DayRecord[]): Map<string, DayRecord> {
  const newest = new Map<string, DayRecord>();
  for (const dayRecord of dayRecords) {
    const key = toDateKey(new Date(dayRecord.date));
    if (!key) {
      console.warn("Skipped remote record with invalid date:", dayRecord.id);
      continue;
    }
    const best = newest.get(key);
    if (
      !best ||
      isNewer(dayRecord, best) ||
      (timestampOf(dayRecord.updatedAt) === timestampOf(best.updatedAt) &&
        dayRecord.id > best.id)
    ) {
      newest.set(key, dayRecord);
    }
  }
  return newest;
}

function statusEquals(a: CloudSyncStatus, b: CloudSyncStatus): boolean {
  return (
    a.phase === b.phase &&
    a.enabled === b.enabled &&
    a.available === b.available &&
    a.signedIn === b.signedIn &&
    a.syncing === b.syncing &&
    a.lastSyncAt === b.lastSyncAt &&
    a.lastError === b.lastError
  );
}

export function createCloudMergeService(
  options: CloudMergeServiceOptions,
): CloudMergeService {
  const { store, blobStore } = options;
  const clock = options.clock ?? systemClock;

  let enabled = options.enabled ?? false;
  let autoSync = options.autoSync ?? false;
  let autoSyncIntervalMs =
    options.autoSyncIntervalMs ?? DEFAULT_AUTO_SYNC_INTERVAL_MS;
  let available = false;
  let signedIn = false;
  let lastSyncAt: string | null = null;
  let lastError: string | null = null;

  const pending = new Set<Promise<unknown>>();
  const listeners = new Set<(status: CloudSyncStatus) => void>();

  const actor = createActor(syncStateMachine);
  actor.start();

  const getStatus = (): CloudSyncStatus => {
    const phase = actor.getSnapshot().context.phase;
    return {
      phase,
      enabled,
      available,
      signedIn,
      syncing: phase === "syncing",
      lastSyncAt,
      lastError,
    };
  };

  let lastPublished = getStatus();
  const publish = () => {
    const status = getStatus();
    if (statusEquals(status, lastPublished)) return;
    lastPublished = status;
    listeners.forEach((callback) => {
      try {
        callback({ ...status });
      } catch (error) {
        console.error("Sync status listener failed:", error);
      }
    });
  };

  actor.subscribe(() => publish());

  const sendInputs = () => {
    actor.send({ type: "INPUTS_CHANGED", inputs: { enabled, signedIn } });
  };

  const recordError = (error: SyncError) => {
    lastError = error.message;
    publish();
  };

  const track = <T>(promise: Promise<T>): Promise<T> => {
    pending.add(promise);
    void promise
      .catch((error: unknown) => {
        console.error("Background sync task failed:", error);
      })
      .finally(() => {
        pending.delete(promise);
      });
    return promise;
  };

  const notSignedIn = (): SyncError => ({
    type: "NotSignedIn",
    message: lastError ?? "Not signed in to the cloud account.",
  });

  const checkAccountStatus = async (): Promise<AccountStatus> => {
    let status: AccountStatus;
    try {
      const result = await blobStore.getAccountStatus();
      if (result.ok) {
        status = result.value;
      } else {
        console.warn("Account status check failed:", result.error.message);
        status = AccountStatus.CouldNotDetermine;
      }
    } catch (error) {
      console.warn("Account status check failed:", error);
      status = AccountStatus.CouldNotDetermine;
    }

    available = status !== AccountStatus.Unavailable;
    signedIn = status === AccountStatus.Available;
    lastError = ACCOUNT_MESSAGES[status];
    sendInputs();
    publish();
    return status;
  };

  const push = async (
    dayRecord: DayRecord,
  ): Promise<Result<void, SyncError>> => {
    if (!signedIn) {
      const error = notSignedIn();
      recordError(error);
      return err(error);
    }
    try {
      const result = await blobStore.upsert(
        dayRecord.id,
        encodeDayRecordBlob(dayRecord),
      );
      if (!result.ok) {
        console.warn("Failed to push day record:", result.error.message);
        recordError(result.error);
        return result;
      }
      lastSyncAt = clock.now().toISOString();
      lastError = null;
      publish();
      return ok(undefined);
    } catch (error) {
      const syncError: SyncError = {
        type: "Unknown",
        message: describeError(error, "Push failed."),
      };
      recordError(syncError);
      return err(syncError);
    }
  };

  const remove = async (remoteKey: string): Promise<Result<void, SyncError>> => {
    if (!signedIn) {
      const error = notSignedIn();
      recordError(error);
      return err(error);
    }
    try {
      const result = await blobStore.delete(remoteKey);
      if (!result.ok) {
        console.warn("Failed to delete remote day record:", result.error.message);
        recordError(result.error);
      }
      return result;
    } catch (error) {
      const syncError: SyncError = {
        type: "Unknown",
        message: describeError(error, "Delete failed."),
      };
      recordError(syncError);
      return err(syncError);
    }
  };

  const pullRemote = async (): Promise<
    Result<{ records: DayRecord[]; skipped: number }, SyncError>
  > => {
    if (!signedIn) {
      const error = notSignedIn();
      recordError(error);
      return err(error);
    }
    try {
      const fetched = await blobStore.fetchAll();
      if (!fetched.ok) {
        console.warn("Failed to fetch remote day records:", fetched.error.message);
        recordError(fetched.error);
        return fetched;
      }

      const records: DayRecord[] = [];
      let skipped = 0;
      for (const remote of fetched.value) {
        const decoded = decodeDayRecordBlob(remote.blob);
        if (!decoded.ok) {
          console.warn(
            `Skipped undecodable remote record ${remote.key}:`,
            decoded.error.message,
          );
          skipped += 1;
          continue;
        }
        // The blob key names the aggregate remotely.
        records.push({ ...decoded.value, id: remote.key });
      }
      return ok({ records, skipped });
    } catch (error) {
      const syncError: SyncError = {
        type: "Unknown",
        message: describeError(error, "Pull failed."),
      };
      recordError(syncError);
      return err(syncError);
    }
  };

  const pull = async (): Promise<Result<DayRecord[], SyncError>> => {
    const pulled = await pullRemote();
    return pulled.ok ? ok(pulled.value.records) : pulled;
  };

  const merge = (remoteRecords: DayRecord[]): Result<string[], StorageError> => {
    const winners: DayRecord[] = [];
    for (const [key, remote] of newestByDate(remoteRecords)) {
      const local = store.getRecord(key);
      if (!local || isNewer(remote, local)) {
        winners.push(remote);
      }
    }
    return store.applyMerged(winners);
  };

  const finish = (status: SyncStatus) => {
    actor.send({ type: "SYNC_FINISHED", status });
  };

  const fail = (error: SyncError): Result<never, SyncError> => {
    recordError(error);
    finish(
      error.type === "Unavailable" || error.type === "NotSignedIn"
        ? SyncStatus.Unavailable
        : SyncStatus.Error,
    );
    return err(error);
  };

  const runSync = async (): Promise<Result<SyncSummary, SyncError>> => {
    if (!enabled) {
      return err({ type: "Disabled", message: "Cloud sync is disabled." });
    }

    const account = await checkAccountStatus();
    if (account !== AccountStatus.Available) {
      return err({
        type: account === AccountStatus.Unavailable ? "Unavailable" : "NotSignedIn",
        message: ACCOUNT_MESSAGES[account] ?? "Cloud sync is unavailable.",
      });
    }

    actor.send({ type: "SYNC_STARTED" });

    const pulled = await pullRemote();
    if (!pulled.ok) return fail(pulled.error);

    const merged = merge(pulled.value.records);
    if (!merged.ok) {
      // The merged state is kept in memory; the next save retries the write.
      console.error("Failed to persist merged records:", merged.error.message);
    }

    const remoteByDate = new Map<string, DayRecord[]>();
    for (const remote of pulled.value.records) {
      const key = toDateKey(new Date(remote.date));
      if (!key) continue;
      remoteByDate.set(key, [...(remoteByDate.get(key) ?? []), remote]);
    }

    let pushed = 0;
    let removedRemote = 0;
    for (const local of store.getAll()) {
      const key = toDateKey(new Date(local.date));
      const copies = (key ? remoteByDate.get(key) : undefined) ?? [];
      const current = copies.find((copy) => copy.id === local.id);

      if (!current || isNewer(local, current)) {
        const result = await push(local);
        if (!result.ok) return fail(result.error);
        pushed += 1;
      }

      // Copies of the day under other ids lost the merge.
      for (const stale of copies) {
        if (stale.id === local.id) continue;
        const result = await remove(stale.id);
        if (!result.ok) return fail(result.error);
        removedRemote += 1;
      }
    }

    lastSyncAt = clock.now().toISOString();
    lastError = null;
    finish(SyncStatus.Synced);
    publish();

    return ok({
      pulled: pulled.value.records.length,
      skipped: pulled.value.skipped,
      merged: merged.ok ? merged.value : [],
      pushed,
      removedRemote,
    });
  };

  const syncService = createSyncService(runSync, {
    onSyncError: (error) => {
      if (error.type === "Disabled") return;
      console.warn(`${formatSyncError(error)}:`, error.message);
    },
  });

  const syncNow = () => syncService.syncNow();

  const scheduler = createAutoSyncScheduler(() => {
    void syncNow();
  });

  const applySchedule = () => {
    if (enabled && autoSync) {
      scheduler.startAutoSync(autoSyncIntervalMs);
    } else {
      scheduler.stopAutoSync();
    }
  };

  // Runs the sync the machine asks for when it becomes ready.
  const dispatchPendingSync = async () => {
    if (!actor.getSnapshot().context.syncPending) return;
    actor.send({ type: "SYNC_DISPATCHED" });
    await syncNow();
  };

  const unsubscribeStore = store.onChange((event) => {
    if (!enabled || !signedIn || event.reason !== ChangeReason.Local) return;
    for (const change of event.changes) {
      if (change.current) {
        track(push(change.current));
      } else if (change.previous) {
        track(remove(change.previous.id));
      }
    }
  });

  const start = async () => {
    applySchedule();
    if (!enabled) return;
    await checkAccountStatus();
    await dispatchPendingSync();
  };

  const setEnabled = async (next: boolean) => {
    enabled = next;
    applySchedule();
    sendInputs();
    publish();
    if (!enabled) return;
    await checkAccountStatus();
    await dispatchPendingSync();
  };

  const setAutoSync = (next: boolean, intervalMs?: number) => {
    autoSync = next;
    if (intervalMs !== undefined) {
      autoSyncIntervalMs = intervalMs;
    }
    applySchedule();
  };

  const whenIdle = async () => {
    while (pending.size > 0) {
      await Promise.allSettled([...pending]);
    }
  };

  const onStatusChange = (callback: (status: CloudSyncStatus) => void) => {
    listeners.add(callback);
    return () => {
      listeners.delete(callback);
    };
  };

  const dispose = () => {
    unsubscribeStore();
    scheduler.dispose();
    syncService.dispose();
    listeners.clear();
    actor.stop();
  };

  return {
    push: (dayRecord) => track(push(dayRecord)),
    pull,
    merge,
    delete: (remoteKey) => track(remove(remoteKey)),
    runSync,
    syncNow,
    checkAccountStatus,
    setEnabled,
    setAutoSync,
    start,
    whenIdle,
    getStatus,
    onStatusChange,
    dispose,
  };
}
