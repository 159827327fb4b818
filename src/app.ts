import type { JournalSettings } from "./types";
import type { DayRecordStore } from "./domain/records/dayRecordStore";
import type { BlobStore } from "./domain/sync/blobStore";
import {
  createCloudMergeService,
  type CloudMergeService,
} from "./domain/sync/cloudMergeService";
import type { Clock } from "./domain/runtime/clock";
import type { StorageError } from "./domain/errors";
import type { Result } from "./domain/result";
import { loadConfig, type JournalConfig, type SupabaseConfig } from "./config";
import { createDayRecordStore } from "./storage/dayRecordStore";
import { createSettingsStore, type SettingsStore } from "./storage/settingsStore";
import {
  createSupabaseBlobStore,
  createSupabaseClient,
} from "./storage/supabaseBlobStore";
import { createUnavailableBlobStore } from "./storage/unavailableBlobStore";

export interface JournalApp {
  config: JournalConfig;
  store: DayRecordStore;
  sync: CloudMergeService;
  settings: SettingsStore;
  setSyncEnabled(
    enabled: boolean,
  ): Promise<Result<JournalSettings, StorageError>>;
  setAutoSync(autoSync: boolean): Result<JournalSettings, StorageError>;
  dispose(): void;
}

export interface JournalAppOptions {
  config?: JournalConfig;
  /** Overrides the remote built from config, e.g. an in-process fake. */
  blobStore?: BlobStore;
  clock?: Clock;
}

/**
 * Falls back to the local-only remote when nothing is configured or the
 * client cannot be built on this runtime.
 */
export function createRemoteBlobStore(supabase: SupabaseConfig | null): BlobStore {
  if (!supabase) {
    return createUnavailableBlobStore();
  }
  try {
    const client = createSupabaseClient(supabase);
    return createSupabaseBlobStore(client, { accessToken: supabase.accessToken });
  } catch (error) {
    console.warn("Cloud client unavailable, running local-only:", error);
    return createUnavailableBlobStore();
  }
}

/**
 * Wires the record store, settings and cloud sync together and runs the
 * startup sync when it is enabled.
 */
export async function createJournalApp(
  options: JournalAppOptions = {},
): Promise<JournalApp> {
  const config = options.config ?? loadConfig();
  const settings = createSettingsStore(config.settingsFile);
  const store = createDayRecordStore({
    filePath: config.recordsFile,
    clock: options.clock,
  });

  const { enableSync, autoSync } = settings.get();
  const sync = createCloudMergeService({
    store,
    blobStore: options.blobStore ?? createRemoteBlobStore(config.supabase),
    clock: options.clock,
    enabled: enableSync,
    autoSync,
    autoSyncIntervalMs: config.autoSyncIntervalMs,
  });

  await sync.start();

  const setSyncEnabled = async (enabled: boolean) => {
    const saved = settings.update({ enableSync: enabled });
    await sync.setEnabled(enabled);
    return saved;
  };

  const setAutoSync = (next: boolean) => {
    const saved = settings.update({ autoSync: next });
    sync.setAutoSync(next);
    return saved;
  };

  return {
    config,
    store,
    sync,
    settings,
    setSyncEnabled,
    setAutoSync,
    dispose: () => sync.dispose(),
  };
}
