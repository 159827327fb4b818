export * from "./types";
export type { Result } from "./domain/result";
export { ok, err } from "./domain/result";
export type { StorageError, SyncError } from "./domain/errors";
export type { Clock } from "./domain/runtime/clock";
export type {
  DayRecordStore,
  LoadSummary,
} from "./domain/records/dayRecordStore";
export { hasRecords } from "./domain/records/dayRecord";
export * from "./domain/sync";
export { createDayRecordStore } from "./storage/dayRecordStore";
export type { DayRecordStoreOptions } from "./storage/dayRecordStore";
export {
  createSupabaseBlobStore,
  createSupabaseClient,
} from "./storage/supabaseBlobStore";
export { createUnavailableBlobStore } from "./storage/unavailableBlobStore";
export { createSettingsStore } from "./storage/settingsStore";
export type { SettingsStore } from "./storage/settingsStore";
export { loadConfig, ConfigError } from "./config";
export type { JournalConfig, SupabaseConfig } from "./config";
export { createJournalApp, createRemoteBlobStore } from "./app";
export type { JournalApp, JournalAppOptions } from "./app";
export {
  dateKeyToIso,
  formatDateKey,
  getDaysInMonth,
  isValidDateKey,
  parseDateKey,
  toDateKey,
} from "./utils/date";
export { formatSyncError } from "./utils/syncError";
