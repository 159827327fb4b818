export interface RecordItem {
  id: string;
  content: string;
  createdAt: string; // ISO timestamp
  updatedAt: string; // ISO timestamp
}

export interface DayRecord {
  id: string;
  date: string; // ISO timestamp of local midnight
  records: RecordItem[];
  createdAt: string; // ISO timestamp
  updatedAt: string; // ISO timestamp
}

// "YYYY-MM-DD" string or a Date whose local calendar day is used
export type DateInput = Date | string;

export const ChangeReason = {
  Local: "local",
  Merge: "merge",
  Reload: "reload",
} as const;

export type ChangeReason = (typeof ChangeReason)[keyof typeof ChangeReason];

export interface DayRecordChange {
  key: string;
  previous: DayRecord | null;
  current: DayRecord | null;
}

export interface DayRecordChangeEvent {
  reason: ChangeReason;
  changes: DayRecordChange[];
}

export const AccountStatus = {
  Available: "available",
  NoAccount: "noAccount",
  Unavailable: "unavailable",
  CouldNotDetermine: "couldNotDetermine",
} as const;

export type AccountStatus = (typeof AccountStatus)[keyof typeof AccountStatus];

// Outcome of one sync pass.
export const SyncStatus = {
  Synced: "synced",
  Unavailable: "unavailable",
  Error: "error",
} as const;

export type SyncStatus = (typeof SyncStatus)[keyof typeof SyncStatus];

export interface JournalSettings {
  enableSync: boolean;
  autoSync: boolean;
}
