import type {
  DateInput,
  DayRecord,
  DayRecordChangeEvent,
  RecordItem,
} from "../../types";
import type { StorageError } from "../errors";
import type { Result } from "../result";

export interface LoadSummary {
  loaded: number;
  skipped: number;
}

/**
 * Single source of truth for day records. Every mutation is flushed to disk
 * before it returns; a failed flush keeps the in-memory change and reports
 * an IO error.
 */
export interface DayRecordStore {
  getRecord(date: DateInput): DayRecord | null;
  getRecords(date: DateInput): RecordItem[];
  hasRecord(date: DateInput): boolean;
  recordCount(date: DateInput): number;
  getAll(): DayRecord[];
  getAllDates(): string[];
  /** Keys of days in the month (0-based) that have non-empty notes */
  getDatesForMonth(year: number, month: number): string[];

  /** Trimmed-empty content is accepted; it counts but does not mark the day. */
  addRecord(date: DateInput, content: string): Result<RecordItem, StorageError>;
  /** Resolves to null when no item with that id exists for the day. */
  updateRecord(
    date: DateInput,
    recordId: string,
    content: string,
  ): Result<RecordItem | null, StorageError>;
  /**
   * Removes one item, or the whole day when recordId is omitted. Resolves to
   * false when there was nothing to remove.
   */
  deleteRecord(
    date: DateInput,
    recordId?: string,
  ): Result<boolean, StorageError>;
  deleteDay(date: DateInput): Result<boolean, StorageError>;

  /**
   * Writes remote winners in one batch. An aggregate with no items removes
   * the day. Persists once and emits a single merge event.
   */
  applyMerged(dayRecords: DayRecord[]): Result<string[], StorageError>;

  load(): Result<LoadSummary, StorageError>;
  save(): Result<void, StorageError>;
  onChange(listener: (event: DayRecordChangeEvent) => void): () => void;
}
