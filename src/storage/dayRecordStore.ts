import { randomUUID } from "node:crypto";
import {
  ChangeReason,
  type DateInput,
  type DayRecord,
  type DayRecordChange,
  type DayRecordChangeEvent,
  type RecordItem,
} from "../types";
import type {
  DayRecordStore,
  LoadSummary,
} from "../domain/records/dayRecordStore";
import {
  cloneDayRecord,
  cloneRecordItem,
  dayRecordsEqual,
  hasRecords,
} from "../domain/records/dayRecord";
import type { StorageError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import { systemClock, type Clock } from "../domain/runtime/clock";
import {
  dateKeyToIso,
  laterTimestamp,
  monthKeyPrefix,
  toDateKey,
} from "../utils/date";
import { decodeRecordFile, encodeRecordFile } from "./dayRecordCodec";
import { readTextFile, writeTextFileAtomic } from "./recordFile";

export interface DayRecordStoreOptions {
  filePath: string;
  clock?: Clock;
  createId?: () => string;
  /** Skip the initial load; the caller invokes load() itself. */
  deferLoad?: boolean;
}

function invalidDate(date: DateInput): StorageError {
  const label = date instanceof Date ? String(date) : date;
  return { type: "Invalid", message: `Invalid date: ${label}` };
}

export function createDayRecordStore(
  options: DayRecordStoreOptions,
): DayRecordStore {
  const { filePath } = options;
  const clock = options.clock ?? systemClock;
  const createId = options.createId ?? randomUUID;

  let records = new Map<string, DayRecord>();
  const listeners = new Set<(event: DayRecordChangeEvent) => void>();

  const emit = (reason: ChangeReason, changes: DayRecordChange[]) => {
    if (changes.length === 0) return;
    const event: DayRecordChangeEvent = { reason, changes };
    listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        console.error("Day record listener failed:", error);
      }
    });
  };

  const snapshot = (dayRecord: DayRecord | undefined): DayRecord | null =>
    dayRecord ? cloneDayRecord(dayRecord) : null;

  const save = (): Result<void, StorageError> => {
    const result = writeTextFileAtomic(filePath, encodeRecordFile(records));
    if (!result.ok) {
      console.error("Failed to save day records:", result.error.message);
    }
    return result;
  };

  // Persist, then notify. The in-memory change stands even if the write fails.
  const commit = <T>(
    value: T,
    changes: DayRecordChange[],
    reason: ChangeReason = ChangeReason.Local,
  ): Result<T, StorageError> => {
    const saved = save();
    emit(reason, changes);
    return saved.ok ? ok(value) : saved;
  };

  const load = (): Result<LoadSummary, StorageError> => {
    const read = readTextFile(filePath);
    if (!read.ok) {
      console.error("Failed to read day records:", read.error.message);
      return read;
    }

    const previous = records;
    let next = new Map<string, DayRecord>();
    let skipped = 0;
    let failure: StorageError | null = null;

    if (read.value !== null) {
      const decoded = decodeRecordFile(read.value);
      if (decoded.ok) {
        next = decoded.value.records;
        skipped = decoded.value.skipped.length;
        decoded.value.skipped.forEach((entry) => {
          console.warn("Skipped malformed day record:", entry);
        });
      } else {
        console.error(
          "Day record file is corrupt, starting empty:",
          decoded.error.message,
        );
        failure = decoded.error;
      }
    }

    records = next;

    const changes: DayRecordChange[] = [];
    const keys = new Set([...previous.keys(), ...next.keys()]);
    for (const key of keys) {
      const before = previous.get(key);
      const after = next.get(key);
      if (before && after && dayRecordsEqual(before, after)) continue;
      if (before || after) {
        changes.push({ key, previous: snapshot(before), current: snapshot(after) });
      }
    }
    emit(ChangeReason.Reload, changes);

    if (failure) return err(failure);
    return ok({ loaded: next.size, skipped });
  };

  const getRecord = (date: DateInput): DayRecord | null => {
    const key = toDateKey(date);
    if (!key) return null;
    return snapshot(records.get(key));
  };

  const getRecords = (date: DateInput): RecordItem[] => {
    const key = toDateKey(date);
    if (!key) return [];
    return (records.get(key)?.records ?? []).map(cloneRecordItem);
  };

  const hasRecord = (date: DateInput): boolean => {
    const key = toDateKey(date);
    if (!key) return false;
    const dayRecord = records.get(key);
    return dayRecord ? hasRecords(dayRecord) : false;
  };

  const recordCount = (date: DateInput): number => {
    const key = toDateKey(date);
    if (!key) return 0;
    return records.get(key)?.records.length ?? 0;
  };

  const getAll = (): DayRecord[] =>
    [...records.keys()]
      .sort()
      .map((key) => snapshot(records.get(key)))
      .filter((dayRecord): dayRecord is DayRecord => dayRecord !== null);

  const getAllDates = (): string[] => [...records.keys()].sort();

  const getDatesForMonth = (year: number, month: number): string[] => {
    const prefix = monthKeyPrefix(year, month);
    return getAllDates().filter((key) => {
      const dayRecord = records.get(key);
      return key.startsWith(prefix) && !!dayRecord && hasRecords(dayRecord);
    });
  };

  const addRecord = (
    date: DateInput,
    content: string,
  ): Result<RecordItem, StorageError> => {
    const key = toDateKey(date);
    const dayIso = key ? dateKeyToIso(key) : null;
    if (!key || !dayIso) return err(invalidDate(date));

    const now = clock.now().toISOString();
    const previous = records.get(key);
    const item: RecordItem = {
      id: createId(),
      content,
      createdAt: now,
      updatedAt: now,
    };

    const next: DayRecord = previous
      ? {
          ...previous,
          records: [...previous.records, item],
          updatedAt: laterTimestamp(previous.updatedAt, now),
        }
      : {
          id: createId(),
          date: dayIso,
          records: [item],
          createdAt: now,
          updatedAt: now,
        };
    records.set(key, next);

    return commit(cloneRecordItem(item), [
      { key, previous: snapshot(previous), current: snapshot(next) },
    ]);
  };

  const updateRecord = (
    date: DateInput,
    recordId: string,
    content: string,
  ): Result<RecordItem | null, StorageError> => {
    const key = toDateKey(date);
    if (!key) return err(invalidDate(date));

    const previous = records.get(key);
    const index = previous?.records.findIndex((item) => item.id === recordId);
    if (!previous || index === undefined || index < 0) {
      return ok(null);
    }

    const now = clock.now().toISOString();
    const current = previous.records[index];
    const updated: RecordItem = {
      ...current,
      content,
      updatedAt: laterTimestamp(current.updatedAt, now),
    };
    const nextItems = [...previous.records];
    nextItems[index] = updated;
    const next: DayRecord = {
      ...previous,
      records: nextItems,
      updatedAt: laterTimestamp(previous.updatedAt, now),
    };
    records.set(key, next);

    return commit(cloneRecordItem(updated), [
      { key, previous: snapshot(previous), current: snapshot(next) },
    ]);
  };

  const deleteDay = (date: DateInput): Result<boolean, StorageError> => {
    const key = toDateKey(date);
    if (!key) return err(invalidDate(date));

    const previous = records.get(key);
    if (!previous) return ok(false);

    records.delete(key);
    return commit(true, [
      { key, previous: snapshot(previous), current: null },
    ]);
  };

  const deleteRecord = (
    date: DateInput,
    recordId?: string,
  ): Result<boolean, StorageError> => {
    if (recordId === undefined) {
      return deleteDay(date);
    }

    const key = toDateKey(date);
    if (!key) return err(invalidDate(date));

    const previous = records.get(key);
    if (!previous || !previous.records.some((item) => item.id === recordId)) {
      return ok(false);
    }

    const remaining = previous.records.filter((item) => item.id !== recordId);
    if (remaining.length === 0) {
      records.delete(key);
      return commit(true, [
        { key, previous: snapshot(previous), current: null },
      ]);
    }

    const next: DayRecord = {
      ...previous,
      records: remaining,
      updatedAt: laterTimestamp(previous.updatedAt, clock.now().toISOString()),
    };
    records.set(key, next);
    return commit(true, [
      { key, previous: snapshot(previous), current: snapshot(next) },
    ]);
  };

  const applyMerged = (
    dayRecords: DayRecord[],
  ): Result<string[], StorageError> => {
    const changes: DayRecordChange[] = [];

    for (const incoming of dayRecords) {
      const key = toDateKey(new Date(incoming.date));
      if (!key) {
        console.warn("Skipped merged record with invalid date:", incoming.id);
        continue;
      }
      const previous = records.get(key);
      if (incoming.records.length === 0) {
        if (!previous) continue;
        records.delete(key);
        changes.push({ key, previous: snapshot(previous), current: null });
        continue;
      }
      const next = cloneDayRecord(incoming);
      records.set(key, next);
      changes.push({ key, previous: snapshot(previous), current: snapshot(next) });
    }

    if (changes.length === 0) {
      return ok([]);
    }
    return commit(
      changes.map((change) => change.key),
      changes,
      ChangeReason.Merge,
    );
  };

  const onChange = (listener: (event: DayRecordChangeEvent) => void) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  if (!options.deferLoad) {
    load();
  }

  return {
    getRecord,
    getRecords,
    hasRecord,
    recordCount,
    getAll,
    getAllDates,
    getDatesForMonth,
    addRecord,
    updateRecord,
    deleteRecord,
    deleteDay,
    applyMerged,
    load,
    save,
    onChange,
  };
}
