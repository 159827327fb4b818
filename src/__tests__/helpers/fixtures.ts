import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Clock } from "../../domain/runtime/clock";
import type { DayRecord, RecordItem } from "../../types";
import { dateKeyToIso } from "../../utils/date";

export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "day-journal-"));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function createManualClock(start: string): Clock & {
  set(iso: string): void;
  advance(ms: number): void;
} {
  let current = new Date(start);
  return {
    now: () => new Date(current),
    set: (iso) => {
      current = new Date(iso);
    },
    advance: (ms) => {
      current = new Date(current.getTime() + ms);
    },
  };
}

export function createSequentialIds(prefix = "id"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export function makeItem(
  id: string,
  content: string,
  updatedAt: string,
): RecordItem {
  return { id, content, createdAt: updatedAt, updatedAt };
}

export function makeDayRecord(
  key: string,
  options: { id: string; updatedAt: string; records: RecordItem[] },
): DayRecord {
  const date = dateKeyToIso(key);
  if (!date) {
    throw new Error(`Bad fixture date: ${key}`);
  }
  return {
    id: options.id,
    date,
    records: options.records,
    createdAt: options.updatedAt,
    updatedAt: options.updatedAt,
  };
}
