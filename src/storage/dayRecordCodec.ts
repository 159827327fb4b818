import { z } from "zod";
import type { DayRecord } from "../types";
import {
  describeError,
  type StorageError,
  type SyncError,
} from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import { timestampOf, toDateKey } from "../utils/date";

const isoTimestamp = z.string().datetime({ offset: true });

export const recordItemSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
});

export const dayRecordSchema = z.object({
  id: z.string().min(1),
  date: isoTimestamp,
  records: z.array(recordItemSchema),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
});

const recordFileSchema = z.record(z.string(), z.unknown());

export interface DecodedRecordFile {
  records: Map<string, DayRecord>;
  skipped: string[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function toDayRecord(parsed: z.infer<typeof dayRecordSchema>): DayRecord {
  return {
    id: parsed.id,
    date: parsed.date,
    records: parsed.records.map((item) => ({ ...item })),
    createdAt: parsed.createdAt,
    updatedAt: parsed.updatedAt,
  };
}

export function decodeDayRecord(
  value: unknown,
): Result<DayRecord, string> {
  const parsed = dayRecordSchema.safeParse(value);
  if (!parsed.success) {
    return err(formatIssues(parsed.error));
  }
  return ok(toDayRecord(parsed.data));
}

/**
 * Entries are keyed by their file key. An entry whose key is not a valid
 * day falls back to its own date; on collision the later updatedAt wins.
 * Empty aggregates are dropped.
 */
export function decodeRecordFile(
  text: string,
): Result<DecodedRecordFile, StorageError> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err({
      type: "Corrupt",
      message: describeError(error, "Malformed JSON."),
    });
  }

  const file = recordFileSchema.safeParse(json);
  if (!file.success) {
    return err({
      type: "Corrupt",
      message: "Record file must contain a JSON object.",
    });
  }

  const records = new Map<string, DayRecord>();
  const skipped: string[] = [];

  for (const [entryKey, value] of Object.entries(file.data)) {
    const decoded = decodeDayRecord(value);
    if (!decoded.ok) {
      skipped.push(`${entryKey}: ${decoded.error}`);
      continue;
    }
    const dayRecord = decoded.value;
    const key = toDateKey(entryKey) ?? toDateKey(new Date(dayRecord.date));
    if (!key || dayRecord.records.length === 0) {
      continue;
    }
    const existing = records.get(key);
    if (
      existing &&
      timestampOf(existing.updatedAt) >= timestampOf(dayRecord.updatedAt)
    ) {
      continue;
    }
    records.set(key, dayRecord);
  }

  return ok({ records, skipped });
}

export function encodeRecordFile(records: Map<string, DayRecord>): string {
  const sortedKeys = [...records.keys()].sort();
  const payload: Record<string, DayRecord> = {};
  for (const key of sortedKeys) {
    const dayRecord = records.get(key);
    if (dayRecord) payload[key] = dayRecord;
  }
  return `${JSON.stringify(payload, null, 2)}\n`;
}

export function encodeDayRecordBlob(dayRecord: DayRecord): Uint8Array {
  return new Uint8Array(Buffer.from(JSON.stringify(dayRecord), "utf8"));
}

export function decodeDayRecordBlob(
  blob: Uint8Array,
): Result<DayRecord, SyncError> {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(blob).toString("utf8"));
  } catch (error) {
    return err({
      type: "Serialization",
      message: describeError(error, "Malformed blob."),
    });
  }
  const decoded = decodeDayRecord(json);
  if (!decoded.ok) {
    return err({ type: "Serialization", message: decoded.error });
  }
  return ok(decoded.value);
}
