import type { DayRecord, RecordItem } from "../../types";

export function hasRecords(dayRecord: DayRecord): boolean {
  return dayRecord.records.some((item) => item.content.trim().length > 0);
}

export function cloneRecordItem(item: RecordItem): RecordItem {
  return { ...item };
}

export function cloneDayRecord(dayRecord: DayRecord): DayRecord {
  return {
    ...dayRecord,
    records: dayRecord.records.map(cloneRecordItem),
  };
}

export function dayRecordsEqual(a: DayRecord, b: DayRecord): boolean {
  if (
    a.id !== b.id ||
    a.date !== b.date ||
    a.createdAt !== b.createdAt ||
    a.updatedAt !== b.updatedAt ||
    a.records.length !== b.records.length
  ) {
    return false;
  }
  return a.records.every((item, index) => {
    const other = b.records[index];
    return (
      item.id === other.id &&
      item.content === other.content &&
      item.createdAt === other.createdAt &&
      item.updatedAt === other.updatedAt
    );
  });
}
