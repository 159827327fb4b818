import type { DateInput } from "../types";

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Format a Date object to a YYYY-MM-DD key in the host's local timezone
 */
export function formatDateKey(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parse a YYYY-MM-DD key to a Date at local midnight
 */
export function parseDateKey(key: string): Date | null {
  const match = DATE_KEY_PATTERN.exec(key);
  if (!match) return null;

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10) - 1;
  const day = parseInt(match[3], 10);

  const date = new Date(year, month, day);
  date.setFullYear(year);

  // Validate the date is real (e.g., not Feb 30)
  if (
    date.getDate() !== day ||
    date.getMonth() !== month ||
    date.getFullYear() !== year
  ) {
    return null;
  }

  return date;
}

export function isValidDateKey(key: string): boolean {
  return parseDateKey(key) !== null;
}

/**
 * Normalize a Date or key string to its day key. Time of day is dropped.
 */
export function toDateKey(input: DateInput): string | null {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) return null;
    return formatDateKey(input);
  }
  const parsed = parseDateKey(input);
  return parsed ? formatDateKey(parsed) : null;
}

/**
 * ISO instant of local midnight for a day key
 */
export function dateKeyToIso(key: string): string | null {
  const date = parseDateKey(key);
  return date ? date.toISOString() : null;
}

export function getDaysInMonth(year: number, month: number): number {
  return new Date(year, month + 1, 0).getDate();
}

/**
 * Key prefix shared by every day of a month ("2024-03-"); month is 0-based
 */
export function monthKeyPrefix(year: number, month: number): string {
  const yyyy = String(year).padStart(4, "0");
  const mm = String(month + 1).padStart(2, "0");
  return `${yyyy}-${mm}-`;
}

export function timestampOf(iso: string): number {
  return new Date(iso).getTime();
}

/**
 * Later of two ISO timestamps; keeps updatedAt non-decreasing when the
 * wall clock steps backwards.
 */
export function laterTimestamp(previous: string, next: string): string {
  return timestampOf(next) >= timestampOf(previous) ? next : previous;
}
