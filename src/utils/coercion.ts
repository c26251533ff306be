import { RawCell } from "../models/LedgerStore";

/**
 * Per-field cleansing for raw sheet cells.
 * Each function returns a default instead of failing, so a bad cell never drops its row.
 */

const DATE_PATTERN = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
/** Spreadsheet serial day 0. */
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 86_400_000;
/** Serial day of 9999-12-31. */
const MAX_SERIAL_DAY = 2_958_465;
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parses a calendar date. Numbers are spreadsheet serial days, where any fraction is
 * the time of day.
 *
 * @returns `YYYY-MM-DD`, or null for blanks and anything that is not a real day
 *
 * @example
 * ```ts
 * coerceDate("2024/2/9")   // "2024-02-09"
 * coerceDate(45306)        // "2024-01-15"
 * coerceDate("2024-02-30") // null
 * ```
 */
export function coerceDate(value: RawCell): string | null {
  if (typeof value === "number") {
    return fromSerialDay(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (
    calendar.getUTCFullYear() !== year ||
    calendar.getUTCMonth() !== month - 1 ||
    calendar.getUTCDate() !== day
  ) {
    return null;
  }

  return `${match[1]}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function fromSerialDay(serial: number): string | null {
  if (!Number.isFinite(serial) || serial < 1 || serial >= MAX_SERIAL_DAY + 1) {
    return null;
  }
  return new Date(SERIAL_EPOCH_MS + Math.floor(serial) * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Parses a numeric cell, falling back to 0.
 *
 * @example
 * ```ts
 * coerceNumber(" 1500.5 ") // 1500.5
 * coerceNumber("abc")      // 0
 * ```
 */
export function coerceNumber(value: RawCell): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== "string") {
    return 0;
  }
  const trimmed = value.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    return 0;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function coerceText(value: RawCell): string {
  if (value === null) {
    return "";
  }
  return typeof value === "number" ? String(value) : value;
}
