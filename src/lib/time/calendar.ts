/*
 * Calendar-day helpers. Days are UTC `YYYY-MM-DD` strings; arithmetic runs on
 * epoch milliseconds at UTC midnight so DST never shifts a count.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/** UTC-midnight epoch ms for a real `YYYY-MM-DD` day, else null. */
export function parseIsoDate(value: string): number | null {
  const m = ISO_DATE.exec(value);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  // Date.UTC rolls 2025-02-30 over into March; reject instead.
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return ms;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number | null {
  const a = parseIsoDate(from);
  const b = parseIsoDate(to);
  if (a === null || b === null) return null;
  return Math.round((b - a) / MS_PER_DAY);
}

export function addDays(isoDate: string, days: number): string | null {
  const ms = parseIsoDate(isoDate);
  if (ms === null) return null;
  return toIsoDate(new Date(ms + days * MS_PER_DAY));
}
