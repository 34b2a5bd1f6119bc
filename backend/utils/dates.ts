// utils/dates.ts
//
// Calendar helpers on plain ISO date strings (YYYY-MM-DD) and UTC day numbers.
// Pure TypeScript, no imports.

const MS_PER_DAY = 86_400_000;

//
// ---------- Calendar ----------
//

/** Proleptic Gregorian leap-year rule. */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return MONTH_DAYS[month - 1] ?? 0;
}

/**
 * Walk the months, taking each month's length off the day-of-year until the
 * remainder fits. Returns undefined when the day falls outside the year.
 */
export function monthDayFromDayOfYear(
  year: number,
  dayOfYear: number
): { month: number; dayOfMonth: number } | undefined {
  if (!Number.isInteger(dayOfYear) || dayOfYear < 1) return undefined;
  let remaining = dayOfYear;
  for (let month = 1; month <= 12; month++) {
    const len = daysInMonth(year, month);
    if (remaining <= len) return { month, dayOfMonth: remaining };
    remaining -= len;
  }
  return undefined;
}

//
// ---------- Conversions ----------
//

const pad = (n: number, width: number) => String(n).padStart(width, "0");

export function formatISODate(year: number, month: number, dayOfMonth: number): string {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(dayOfMonth, 2)}`;
}

/** Days since 1970-01-01 (UTC). */
export function toDayNumber(iso: string): number {
  const [y, m, d] = iso.split("-").map(Number);
  const date = new Date(0);
  date.setUTCFullYear(y ?? 0, (m ?? 1) - 1, d ?? 1);
  return Math.round(date.getTime() / MS_PER_DAY);
}

export function fromDayNumber(day: number): string {
  const d = new Date(day * MS_PER_DAY);
  return formatISODate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
}

export function addDays(iso: string, n: number): string {
  return fromDayNumber(toDayNumber(iso) + n);
}

export function daysBetween(a: string, b: string): number {
  return Math.abs(toDayNumber(b) - toDayNumber(a));
}
