// Calendar-day helpers. Dates are plain "YYYY-MM-DD" strings with no timezone model.

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_MONTH = /^(\d{4})-(\d{2})$/;

const DAY_MS = 86400000;

function toUtcMs(date: string): number | null {
  const m = date.match(ISO_DATE);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const ms = Date.UTC(year, month - 1, day);
  const d = new Date(ms);
  // Rejects 2024-02-31 and friends.
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return ms;
}

function fromUtcMs(ms: number): string {
  const d = new Date(ms);
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, "0")}-${String(d.getUTCDate()).padStart(2, "0")}`;
}

export function isIsoDate(input: string): boolean {
  return toUtcMs(input) !== null;
}

export function isIsoMonth(input: string): boolean {
  const m = input.match(ISO_MONTH);
  if (!m) return false;
  const month = Number(m[2]);
  return month >= 1 && month <= 12;
}

export function addDays(date: string, days: number): string {
  const ms = toUtcMs(date);
  if (ms === null) throw new Error(`Invalid date: ${date}`);
  return fromUtcMs(ms + days * DAY_MS);
}

export function previousDay(date: string): string {
  return addDays(date, -1);
}

export function monthOf(date: string): string {
  return date.slice(0, 7);
}

export function daysInMonth(month: string): number {
  const m = month.match(ISO_MONTH);
  if (!m) throw new Error(`Invalid month: ${month}`);
  // Day 0 of the next month is the last day of this one.
  return new Date(Date.UTC(Number(m[1]), Number(m[2]), 0)).getUTCDate();
}

export function monthRange(month: string): { first: string; last: string } {
  const n = daysInMonth(month);
  return { first: `${month}-01`, last: `${month}-${String(n).padStart(2, "0")}` };
}

/** Server-local calendar day, the "today" the request layer hands to the engine. */
export function todayLocal(now = new Date()): string {
  return `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, "0")}-${String(now.getDate()).padStart(2, "0")}`;
}
