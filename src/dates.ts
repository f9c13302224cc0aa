// Calendar helpers over YYYY-MM-DD strings. All math is done in UTC so the
// host timezone never shifts a month boundary. ISO dates compare correctly
// as plain strings, which the rest of the code relies on.

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function toISODate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;
}

export function parseISODate(s: string): { year: number; month: number; day: number } | null {
  const m = ISO_DATE.exec(s);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

export function isISODate(s: string): boolean {
  return parseISODate(s) !== null;
}

function mustParse(s: string): { year: number; month: number; day: number } {
  const parsed = parseISODate(s);
  if (!parsed) throw new RangeError(`Invalid ISO date: ${s}`);
  return parsed;
}

export function monthEndOf(iso: string): string {
  const { year, month } = mustParse(iso);
  return toISODate(year, month, daysInMonth(year, month));
}

export function isMonthEnd(iso: string): boolean {
  return monthEndOf(iso) === iso;
}

// Last day of the month before `iso`'s month.
export function previousMonthEnd(iso: string): string {
  const { year, month } = mustParse(iso);
  const y = month === 1 ? year - 1 : year;
  const m = month === 1 ? 12 : month - 1;
  return toISODate(y, m, daysInMonth(y, m));
}

// Last day of the month after `iso`'s month.
export function nextMonthEnd(iso: string): string {
  const { year, month } = mustParse(iso);
  const y = month === 12 ? year + 1 : year;
  const m = month === 12 ? 1 : month + 1;
  return toISODate(y, m, daysInMonth(y, m));
}

export function minISODate(a: string, b: string): string {
  return a <= b ? a : b;
}
