export interface YearMonth {
  year: number;
  month: number; // 1-12
}

const YEAR_MONTH_PREFIX = /^(\d{4})-(\d{2})/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: unknown): value is string {
  return typeof value === "string" && ISO_DATE.test(value);
}

export function formatLocalDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

export function yearMonthOf(date: Date): YearMonth {
  return {year: date.getFullYear(), month: date.getMonth() + 1};
}

export function parseYearMonth(value: unknown): YearMonth | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const match = YEAR_MONTH_PREFIX.exec(value);
  if (!match) {
    return undefined;
  }
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    return undefined;
  }
  return {year: Number(match[1]), month};
}

export function shiftMonth({year, month}: YearMonth, delta: number): YearMonth {
  const index = year * 12 + (month - 1) + delta;
  return {year: Math.floor(index / 12), month: (index % 12) + 1};
}

export function firstDayOf({year, month}: YearMonth): string {
  return `${pad(year, 4)}-${pad(month, 2)}-01`;
}

export function sameMonth(a: YearMonth, b: YearMonth): boolean {
  return a.year === b.year && a.month === b.month;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}
