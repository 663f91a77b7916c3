// ── Calendar Periods ────────────────────────────────────────────────
// Date ranges are inclusive "YYYY-MM-DD" strings; periods are "YYYY-MM".

export interface DateRange {
  start: string;
  end: string;
}

export interface MonthRef {
  month: number; // 1-12
  year: number;
}

/** The full calendar month as a date range. */
export function monthRange({ month, year }: MonthRef): DateRange {
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return {
    start: `${year}-${pad(month)}-01`,
    end: `${year}-${pad(month)}-${pad(lastDay)}`,
  };
}

/**
 * Rolling window of `months` calendar months ending with the month that
 * contains `asOf`. The window runs from the first day of its earliest
 * month up to `asOf` itself.
 */
export function trailingWindow(months: number, asOf: Date): DateRange {
  const anchor = toMonthRef(asOf);
  const first = shiftMonth(anchor, -(Math.max(1, months) - 1));
  return {
    start: `${first.year}-${pad(first.month)}-01`,
    end: formatDate(asOf),
  };
}

export function shiftMonth(ref: MonthRef, delta: number): MonthRef {
  const index = ref.year * 12 + (ref.month - 1) + delta;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

export function nextMonth(ref: MonthRef): MonthRef {
  return shiftMonth(ref, 1);
}

export function toMonthRef(date: Date): MonthRef {
  return { month: date.getMonth() + 1, year: date.getFullYear() };
}

export function periodOf(date: string): string {
  return date.slice(0, 7);
}

export function inRange(date: string, range: DateRange): boolean {
  return date >= range.start && date <= range.end;
}

export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = pad(d.getMonth() + 1);
  const day = pad(d.getDate());
  return `${y}-${m}-${day}`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}
