/**
 * Calendar helpers for a fixed IANA time zone. Dates are `YYYY-MM-DD`,
 * months are `YYYY-MM`; both compare correctly as plain strings.
 */

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit'
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function calendarDate(date: Date, timeZone: string): string {
  const parts = getFormatter(timeZone).formatToParts(date);
  const lookup = new Map(parts.map((part) => [part.type, part.value]));
  return `${lookup.get('year') ?? '1970'}-${lookup.get('month') ?? '01'}-${lookup.get('day') ?? '01'}`;
}

export function calendarMonth(date: Date, timeZone: string): string {
  return calendarDate(date, timeZone).slice(0, 7);
}

export function monthOfDate(date: string): string {
  return date.slice(0, 7);
}

function parseMonth(month: string): { year: number; month: number } {
  const [year, monthNumber] = month.split('-').map((part) => Number.parseInt(part, 10));
  return { year: year ?? 1970, month: monthNumber ?? 1 };
}

function formatMonth(year: number, month: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

export function previousMonth(month: string): string {
  const parsed = parseMonth(month);
  return parsed.month === 1 ? formatMonth(parsed.year - 1, 12) : formatMonth(parsed.year, parsed.month - 1);
}

export function nextMonth(month: string): string {
  const parsed = parseMonth(month);
  return parsed.month === 12 ? formatMonth(parsed.year + 1, 1) : formatMonth(parsed.year, parsed.month + 1);
}

/** Months strictly after `from` up to and including `to`, oldest first. */
export function monthsBetween(from: string, to: string): string[] {
  const months: string[] = [];
  for (let cursor = nextMonth(from); cursor <= to; cursor = nextMonth(cursor)) {
    months.push(cursor);
  }
  return months;
}
