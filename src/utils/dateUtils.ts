/**
 * Calendar-date helpers. Dates are plain `YYYY-MM-DD` strings so that day
 * arithmetic never depends on time of day or the host timezone.
 */

const DAY_MS = 86_400_000;
const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarWindow {
  start: string;
  end: string;
}

function toUtcTime(date: string): number | null {
  const match = DATE_ONLY_PATTERN.exec(date);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const time = Date.UTC(Number(year), Number(month) - 1, Number(day));
  // Reject dates that roll over, e.g. 2024-02-30
  if (new Date(time).toISOString().slice(0, 10) !== date) {
    return null;
  }
  return time;
}

function formatUtcDate(time: number): string {
  return new Date(time).toISOString().slice(0, 10);
}

/**
 * Current calendar date in the given IANA zone, or in local time when no zone
 * is given or the zone is unknown.
 */
export function toDateString(date: Date, timeZone?: string): string {
  if (timeZone) {
    try {
      const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
      }).formatToParts(date);
      const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
      return `${part('year')}-${part('month')}-${part('day')}`;
    } catch (error: unknown) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
    }
  }

  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Date portion of an upstream date or timestamp ("2024-05-02T01:00:00Z" -> "2024-05-02").
 * Returns null when the value is missing or not a real calendar date.
 */
export function extractDate(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const datePart = value.split('T')[0];
  return toUtcTime(datePart) === null ? null : datePart;
}

export function addDays(date: string, days: number): string {
  const time = toUtcTime(date);
  if (time === null) {
    throw new RangeError(`Invalid date: ${date}`);
  }
  return formatUtcDate(time + days * DAY_MS);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  const fromTime = toUtcTime(from);
  const toTime = toUtcTime(to);
  if (fromTime === null || toTime === null) {
    throw new RangeError(`Invalid date range: ${from} .. ${to}`);
  }
  return Math.round((toTime - fromTime) / DAY_MS);
}

/**
 * Inclusive window [today - daysBefore, today + daysForward]
 */
export function getCalendarWindow(today: string, daysBefore: number, daysForward: number): CalendarWindow {
  return {
    start: addDays(today, -daysBefore),
    end: addDays(today, daysForward),
  };
}
