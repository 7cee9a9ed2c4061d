import type { DateWindow } from '../types/fixture.js';

/** Wall-clock reading in some timezone. Months are 1-based. */
export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const pad = (n: number, width = 2): string => n.toString().padStart(width, '0');

const formatters = new Map<string, Intl.DateTimeFormat>();

function zoneFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

/** Throws RangeError for an unknown IANA zone, like Intl itself. */
export function assertTimeZone(timeZone: string): void {
  zoneFormatter(timeZone);
}

/** Reads the wall clock of `instant` in `timeZone`. */
export function instantToLocal(instant: Date, timeZone: string): LocalDateTime {
  const parts: Record<string, number> = {};
  for (const part of zoneFormatter(timeZone).formatToParts(instant)) {
    if (part.type !== 'literal') parts[part.type] = parseInt(part.value, 10);
  }
  return {
    year: parts['year'] ?? 0,
    month: parts['month'] ?? 0,
    day: parts['day'] ?? 0,
    hour: (parts['hour'] ?? 0) % 24,
    minute: parts['minute'] ?? 0,
    second: parts['second'] ?? 0,
  };
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

export function isValidClock(hour: number, minute: number, second = 0): boolean {
  return hour >= 0 && hour < 24 && minute >= 0 && minute < 60 && second >= 0 && second < 60;
}

export function toIsoDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** 'YYYY-MM-DD HH:MM:SS', the sink's datetime format. */
export function formatLocalDateTime(dt: LocalDateTime): string {
  return `${toIsoDate(dt.year, dt.month, dt.day)} ${pad(dt.hour)}:${pad(dt.minute)}:${pad(dt.second)}`;
}

export function localDatePart(dt: LocalDateTime): string {
  return toIsoDate(dt.year, dt.month, dt.day);
}

/** Today's date as YYYY-MM-DD in the given timezone. */
export function todayDateString(timeZone: string, now: Date = new Date()): string {
  return localDatePart(instantToLocal(now, timeZone));
}

/** Calendar arithmetic on a YYYY-MM-DD string. */
export function shiftIsoDate(isoDate: string, days: number): string {
  const [y, m, d] = isoDate.split('-').map((v) => parseInt(v, 10));
  const base = new Date(Date.UTC(y ?? 1970, (m ?? 1) - 1, d ?? 1));
  base.setUTCDate(base.getUTCDate() + days);
  return toIsoDate(base.getUTCFullYear(), base.getUTCMonth() + 1, base.getUTCDate());
}

export function yearOf(isoDate: string): number {
  return parseInt(isoDate.slice(0, 4), 10);
}

/** Inclusive on both ends. ISO dates compare correctly as strings. */
export function isWithinWindow(isoDate: string, window: DateWindow): boolean {
  return isoDate >= window.from && isoDate <= window.to;
}
