import type { DateWindow, RawWhen } from '../types/fixture.js';
import {
  type LocalDateTime,
  formatLocalDateTime,
  instantToLocal,
  isValidCalendarDate,
  isValidClock,
  isWithinWindow,
  toIsoDate,
  yearOf,
} from '../utils/date.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface ResolvedDateTime {
  local: LocalDateTime;
  /** 'YYYY-MM-DD HH:MM:SS' */
  formatted: string;
  /** 'YYYY-MM-DD' */
  date: string;
  /** Year came from the window start without any candidate landing inside the window */
  yearInferred: boolean;
  /** False when the source gave no usable time and 00:00:00 was assumed */
  timeKnown: boolean;
}

export interface DateTimeResolverOptions {
  /** IANA zone every output is expressed in */
  timeZone: string;
  logger?: Logger;
}

interface DateParts {
  year: number | null;
  month: number;
  day: number;
}

interface ClockParts {
  hour: number;
  minute: number;
  second: number;
}

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T\s](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const ISO_DATE = /(\d{4})-(\d{2})-(\d{2})/;
const DAY_MONTH = /(\d{1,2})[./](\d{1,2})(?:[./](\d{4}|\d{2})(?!\d))?/;
const CLOCK = /(\d{1,2})\s*[:hH]\s*(\d{2})(?::(\d{2}))?/;
const HOUR_ONLY = /\b(\d{1,2})\s*h\b/i;
const ZONE_DESIGNATOR = /(?:Z|GMT|UTC|[+-]\d{2}:?\d{2})\s*$/i;

/** Reads '2026-03-15', '15/03', '15.03', '15/03/2026' or '15/03/26'. */
export function parseDateToken(token: string): DateParts | null {
  const trimmed = token.trim();
  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    return { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) };
  }
  const dm = DAY_MONTH.exec(trimmed);
  if (!dm) return null;
  let year: number | null = null;
  if (dm[3]) {
    year = Number(dm[3]);
    if (year < 100) year += 2000;
  }
  return { year, month: Number(dm[2]), day: Number(dm[1]) };
}

/** Reads '16:00', '16h00', '16h' or '16:00:30'. */
export function parseTimeToken(token: string | null | undefined): ClockParts | null {
  if (!token) return null;
  const clock = CLOCK.exec(token);
  if (clock) {
    const parts = { hour: Number(clock[1]), minute: Number(clock[2]), second: Number(clock[3] ?? 0) };
    return isValidClock(parts.hour, parts.minute, parts.second) ? parts : null;
  }
  const hourOnly = HOUR_ONLY.exec(token);
  if (hourOnly) {
    const hour = Number(hourOnly[1]);
    return isValidClock(hour, 0) ? { hour, minute: 0, second: 0 } : null;
  }
  return null;
}

function offsetMinutes(designator: string): number {
  if (designator.toUpperCase() === 'Z') return 0;
  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Turns whatever an extractor saw into a wall-clock time in the configured
 * zone. Partial dates get their year from the caller's window.
 */
export class DateTimeResolver {
  readonly timeZone: string;
  private readonly log: Logger;

  constructor(options: DateTimeResolverOptions) {
    this.timeZone = options.timeZone;
    this.log = options.logger ?? rootLogger.child({ component: 'datetime' });
  }

  resolve(when: RawWhen | null, window: DateWindow): ResolvedDateTime | null {
    if (!when) return null;
    switch (when.kind) {
      case 'epoch':
        return this.resolveEpoch(when.seconds);
      case 'timestamp':
        return this.resolveTimestamp(when.value, window);
      case 'tokens':
        return this.resolveTokens(when.date, when.time, window);
    }
  }

  resolveEpoch(seconds: number): ResolvedDateTime | null {
    if (!Number.isFinite(seconds)) return null;
    const instant = new Date(seconds * 1000);
    if (Number.isNaN(instant.getTime())) return null;
    return this.build(instantToLocal(instant, this.timeZone), false, true);
  }

  /**
   * A zoned timestamp is moved to the local zone (same instant).
   * A naive one is read as local wall clock and only labelled.
   */
  resolveTimestamp(value: string, window: DateWindow): ResolvedDateTime | null {
    const trimmed = value.trim();
    const m = ISO_TIMESTAMP.exec(trimmed);
    if (m) {
      const year = Number(m[1]);
      const month = Number(m[2]);
      const day = Number(m[3]);
      if (!isValidCalendarDate(year, month, day)) return null;

      const timeKnown = m[4] !== undefined;
      const clock: ClockParts = {
        hour: Number(m[4] ?? 0),
        minute: Number(m[5] ?? 0),
        second: Number(m[6] ?? 0),
      };
      if (!isValidClock(clock.hour, clock.minute, clock.second)) return null;

      const zone = m[7];
      if (zone && timeKnown) {
        const utcMs =
          Date.UTC(year, month - 1, day, clock.hour, clock.minute, clock.second) -
          offsetMinutes(zone) * 60_000;
        return this.build(instantToLocal(new Date(utcMs), this.timeZone), false, true);
      }
      if (!timeKnown) this.warnUnknownTime(trimmed);
      return this.build({ year, month, day, ...clock }, false, timeKnown);
    }

    // RFC 2822 and friends: only trusted when they name their zone
    if (ZONE_DESIGNATOR.test(trimmed) && !/^\d{1,2}[./]/.test(trimmed)) {
      const parsed = new Date(trimmed);
      if (!Number.isNaN(parsed.getTime())) {
        return this.build(instantToLocal(parsed, this.timeZone), false, true);
      }
    }

    // '15/03/2026 16:00' style strings
    const dm = DAY_MONTH.exec(trimmed);
    if (dm) {
      const rest = trimmed.slice(dm.index + dm[0].length);
      return this.resolveTokens(dm[0], CLOCK.test(rest) ? rest : null, window);
    }
    return null;
  }

  resolveTokens(
    dateToken: string,
    timeToken: string | null | undefined,
    window: DateWindow,
  ): ResolvedDateTime | null {
    const date = parseDateToken(dateToken);
    if (!date) return null;

    const clock = parseTimeToken(timeToken);
    const timeKnown = clock !== null;
    if (!timeKnown) this.warnUnknownTime(dateToken);
    const hms: ClockParts = clock ?? { hour: 0, minute: 0, second: 0 };

    if (date.year !== null) {
      if (!isValidCalendarDate(date.year, date.month, date.day)) return null;
      return this.build({ year: date.year, month: date.month, day: date.day, ...hms }, false, timeKnown);
    }

    const year = this.inferYear(date.month, date.day, window);
    if (year === null) return null;
    return this.build({ year: year.value, month: date.month, day: date.day, ...hms }, year.inferred, timeKnown);
  }

  /**
   * Walks every year the window touches, oldest first, and takes the first
   * one that puts day/month inside the window. Falls back to the window's
   * start year, flagged as inferred.
   */
  inferYear(month: number, day: number, window: DateWindow): { value: number; inferred: boolean } | null {
    const first = yearOf(window.from);
    const last = yearOf(window.to);
    for (let year = first; year <= last; year++) {
      if (!isValidCalendarDate(year, month, day)) continue;
      if (isWithinWindow(toIsoDate(year, month, day), window)) {
        return { value: year, inferred: false };
      }
    }
    if (!isValidCalendarDate(first, month, day)) {
      this.log.warn({ day, month, window }, 'Invalid day/month for every candidate year, dropping');
      return null;
    }
    this.log.warn(
      { day, month, year: first, window },
      'No candidate year inside the window, assuming window start year',
    );
    return { value: first, inferred: true };
  }

  private warnUnknownTime(token: string): void {
    this.log.warn({ token }, 'Kick-off time not informed, assuming 00:00:00');
  }

  private build(local: LocalDateTime, yearInferred: boolean, timeKnown: boolean): ResolvedDateTime {
    return {
      local,
      formatted: formatLocalDateTime(local),
      date: toIsoDate(local.year, local.month, local.day),
      yearInferred,
      timeKnown,
    };
  }
}
