import { describe, it, expect } from 'vitest';
import { DateTimeResolver, parseDateToken, parseTimeToken } from '../../src/pipeline/datetime.js';
import { logger } from '../../src/utils/logger.js';

const resolver = new DateTimeResolver({ timeZone: 'America/Sao_Paulo', logger });
const YEAR_2026 = { from: '2026-01-01', to: '2026-12-31' };
const NEW_YEAR = { from: '2025-12-20', to: '2026-01-10' };

describe('parseDateToken', () => {
  it('should read day/month tokens without a year', () => {
    expect(parseDateToken('15/03')).toEqual({ year: null, month: 3, day: 15 });
    expect(parseDateToken('15.03')).toEqual({ year: null, month: 3, day: 15 });
  });

  it('should read full and two-digit years', () => {
    expect(parseDateToken('15/03/2026')).toEqual({ year: 2026, month: 3, day: 15 });
    expect(parseDateToken('15/03/26')).toEqual({ year: 2026, month: 3, day: 15 });
  });

  it('should read ISO dates', () => {
    expect(parseDateToken('2026-03-15')).toEqual({ year: 2026, month: 3, day: 15 });
  });

  it('should return null for text without a date', () => {
    expect(parseDateToken('sábado')).toBeNull();
  });
});

describe('parseTimeToken', () => {
  it('should read the common clock spellings', () => {
    expect(parseTimeToken('16:00')).toEqual({ hour: 16, minute: 0, second: 0 });
    expect(parseTimeToken('16h30')).toEqual({ hour: 16, minute: 30, second: 0 });
    expect(parseTimeToken('16h')).toEqual({ hour: 16, minute: 0, second: 0 });
    expect(parseTimeToken('21:45:10')).toEqual({ hour: 21, minute: 45, second: 10 });
  });

  it('should reject impossible or missing times', () => {
    expect(parseTimeToken('25:00')).toBeNull();
    expect(parseTimeToken(null)).toBeNull();
    expect(parseTimeToken('a definir')).toBeNull();
  });
});

describe('DateTimeResolver', () => {
  describe('tokens', () => {
    it('should place a day/month inside the window year', () => {
      const r = resolver.resolve({ kind: 'tokens', date: '15/03', time: '16:00' }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 16:00:00');
      expect(r?.date).toBe('2026-03-15');
      expect(r?.yearInferred).toBe(false);
      expect(r?.timeKnown).toBe(true);
    });

    it('should pick the later year for January dates in a window spanning new year', () => {
      const r = resolver.resolve({ kind: 'tokens', date: '05/01', time: '19h30' }, NEW_YEAR);
      expect(r?.formatted).toBe('2026-01-05 19:30:00');
      expect(r?.yearInferred).toBe(false);
    });

    it('should pick the earlier year for December dates in a window spanning new year', () => {
      const r = resolver.resolve({ kind: 'tokens', date: '28/12', time: '16:00' }, NEW_YEAR);
      expect(r?.formatted).toBe('2025-12-28 16:00:00');
    });

    it('should fall back to the window start year and flag it when no year fits', () => {
      const r = resolver.resolve({ kind: 'tokens', date: '15/07', time: '16:00' }, NEW_YEAR);
      expect(r?.formatted).toBe('2025-07-15 16:00:00');
      expect(r?.yearInferred).toBe(true);
    });

    it('should skip candidate years where the date does not exist', () => {
      const r = resolver.resolve(
        { kind: 'tokens', date: '29/02', time: '16:00' },
        { from: '2027-01-01', to: '2028-12-31' },
      );
      expect(r?.formatted).toBe('2028-02-29 16:00:00');
    });

    it('should return null for a day/month that exists in no year', () => {
      expect(resolver.resolve({ kind: 'tokens', date: '31/02', time: '16:00' }, YEAR_2026)).toBeNull();
    });

    it('should default a missing time to midnight and say so', () => {
      const r = resolver.resolve({ kind: 'tokens', date: '22/03', time: null }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-22 00:00:00');
      expect(r?.timeKnown).toBe(false);
    });

    it('should use an explicit year as given', () => {
      const r = resolver.resolve({ kind: 'tokens', date: '15/03/2027', time: '16:00' }, YEAR_2026);
      expect(r?.formatted).toBe('2027-03-15 16:00:00');
      expect(r?.yearInferred).toBe(false);
    });
  });

  describe('timestamps', () => {
    it('should convert a UTC timestamp to local wall clock', () => {
      const r = resolver.resolve({ kind: 'timestamp', value: '2026-03-15T19:00:00Z' }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 16:00:00');
    });

    it('should convert a timestamp with a foreign offset', () => {
      const r = resolver.resolve({ kind: 'timestamp', value: '2026-03-15T21:30:00+02:00' }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 16:30:00');
    });

    it('should keep a timestamp already in the local offset', () => {
      const r = resolver.resolve({ kind: 'timestamp', value: '2026-03-15T16:00:00-03:00' }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 16:00:00');
    });

    it('should label a naive timestamp as local without shifting it', () => {
      const r = resolver.resolve({ kind: 'timestamp', value: '2026-03-15 16:00' }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 16:00:00');
      expect(r?.timeKnown).toBe(true);
    });

    it('should treat a date-only timestamp as unknown time', () => {
      const r = resolver.resolve({ kind: 'timestamp', value: '2026-03-15' }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 00:00:00');
      expect(r?.timeKnown).toBe(false);
    });

    it('should read day-first timestamps', () => {
      const r = resolver.resolve({ kind: 'timestamp', value: '15/03/2026 16h00' }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 16:00:00');
    });

    it('should read RFC 2822 timestamps that name their zone', () => {
      const r = resolver.resolve({ kind: 'timestamp', value: 'Sun, 15 Mar 2026 19:00:00 GMT' }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 16:00:00');
    });

    it('should return null for impossible or unreadable timestamps', () => {
      expect(resolver.resolve({ kind: 'timestamp', value: '2026-02-30T16:00:00Z' }, YEAR_2026)).toBeNull();
      expect(resolver.resolve({ kind: 'timestamp', value: 'a definir' }, YEAR_2026)).toBeNull();
    });
  });

  describe('epoch', () => {
    it('should convert Unix seconds to local time', () => {
      const r = resolver.resolve({ kind: 'epoch', seconds: 1773601200 }, YEAR_2026);
      expect(r?.formatted).toBe('2026-03-15 16:00:00');
      expect(r?.timeKnown).toBe(true);
    });

    it('should move the calendar date when the local clock is still on the previous day', () => {
      const r = resolver.resolve({ kind: 'epoch', seconds: 1767232800 }, NEW_YEAR);
      expect(r?.formatted).toBe('2025-12-31 23:00:00');
      expect(r?.date).toBe('2025-12-31');
    });
  });

  it('should return null when nothing was recognised', () => {
    expect(resolver.resolve(null, YEAR_2026)).toBeNull();
  });
});
