import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { normalizeEvent, type NormalizeContext } from '../../src/pipeline/normalizer.js';
import { DateTimeResolver } from '../../src/pipeline/datetime.js';
import { TeamCanonicalizer } from '../../src/pipeline/team-resolver.js';
import { MINEIRO_TEAMS } from '../../src/pipeline/team-aliases.js';
import type { HeuristicRawEvent } from '../../src/types/fixture.js';

const ctx: NormalizeContext = {
  source: { id: 'ge-mineiro', label: 'ge.globo.com', competitionFallback: 'Campeonato Mineiro' },
  canonicalizer: new TeamCanonicalizer(MINEIRO_TEAMS),
  resolver: new DateTimeResolver({ timeZone: 'America/Sao_Paulo' }),
  window: { from: '2026-01-01', to: '2026-12-31' },
};

function card(overrides: Partial<HeuristicRawEvent> = {}): HeuristicRawEvent {
  return {
    origin: 'heuristic',
    homeRaw: 'Atlético Mineiro',
    awayRaw: ' Tombense ',
    when: { kind: 'tokens', date: '15/03', time: '16h00' },
    venue: 'Arena MRV',
    cardText: 'Atlético Mineiro x Tombense 15/03 16h00 Arena MRV',
    ...overrides,
  };
}

describe('normalizeEvent', () => {
  it('should project a raw card onto the canonical fixture', () => {
    const result = normalizeEvent(card(), ctx);

    expect(result).toEqual({
      ok: true,
      date: '2026-03-15',
      yearInferred: false,
      timeKnown: true,
      fixture: {
        external_id: '9e16cb627648c034d39c5c9b7bf0864d4f75a640',
        competition: 'Campeonato Mineiro',
        match_datetime: '2026-03-15 16:00:00',
        home_team: 'Atletico-MG',
        away_team: 'Tombense',
        venue: 'Arena MRV',
        status: 'scheduled',
        source: 'ge.globo.com',
      },
    });
  });

  it('should keep the record competition, status and extras when present', () => {
    const result = normalizeEvent(
      card({ competition: ' Copa do Brasil ', status: 'postponed', round: '3ª fase', season: '2026', homeGoals: 2, awayGoals: 0 }),
      ctx,
    );
    if (!result.ok) throw new Error('expected a fixture');
    expect(result.fixture.competition).toBe('Copa do Brasil');
    expect(result.fixture.status).toBe('postponed');
    expect(result.fixture.round).toBe('3ª fase');
    expect(result.fixture.season).toBe('2026');
    expect(result.fixture.home_goals).toBe(2);
    expect(result.fixture.away_goals).toBe(0);
  });

  it('should default the venue to an empty string', () => {
    const result = normalizeEvent(card({ venue: undefined }), ctx);
    expect(result.ok && result.fixture.venue).toBe('');
  });

  it('should skip records missing a team', () => {
    expect(normalizeEvent(card({ awayRaw: null }), ctx)).toEqual({ ok: false, reason: 'missing_team' });
    expect(normalizeEvent(card({ homeRaw: '  ' }), ctx)).toEqual({ ok: false, reason: 'missing_team' });
  });

  it('should skip records without a usable kick-off', () => {
    expect(normalizeEvent(card({ when: null }), ctx)).toEqual({ ok: false, reason: 'invalid_timestamp' });
    expect(normalizeEvent(card({ when: { kind: 'tokens', date: '31/02', time: null } }), ctx)).toEqual({
      ok: false,
      reason: 'invalid_timestamp',
    });
  });

  it('should name the upstream event when skipping it', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });

    normalizeEvent(card({ awayRaw: null, sourceEventId: 'g7' }), { ...ctx, logger });
    normalizeEvent(card({ when: null, sourceEventId: 'g8' }), { ...ctx, logger });

    const logged: unknown[] = lines.map((line) => JSON.parse(line));
    expect(logged).toEqual([
      expect.objectContaining({ msg: 'Missing team name, skipping event', sourceEventId: 'g7' }),
      expect.objectContaining({ msg: 'Could not resolve kick-off, skipping event', sourceEventId: 'g8' }),
    ]);
  });

  it('should give the same id to the same match read twice', () => {
    const a = normalizeEvent(card(), ctx);
    const b = normalizeEvent(card({ homeRaw: 'Galo', cardText: 'Galo x Tombense' }), ctx);
    expect(a.ok && b.ok && a.fixture.external_id === b.fixture.external_id).toBe(true);
  });
});
