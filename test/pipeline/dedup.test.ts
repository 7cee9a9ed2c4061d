import { describe, it, expect } from 'vitest';
import { computeExternalId, dedupeFixtures } from '../../src/pipeline/dedup.js';
import type { NormalizedFixture } from '../../src/types/fixture.js';

const parts = {
  sourceId: 'ge-mineiro',
  competition: 'Campeonato Mineiro',
  homeTeam: 'Atletico-MG',
  awayTeam: 'Tombense',
  matchDatetime: '2026-03-15 16:00:00',
  venue: 'Arena MRV',
};

function fixture(id: string, overrides: Partial<NormalizedFixture> = {}): NormalizedFixture {
  return {
    external_id: id,
    competition: 'Campeonato Mineiro',
    match_datetime: '2026-03-15 16:00:00',
    home_team: 'Cruzeiro',
    away_team: 'Tombense',
    venue: '',
    status: 'scheduled',
    source: 'ge.globo.com',
    ...overrides,
  };
}

describe('computeExternalId', () => {
  it('should hash the lower-cased identity fields', () => {
    expect(computeExternalId(parts)).toBe('9e16cb627648c034d39c5c9b7bf0864d4f75a640');
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(computeExternalId({ ...parts, homeTeam: '  ATLETICO-MG ', venue: 'arena mrv' })).toBe(
      computeExternalId(parts),
    );
  });

  it('should change with any identity field', () => {
    const base = computeExternalId(parts);
    expect(computeExternalId({ ...parts, sourceId: 'flashscore' })).not.toBe(base);
    expect(computeExternalId({ ...parts, matchDatetime: '2026-03-15 18:00:00' })).not.toBe(base);
    expect(computeExternalId({ ...parts, venue: '' })).not.toBe(base);
  });

  it('should be 40 hex characters', () => {
    expect(computeExternalId(parts)).toMatch(/^[0-9a-f]{40}$/);
  });
});

describe('dedupeFixtures', () => {
  it('should keep the last record but the first position for a repeated id', () => {
    const first = fixture('a', { status: 'scheduled' });
    const other = fixture('b');
    const later = fixture('a', { status: 'postponed' });

    const result = dedupeFixtures([first, other, later]);

    expect(result.map((f) => f.external_id)).toEqual(['a', 'b']);
    expect(result[0]?.status).toBe('postponed');
  });

  it('should be idempotent', () => {
    const input = [fixture('a'), fixture('b'), fixture('a', { venue: 'Mineirão' }), fixture('c')];
    const once = dedupeFixtures(input);
    expect(dedupeFixtures(once)).toEqual(once);
  });

  it('should return an empty list for no input', () => {
    expect(dedupeFixtures([])).toEqual([]);
  });
});
