import { describe, it, expect } from 'vitest';
import {
  FUZZY_MATCH_THRESHOLD,
  TeamCanonicalizer,
  normalizeNameKey,
  similarity,
} from '../../src/pipeline/team-resolver.js';
import { MINEIRO_TEAMS } from '../../src/pipeline/team-aliases.js';

describe('normalizeNameKey', () => {
  it('should drop accents, case and punctuation', () => {
    expect(normalizeNameKey('Atlético-MG')).toBe('atleticomg');
    expect(normalizeNameKey('  América Futebol Clube ')).toBe('americafutebolclube');
    expect(normalizeNameKey(null)).toBe('');
  });
});

describe('similarity', () => {
  it('should be 1 for equal strings and 0 for two empty ones', () => {
    expect(similarity('cruzeiro', 'cruzeiro')).toBe(1);
    expect(similarity('', '')).toBe(0);
  });

  it('should scale edit distance by the longer string', () => {
    expect(similarity('cruzeyro', 'cruzeiro')).toBe(0.875);
  });
});

describe('TeamCanonicalizer', () => {
  const canon = new TeamCanonicalizer(MINEIRO_TEAMS);

  it('should map every alias spelling of a club to one name', () => {
    for (const spelling of ['Atlético-MG', 'atletico mineiro', 'Galo', 'CAM', 'Clube Atlético Mineiro']) {
      expect(canon.canonicalize(spelling)).toBe('Atletico-MG');
    }
    for (const spelling of ['América Mineiro', 'Coelho', 'america-mg']) {
      expect(canon.canonicalize(spelling)).toBe('America-MG');
    }
  });

  it('should be idempotent', () => {
    for (const name of ['Cruzeiro EC', 'Atlético Mineiro', 'Coelho', 'Cruzeyro', 'Tombense']) {
      const once = canon.canonicalize(name);
      expect(canon.canonicalize(once)).toBe(once);
    }
  });

  it('should match an alias contained in a longer name', () => {
    const match = canon.match('Cruzeiro (MG)');
    expect(match?.canonical).toBe('Cruzeiro');
    expect(match?.method).toBe('substring');
  });

  it('should prefer the longest contained alias', () => {
    expect(canon.match('Clube Atlético Mineiro SAF')?.key).toBe('clubeatleticomineiro');
  });

  it('should not use short abbreviations as substrings', () => {
    // 'cam' sits inside 'campinense' but is only ever an exact match
    expect(canon.canonicalize('Campinense')).toBe('Campinense');
  });

  it('should fall back to fuzzy matching above the threshold', () => {
    const match = canon.match('Cruzeyro');
    expect(match?.canonical).toBe('Cruzeiro');
    expect(match?.method).toBe('fuzzy');
    expect(match?.score).toBeGreaterThanOrEqual(FUZZY_MATCH_THRESHOLD);
  });

  it('should return unknown teams trimmed and unchanged', () => {
    expect(canon.canonicalize('  Tombense ')).toBe('Tombense');
    expect(canon.match('Tombense')).toBeNull();
  });

  it('should return an empty name for missing input', () => {
    expect(canon.canonicalize(null)).toBe('');
    expect(canon.canonicalize('   ')).toBe('');
  });

  it('should compare spellings by canonical identity', () => {
    expect(canon.sameTeam('Galo', 'Atlético-MG')).toBe(true);
    expect(canon.sameTeam('Galo', 'Cruzeiro')).toBe(false);
    expect(canon.sameTeam('', '')).toBe(false);
  });

  it('should tell whether a fixture involves a target team', () => {
    const targets = canon.targetKeys(['Cruzeiro', 'Atletico-MG']);
    expect(canon.involvesTarget('Tombense', 'Raposa', targets)).toBe(true);
    expect(canon.involvesTarget('Coelho', 'Tombense', targets)).toBe(false);
  });

  it('should refuse a table where one alias names two teams', () => {
    expect(
      () =>
        new TeamCanonicalizer([
          { name: 'Villa Nova', aliases: ['Leão'] },
          { name: 'Sport', aliases: ['leao'] },
        ]),
    ).toThrow(/maps to both Villa Nova and Sport/);
  });
});
