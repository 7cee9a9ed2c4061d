export interface TeamAliasEntry {
  /** Canonical name written into every fixture */
  name: string;
  abbr?: string;
  aliases: readonly string[];
}

export type TeamAliasTable = readonly TeamAliasEntry[];

export type MatchMethod = 'exact' | 'substring' | 'fuzzy';

export interface TeamMatch {
  canonical: string;
  method: MatchMethod;
  /** Alias key that matched */
  key: string;
  /** 1 for exact/substring, the similarity for fuzzy */
  score: number;
}

/** Minimum similarity for a fuzzy hit, on the 0..1 normalized edit-distance scale. */
export const FUZZY_MATCH_THRESHOLD = 0.75;

/** Alias keys shorter than this never match as substrings ('cam' would hit 'americana'). */
export const MIN_SUBSTRING_KEY_LENGTH = 4;

/**
 * Lookup key for a team name: accents decomposed and dropped, lower-cased,
 * everything but letters and digits removed. 'Atlético-MG' -> 'atleticomg'.
 */
export function normalizeNameKey(name: string | null | undefined): string {
  if (!name) return '';
  return name
    .normalize('NFD')
    .replace(/\p{Mn}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]/gu, '');
}

function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min((prev[j] ?? 0) + 1, (curr[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost);
    }
    prev = curr;
  }
  return prev[b.length] ?? Math.max(a.length, b.length);
}

/** 1 - editDistance / longerLength. Two empty strings are not similar. */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 0;
  return 1 - levenshtein(a, b) / longest;
}

/**
 * Maps any spelling of a monitored team to its canonical name.
 *
 * Resolution order: exact key, alias key contained in the input key
 * (longest alias first), fuzzy match above the threshold, and finally the
 * trimmed input unchanged. Unknown teams are valid, just not canonicalized.
 */
export class TeamCanonicalizer {
  private readonly aliasMap: ReadonlyMap<string, string>;
  /** Keys eligible for substring matching, longest first */
  private readonly substringKeys: readonly string[];
  private readonly fuzzyThreshold: number;

  constructor(table: TeamAliasTable, options: { fuzzyThreshold?: number } = {}) {
    const map = new Map<string, string>();
    for (const team of table) {
      const spellings = [team.name, ...(team.abbr ? [team.abbr] : []), ...team.aliases];
      for (const spelling of spellings) {
        const key = normalizeNameKey(spelling);
        if (!key) continue;
        const existing = map.get(key);
        if (existing && existing !== team.name) {
          throw new Error(`Alias "${spelling}" maps to both ${existing} and ${team.name}`);
        }
        map.set(key, team.name);
      }
    }
    this.aliasMap = map;
    this.substringKeys = [...map.keys()]
      .filter((k) => k.length >= MIN_SUBSTRING_KEY_LENGTH)
      .sort((a, b) => b.length - a.length);
    this.fuzzyThreshold = options.fuzzyThreshold ?? FUZZY_MATCH_THRESHOLD;
  }

  match(name: string | null | undefined): TeamMatch | null {
    const key = normalizeNameKey(name);
    if (!key) return null;

    const exact = this.aliasMap.get(key);
    if (exact) return { canonical: exact, method: 'exact', key, score: 1 };

    for (const aliasKey of this.substringKeys) {
      if (key.includes(aliasKey)) {
        return { canonical: this.aliasMap.get(aliasKey) ?? aliasKey, method: 'substring', key: aliasKey, score: 1 };
      }
    }

    let best: TeamMatch | null = null;
    for (const [aliasKey, canonical] of this.aliasMap) {
      const score = similarity(key, aliasKey);
      if (score >= this.fuzzyThreshold && (!best || score > best.score)) {
        best = { canonical, method: 'fuzzy', key: aliasKey, score };
      }
    }
    return best;
  }

  canonicalize(name: string | null | undefined): string {
    if (!name) return '';
    return this.match(name)?.canonical ?? name.trim();
  }

  /** Comparison key of the canonical form. */
  key(name: string | null | undefined): string {
    return normalizeNameKey(this.canonicalize(name));
  }

  sameTeam(a: string, b: string): boolean {
    const ka = this.key(a);
    return ka !== '' && ka === this.key(b);
  }

  targetKeys(teams: readonly string[]): Set<string> {
    return new Set(teams.map((t) => this.key(t)).filter((k) => k !== ''));
  }

  /** True when either side canonicalizes to one of the targets. */
  involvesTarget(home: string, away: string, targets: ReadonlySet<string>): boolean {
    return targets.has(this.key(home)) || targets.has(this.key(away));
  }
}
