import crypto from 'node:crypto';
import type { NormalizedFixture } from '../types/fixture.js';

/**
 * Generates a deterministic identity for a fixture.
 * Same source + competition + teams + kick-off + venue = same id.
 */
export function computeExternalId(p: {
  sourceId: string;
  competition: string;
  homeTeam: string;
  awayTeam: string;
  matchDatetime: string;
  venue: string;
}): string {
  const raw = [p.sourceId, p.competition, p.homeTeam, p.awayTeam, p.matchDatetime, p.venue]
    .map((part) => part.trim())
    .join('|')
    .toLowerCase();
  return crypto.createHash('sha256').update(raw).digest('hex').slice(0, 40);
}

/**
 * Collapses fixtures sharing an external_id.
 *
 * The last record seen for an id wins on content, but the id keeps the
 * position of its first occurrence. Downstream relies on later passes
 * overriding fields, so do not switch this to first-write-wins.
 */
export function dedupeFixtures(fixtures: readonly NormalizedFixture[]): NormalizedFixture[] {
  const byId = new Map<string, NormalizedFixture>();
  for (const fixture of fixtures) {
    byId.set(fixture.external_id, fixture);
  }
  return Array.from(byId.values());
}
