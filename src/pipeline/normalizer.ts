import type { DateWindow, NormalizedFixture, RawEvent } from '../types/fixture.js';
import type { SourceAdapterConfig } from '../types/adapter.js';
import type { DateTimeResolver } from './datetime.js';
import type { TeamCanonicalizer } from './team-resolver.js';
import { computeExternalId } from './dedup.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_STATUS = 'scheduled';

export type SkipReason = 'missing_team' | 'invalid_timestamp';

export type NormalizeResult =
  | { ok: true; fixture: NormalizedFixture; date: string; yearInferred: boolean; timeKnown: boolean }
  | { ok: false; reason: SkipReason };

export interface NormalizeContext {
  source: Pick<SourceAdapterConfig, 'id' | 'label' | 'competitionFallback'>;
  canonicalizer: TeamCanonicalizer;
  resolver: DateTimeResolver;
  window: DateWindow;
  logger?: Logger;
}

function clean(value: string | undefined): string {
  return value?.replace(/\s+/g, ' ').trim() ?? '';
}

/**
 * Projects one raw event onto the canonical fixture shape.
 * Records without both teams or without a usable kick-off are skipped.
 */
export function normalizeEvent(raw: RawEvent, ctx: NormalizeContext): NormalizeResult {
  const log = ctx.logger ?? rootLogger;

  const home = ctx.canonicalizer.canonicalize(raw.homeRaw);
  const away = ctx.canonicalizer.canonicalize(raw.awayRaw);
  if (!home || !away) {
    log.debug(
      { origin: raw.origin, sourceEventId: raw.sourceEventId, home: raw.homeRaw, away: raw.awayRaw },
      'Missing team name, skipping event',
    );
    return { ok: false, reason: 'missing_team' };
  }

  const resolved = ctx.resolver.resolve(raw.when, ctx.window);
  if (!resolved) {
    log.warn(
      { origin: raw.origin, sourceEventId: raw.sourceEventId, home, away, when: raw.when },
      'Could not resolve kick-off, skipping event',
    );
    return { ok: false, reason: 'invalid_timestamp' };
  }

  const competition = clean(raw.competition) || ctx.source.competitionFallback;
  const venue = clean(raw.venue);
  const status = clean(raw.status) || DEFAULT_STATUS;

  const fixture: NormalizedFixture = {
    external_id: computeExternalId({
      sourceId: ctx.source.id,
      competition,
      homeTeam: home,
      awayTeam: away,
      matchDatetime: resolved.formatted,
      venue,
    }),
    competition,
    match_datetime: resolved.formatted,
    home_team: home,
    away_team: away,
    venue,
    status,
    source: ctx.source.label,
  };
  if (raw.season) fixture.season = clean(raw.season);
  if (raw.round) fixture.round = clean(raw.round);
  if (raw.homeGoals !== undefined) fixture.home_goals = raw.homeGoals;
  if (raw.awayGoals !== undefined) fixture.away_goals = raw.awayGoals;

  return {
    ok: true,
    fixture,
    date: resolved.date,
    yearInferred: resolved.yearInferred,
    timeKnown: resolved.timeKnown,
  };
}
