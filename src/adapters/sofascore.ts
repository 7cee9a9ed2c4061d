import { z } from 'zod';
import { ApiAdapter, findByTeam } from './base-adapter.js';
import type { SourceAdapterConfig, SourceTarget } from '../types/adapter.js';
import type { ApiRawEvent, DateWindow } from '../types/fixture.js';
import { MalformedUpstreamDataError, UnresolvableIdentityError } from '../types/errors.js';

export const SOFASCORE_TEAM_IDS: Readonly<Record<string, number>> = {
  Cruzeiro: 1241,
  'Atletico-MG': 1237,
  'America-MG': 1234,
};

const named = z.object({ name: z.string().optional(), shortName: z.string().optional() }).passthrough();

const eventSchema = z
  .object({
    id: z.union([z.number(), z.string()]).optional(),
    homeTeam: named.optional(),
    awayTeam: named.optional(),
    startTimestamp: z.number().optional(),
    tournament: named.optional(),
    competition: named.optional(),
    status: z
      .union([z.string(), z.object({ description: z.string().optional(), type: z.string().optional() })])
      .optional(),
    venue: z
      .object({ name: z.string().optional(), stadium: named.optional() })
      .passthrough()
      .optional(),
    roundInfo: z.object({ round: z.number().optional() }).passthrough().optional(),
    season: z.object({ year: z.string().optional(), name: z.string().optional() }).passthrough().optional(),
    homeScore: z.object({ current: z.number().optional() }).passthrough().optional(),
    awayScore: z.object({ current: z.number().optional() }).passthrough().optional(),
  })
  .passthrough();

const payloadSchema = z
  .object({
    events: z.array(z.unknown()).optional(),
    matches: z.array(z.unknown()).optional(),
  })
  .passthrough();

type SofascoreEvent = z.infer<typeof eventSchema>;

function statusOf(status: SofascoreEvent['status']): string | undefined {
  if (typeof status === 'string') return status || undefined;
  return status?.description || status?.type || undefined;
}

/**
 * SofaScore public API: GET /team/{id}/events/next/0.
 * `startTimestamp` is Unix seconds; 403/404 come back for teams it hides.
 */
export class SofascoreAdapter extends ApiAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'sofascore',
    name: 'SofaScore',
    label: 'sofascore.com',
    kind: 'api',
    baseUrl: 'https://api.sofascore.com/api/v1',
    competitionFallback: 'SofaScore',
    rateLimitMs: 1000,
    maxAttempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
  };

  protected override requestHeaders(): Record<string, string> {
    return { Origin: 'https://www.sofascore.com', Referer: 'https://www.sofascore.com/' };
  }

  async resolveTarget(team: string, _window: DateWindow): Promise<SourceTarget> {
    const id = findByTeam(SOFASCORE_TEAM_IDS, team);
    if (id === undefined) throw new UnresolvableIdentityError(this.config.id, team);
    return { team, cacheKey: `team:${id}`, path: `/team/${id}/events/next/0` };
  }

  protected project(body: unknown): ApiRawEvent[] {
    const payload = payloadSchema.safeParse(body);
    if (!payload.success) {
      throw new MalformedUpstreamDataError('SofaScore payload is not an object', { cause: payload.error });
    }
    const items = payload.data.events ?? payload.data.matches ?? [];

    const events: ApiRawEvent[] = [];
    for (const item of items) {
      const parsed = eventSchema.safeParse(item);
      if (!parsed.success) {
        this.log.debug({ issues: parsed.error.issues.length }, 'Skipping malformed SofaScore event');
        continue;
      }
      events.push(this.toRawEvent(parsed.data));
    }
    return events;
  }

  private toRawEvent(ev: SofascoreEvent): ApiRawEvent {
    const raw: ApiRawEvent = {
      origin: 'api',
      homeRaw: ev.homeTeam?.name || ev.homeTeam?.shortName || null,
      awayRaw: ev.awayTeam?.name || ev.awayTeam?.shortName || null,
      when: ev.startTimestamp !== undefined ? { kind: 'epoch', seconds: ev.startTimestamp } : null,
    };
    const venue = ev.venue?.name || ev.venue?.stadium?.name;
    if (venue) raw.venue = venue;
    const competition = ev.tournament?.name || ev.competition?.name;
    if (competition) raw.competition = competition;
    const status = statusOf(ev.status);
    if (status) raw.status = status;
    if (ev.roundInfo?.round !== undefined) raw.round = String(ev.roundInfo.round);
    const season = ev.season?.year || ev.season?.name;
    if (season) raw.season = season;
    if (ev.homeScore?.current !== undefined) raw.homeGoals = ev.homeScore.current;
    if (ev.awayScore?.current !== undefined) raw.awayGoals = ev.awayScore.current;
    if (ev.id !== undefined) raw.sourceEventId = String(ev.id);
    return raw;
  }
}
