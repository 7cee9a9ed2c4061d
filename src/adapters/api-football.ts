import { z } from 'zod';
import { ApiAdapter, findByTeam, type AdapterDeps } from './base-adapter.js';
import type { SourceAdapterConfig, SourceTarget } from '../types/adapter.js';
import type { ApiRawEvent, DateWindow } from '../types/fixture.js';
import { MalformedUpstreamDataError, NotFoundError, UnresolvableIdentityError } from '../types/errors.js';
import { normalizeNameKey } from '../pipeline/team-resolver.js';

/** Used when `/teams?search=` is unavailable or finds nothing. */
export const API_FOOTBALL_TEAM_IDS: Readonly<Record<string, number>> = {
  Cruzeiro: 135,
  'Atletico-MG': 1062,
  'America-MG': 125,
};

export interface ApiFootballOptions {
  apiKey: string;
  host: string;
  /** IANA zone the API renders fixture dates in */
  timeZone: string;
}

const envelope = z
  .object({
    errors: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
    response: z.array(z.unknown()).default([]),
  })
  .passthrough();

const teamEntry = z.object({
  team: z.object({ id: z.number(), name: z.string() }).passthrough(),
});

const goalsSchema = z.number().nullable().optional();

const fixtureEntry = z
  .object({
    fixture: z
      .object({
        id: z.number().optional(),
        date: z.string().optional(),
        timestamp: z.number().nullable().optional(),
        venue: z.object({ name: z.string().nullable().optional() }).passthrough().optional(),
        status: z.object({ long: z.string().optional(), short: z.string().optional() }).passthrough().optional(),
      })
      .passthrough(),
    league: z
      .object({
        name: z.string().optional(),
        round: z.string().optional(),
        season: z.number().optional(),
      })
      .passthrough()
      .optional(),
    teams: z.object({
      home: z.object({ name: z.string().nullable().optional() }).passthrough(),
      away: z.object({ name: z.string().nullable().optional() }).passthrough(),
    }),
    goals: z.object({ home: goalsSchema, away: goalsSchema }).optional(),
  })
  .passthrough();

type FixtureEntry = z.infer<typeof fixtureEntry>;

function hasErrors(errors: z.infer<typeof envelope>['errors']): boolean {
  if (!errors) return false;
  return Array.isArray(errors) ? errors.length > 0 : Object.keys(errors).length > 0;
}

/**
 * API-Football v3 (api-sports.io / RapidAPI).
 *
 * Team ids are looked up by name first; the static table covers a 404 or an
 * empty search. Fixtures are requested for the run window in the local zone,
 * so `fixture.date` already carries the local offset.
 */
export class ApiFootballAdapter extends ApiAdapter {
  readonly config: SourceAdapterConfig;

  constructor(
    private readonly options: ApiFootballOptions,
    deps: AdapterDeps = {},
  ) {
    super(deps);
    this.config = {
      id: 'api-football',
      name: 'API-Football',
      label: 'api-football.com',
      kind: 'api',
      baseUrl: `https://${options.host}`,
      competitionFallback: 'API-Football',
      rateLimitMs: 1000,
      maxAttempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
    };
  }

  protected override requestHeaders(): Record<string, string> {
    return { 'x-rapidapi-key': this.options.apiKey, 'x-rapidapi-host': this.options.host };
  }

  async resolveTarget(team: string, window: DateWindow): Promise<SourceTarget> {
    const id = (await this.searchTeamId(team)) ?? findByTeam(API_FOOTBALL_TEAM_IDS, team);
    if (id === undefined) throw new UnresolvableIdentityError(this.config.id, team);
    return {
      team,
      cacheKey: `team:${id}:${window.from}:${window.to}`,
      path: '/fixtures',
      params: { team: id, from: window.from, to: window.to, timezone: this.options.timeZone },
    };
  }

  /** undefined when the search endpoint is missing or finds nothing. */
  async searchTeamId(team: string): Promise<number | undefined> {
    let body: unknown;
    try {
      body = await this.fetcher.getJson('/teams', { search: team.replace(/-/g, ' ') });
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      this.log.info({ team }, 'Team search unavailable (404), using static id table');
      return undefined;
    }

    const candidates = this.unwrap(body)
      .map((item) => teamEntry.safeParse(item))
      .flatMap((parsed) => (parsed.success ? [parsed.data.team] : []));
    if (candidates.length === 0) {
      this.log.info({ team }, 'Team search found nothing, using static id table');
      return undefined;
    }

    const key = normalizeNameKey(team);
    const exact = candidates.find((c) => normalizeNameKey(c.name) === key);
    return (exact ?? candidates[0])?.id;
  }

  protected project(body: unknown): ApiRawEvent[] {
    const events: ApiRawEvent[] = [];
    for (const item of this.unwrap(body)) {
      const parsed = fixtureEntry.safeParse(item);
      if (!parsed.success) {
        this.log.debug({ issues: parsed.error.issues.length }, 'Skipping malformed API-Football fixture');
        continue;
      }
      events.push(this.toRawEvent(parsed.data));
    }
    return events;
  }

  private unwrap(body: unknown): unknown[] {
    const parsed = envelope.safeParse(body);
    if (!parsed.success) {
      throw new MalformedUpstreamDataError('API-Football response has no "response" array', {
        cause: parsed.error,
      });
    }
    if (hasErrors(parsed.data.errors)) {
      throw new MalformedUpstreamDataError(`API-Football reported errors: ${JSON.stringify(parsed.data.errors)}`);
    }
    return parsed.data.response;
  }

  private toRawEvent(entry: FixtureEntry): ApiRawEvent {
    const { fixture, league, teams, goals } = entry;
    const when: ApiRawEvent['when'] = fixture.date
      ? { kind: 'timestamp', value: fixture.date }
      : typeof fixture.timestamp === 'number'
        ? { kind: 'epoch', seconds: fixture.timestamp }
        : null;

    const raw: ApiRawEvent = {
      origin: 'api',
      homeRaw: teams.home.name ?? null,
      awayRaw: teams.away.name ?? null,
      when,
    };
    if (fixture.venue?.name) raw.venue = fixture.venue.name;
    const status = fixture.status?.long || fixture.status?.short;
    if (status) raw.status = status;
    if (league?.name) raw.competition = league.name;
    if (league?.round) raw.round = league.round;
    if (league?.season !== undefined) raw.season = String(league.season);
    if (typeof goals?.home === 'number') raw.homeGoals = goals.home;
    if (typeof goals?.away === 'number') raw.awayGoals = goals.away;
    if (fixture.id !== undefined) raw.sourceEventId = String(fixture.id);
    return raw;
  }
}
