import { request, type Dispatcher } from 'undici';
import type { NormalizedFixture } from '../types/fixture.js';
import { AuthorizationError, TransientNetworkError } from '../types/errors.js';
import { isValidCalendarDate, isValidClock } from '../utils/date.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export const MATCHES_PATH = '/bhz/football/api/matches';

export const WIRE_DEFAULTS = {
  homeTeam: 'Time',
  awayTeam: 'Adversário',
  competition: 'Campeonato Mineiro',
  source: 'FlashScore',
  venue: 'A definir',
} as const;

/** One match as the ingestion endpoint takes it. */
export interface WireMatch {
  external_id: string;
  competition: string;
  /** Same value as match_datetime; older receivers read this one */
  date: string;
  match_datetime: string;
  home_team: string;
  away_team: string;
  source: string;
  venue: string;
  status: string;
  season?: string;
  round?: string;
  home_goals?: number;
  away_goals?: number;
}

export type IngestResult =
  | { ok: true; statusCode: number; body: unknown }
  | { ok: false; statusCode: number; raw: string };

export interface IngestClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

const WIRE_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T\s](\d{1,2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;
const DMY_DATETIME = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Rewrites a datetime into 'YYYY-MM-DD HH:MM:SS'. The wall clock is kept
 * as written; an offset suffix is dropped. null when unreadable.
 */
export function normalizeWireDatetime(value: string): string | null {
  const trimmed = value.trim();
  let parts: [number, number, number, number, number, number] | null = null;

  const iso = WIRE_DATETIME.exec(trimmed);
  if (iso) {
    parts = [Number(iso[1]), Number(iso[2]), Number(iso[3]), Number(iso[4] ?? 0), Number(iso[5] ?? 0), Number(iso[6] ?? 0)];
  } else {
    const dmy = DMY_DATETIME.exec(trimmed);
    if (dmy) {
      parts = [Number(dmy[3]), Number(dmy[2]), Number(dmy[1]), Number(dmy[4] ?? 0), Number(dmy[5] ?? 0), Number(dmy[6] ?? 0)];
    }
  }
  if (!parts) return null;

  const [year, month, day, hour, minute, second] = parts;
  if (!isValidCalendarDate(year, month, day) || !isValidClock(hour, minute, second)) return null;
  return `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/** Fills the receiver's placeholders and mirrors match_datetime into date. */
export function prepareMatch(fixture: NormalizedFixture, log: Logger = rootLogger): WireMatch {
  const datetime = normalizeWireDatetime(fixture.match_datetime);
  if (datetime === null) {
    log.warn({ external_id: fixture.external_id, value: fixture.match_datetime }, 'Unreadable match_datetime sent as is');
  }
  const when = datetime ?? fixture.match_datetime;

  const match: WireMatch = {
    external_id: fixture.external_id,
    competition: fixture.competition.trim() || WIRE_DEFAULTS.competition,
    date: when,
    match_datetime: when,
    home_team: fixture.home_team.trim() || WIRE_DEFAULTS.homeTeam,
    away_team: fixture.away_team.trim() || WIRE_DEFAULTS.awayTeam,
    source: fixture.source.trim() || WIRE_DEFAULTS.source,
    venue: fixture.venue.trim() || WIRE_DEFAULTS.venue,
    status: fixture.status,
  };
  if (fixture.season !== undefined) match.season = fixture.season;
  if (fixture.round !== undefined) match.round = fixture.round;
  if (fixture.home_goals !== undefined) match.home_goals = fixture.home_goals;
  if (fixture.away_goals !== undefined) match.away_goals = fixture.away_goals;
  return match;
}

function isDatetimeComplaint(body: string): boolean {
  return body.toLowerCase().includes('time data');
}

/**
 * Posts the run's fixtures to the ingestion endpoint with a bearer token.
 * A receiver that rejects the datetime format gets one resubmission with
 * every date rewritten; a 403 aborts the run like any other 403.
 */
export class IngestClient {
  readonly url: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly log: Logger;

  constructor(options: IngestClientOptions) {
    this.url = options.baseUrl.replace(/\/+$/, '') + MATCHES_PATH;
    this.token = options.token.trim();
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.dispatcher = options.dispatcher;
    this.log = options.logger ?? rootLogger.child({ component: 'ingest' });
  }

  async postMatches(fixtures: readonly NormalizedFixture[], opts: { source?: string } = {}): Promise<IngestResult> {
    const matches = fixtures.map((f) => prepareMatch(f, this.log));
    return this.submit(matches, opts.source, true);
  }

  private async submit(matches: WireMatch[], source: string | undefined, retryOnDatetime: boolean): Promise<IngestResult> {
    const payload = source ? { source, matches } : { matches };
    const { statusCode, body } = await this.send(JSON.stringify(payload));

    if (statusCode === 403) throw new AuthorizationError(this.url, body.slice(0, 500));

    if (statusCode >= 400) {
      this.log.error({ status: statusCode, body: body.slice(0, 1000), matches: matches.length }, 'Ingest endpoint rejected the batch');
      if (retryOnDatetime && isDatetimeComplaint(body)) {
        this.log.warn('Receiver could not parse a datetime, rewriting dates and resubmitting');
        const rewritten = matches.map((m) => {
          const when = normalizeWireDatetime(m.match_datetime) ?? m.match_datetime;
          return { ...m, date: when, match_datetime: when };
        });
        return this.submit(rewritten, source, false);
      }
      return { ok: false, statusCode, raw: body.slice(0, 500) };
    }

    this.log.info({ status: statusCode, matches: matches.length }, 'Batch posted');
    try {
      return { ok: true, statusCode, body: JSON.parse(body) as unknown };
    } catch (err) {
      this.log.debug({ err }, 'Ingest response is not JSON');
      return { ok: true, statusCode, body: { ok: true, raw: body.slice(0, 500) } };
    }
  }

  private async send(body: string): Promise<{ statusCode: number; body: string }> {
    try {
      const res = await request(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${this.token}` },
        body,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
      return { statusCode: res.statusCode, body: await res.body.text() };
    } catch (err) {
      throw new TransientNetworkError(this.url, 1, { cause: err });
    }
  }
}
