export type ExtractionOrigin = 'structured' | 'heuristic' | 'text' | 'api';

/** How an extractor saw the kick-off moment. */
export type RawWhen =
  /** Full timestamp string, e.g. '2026-03-15T16:00:00-03:00' or '2026-03-15 16:00' */
  | { kind: 'timestamp'; value: string }
  /** Unix seconds, as served by the JSON APIs */
  | { kind: 'epoch'; seconds: number }
  /** Partial tokens scraped from text, e.g. date '15/03', time '16h00' */
  | { kind: 'tokens'; date: string; time: string | null };

interface RawEventBase {
  homeRaw: string | null;
  awayRaw: string | null;
  when: RawWhen | null;
  venue?: string;
  status?: string;
  competition?: string;
  round?: string;
  season?: string;
  homeGoals?: number;
  awayGoals?: number;
  /** Upstream identifier, kept for logging only */
  sourceEventId?: string;
}

export interface StructuredRawEvent extends RawEventBase {
  origin: 'structured';
}

export interface HeuristicRawEvent extends RawEventBase {
  origin: 'heuristic';
  /** Flattened card text the event was read from */
  cardText: string;
}

export interface TextRawEvent extends RawEventBase {
  origin: 'text';
  /** The comma-separated item the event was split from */
  item: string;
}

export interface ApiRawEvent extends RawEventBase {
  origin: 'api';
}

/** Directly extracted from a page or API payload. Minimal normalization. */
export type RawEvent = StructuredRawEvent | HeuristicRawEvent | TextRawEvent | ApiRawEvent;

/** Canonical output unit, in the sink's wire field names. */
export interface NormalizedFixture {
  external_id: string;
  competition: string;
  /** 'YYYY-MM-DD HH:MM:SS' in the configured local timezone */
  match_datetime: string;
  home_team: string;
  away_team: string;
  venue: string;
  status: string;
  source: string;
  season?: string;
  round?: string;
  home_goals?: number;
  away_goals?: number;
}

/** Inclusive calendar window, both ends as 'YYYY-MM-DD'. */
export interface DateWindow {
  from: string;
  to: string;
}
