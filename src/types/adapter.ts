import type { DateWindow, RawEvent } from './fixture.js';

export type SourceKind = 'page' | 'api';

export interface SourceAdapterConfig {
  id: string;
  name: string;
  /** Host label written into NormalizedFixture.source */
  label: string;
  kind: SourceKind;
  baseUrl: string;
  /** Competition written when a record carries none */
  competitionFallback: string;
  /** Minimum delay between requests in ms */
  rateLimitMs: number;
  maxAttempts: number;
  backoff: { type: 'exponential'; delay: number };
}

/** Where one team's fixtures live on a source. */
export interface SourceTarget {
  team: string;
  /** Requests with equal keys return the same payload within a run */
  cacheKey: string;
  path: string;
  params?: Record<string, string | number>;
}

export type SourcePayload =
  | { kind: 'html'; html: string }
  | { kind: 'json'; body: unknown };

export interface SourceAdapter {
  readonly config: SourceAdapterConfig;

  /** Throws UnresolvableIdentityError when the team has no identity here. */
  resolveTarget(team: string, window: DateWindow): Promise<SourceTarget>;

  fetchPayload(target: SourceTarget): Promise<SourcePayload>;

  /** Never throws for bad records; returns [] when nothing is found. */
  extract(payload: SourcePayload): RawEvent[];
}
