import type { Dispatcher } from 'undici';
import type { RateLimiter, Sleep } from '../compliance/rate-limiter.js';
import { RateLimitedFetcher } from '../http/rate-limited-fetcher.js';
import { createPageChain, type ExtractionChain } from '../extraction/chain.js';
import type { HeuristicProfile } from '../extraction/heuristic.js';
import type { TextFallbackOptions } from '../extraction/text-fallback.js';
import type { SourceAdapter, SourceAdapterConfig, SourcePayload, SourceTarget } from '../types/adapter.js';
import type { ApiRawEvent, DateWindow, RawEvent } from '../types/fixture.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { normalizeNameKey } from '../pipeline/team-resolver.js';

/** Run-wide settings and test seams handed to every adapter. */
export interface AdapterDeps {
  timeoutMs?: number;
  /** Overrides the adapter's own retry budget */
  maxAttempts?: number;
  backoffMs?: number;
  /** Overrides the adapter's own rateLimitMs */
  minDelayMs?: number;
  maxRedirections?: number;
  rateLimiter?: RateLimiter;
  dispatcher?: Dispatcher;
  sleep?: Sleep;
  logger?: Logger;
}

/** Looks a team up in a per-source table keyed by canonical name. */
export function findByTeam<T>(table: Readonly<Record<string, T>>, team: string): T | undefined {
  const key = normalizeNameKey(team);
  for (const [name, value] of Object.entries(table)) {
    if (normalizeNameKey(name) === key) return value;
  }
  return undefined;
}

export abstract class BaseAdapter implements SourceAdapter {
  abstract readonly config: SourceAdapterConfig;
  private client: RateLimitedFetcher | undefined;

  constructor(protected readonly deps: AdapterDeps = {}) {}

  abstract resolveTarget(team: string, window: DateWindow): Promise<SourceTarget>;
  abstract fetchPayload(target: SourceTarget): Promise<SourcePayload>;
  abstract extract(payload: SourcePayload): RawEvent[];

  protected get log(): Logger {
    return (this.deps.logger ?? rootLogger).child({ source: this.config.id });
  }

  /** Extra request headers, e.g. API keys. */
  protected requestHeaders(): Record<string, string> {
    return {};
  }

  // built on first use: `config` is assigned after this constructor runs
  protected get fetcher(): RateLimitedFetcher {
    this.client ??= new RateLimitedFetcher({
      baseUrl: this.config.baseUrl,
      headers: this.requestHeaders(),
      maxAttempts: this.deps.maxAttempts ?? this.config.maxAttempts,
      backoffMs: this.deps.backoffMs ?? this.config.backoff.delay,
      minDelayMs: this.deps.minDelayMs ?? this.config.rateLimitMs,
      rateLimitKey: this.config.id,
      timeoutMs: this.deps.timeoutMs,
      maxRedirections: this.deps.maxRedirections,
      rateLimiter: this.deps.rateLimiter,
      dispatcher: this.deps.dispatcher,
      sleep: this.deps.sleep,
      logger: this.log.child({ component: 'fetcher' }),
    });
    return this.client;
  }
}

/** HTML source read through the structured -> heuristic -> text chain. */
export abstract class PageAdapter extends BaseAdapter {
  private pageChain: ExtractionChain | undefined;

  /** Site-specific overrides of the heuristic profile. */
  protected heuristicProfile(): Partial<HeuristicProfile> {
    return {};
  }

  protected textFallback(): Partial<TextFallbackOptions> {
    return {};
  }

  /** Logged with their surrounding text when a page yields nothing. */
  protected diagnosticKeywords(): readonly string[] {
    return [];
  }

  get chain(): ExtractionChain {
    this.pageChain ??= createPageChain({
      heuristic: this.heuristicProfile(),
      text: this.textFallback(),
      diagnosticKeywords: this.diagnosticKeywords(),
      logger: this.log,
    });
    return this.pageChain;
  }

  async fetchPayload(target: SourceTarget): Promise<SourcePayload> {
    const html = await this.fetcher.getText(target.path, target.params);
    return { kind: 'html', html };
  }

  extract(payload: SourcePayload): RawEvent[] {
    if (payload.kind !== 'html') {
      this.log.warn({ kind: payload.kind }, 'Page source received a non-HTML payload');
      return [];
    }
    return this.chain.run(payload.html).events;
  }
}

/** JSON source; each adapter projects its own body shape. */
export abstract class ApiAdapter extends BaseAdapter {
  protected abstract project(body: unknown): ApiRawEvent[];

  async fetchPayload(target: SourceTarget): Promise<SourcePayload> {
    const body = await this.fetcher.getJson(target.path, target.params);
    return { kind: 'json', body };
  }

  extract(payload: SourcePayload): RawEvent[] {
    if (payload.kind !== 'json') {
      this.log.warn({ kind: payload.kind }, 'API source received a non-JSON payload');
      return [];
    }
    return this.project(payload.body);
  }
}
