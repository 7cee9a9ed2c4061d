import { request, type Dispatcher } from 'undici';
import { RateLimiter, sleep as defaultSleep, type Sleep } from '../compliance/rate-limiter.js';
import {
  AuthorizationError,
  HttpStatusError,
  MalformedUpstreamDataError,
  NotFoundError,
  RateLimitedError,
  TransientNetworkError,
} from '../types/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type QueryParams = Record<string, string | number | undefined>;

export interface FetcherOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  /** Applies to headers and body separately */
  timeoutMs?: number;
  maxAttempts?: number;
  /** First retry delay; doubles on every further attempt */
  backoffMs?: number;
  /** Pause enforced between two requests of this fetcher */
  minDelayMs?: number;
  maxRedirections?: number;
  rateLimiter?: RateLimiter;
  rateLimitKey?: string;
  dispatcher?: Dispatcher;
  sleep?: Sleep;
  logger?: Logger;
}

export const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'Accept-Language': 'pt-BR,pt;q=0.9,en-US;q=0.8,en;q=0.7',
};

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const JSON_ACCEPT = 'application/json, text/plain, */*';

/**
 * GET client shared by every source.
 *
 * Timeouts and connection errors are retried with exponential backoff, and
 * so is 429. 403 is fatal for the run, 404 is reported as NotFoundError so
 * callers can move on, anything else >= 400 carries its body.
 */
export class RateLimitedFetcher {
  readonly baseUrl: string;
  readonly maxAttempts: number;
  readonly backoffMs: number;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly minDelayMs: number;
  private readonly maxRedirections: number;
  private readonly rateLimiter: RateLimiter;
  private readonly rateLimitKey: string;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(options: FetcherOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffMs = options.backoffMs ?? 1000;
    this.minDelayMs = options.minDelayMs ?? 0;
    this.maxRedirections = options.maxRedirections ?? 3;
    this.sleep = options.sleep ?? defaultSleep;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(this.sleep);
    this.rateLimitKey = options.rateLimitKey ?? this.baseUrl;
    this.dispatcher = options.dispatcher;
    this.log = options.logger ?? rootLogger.child({ component: 'fetcher', baseUrl: this.baseUrl });
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const url = /^https?:\/\//i.test(path)
      ? new URL(path)
      : new URL(`${this.baseUrl}/${path.replace(/^\/+/, '')}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async getText(path: string, params: QueryParams = {}): Promise<string> {
    return this.send(this.buildUrl(path, params), HTML_ACCEPT);
  }

  async getJson(path: string, params: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(path, params);
    const text = await this.send(url, JSON_ACCEPT);
    try {
      return JSON.parse(text) as unknown;
    } catch (err) {
      throw new MalformedUpstreamDataError(`Response from ${url} is not valid JSON`, { cause: err });
    }
  }

  /** Delay before retrying after `attempt` failed: base, 2x base, 4x base... */
  backoffFor(attempt: number): number {
    return this.backoffMs * 2 ** (attempt - 1);
  }

  private async send(url: string, accept: string): Promise<string> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      await this.rateLimiter.acquire(this.rateLimitKey, this.minDelayMs);
      const startMs = Date.now();

      let statusCode: number;
      let body: string;
      try {
        const res = await request(url, {
          method: 'GET',
          headers: { ...this.headers, Accept: accept },
          headersTimeout: this.timeoutMs,
          bodyTimeout: this.timeoutMs,
          maxRedirections: this.maxRedirections,
          ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
        });
        statusCode = res.statusCode;
        body = await res.body.text();
      } catch (err) {
        lastError = err;
        this.log.warn({ url, attempt, maxAttempts: this.maxAttempts, err }, 'Request failed');
        if (attempt < this.maxAttempts) await this.sleep(this.backoffFor(attempt));
        continue;
      }

      const durationMs = Date.now() - startMs;

      if (statusCode >= 200 && statusCode < 300) {
        this.log.info({ url, status: statusCode, durationMs, sizeBytes: body.length }, 'GET completed');
        return body;
      }
      if (statusCode === 429) {
        this.log.warn({ url, attempt, maxAttempts: this.maxAttempts }, 'Rate limited (429)');
        if (attempt < this.maxAttempts) {
          await this.sleep(this.backoffFor(attempt));
          continue;
        }
        throw new RateLimitedError(url, attempt);
      }
      if (statusCode === 403) throw new AuthorizationError(url, body.slice(0, 500));
      if (statusCode === 404) throw new NotFoundError(url);
      throw new HttpStatusError(url, statusCode, body.slice(0, 1000));
    }

    throw new TransientNetworkError(url, this.maxAttempts, { cause: lastError });
  }
}
