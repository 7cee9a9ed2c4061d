export type PipelineErrorKind =
  | 'transient_network'
  | 'rate_limited'
  | 'not_found'
  | 'authorization'
  | 'http_status'
  | 'malformed_upstream'
  | 'unresolvable_identity';

/**
 * Base class for every failure the pipeline classifies.
 * `recoverable` errors stop one team/source pass; the others stop the run.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly recoverable: boolean = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeout or connection failure that outlived every retry. */
export class TransientNetworkError extends PipelineError {
  readonly kind = 'transient_network';

  constructor(
    readonly url: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Network failure after ${attempts} attempt(s): ${url}`, options);
  }
}

export class RateLimitedError extends PipelineError {
  readonly kind = 'rate_limited';

  constructor(
    readonly url: string,
    readonly attempts: number,
  ) {
    super(`Still rate limited (429) after ${attempts} attempt(s): ${url}`);
  }
}

export class NotFoundError extends PipelineError {
  readonly kind = 'not_found';

  constructor(readonly url: string) {
    super(`Not found (404): ${url}`);
  }
}

/** 403 from any upstream. Credentials are wrong for the whole run. */
export class AuthorizationError extends PipelineError {
  readonly kind = 'authorization';
  override readonly recoverable = false;

  constructor(
    readonly url: string,
    readonly body: string,
  ) {
    super(`Authorization refused (403): ${url}`);
  }
}

export class HttpStatusError extends PipelineError {
  readonly kind = 'http_status';

  constructor(
    readonly url: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`HTTP ${status} from ${url}: ${body.slice(0, 200)}`);
  }
}

export class MalformedUpstreamDataError extends PipelineError {
  readonly kind = 'malformed_upstream';
}

/** A team has no identifier on a given source. */
export class UnresolvableIdentityError extends PipelineError {
  readonly kind = 'unresolvable_identity';

  constructor(
    readonly sourceId: string,
    readonly team: string,
  ) {
    super(`No ${sourceId} identity for team "${team}"`);
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function isFatal(err: unknown): boolean {
  return isPipelineError(err) && !err.recoverable;
}
