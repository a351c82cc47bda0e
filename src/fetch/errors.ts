/**
 * Diff fetch errors
 *
 * The orchestrator tells these apart with instanceof: a missing diff is a
 * skipped record, everything else is a failed one.
 */

/**
 * The remote diff no longer exists (repository deleted or made private)
 */
export class DiffNotFoundError extends Error {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number) {
    super(`Diff not found (HTTP ${status}): ${url}`);
    this.name = 'DiffNotFoundError';
    this.url = url;
    this.status = status;
  }
}

/**
 * The provider refused the request because the quota is exhausted
 */
export class RateLimitedError extends Error {
  readonly url: string;
  /** Provider wait hint in seconds, when one was sent */
  readonly retryAfterSeconds?: number;

  constructor(url: string, retryAfterSeconds?: number) {
    super(`Rate limited (HTTP 429): ${url}`);
    this.name = 'RateLimitedError';
    this.url = url;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Any other HTTP or network failure
 */
export class TransientFetchError extends Error {
  readonly url: string;
  /** HTTP status, absent for network errors and timeouts */
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientFetchError';
    this.url = url;
    this.status = options.status;
  }
}
