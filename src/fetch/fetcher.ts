/**
 * Diff fetcher
 *
 * Retrieves pull request diffs over HTTP with:
 * - Content-addressed caching (cache hits skip the network and the limiter)
 * - Per-host pacing and quota tracking through a shared RateLimiter
 * - One bounded retry when the provider answers "quota exceeded"
 * - A distinct DiffNotFoundError when the diff is gone
 * - Quota reads from the rate limit endpoint, fed into the limiter
 */

import { z } from 'zod';
import type { DiffCache } from './cache.js';
import type { QuotaLedger, RateLimiter } from './rate-limiter.js';
import { DiffNotFoundError, RateLimitedError, TransientFetchError } from './errors.js';
import { AbortError, sleep as defaultSleep } from '../utils/index.js';
import type { Logger } from '../cli/progress.js';

/** Accept header value asking GitHub for the unified diff representation */
export const DIFF_MEDIA_TYPE = 'application/vnd.github.v3.diff';

/** Quota endpoint; reading it does not count against the quota */
export const RATE_LIMIT_URL = 'https://api.github.com/rate_limit';

const JSON_MEDIA_TYPE = 'application/vnd.github+json';

const quotaWindowSchema = z.object({
  remaining: z.number().int(),
  /** Epoch seconds */
  reset: z.number(),
});

const rateLimitBodySchema = z.object({
  resources: z.object({
    core: quotaWindowSchema,
    search: quotaWindowSchema.optional(),
  }),
});

/**
 * Minimal fetch signature the fetcher relies on
 */
export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export interface DiffFetcherOptions {
  /** Cache to consult and fill; omit to disable caching */
  cache?: DiffCache;
  /** Shared limiter; omit to disable throttling */
  rateLimiter?: RateLimiter;
  /** Bearer token sent with every request */
  token?: string;
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  /** Wait before retrying a 429 without Retry-After (default: 60) */
  retryAfterDefaultSeconds?: number;
  /** Upper bound for the retry wait (default: 300) */
  maxRetryWaitSeconds?: number;
  /** Rewrite github.com pull request .diff URLs to the REST API (default: true) */
  useApiUrl?: boolean;
  fetchImpl?: FetchLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

const WEB_DIFF_URL = /^https?:\/\/github\.com\/([^/]+)\/([^/]+)\/pull\/(\d+)\.diff(?:[?#].*)?$/;

/**
 * Convert a GitHub web diff URL to its REST API equivalent
 *
 * `https://github.com/o/r/pull/7.diff` becomes
 * `https://api.github.com/repos/o/r/pulls/7`; other URLs are returned as is.
 */
export function toApiUrl(webUrl: string): string {
  const match = webUrl.match(WEB_DIFF_URL);
  if (!match) {
    return webUrl;
  }
  const [, owner, repo, number] = match;
  return `https://api.github.com/repos/${owner}/${repo}/pulls/${number}`;
}

const DELTA_SECONDS = /^\d+$/;
/** `Sun, 06 Nov 1994 08:49:37 GMT` */
const IMF_FIXDATE = /^[A-Z][a-z]{2}, \d{2} [A-Z][a-z]{2} \d{4} \d{2}:\d{2}:\d{2} GMT$/;

/**
 * Parse a Retry-After header (delta seconds or IMF-fixdate) into seconds
 *
 * Any other form is unreadable and yields undefined.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (DELTA_SECONDS.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  if (!IMF_FIXDATE.test(trimmed)) {
    return undefined;
  }
  const date = Date.parse(trimmed);
  if (isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}

export class DiffFetcher {
  private readonly cache?: DiffCache;
  private readonly rateLimiter?: RateLimiter;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly retryAfterDefaultSeconds: number;
  private readonly maxRetryWaitSeconds: number;
  private readonly useApiUrl: boolean;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger?: Logger;

  constructor(options: DiffFetcherOptions = {}) {
    this.cache = options.cache;
    this.rateLimiter = options.rateLimiter;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.retryAfterDefaultSeconds = options.retryAfterDefaultSeconds ?? 60;
    this.maxRetryWaitSeconds = options.maxRetryWaitSeconds ?? 300;
    this.useApiUrl = options.useApiUrl ?? true;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => globalThis.fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
  }

  /**
   * Fetch the diff text behind a URL
   *
   * @throws DiffNotFoundError when the diff no longer exists
   * @throws TransientFetchError for every other failure
   * @throws AbortError when the signal fires
   */
  async fetch(url: string, signal?: AbortSignal): Promise<string> {
    const cached = await this.readCache(url);
    if (cached !== undefined) {
      this.logger?.debug(`[DiffFetcher] Cache hit: ${url}`);
      return cached;
    }

    const requestUrl = this.useApiUrl ? toApiUrl(url) : url;
    let text: string;
    try {
      text = await this.request(requestUrl, signal);
    } catch (error) {
      if (!(error instanceof RateLimitedError)) {
        throw error;
      }

      const waitSeconds = Math.min(
        error.retryAfterSeconds ?? this.retryAfterDefaultSeconds,
        this.maxRetryWaitSeconds
      );
      this.logger?.warn(`[DiffFetcher] 429 from ${requestUrl}, retrying in ${waitSeconds}s`);
      await this.sleep(waitSeconds * 1000, signal);
      await this.rateLimiter?.refreshQuota(signal);

      try {
        text = await this.request(requestUrl, signal);
      } catch (retryError) {
        if (retryError instanceof RateLimitedError) {
          throw new TransientFetchError(requestUrl, `Still rate limited after retry: ${requestUrl}`, {
            status: 429,
            cause: retryError,
          });
        }
        throw retryError;
      }
    }

    await this.writeCache(url, text);
    return text;
  }

  /**
   * Read the current core quota from the rate limit endpoint
   *
   * Bypasses the limiter. Never throws: a failed read is logged, and a
   * failed or cancelled read yields undefined.
   */
  async fetchQuota(signal?: AbortSignal): Promise<QuotaLedger | undefined> {
    try {
      const body = await this.send(RATE_LIMIT_URL, JSON_MEDIA_TYPE, signal, async (response) => {
        const text = await response.text();
        if (!response.ok) {
          throw new TransientFetchError(RATE_LIMIT_URL, `HTTP ${response.status} fetching ${RATE_LIMIT_URL}`, {
            status: response.status,
          });
        }
        return text;
      });

      const { core, search } = rateLimitBodySchema.parse(JSON.parse(body)).resources;
      const resetAt = core.reset * 1000;
      this.logger?.debug(
        `[DiffFetcher] Rate limit: core ${core.remaining} remaining, resets at ${new Date(resetAt).toISOString()}` +
          (search ? `; search ${search.remaining} remaining` : '')
      );
      return { remaining: core.remaining, resetAt };
    } catch (error) {
      if (!signal?.aborted) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger?.warn(`[DiffFetcher] Failed to update rate limit info: ${message}`);
      }
      return undefined;
    }
  }

  private async readCache(url: string): Promise<string | undefined> {
    if (!this.cache) {
      return undefined;
    }
    try {
      return await this.cache.get(url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`[DiffFetcher] Cache read failed, fetching instead: ${message}`);
      return undefined;
    }
  }

  private async writeCache(url: string, text: string): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.set(url, text);
    } catch (error) {
      // Cache write failure is non-fatal: the diff itself is good
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`[DiffFetcher] Cache write failed for ${url}: ${message}`);
    }
  }

  private buildHeaders(accept: string): Record<string, string> {
    const headers: Record<string, string> = { Accept: accept };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }
    return headers;
  }

  /**
   * Issue one GET and classify the response
   */
  private async request(url: string, signal?: AbortSignal): Promise<string> {
    let host: string;
    try {
      host = new URL(url).hostname;
    } catch (error) {
      throw new TransientFetchError(url, `Invalid diff URL: ${url}`, { cause: error });
    }

    await this.rateLimiter?.acquire(host, signal);
    if (signal?.aborted) {
      throw new AbortError(`Fetch cancelled: ${url}`);
    }

    this.logger?.debug(`[DiffFetcher] GET ${url} (auth: ${this.token ? 'bearer' : 'none'})`);

    return this.send(url, DIFF_MEDIA_TYPE, signal, async (response) => {
      this.recordQuota(response.headers);

      if (response.ok) {
        return await response.text();
      }

      const status = response.status;
      await response.text().catch(() => '');

      if (status === 404 || status === 410) {
        throw new DiffNotFoundError(url, status);
      }
      if (status === 429 || (status === 403 && response.headers.get('x-ratelimit-remaining') === '0')) {
        throw new RateLimitedError(url, this.retryHint(response.headers));
      }
      throw new TransientFetchError(url, `HTTP ${status} fetching ${url}`, { status });
    });
  }

  /**
   * GET a URL under the request timeout and the caller's signal
   *
   * `read` consumes the response before the timer is cleared. Errors it
   * throws from the fetch error classes pass through; anything else becomes
   * an AbortError, a timeout or a network error.
   */
  private async send<T>(
    url: string,
    accept: string,
    signal: AbortSignal | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = globalThis.setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        headers: this.buildHeaders(accept),
        signal: controller.signal,
      });
      return await read(response);
    } catch (error) {
      if (
        error instanceof DiffNotFoundError ||
        error instanceof RateLimitedError ||
        error instanceof TransientFetchError
      ) {
        throw error;
      }
      if (signal?.aborted) {
        throw new AbortError(`Fetch cancelled: ${url}`);
      }
      if (timedOut) {
        throw new TransientFetchError(url, `Timed out after ${this.timeoutMs}ms: ${url}`, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientFetchError(url, `Network error fetching ${url}: ${message}`, {
        cause: error,
      });
    } finally {
      globalThis.clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Wait hint for a quota response: Retry-After, else time until reset
   */
  private retryHint(headers: Headers): number | undefined {
    const retryAfter = parseRetryAfter(headers.get('retry-after'));
    if (retryAfter !== undefined) {
      return retryAfter;
    }
    const reset = parseInt(headers.get('x-ratelimit-reset') ?? '', 10);
    if (isNaN(reset)) {
      return undefined;
    }
    return Math.max(0, Math.ceil(reset - Date.now() / 1000));
  }

  private recordQuota(headers: Headers): void {
    if (!this.rateLimiter) {
      return;
    }
    const remaining = parseInt(headers.get('x-ratelimit-remaining') ?? '', 10);
    if (isNaN(remaining)) {
      return;
    }
    const reset = parseInt(headers.get('x-ratelimit-reset') ?? '', 10);
    this.rateLimiter.updateQuota(remaining, isNaN(reset) ? undefined : reset * 1000);
  }
}
