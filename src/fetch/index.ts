/**
 * Diff Fetch Module
 *
 * HTTP retrieval of pull request diffs with caching and rate limiting.
 */

export {
  DiffFetcher,
  toApiUrl,
  parseRetryAfter,
  DIFF_MEDIA_TYPE,
  RATE_LIMIT_URL,
  type DiffFetcherOptions,
  type FetchLike,
} from './fetcher.js';

export { DiskDiffCache, cacheKey, type DiffCache } from './cache.js';

export { RateLimiter, type RateLimiterOptions, type QuotaLedger, type QuotaSource } from './rate-limiter.js';

export { DiffNotFoundError, RateLimitedError, TransientFetchError } from './errors.js';
