/**
 * Rate limiter for diff fetches
 *
 * Combines two throttles:
 * - Per-host pacing: consecutive requests to one host are spaced by at
 *   least the host's minimum interval
 * - Quota pause: when the provider reports that the remaining quota has
 *   dropped below a threshold, all requests wait for the reset (bounded)
 *
 * Every acquisition runs through one internal lock, so pacing decisions
 * and ledger reads never interleave between concurrent workers.
 *
 * Between responses the ledger can be refreshed from a quota source (the
 * provider's rate limit endpoint); after a pause the ledger is unknown
 * until a refresh or the next response fills it.
 */

import { sleep as defaultSleep } from '../utils/index.js';
import type { Logger } from '../cli/progress.js';

/**
 * Provider quota as last reported by response headers
 */
export interface QuotaLedger {
  /** Requests left in the current window */
  remaining?: number;
  /** Window reset time (epoch milliseconds) */
  resetAt?: number;
}

export type QuotaSource = (signal?: AbortSignal) => Promise<QuotaLedger | undefined>;

export interface RateLimiterOptions {
  /** Disable to make acquire() a no-op (default: true) */
  enabled?: boolean;
  /** Minimum seconds between requests for hosts without an override (default: 0) */
  secondsBetweenRequests?: number;
  /** Per-host minimum seconds between requests */
  hosts?: Record<string, number>;
  /** Pause when remaining quota drops below this (default: 100, 0 disables) */
  lowQuotaThreshold?: number;
  /** Longest quota pause in seconds (default: 60) */
  quotaPauseSeconds?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
  /** Cancellable sleep */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Reads the current quota; undefined when it could not be read */
  quotaSource?: QuotaSource;
  logger?: Logger;
}

export class RateLimiter {
  private readonly enabled: boolean;
  private readonly defaultIntervalMs: number;
  private readonly hostIntervalsMs: Map<string, number>;
  private readonly lowQuotaThreshold: number;
  private readonly quotaPauseMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly quotaSource?: QuotaSource;
  private readonly logger?: Logger;

  private readonly lastRequestAt = new Map<string, number>();
  private ledger: QuotaLedger = {};
  private lock: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.defaultIntervalMs = toMs(options.secondsBetweenRequests ?? 0);
    this.hostIntervalsMs = new Map(
      Object.entries(options.hosts ?? {}).map(([host, seconds]) => [host.toLowerCase(), toMs(seconds)])
    );
    this.lowQuotaThreshold = options.lowQuotaThreshold ?? 100;
    this.quotaPauseMs = toMs(options.quotaPauseSeconds ?? 60);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.quotaSource = options.quotaSource;
    this.logger = options.logger;
  }

  /**
   * Minimum interval for a host in milliseconds
   */
  intervalFor(host: string): number {
    return this.hostIntervalsMs.get(host.toLowerCase()) ?? this.defaultIntervalMs;
  }

  /**
   * Wait until a request to `host` may be issued, then record it
   */
  acquire(host: string, signal?: AbortSignal): Promise<void> {
    if (!this.enabled) {
      return Promise.resolve();
    }

    return this.withLock(async () => {
      await this.pauseForQuota(signal);

      const key = host.toLowerCase();
      const interval = this.intervalFor(key);
      const last = this.lastRequestAt.get(key);
      if (last !== undefined && interval > 0) {
        const wait = last + interval - this.now();
        if (wait > 0) {
          this.logger?.debug(`[RateLimiter] Waiting ${wait}ms before next request to ${key}`);
          await this.sleep(wait, signal);
        }
      }

      this.lastRequestAt.set(key, this.now());
    });
  }

  /**
   * Record the quota reported by a response
   *
   * @param remaining - Requests left in the window
   * @param resetAt - Reset time in epoch milliseconds, when known
   */
  updateQuota(remaining: number, resetAt?: number): void {
    this.ledger = { remaining, resetAt };
    this.logger?.debug(
      `[RateLimiter] Quota updated: ${remaining} remaining` +
        (resetAt !== undefined ? `, resets at ${new Date(resetAt).toISOString()}` : '')
    );
  }

  /**
   * Ask the quota source for the current quota and record it
   *
   * No-op when disabled or without a source; a source that reports
   * nothing leaves the ledger as it is.
   */
  async refreshQuota(signal?: AbortSignal): Promise<void> {
    if (!this.enabled || !this.quotaSource) {
      return;
    }
    const quota = await this.quotaSource(signal);
    if (quota?.remaining !== undefined) {
      this.updateQuota(quota.remaining, quota.resetAt);
    }
  }

  /**
   * Current quota ledger (copy)
   */
  getLedger(): QuotaLedger {
    return { ...this.ledger };
  }

  private async pauseForQuota(signal?: AbortSignal): Promise<void> {
    const { remaining, resetAt } = this.ledger;
    if (remaining === undefined || this.lowQuotaThreshold <= 0 || remaining >= this.lowQuotaThreshold) {
      return;
    }

    const untilReset = resetAt !== undefined ? resetAt - this.now() : Infinity;
    const pause = Math.max(0, Math.min(untilReset, this.quotaPauseMs));
    this.logger?.warn(
      `[RateLimiter] Quota low (${remaining} remaining), pausing ${Math.round(pause / 1000)}s`
    );
    await this.sleep(pause, signal);

    this.ledger = {};
    await this.refreshQuota(signal);
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

function toMs(seconds: number): number {
  return Math.max(0, Math.round(seconds * 1000));
}
