/**
 * Split Orchestrator
 *
 * Runs one pull request through fetch → parse → group → split and is the
 * single point of failure containment for that record: whatever happens
 * inside, the caller gets a SplitOutcome and never an exception.
 */

import { parseDiff } from '../diff/parser.js';
import { groupByDirectory } from '../diff/grouper.js';
import { meetsMinDiffs, planAtomicDiffs } from '../diff/splitter.js';
import { DiffFetcher } from '../fetch/fetcher.js';
import { DiskDiffCache } from '../fetch/cache.js';
import { RateLimiter } from '../fetch/rate-limiter.js';
import { DiffNotFoundError } from '../fetch/errors.js';
import type { FetchLike } from '../fetch/fetcher.js';
import type { SplitConfig } from '../config/schema.js';
import type { Logger } from '../cli/progress.js';
import { nullProgressPrinter } from '../cli/progress.js';
import { isAbortError } from '../utils/index.js';
import type { RawRecord, SplitOutcome, SplitResult } from './types.js';

/**
 * Anything that can turn a diff URL into diff text
 */
export interface DiffSource {
  fetch(url: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Settings the orchestrator reads per record
 */
export type OrchestratorConfig = Pick<SplitConfig, 'maxLoc' | 'maxDirs' | 'minDiffs' | 'groupRootFiles'>;

export interface SplitOrchestratorOptions {
  /** Diff source, normally a DiffFetcher shared by all workers */
  fetcher: DiffSource;
  logger?: Logger;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SplitOrchestrator {
  private readonly config: OrchestratorConfig;
  private readonly fetcher: DiffSource;
  private readonly logger: Logger;

  constructor(config: OrchestratorConfig, options: SplitOrchestratorOptions) {
    this.config = config;
    this.fetcher = options.fetcher;
    this.logger = options.logger ?? nullProgressPrinter;
  }

  /**
   * Split one record, reporting why when there is no result
   */
  async processRecord(record: RawRecord | null | undefined, signal?: AbortSignal): Promise<SplitOutcome> {
    try {
      return await this.run(record, signal);
    } catch (error) {
      if (signal?.aborted) {
        return { status: 'cancelled' };
      }
      const message = describeError(error);
      this.logger.error(`[Orchestrator] Error processing PR ${String(record?.id)}: ${message}`);
      return { status: 'failed', reason: 'unexpected_error', message };
    }
  }

  /**
   * Split one record
   *
   * @returns The split, or undefined when the record was skipped or failed
   */
  async splitRecord(record: RawRecord | null | undefined, signal?: AbortSignal): Promise<SplitResult | undefined> {
    const outcome = await this.processRecord(record, signal);
    return outcome.status === 'split' ? outcome.result : undefined;
  }

  private async run(record: RawRecord | null | undefined, signal?: AbortSignal): Promise<SplitOutcome> {
    if (!record) {
      this.logger.warn('[Orchestrator] Received empty PR record');
      return { status: 'skipped', reason: 'empty_record', message: 'Empty record' };
    }

    const label = `PR ${String(record.id)}`;
    const diffUrl = record.diffLocation.trim();
    if (!diffUrl) {
      this.logger.warn(`[Orchestrator] ${label} has no diff_url`);
      return { status: 'skipped', reason: 'missing_diff_url', message: 'Record has no diff_url' };
    }

    this.logger.debug(`[Orchestrator] Processing ${label} from ${record.repository ?? '(unknown repo)'}`);

    let diffText: string;
    try {
      diffText = await this.fetcher.fetch(diffUrl, signal);
    } catch (error) {
      if (error instanceof DiffNotFoundError) {
        this.logger.info(`[Orchestrator] ${label} diff vanished (repo deleted/private), skipping`);
        return { status: 'skipped', reason: 'diff_not_found', message: error.message };
      }
      if (signal?.aborted || isAbortError(error)) {
        return { status: 'cancelled' };
      }
      const message = describeError(error);
      this.logger.error(`[Orchestrator] Fetch failed for ${diffUrl}: ${message}`);
      return { status: 'failed', reason: 'fetch_failed', message };
    }

    const files = parseDiff(diffText);
    this.logger.debug(`[Orchestrator] Found ${files.length} files in ${label}`);

    const groups = groupByDirectory(files, { groupRootFiles: this.config.groupRootFiles });
    this.logger.debug(`[Orchestrator] Grouped into ${groups.size} directories`);

    const atomicDiffs = planAtomicDiffs(groups, this.config);
    if (!meetsMinDiffs(atomicDiffs, this.config.minDiffs)) {
      const message = `Too few diffs (${atomicDiffs.length} < ${this.config.minDiffs})`;
      this.logger.debug(`[Orchestrator] ${label}: ${message}`);
      return { status: 'skipped', reason: 'too_few_diffs', message };
    }

    return {
      status: 'split',
      result: {
        id: record.id,
        repository: record.repository,
        originalDiff: diffText,
        atomicDiffs,
      },
    };
  }
}

export interface CreatePipelineOptions {
  logger?: Logger;
  /** Replaces global fetch (tests, proxies) */
  fetchImpl?: FetchLike;
  /** Replaces the cancellable sleep used for retries and pacing */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface SplitPipeline {
  orchestrator: SplitOrchestrator;
  fetcher: DiffFetcher;
  rateLimiter: RateLimiter;
  cache?: DiskDiffCache;
}

/**
 * Build the fetcher, limiter, cache and orchestrator described by a config
 *
 * The returned objects hold all cross-record state; build one pipeline per
 * run and share it between workers.
 */
export function createSplitPipeline(config: SplitConfig, options: CreatePipelineOptions = {}): SplitPipeline {
  const rateLimiter: RateLimiter = new RateLimiter({
    enabled: config.rateLimit.enabled,
    secondsBetweenRequests: config.rateLimit.secondsBetweenRequests,
    hosts: config.rateLimit.hosts,
    lowQuotaThreshold: config.rateLimit.lowQuotaThreshold,
    quotaPauseSeconds: config.rateLimit.quotaPauseSeconds,
    quotaSource: config.rateLimit.refreshQuota ? (signal) => fetcher.fetchQuota(signal) : undefined,
    sleep: options.sleep,
    logger: options.logger,
  });

  const cache = config.cache.enabled ? new DiskDiffCache(config.cache.dir) : undefined;

  const fetcher: DiffFetcher = new DiffFetcher({
    cache,
    rateLimiter,
    token: config.github.token,
    timeoutMs: config.fetch.timeoutMs,
    retryAfterDefaultSeconds: config.fetch.retryAfterDefaultSeconds,
    maxRetryWaitSeconds: config.fetch.maxRetryWaitSeconds,
    useApiUrl: config.fetch.useApiUrl,
    fetchImpl: options.fetchImpl,
    sleep: options.sleep,
    logger: options.logger,
  });

  const orchestrator = new SplitOrchestrator(config, { fetcher, logger: options.logger });

  return { orchestrator, fetcher, rateLimiter, cache };
}
