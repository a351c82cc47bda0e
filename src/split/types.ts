/**
 * Type definitions for the split pipeline
 */

import type { AtomicDiff } from '../diff/types.js';

/**
 * A pull request as handed to the pipeline
 */
export interface RawRecord {
  id: string | number | null;
  repository: string | null;
  /** URL of the unified diff; records without one are skipped */
  diffLocation: string;
  body?: string;
}

/**
 * Atomic split of one pull request
 */
export interface SplitResult {
  id: string | number | null;
  repository: string | null;
  originalDiff: string;
  atomicDiffs: AtomicDiff[];
}

/**
 * Why a record was deliberately left out
 */
export type SkipReason = 'empty_record' | 'missing_diff_url' | 'diff_not_found' | 'too_few_diffs';

/**
 * Why a record could not be processed
 */
export type FailureReason = 'fetch_failed' | 'unexpected_error';

/**
 * Outcome of processing one record
 */
export type SplitOutcome =
  | { status: 'split'; result: SplitResult }
  | { status: 'skipped'; reason: SkipReason; message: string }
  | { status: 'failed'; reason: FailureReason; message: string }
  | { status: 'cancelled' };

/**
 * Totals for a run over an input file
 */
export interface RunSummary {
  /** Records taken from the input (including unparseable lines) */
  total: number;
  split: number;
  skipped: number;
  failed: number;
  cancelled: number;
  /** Atomic diffs written across all split records */
  atomicDiffs: number;
  elapsedMs: number;
  /** Whether the run was aborted before the input was exhausted */
  aborted: boolean;
}
