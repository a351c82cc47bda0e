/**
 * Split Runner
 *
 * Drives an NDJSON file of pull request records through a bounded worker
 * pool. Each worker takes one record end to end; results are written as
 * they complete, so output order may differ from input order.
 */

import { access, constants } from 'node:fs/promises';
import { readNdjson, toRawRecord, toOutputRecord, NdjsonWriter } from '../io/ndjson.js';
import { createSplitPipeline, type CreatePipelineOptions, type SplitOrchestrator } from './orchestrator.js';
import type { SplitConfig } from '../config/schema.js';
import type { RateLimiter } from '../fetch/rate-limiter.js';
import { nullProgressPrinter, type IProgressPrinter } from '../cli/progress.js';
import { mapConcurrent } from '../utils/index.js';
import type { RunSummary, SplitOutcome } from './types.js';

export interface RunSplitOptions {
  inputPath: string;
  outputPath: string;
  config: SplitConfig;
  progress?: IProgressPrinter;
  /** Stops the run between records and interrupts in-flight waits */
  signal?: AbortSignal;
  /** Use this orchestrator instead of building one from the config */
  orchestrator?: SplitOrchestrator;
  /** Passed to createSplitPipeline when no orchestrator is given */
  pipeline?: Omit<CreatePipelineOptions, 'logger'>;
}

function resolvePipeline(
  options: RunSplitOptions,
  progress: IProgressPrinter
): { orchestrator: SplitOrchestrator; rateLimiter?: RateLimiter } {
  if (options.orchestrator) {
    return { orchestrator: options.orchestrator };
  }
  return createSplitPipeline(options.config, { ...options.pipeline, logger: progress });
}

/**
 * Split every record of an NDJSON file into an NDJSON file of results
 *
 * Per-record problems never abort the run; only I/O failures on the input
 * or output files reject. A pipeline built here reads the provider quota
 * once before the first record. A missing input file rejects before the output
 * file is touched.
 */
export async function runSplit(options: RunSplitOptions): Promise<RunSummary> {
  const progress = options.progress ?? nullProgressPrinter;
  const { config, signal } = options;
  const startTime = Date.now();

  const { orchestrator, rateLimiter } = resolvePipeline(options, progress);

  const summary: RunSummary = {
    total: 0,
    split: 0,
    skipped: 0,
    failed: 0,
    cancelled: 0,
    atomicDiffs: 0,
    elapsedMs: 0,
    aborted: false,
  };

  const tally = (outcome: SplitOutcome) => {
    switch (outcome.status) {
      case 'split':
        summary.split++;
        summary.atomicDiffs += outcome.result.atomicDiffs.length;
        break;
      case 'skipped':
        summary.skipped++;
        break;
      case 'failed':
        summary.failed++;
        break;
      case 'cancelled':
        summary.cancelled++;
        break;
    }
  };

  progress.runStart({
    inputPath: options.inputPath,
    outputPath: options.outputPath,
    concurrency: config.concurrency,
  });

  // Checked before the output is truncated
  await access(options.inputPath, constants.R_OK);
  if (!signal?.aborted) {
    await rateLimiter?.refreshQuota(signal);
  }
  const writer = await NdjsonWriter.open(options.outputPath);
  const lines = readNdjson(options.inputPath, {
    onInvalidLine: ({ lineNumber, error }) => {
      summary.total++;
      const outcome: SplitOutcome = {
        status: 'failed',
        reason: 'unexpected_error',
        message: `Malformed JSON on line ${lineNumber}: ${error}`,
      };
      tally(outcome);
      progress.warn(`[Runner] Skipping malformed line ${lineNumber}: ${error}`);
      progress.recordComplete(`line ${lineNumber}`, outcome, 0);
    },
  });

  try {
    await mapConcurrent(
      lines,
      config.concurrency,
      async ({ lineNumber, value }) => {
        summary.total++;
        const recordStart = Date.now();
        const record = toRawRecord(value);
        const outcome = await orchestrator.processRecord(record, signal);
        tally(outcome);

        if (outcome.status === 'split') {
          await writer.write(toOutputRecord(outcome.result));
        }

        const recordId = record?.id != null ? String(record.id) : `line ${lineNumber}`;
        progress.recordComplete(recordId, outcome, Date.now() - recordStart);
      },
      signal
    );
  } finally {
    await writer.close();
  }

  summary.aborted = signal?.aborted ?? false;
  summary.elapsedMs = Date.now() - startTime;
  progress.runComplete(summary);
  return summary;
}
