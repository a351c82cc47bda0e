/**
 * Split Module
 *
 * Per-record orchestration and the NDJSON run driver.
 */

export {
  SplitOrchestrator,
  createSplitPipeline,
  type DiffSource,
  type OrchestratorConfig,
  type SplitOrchestratorOptions,
  type CreatePipelineOptions,
  type SplitPipeline,
} from './orchestrator.js';

export { runSplit, type RunSplitOptions } from './runner.js';

export type {
  RawRecord,
  SplitResult,
  SplitOutcome,
  SkipReason,
  FailureReason,
  RunSummary,
} from './types.js';
