/**
 * pr-atomizer library entry point
 *
 * @example
 * ```typescript
 * import { createSplitPipeline, defaultConfig } from 'pr-atomizer';
 *
 * const { orchestrator } = createSplitPipeline(defaultConfig());
 * const result = await orchestrator.splitRecord({
 *   id: 42,
 *   repository: 'octo/widgets',
 *   diffLocation: 'https://github.com/octo/widgets/pull/42.diff',
 * });
 * ```
 */

export * from './diff/index.js';
export * from './fetch/index.js';
export * from './split/index.js';
export * from './config/index.js';
export * from './cli/index.js';
export {
  readNdjson,
  toRawRecord,
  toOutputRecord,
  NdjsonWriter,
  type InvalidLine,
  type NdjsonLine,
  type OutputRecord,
  type ReadNdjsonOptions,
} from './io/ndjson.js';
export { sleep, mapConcurrent, sha256Hex, AbortError, isAbortError } from './utils/index.js';
