/**
 * CLI Module
 *
 * Progress output and event system for split runs.
 */

export {
  ProgressPrinter,
  createProgressPrinter,
  nullProgressPrinter,
  formatDuration,
  type IProgressPrinter,
  type Logger,
  type ProgressPrinterOptions,
  type RunStartInfo,
} from './progress.js';

export {
  SplitEventEmitter,
  createSplitEventEmitter,
  type SplitEvent,
  type SplitEventHandler,
  type SplitStateSnapshot,
  type RunStartData,
  type RecordCompleteData,
  type RunCompleteData,
  type RunErrorData,
  type LogData,
} from './events.js';

export {
  StructuredProgressPrinter,
  createStructuredProgressPrinter,
  type StructuredProgressOptions,
} from './structured-progress.js';

import { createProgressPrinter, nullProgressPrinter, type IProgressPrinter } from './progress.js';
import { createStructuredProgressPrinter } from './structured-progress.js';
import type { SplitEvent } from './events.js';

export type ProgressMode = 'auto' | 'tty' | 'json' | 'silent';

/**
 * Options for creating a progress printer with mode selection
 */
export interface CreateProgressPrinterOptions {
  /** Progress output mode */
  mode?: ProgressMode;
  /** Enable verbose output */
  verbose?: boolean;
  /** Custom event handler (json mode) */
  onEvent?: (event: SplitEvent) => void;
  /** Output stream for JSON mode (default: process.stderr) */
  jsonOutput?: NodeJS.WritableStream;
}

/**
 * Create a progress printer based on the specified mode
 *
 * `auto` picks the colored printer on a TTY and JSON lines otherwise.
 *
 * @example
 * ```typescript
 * const printer = createProgressPrinterWithMode({ mode: 'json', verbose: true });
 * ```
 */
export function createProgressPrinterWithMode(
  options: CreateProgressPrinterOptions = {}
): IProgressPrinter {
  const mode = options.mode ?? 'auto';

  switch (mode) {
    case 'silent':
      return nullProgressPrinter;

    case 'json':
      return createStructuredProgressPrinter({
        verbose: options.verbose,
        output: options.jsonOutput,
        onEvent: options.onEvent,
      });

    case 'tty':
      return createProgressPrinter({ verbose: options.verbose });

    case 'auto':
    default:
      if (process.stderr.isTTY ?? false) {
        return createProgressPrinter({ verbose: options.verbose });
      }
      return createStructuredProgressPrinter({
        verbose: options.verbose,
        output: options.jsonOutput,
        onEvent: options.onEvent,
      });
  }
}
