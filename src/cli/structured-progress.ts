/**
 * Structured Progress Printer
 *
 * Outputs JSON Lines (NDJSON) for service integration.
 * Each line is a valid JSON object representing a split event.
 */

import type { IProgressPrinter, RunStartInfo } from './progress.js';
import {
  SplitEventEmitter,
  type SplitEvent,
  type SplitStateSnapshot,
  createSplitEventEmitter,
} from './events.js';
import type { RunSummary, SplitOutcome } from '../split/types.js';

export interface StructuredProgressOptions {
  /**
   * Output stream to write JSON lines to (default: process.stderr)
   */
  output?: NodeJS.WritableStream;

  /**
   * Include debug-level events (default: false)
   */
  verbose?: boolean;

  /**
   * Event filter - only emit events of these types (default: all)
   */
  eventTypes?: SplitEvent['type'][];

  /**
   * Custom event handler (in addition to JSON output)
   */
  onEvent?: (event: SplitEvent) => void;

  /**
   * Disable JSON output, only use event handlers (default: false)
   */
  silent?: boolean;
}

export class StructuredProgressPrinter implements IProgressPrinter {
  private output: NodeJS.WritableStream;
  private verbose: boolean;
  private eventTypes?: Set<SplitEvent['type']>;
  private onEventHandler?: (event: SplitEvent) => void;
  private silent: boolean;
  private emitter: SplitEventEmitter;

  constructor(options: StructuredProgressOptions = {}) {
    this.output = options.output ?? process.stderr;
    this.verbose = options.verbose ?? false;
    this.eventTypes = options.eventTypes ? new Set(options.eventTypes) : undefined;
    this.onEventHandler = options.onEvent;
    this.silent = options.silent ?? false;

    this.emitter = createSplitEventEmitter();
    this.emitter.onEvent((event) => {
      if (this.eventTypes && !this.eventTypes.has(event.type)) {
        return;
      }

      if (this.onEventHandler) {
        this.onEventHandler(event);
      }

      if (!this.silent) {
        this.writeJson(event);
      }
    });
  }

  /**
   * Get the underlying event emitter for direct event subscription
   */
  getEmitter(): SplitEventEmitter {
    return this.emitter;
  }

  /**
   * Get current state snapshot
   */
  getState(): SplitStateSnapshot {
    return this.emitter.getState();
  }

  private writeJson(event: SplitEvent): void {
    if (!this.output.writable) {
      return;
    }
    this.output.write(JSON.stringify(event) + '\n');
  }

  // ============ IProgressPrinter Implementation ============

  info(message: string): void {
    this.emitter.log('info', message);
  }

  warn(message: string): void {
    this.emitter.log('warn', message);
  }

  error(message: string): void {
    this.emitter.log('error', message);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.emitter.log('debug', message);
    }
  }

  runStart(info: RunStartInfo): void {
    this.emitter.runStart(info);
  }

  recordComplete(recordId: string, outcome: SplitOutcome, elapsedMs: number): void {
    this.emitter.recordComplete(recordId, outcome, elapsedMs);
  }

  runComplete(summary: RunSummary): void {
    this.emitter.runComplete(summary);
  }

  runFailed(message: string): void {
    this.emitter.runError(message);
  }
}

/**
 * Create a structured progress printer
 */
export function createStructuredProgressPrinter(
  options?: StructuredProgressOptions
): StructuredProgressPrinter {
  return new StructuredProgressPrinter(options);
}
