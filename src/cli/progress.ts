/**
 * CLI Progress Printer
 *
 * Human-readable progress for split runs. Writes to stderr so stdout stays
 * free for piping.
 */

import type { RunSummary, SplitOutcome } from '../split/types.js';

/**
 * Progress printer options
 */
export interface ProgressPrinterOptions {
  /** Enable colored output (default: true if stderr is a TTY) */
  colors?: boolean;
  /** Print debug messages and every skipped record (default: false) */
  verbose?: boolean;
  /** Line sink (default: console.error) */
  write?: (line: string) => void;
}

export interface RunStartInfo {
  inputPath: string;
  outputPath: string;
  concurrency: number;
}

/**
 * Progress printer interface (for null object pattern)
 */
export interface IProgressPrinter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  runStart(info: RunStartInfo): void;
  recordComplete(recordId: string, outcome: SplitOutcome, elapsedMs: number): void;
  runComplete(summary: RunSummary): void;
  runFailed(message: string): void;
}

/**
 * Logging subset handed to the fetch and split layers
 */
export type Logger = Pick<IProgressPrinter, 'info' | 'warn' | 'error' | 'debug'>;

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
};

/**
 * Format duration in ms to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  const remainingMs = ms % 1000;
  if (seconds < 60) {
    return remainingMs > 0 ? `${seconds}.${Math.floor(remainingMs / 100)}s` : `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds}s`;
}

export class ProgressPrinter implements IProgressPrinter {
  private useColors: boolean;
  private verbose: boolean;
  private write: (line: string) => void;

  constructor(options: ProgressPrinterOptions = {}) {
    const isTTY = process.stderr.isTTY ?? false;
    this.useColors = options.colors ?? isTTY;
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line) => console.error(line));
  }

  /**
   * Color helper
   */
  private c(color: keyof typeof colors, text: string): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  info(message: string): void {
    this.write(`  ${this.c('cyan', 'ℹ')} ${message}`);
  }

  warn(message: string): void {
    this.write(`  ${this.c('yellow', '⚠')} ${message}`);
  }

  error(message: string): void {
    this.write(`  ${this.c('red', '✗')} ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.write(`  ${this.c('gray', '·')} ${this.c('gray', message)}`);
    }
  }

  runStart(info: RunStartInfo): void {
    this.write('');
    this.write(this.c('bold', this.c('blue', 'pr-atomizer - split pull requests into atomic diffs')));
    this.write(this.c('gray', '─'.repeat(50)));
    this.write(`Input:        ${info.inputPath}`);
    this.write(`Output:       ${info.outputPath}`);
    this.write(`Concurrency:  ${info.concurrency}`);
    this.write(this.c('gray', '─'.repeat(50)));
  }

  recordComplete(recordId: string, outcome: SplitOutcome, elapsedMs: number): void {
    const time = this.c('gray', `(${formatDuration(elapsedMs)})`);
    switch (outcome.status) {
      case 'split':
        this.write(
          `  ${this.c('green', '✓')} PR ${recordId}: ${outcome.result.atomicDiffs.length} atomic diffs ${time}`
        );
        break;
      case 'skipped':
        if (this.verbose) {
          this.write(`  ${this.c('gray', '-')} PR ${recordId} skipped (${outcome.reason}): ${outcome.message}`);
        }
        break;
      case 'failed':
        this.write(`  ${this.c('red', '✗')} PR ${recordId} failed (${outcome.reason}): ${outcome.message}`);
        break;
      case 'cancelled':
        this.write(`  ${this.c('yellow', '⏹')} PR ${recordId} cancelled`);
        break;
    }
  }

  runComplete(summary: RunSummary): void {
    this.write('');
    const headline = summary.aborted ? '⏹ Run aborted' : '✅ Run complete';
    this.write(
      this.c(
        'bold',
        this.c(summary.aborted ? 'yellow' : 'green', `${headline} in ${formatDuration(summary.elapsedMs)}`)
      )
    );
    this.write(`  Records:      ${summary.total}`);
    this.write(`  Split:        ${summary.split} (${summary.atomicDiffs} atomic diffs)`);
    this.write(`  Skipped:      ${summary.skipped}`);
    this.write(`  Failed:       ${summary.failed}`);
    if (summary.cancelled > 0) {
      this.write(`  Cancelled:    ${summary.cancelled}`);
    }
    this.write('');
  }

  runFailed(message: string): void {
    this.write('');
    this.write(this.c('bold', this.c('red', `❌ Run failed: ${message}`)));
    this.write('');
  }
}

/**
 * Create a progress printer
 */
export function createProgressPrinter(options?: ProgressPrinterOptions): ProgressPrinter {
  return new ProgressPrinter(options);
}

/**
 * Null progress printer (no output)
 */
export const nullProgressPrinter: IProgressPrinter = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  runStart: () => {},
  recordComplete: () => {},
  runComplete: () => {},
  runFailed: () => {},
};
