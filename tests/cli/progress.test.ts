import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { ProgressPrinter, formatDuration } from '../../src/cli/progress.js';
import { StructuredProgressPrinter } from '../../src/cli/structured-progress.js';
import { createProgressPrinterWithMode, nullProgressPrinter, type SplitEvent } from '../../src/cli/index.js';
import type { RunSummary, SplitOutcome } from '../../src/split/types.js';

const splitOutcome: SplitOutcome = {
  status: 'split',
  result: {
    id: 7,
    repository: 'octo/widgets',
    originalDiff: 'diff',
    atomicDiffs: [
      { title: 'Update src directory', patchText: 'a' },
      { title: 'Update docs directory', patchText: 'b' },
    ],
  },
};

const summary: RunSummary = {
  total: 3,
  split: 1,
  skipped: 1,
  failed: 1,
  cancelled: 0,
  atomicDiffs: 2,
  elapsedMs: 1500,
  aborted: false,
};

describe('formatDuration', () => {
  it('should format milliseconds, seconds and minutes', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(2000)).toBe('2s');
    expect(formatDuration(125_000)).toBe('2m 5s');
  });
});

describe('ProgressPrinter', () => {
  function createPrinter(verbose = false) {
    const lines: string[] = [];
    const printer = new ProgressPrinter({ colors: false, verbose, write: (line) => lines.push(line) });
    return { printer, lines };
  }

  it('should print split and failed records', () => {
    const { printer, lines } = createPrinter();

    printer.recordComplete('7', splitOutcome, 250);
    printer.recordComplete('8', { status: 'failed', reason: 'fetch_failed', message: 'HTTP 500' }, 10);

    expect(lines).toEqual(['  ✓ PR 7: 2 atomic diffs (250ms)', '  ✗ PR 8 failed (fetch_failed): HTTP 500']);
  });

  it('should print skipped records and debug lines only when verbose', () => {
    const quiet = createPrinter();
    const verbose = createPrinter(true);
    const skipped: SplitOutcome = { status: 'skipped', reason: 'too_few_diffs', message: 'Too few diffs (1 < 2)' };

    for (const { printer } of [quiet, verbose]) {
      printer.recordComplete('9', skipped, 5);
      printer.debug('details');
    }

    expect(quiet.lines).toEqual([]);
    expect(verbose.lines).toEqual(['  - PR 9 skipped (too_few_diffs): Too few diffs (1 < 2)', '  · details']);
  });

  it('should print the run summary', () => {
    const { printer, lines } = createPrinter();

    printer.runComplete(summary);

    expect(lines).toEqual([
      '',
      '✅ Run complete in 1.5s',
      '  Records:      3',
      '  Split:        1 (2 atomic diffs)',
      '  Skipped:      1',
      '  Failed:       1',
      '',
    ]);
  });
});

describe('StructuredProgressPrinter', () => {
  it('should write one JSON event per line', () => {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    const printer = new StructuredProgressPrinter({ output });

    printer.warn('[Runner] Skipping malformed line 2');
    printer.debug('hidden without verbose');

    const lines = chunks.join('').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      type: 'log',
      data: { level: 'warn', message: '[Runner] Skipping malformed line 2' },
    });
  });

  it('should keep a state snapshot of record outcomes', () => {
    const printer = new StructuredProgressPrinter({ silent: true });

    printer.runStart({ inputPath: 'in', outputPath: 'out', concurrency: 2 });
    printer.recordComplete('7', splitOutcome, 5);
    printer.recordComplete('8', { status: 'skipped', reason: 'diff_not_found', message: 'gone' }, 5);
    printer.recordComplete('9', { status: 'skipped', reason: 'diff_not_found', message: 'gone' }, 5);
    printer.recordComplete('10', { status: 'cancelled' }, 5);

    const state = printer.getState();
    expect(state.status).toBe('running');
    expect(state.records).toEqual({ processed: 4, split: 1, skipped: 2, failed: 0, cancelled: 1 });
    expect(state.atomicDiffs).toBe(2);
    expect(state.skipReasons).toEqual({ diff_not_found: 2 });

    printer.runComplete(summary);
    expect(printer.getState().status).toBe('completed');
  });

  it('should deliver only the requested event types to handlers', () => {
    const events: SplitEvent[] = [];
    const printer = new StructuredProgressPrinter({
      silent: true,
      eventTypes: ['record:complete'],
      onEvent: (event) => events.push(event),
    });

    printer.info('ignored');
    printer.recordComplete('7', splitOutcome, 12);
    printer.runFailed('disk full');

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'record:complete',
      data: { recordId: '7', status: 'split', atomicDiffs: 2, elapsedMs: 12 },
    });
  });

  it('should record run failures in the state', () => {
    const printer = new StructuredProgressPrinter({ silent: true });

    printer.runFailed('disk full');

    expect(printer.getState()).toMatchObject({ status: 'failed', error: 'disk full' });
  });
});

describe('createProgressPrinterWithMode', () => {
  it('should pick the printer for each mode', () => {
    expect(createProgressPrinterWithMode({ mode: 'silent' })).toBe(nullProgressPrinter);
    expect(createProgressPrinterWithMode({ mode: 'json' })).toBeInstanceOf(StructuredProgressPrinter);
    expect(createProgressPrinterWithMode({ mode: 'tty' })).toBeInstanceOf(ProgressPrinter);
  });
});
