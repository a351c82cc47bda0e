/**
 * Split Event System
 *
 * Provides structured events for tracking a split run.
 * Designed for both interactive CLI and service integration.
 */

import { EventEmitter } from 'node:events';
import type { RunSummary, SplitOutcome } from '../split/types.js';

// ============ Event Data Types ============

export interface RunStartData {
  inputPath: string;
  outputPath: string;
  concurrency: number;
  timestamp: string;
}

export interface RecordCompleteData {
  recordId: string;
  status: SplitOutcome['status'];
  reason?: string;
  message?: string;
  atomicDiffs?: number;
  elapsedMs: number;
  timestamp: string;
}

export interface RunCompleteData extends RunSummary {
  timestamp: string;
}

export interface RunErrorData {
  error: string;
  timestamp: string;
}

export interface LogData {
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

// ============ Event Union Type ============

export type SplitEvent =
  | { type: 'run:start'; data: RunStartData }
  | { type: 'record:complete'; data: RecordCompleteData }
  | { type: 'run:complete'; data: RunCompleteData }
  | { type: 'run:error'; data: RunErrorData }
  | { type: 'log'; data: LogData };

// ============ State Snapshot ============

export interface SplitStateSnapshot {
  status: 'idle' | 'running' | 'completed' | 'failed';
  records: {
    processed: number;
    split: number;
    skipped: number;
    failed: number;
    cancelled: number;
  };
  atomicDiffs: number;
  skipReasons: Record<string, number>;
  timing: {
    startedAt: string;
    elapsedMs: number;
  };
  error?: string;
}

// ============ Event Emitter ============

export type SplitEventHandler = (event: SplitEvent) => void;

export class SplitEventEmitter extends EventEmitter {
  private state: SplitStateSnapshot;
  private startTime: number;

  constructor() {
    super();
    this.startTime = Date.now();
    this.state = this.createInitialState();
  }

  private createInitialState(): SplitStateSnapshot {
    return {
      status: 'idle',
      records: { processed: 0, split: 0, skipped: 0, failed: 0, cancelled: 0 },
      atomicDiffs: 0,
      skipReasons: {},
      timing: { startedAt: new Date().toISOString(), elapsedMs: 0 },
    };
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private updateElapsed(): void {
    this.state.timing.elapsedMs = Date.now() - this.startTime;
  }

  /**
   * Get current state snapshot (read-only copy)
   */
  getState(): SplitStateSnapshot {
    this.updateElapsed();
    return structuredClone(this.state);
  }

  /**
   * Subscribe to all events
   */
  onEvent(handler: SplitEventHandler): void {
    this.on('event', handler);
  }

  /**
   * Unsubscribe from events
   */
  offEvent(handler: SplitEventHandler): void {
    this.off('event', handler);
  }

  private emitEvent(event: SplitEvent): void {
    this.updateElapsed();
    this.emit('event', event);
  }

  // ============ Event Emitters ============

  runStart(data: Omit<RunStartData, 'timestamp'>): void {
    this.startTime = Date.now();
    this.state = this.createInitialState();
    this.state.status = 'running';
    this.state.timing.startedAt = this.timestamp();

    this.emitEvent({
      type: 'run:start',
      data: { ...data, timestamp: this.timestamp() },
    });
  }

  recordComplete(recordId: string, outcome: SplitOutcome, elapsedMs: number): void {
    const records = this.state.records;
    records.processed++;

    const data: RecordCompleteData = {
      recordId,
      status: outcome.status,
      elapsedMs,
      timestamp: this.timestamp(),
    };

    switch (outcome.status) {
      case 'split':
        records.split++;
        this.state.atomicDiffs += outcome.result.atomicDiffs.length;
        data.atomicDiffs = outcome.result.atomicDiffs.length;
        break;
      case 'skipped':
        records.skipped++;
        this.state.skipReasons[outcome.reason] = (this.state.skipReasons[outcome.reason] ?? 0) + 1;
        data.reason = outcome.reason;
        data.message = outcome.message;
        break;
      case 'failed':
        records.failed++;
        data.reason = outcome.reason;
        data.message = outcome.message;
        break;
      case 'cancelled':
        records.cancelled++;
        break;
    }

    this.emitEvent({ type: 'record:complete', data });
  }

  runComplete(summary: RunSummary): void {
    this.state.status = 'completed';
    this.updateElapsed();

    this.emitEvent({
      type: 'run:complete',
      data: { ...summary, timestamp: this.timestamp() },
    });
  }

  runError(error: string): void {
    this.state.status = 'failed';
    this.state.error = error;

    this.emitEvent({
      type: 'run:error',
      data: { error, timestamp: this.timestamp() },
    });
  }

  log(level: LogData['level'], message: string, details?: Record<string, unknown>): void {
    this.emitEvent({
      type: 'log',
      data: { level, message, details, timestamp: this.timestamp() },
    });
  }
}

/**
 * Create a new event emitter instance
 */
export function createSplitEventEmitter(): SplitEventEmitter {
  return new SplitEventEmitter();
}
