/**
 * Utility functions
 */

import { createHash } from 'node:crypto';

/**
 * Error raised when a sleep or run is aborted through an AbortSignal
 */
export class AbortError extends Error {
  constructor(message: string = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/**
 * Check whether an error came from an aborted signal (ours or fetch's)
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Sleep for a specified duration
 *
 * Rejects with AbortError as soon as the signal fires, so long waits
 * never outlive a cancelled run.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      globalThis.clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = globalThis.setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Hex-encoded SHA-256 digest of a string
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Drive an async iterable through a fixed-size worker pool
 *
 * Each worker pulls the next item and runs `fn` on it to completion before
 * pulling again. Workers stop pulling once the signal is aborted; items
 * already in flight finish. Results are not collected: `fn` owns its output.
 *
 * When `fn` rejects, no further item is started and the first error is
 * rethrown once every in-flight item has settled.
 *
 * @param source - Items to process (pulled lazily)
 * @param concurrency - Maximum concurrent executions
 * @param fn - Worker body for one item
 * @param signal - Optional cancellation signal checked between items
 */
export async function mapConcurrent<T>(
  source: AsyncIterable<T> | Iterable<T>,
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  const iterator = isAsyncIterable(source)
    ? source[Symbol.asyncIterator]()
    : toAsyncIterator(source[Symbol.iterator]());
  let nextIndex = 0;
  let exhausted = false;
  // Errors in the order they happened; the first one is rethrown
  const failures: unknown[] = [];

  // Pulls are chained so two workers never call next() at the same time
  let pullChain: Promise<unknown> = Promise.resolve();
  const pull = (): Promise<IteratorResult<T>> => {
    const result = pullChain.then(() => iterator.next());
    pullChain = result.catch(() => undefined);
    return result;
  };

  async function worker(): Promise<void> {
    try {
      while (!exhausted && failures.length === 0 && !signal?.aborted) {
        const next = await pull();
        if (next.done) {
          exhausted = true;
          return;
        }
        if (failures.length > 0) {
          return;
        }
        const currentIndex = nextIndex++;
        await fn(next.value, currentIndex);
      }
    } catch (error) {
      failures.push(error);
      throw error;
    }
  }

  const workerCount = Math.max(1, Math.floor(concurrency));
  const workers = Array.from({ length: workerCount }, () => worker());

  try {
    await Promise.allSettled(workers);
    if (failures.length > 0) {
      throw failures[0];
    }
  } finally {
    if (!exhausted && iterator.return) {
      await iterator.return();
    }
  }
}

function isAsyncIterable<T>(source: AsyncIterable<T> | Iterable<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}

function toAsyncIterator<T>(iterator: Iterator<T>): AsyncIterator<T> {
  return {
    next: async () => iterator.next(),
  };
}
