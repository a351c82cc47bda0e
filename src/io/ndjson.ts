/**
 * NDJSON input and output
 *
 * Input lines are raw pull request records, output lines are split
 * results; both use the snake_case field names of the dataset files.
 */

import { createReadStream, createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { once } from 'node:events';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import type { RawRecord, SplitResult } from '../split/types.js';

/**
 * A line that could not be parsed as JSON
 */
export interface InvalidLine {
  lineNumber: number;
  error: string;
}

export interface ReadNdjsonOptions {
  /** Called for every malformed line; the line is then skipped */
  onInvalidLine?: (invalid: InvalidLine) => void;
}

/**
 * Parsed value of one NDJSON line
 */
export interface NdjsonLine {
  lineNumber: number;
  value: unknown;
}

/**
 * Read an NDJSON file line by line
 *
 * Blank lines are ignored. Malformed lines are reported and skipped.
 */
export async function* readNdjson(
  filePath: string,
  options: ReadNdjsonOptions = {}
): AsyncGenerator<NdjsonLine> {
  const lines = createInterface({
    input: createReadStream(filePath, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      if (!line.trim()) {
        continue;
      }
      try {
        yield { lineNumber, value: JSON.parse(line) };
      } catch (error) {
        if (!(error instanceof SyntaxError)) {
          throw error;
        }
        options.onInvalidLine?.({ lineNumber, error: error.message });
      }
    }
  } finally {
    lines.close();
  }
}

const idSchema = z.union([z.string(), z.number()]);

/**
 * Input line schema; fields of the wrong type count as missing
 */
const inputRecordSchema = z
  .object({
    pr_id: idSchema.nullish().catch(null),
    repo: z.string().nullish().catch(null),
    diff_url: z.string().nullish().catch(null),
    body: z.string().nullish().catch(null),
  })
  .passthrough();

export type InputRecord = z.input<typeof inputRecordSchema>;

/**
 * Map an input line to a RawRecord
 *
 * @returns null for values that are not objects or have no fields
 */
export function toRawRecord(value: unknown): RawRecord | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  if (Object.keys(value).length === 0) {
    return null;
  }

  const parsed = inputRecordSchema.parse(value);
  const record: RawRecord = {
    id: parsed.pr_id ?? null,
    repository: parsed.repo ?? null,
    diffLocation: parsed.diff_url ?? '',
  };
  if (parsed.body) {
    record.body = parsed.body;
  }
  return record;
}

/**
 * Output line written for a split pull request
 */
export interface OutputRecord {
  pr_id: string | number | null;
  repo: string | null;
  original_diff: string;
  atomic_diffs: Array<{ title: string; patch: string }>;
}

export function toOutputRecord(result: SplitResult): OutputRecord {
  return {
    pr_id: result.id,
    repo: result.repository,
    original_diff: result.originalDiff,
    atomic_diffs: result.atomicDiffs.map((diff) => ({ title: diff.title, patch: diff.patchText })),
  };
}

/**
 * Appends JSON lines to a file, waiting on back-pressure
 */
export class NdjsonWriter {
  private stream: WriteStream;
  private count = 0;

  private constructor(stream: WriteStream) {
    this.stream = stream;
  }

  /**
   * Open (truncate) an output file, creating its directory
   */
  static async open(filePath: string): Promise<NdjsonWriter> {
    await mkdir(dirname(filePath), { recursive: true });
    const stream = createWriteStream(filePath, { encoding: 'utf-8', flags: 'w' });
    await once(stream, 'open');
    return new NdjsonWriter(stream);
  }

  /** Lines written so far */
  get written(): number {
    return this.count;
  }

  async write(value: unknown): Promise<void> {
    this.count++;
    if (!this.stream.write(JSON.stringify(value) + '\n')) {
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    if (this.stream.writableFinished || this.stream.destroyed) {
      return;
    }
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
    await once(this.stream, 'finish');
  }
}
