import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  readNdjson,
  toRawRecord,
  toOutputRecord,
  NdjsonWriter,
  type InvalidLine,
  type NdjsonLine,
} from '../../src/io/ndjson.js';

describe('toRawRecord', () => {
  it('should map dataset fields to a record', () => {
    expect(
      toRawRecord({
        pr_id: 42,
        repo: 'octo/widgets',
        diff_url: 'https://github.com/octo/widgets/pull/42.diff',
        body: 'Refactor widgets',
        merged_at: '2024-01-01',
      })
    ).toEqual({
      id: 42,
      repository: 'octo/widgets',
      diffLocation: 'https://github.com/octo/widgets/pull/42.diff',
      body: 'Refactor widgets',
    });
  });

  it('should accept string ids and leave out an empty body', () => {
    expect(toRawRecord({ pr_id: 'PR-7', repo: 'octo/widgets', diff_url: 'u', body: '' })).toEqual({
      id: 'PR-7',
      repository: 'octo/widgets',
      diffLocation: 'u',
    });
  });

  it('should treat missing or mistyped fields as absent', () => {
    expect(toRawRecord({ pr_id: true, repo: 5, diff_url: null })).toEqual({
      id: null,
      repository: null,
      diffLocation: '',
    });
  });

  it('should return null for empty or non-object values', () => {
    expect(toRawRecord({})).toBeNull();
    expect(toRawRecord(null)).toBeNull();
    expect(toRawRecord([1, 2])).toBeNull();
    expect(toRawRecord('record')).toBeNull();
  });
});

describe('toOutputRecord', () => {
  it('should write snake_case output fields', () => {
    expect(
      toOutputRecord({
        id: 42,
        repository: 'octo/widgets',
        originalDiff: 'full diff',
        atomicDiffs: [{ title: 'Update src directory', patchText: 'part' }],
      })
    ).toEqual({
      pr_id: 42,
      repo: 'octo/widgets',
      original_diff: 'full diff',
      atomic_diffs: [{ title: 'Update src directory', patch: 'part' }],
    });
  });
});

describe('NDJSON files', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'atomize-ndjson-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should read values with line numbers, skipping blank and malformed lines', async () => {
    const file = join(testDir, 'input.ndjson');
    await writeFile(file, '{"pr_id": 1}\n\n{broken\n  \n[2]\r\n"three"');
    const invalid: InvalidLine[] = [];
    const lines: NdjsonLine[] = [];

    for await (const line of readNdjson(file, { onInvalidLine: (entry) => invalid.push(entry) })) {
      lines.push(line);
    }

    expect(lines).toEqual([
      { lineNumber: 1, value: { pr_id: 1 } },
      { lineNumber: 5, value: [2] },
      { lineNumber: 6, value: 'three' },
    ]);
    expect(invalid.map((entry) => entry.lineNumber)).toEqual([3]);
  });

  it('should write one JSON value per line into a new directory', async () => {
    const file = join(testDir, 'out', 'nested', 'result.ndjson');
    const writer = await NdjsonWriter.open(file);

    await writer.write({ pr_id: 1 });
    await writer.write({ pr_id: 2, note: 'line\nbreak' });
    await writer.close();

    expect(writer.written).toBe(2);
    expect(await readFile(file, 'utf-8')).toBe('{"pr_id":1}\n{"pr_id":2,"note":"line\\nbreak"}\n');
  });

  it('should truncate an existing output file', async () => {
    const file = join(testDir, 'result.ndjson');
    await writeFile(file, 'stale\n');

    const writer = await NdjsonWriter.open(file);
    await writer.close();

    expect(await readFile(file, 'utf-8')).toBe('');
  });

  it('should allow closing twice', async () => {
    const writer = await NdjsonWriter.open(join(testDir, 'twice.ndjson'));

    await writer.close();
    await expect(writer.close()).resolves.toBeUndefined();
  });
});
