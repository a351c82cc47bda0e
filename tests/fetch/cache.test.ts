import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { tmpdir } from 'node:os';
import { DiskDiffCache, cacheKey } from '../../src/fetch/cache.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, writeFile: vi.fn(actual.writeFile) };
});

const URL_A = 'https://github.com/octo/widgets/pull/1.diff';
const URL_B = 'https://github.com/octo/widgets/pull/2.diff';

describe('DiskDiffCache', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'atomize-cache-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should key entries by the SHA-256 hex of the URL', () => {
    expect(cacheKey('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');

    const cache = new DiskDiffCache(testDir);
    expect(basename(cache.entryPath(URL_A))).toBe(cacheKey(URL_A));
  });

  it('should miss when the directory does not exist yet', async () => {
    const cache = new DiskDiffCache(join(testDir, 'nested', 'diffs'));

    expect(await cache.get(URL_A)).toBeUndefined();
  });

  it('should store raw diff text in the entry file', async () => {
    const cache = new DiskDiffCache(join(testDir, 'diffs'));

    await cache.set(URL_A, 'diff --git a/x b/x\n+1\n');

    expect(await cache.get(URL_A)).toBe('diff --git a/x b/x\n+1\n');
    expect(await readFile(cache.entryPath(URL_A), 'utf-8')).toBe('diff --git a/x b/x\n+1\n');
    expect(await cache.get(URL_B)).toBeUndefined();
  });

  it('should leave no temp files behind', async () => {
    const cache = new DiskDiffCache(testDir);

    await cache.set(URL_A, 'first');
    await cache.set(URL_A, 'second');

    expect(await readdir(testDir)).toEqual([cacheKey(URL_A)]);
    expect(await cache.get(URL_A)).toBe('second');
  });

  it('should remove the temp file when writing it fails', async () => {
    const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');
    vi.mocked(writeFile).mockImplementationOnce(async (file) => {
      await actual.writeFile(file, 'partial');
      throw new Error('ENOSPC: no space left on device');
    });
    const cache = new DiskDiffCache(testDir);

    await expect(cache.set(URL_A, 'diff text')).rejects.toThrow('ENOSPC: no space left on device');

    expect(await readdir(testDir)).toEqual([]);
    expect(await cache.get(URL_A)).toBeUndefined();
  });

  it('should end with one whole entry after concurrent writes', async () => {
    const cache = new DiskDiffCache(testDir);
    const bodies = ['one', 'two', 'three', 'four'];

    await Promise.all(bodies.map((body) => cache.set(URL_A, body)));

    expect(bodies).toContain(await cache.get(URL_A));
    expect(await readdir(testDir)).toEqual([cacheKey(URL_A)]);
  });

  it('should clear entries and keep unrelated files', async () => {
    const cache = new DiskDiffCache(testDir);
    await cache.set(URL_A, 'a');
    await cache.set(URL_B, 'b');
    await writeFile(join(testDir, 'notes.txt'), 'keep me');

    await cache.clear();

    expect(await readdir(testDir)).toEqual(['notes.txt']);
    expect(await cache.get(URL_A)).toBeUndefined();
  });

  it('should clear a directory that does not exist', async () => {
    const cache = new DiskDiffCache(join(testDir, 'missing'));

    await expect(cache.clear()).resolves.toBeUndefined();
  });

  it('should surface read errors other than a missing entry', async () => {
    const cache = new DiskDiffCache(testDir);
    await mkdir(cache.entryPath(URL_A));

    await expect(cache.get(URL_A)).rejects.toThrow();
  });
});
