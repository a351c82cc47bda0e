/**
 * Diff cache
 *
 * Content-addressed store of fetched diffs. Each entry is a file named by
 * the SHA-256 hex digest of the source URL, holding the raw diff text.
 * Entries never expire or get evicted; `clear()` is the only removal.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { join, resolve } from 'node:path';
import { sha256Hex } from '../utils/index.js';

/**
 * Store of previously fetched diff text keyed by URL
 */
export interface DiffCache {
  get(url: string): Promise<string | undefined>;
  set(url: string, diffText: string): Promise<void>;
  clear(): Promise<void>;
}

const ENTRY_NAME = /^[0-9a-f]{64}$/;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Cache key for a URL
 */
export function cacheKey(url: string): string {
  return sha256Hex(url);
}

/**
 * Disk-backed diff cache
 *
 * Writes go to a unique temp file in the same directory and are renamed
 * over the entry, so concurrent readers see either nothing or a whole diff.
 */
export class DiskDiffCache implements DiffCache {
  readonly dir: string;
  private dirReady: Promise<void> | null = null;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  /**
   * Path of the entry for a URL
   */
  entryPath(url: string): string {
    return join(this.dir, cacheKey(url));
  }

  async get(url: string): Promise<string | undefined> {
    try {
      return await readFile(this.entryPath(url), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async set(url: string, diffText: string): Promise<void> {
    await this.ensureDir();
    const target = this.entryPath(url);
    const tempPath = `${target}.${process.pid}.${randomUUID()}.tmp`;

    try {
      await writeFile(tempPath, diffText, 'utf-8');
      await rename(tempPath, target);
    } catch (error) {
      await unlink(tempPath).catch(() => undefined);
      throw error;
    }
  }

  async clear(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }

    await Promise.all(
      names
        .filter((name) => ENTRY_NAME.test(name) || name.endsWith('.tmp'))
        .map((name) => unlink(join(this.dir, name)))
    );
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(this.dir, { recursive: true }).then(() => undefined);
      // A failed mkdir is retried on the next write
      this.dirReady.catch(() => {
        this.dirReady = null;
      });
    }
    return this.dirReady;
  }
}
