import { describe, it, expect } from 'vitest';
import { parseDiff, extractHeaderPath } from '../../src/diff/parser.js';
import { buildDiff, filePatch } from '../fixtures.js';

// ============================================================================
// extractHeaderPath tests
// ============================================================================

describe('extractHeaderPath', () => {
  it('should take the b/ side of the header', () => {
    expect(extractHeaderPath('diff --git a/src/old.ts b/src/new.ts')).toBe('src/new.ts');
  });

  it('should keep spaces inside paths', () => {
    expect(extractHeaderPath('diff --git a/my dir/a b.txt b/my dir/a b.txt')).toBe('my dir/a b.txt');
  });

  it('should fall back to the text after the prefix without a b/ marker', () => {
    expect(extractHeaderPath('diff --git  weird-header ')).toBe('weird-header');
  });
});

// ============================================================================
// parseDiff tests
// ============================================================================

describe('parseDiff', () => {
  it('should return no files for empty input', () => {
    expect(parseDiff('')).toEqual([]);
  });

  it('should return no files for text without a file header', () => {
    expect(parseDiff('just some text\n+not a diff\n')).toEqual([]);
  });

  it('should split a diff into one change per file', () => {
    const files = parseDiff(buildDiff([['src/a.ts', 1], ['docs/readme.md', 2]]));

    expect(files).toHaveLength(2);
    expect(files[0].path).toBe('src/a.ts');
    expect(files[0].patchText).toBe(filePatch('src/a.ts', 1));
    expect(files[1].path).toBe('docs/readme.md');
    expect(files[1].patchText).toBe(filePatch('docs/readme.md', 2));
  });

  it('should start every patch with its header line', () => {
    const files = parseDiff(buildDiff([['a/x.go', 1], ['b/y.go', 1]]));

    expect(files.map((file) => file.patchText.split('\n')[0])).toEqual([
      'diff --git a/a/x.go b/a/x.go',
      'diff --git a/b/y.go b/b/y.go',
    ]);
  });

  it('should ignore preamble before the first header', () => {
    const raw = 'From 123abc Mon Sep 17 00:00:00 2001\nSubject: [PATCH] change\n\n' + buildDiff([['lib/z.py', 1]]);

    const files = parseDiff(raw);

    expect(files).toHaveLength(1);
    expect(files[0].patchText).toBe(filePatch('lib/z.py', 1));
  });

  it('should accept CRLF line endings', () => {
    const files = parseDiff('diff --git a/x/y b/x/y\r\n+added\r\n');

    expect(files).toEqual([{ path: 'x/y', patchText: 'diff --git a/x/y b/x/y\n+added' }]);
  });

  it('should keep a header-only file (binary or mode change)', () => {
    const raw = 'diff --git a/img/logo.png b/img/logo.png\nBinary files differ\ndiff --git a/src/a.ts b/src/a.ts\n';

    const files = parseDiff(raw);

    expect(files).toEqual([
      { path: 'img/logo.png', patchText: 'diff --git a/img/logo.png b/img/logo.png\nBinary files differ' },
      { path: 'src/a.ts', patchText: 'diff --git a/src/a.ts b/src/a.ts' },
    ]);
  });

  it('should reproduce the diff body when patches are joined back', () => {
    const raw = buildDiff([['src/a.ts', 3], ['src/b.ts', 0], ['test/c.ts', 5]]);

    const joined = parseDiff(raw)
      .map((file) => file.patchText)
      .join('\n');

    expect(joined + '\n').toBe(raw);
  });
});
