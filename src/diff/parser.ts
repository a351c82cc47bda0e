/**
 * Unified diff parser
 *
 * Splits raw `git diff` / GitHub `.diff` output into one record per file.
 * Never throws: text that does not look like a diff yields fewer (or no)
 * file changes.
 */

import type { FileChange } from './types.js';

const FILE_HEADER_PREFIX = 'diff --git ';

/**
 * Extract the file path from a `diff --git a/<old> b/<new>` header
 *
 * Uses the text after the last " b/" so paths containing spaces survive.
 * Headers without a " b/" marker fall back to everything after the prefix.
 */
export function extractHeaderPath(headerLine: string): string {
  const marker = headerLine.lastIndexOf(' b/');
  if (marker !== -1) {
    return headerLine.slice(marker + 3);
  }
  return headerLine.slice(FILE_HEADER_PREFIX.length).trim();
}

/**
 * Split diff text into lines, dropping the empty entry after a trailing newline
 */
function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parse a unified diff into per-file changes
 *
 * @param raw - Raw diff text
 * @returns File changes in diff order; empty when no file header is present
 */
export function parseDiff(raw: string): FileChange[] {
  const files: FileChange[] = [];
  let currentPath: string | null = null;
  let currentLines: string[] = [];

  const flush = () => {
    if (currentPath !== null) {
      files.push({ path: currentPath, patchText: currentLines.join('\n') });
    }
  };

  for (const line of splitLines(raw)) {
    if (line.startsWith(FILE_HEADER_PREFIX)) {
      flush();
      currentPath = extractHeaderPath(line);
      currentLines = [line];
      continue;
    }

    // Preamble before the first header (e.g. mail headers of a .patch) is ignored
    if (currentPath !== null) {
      currentLines.push(line);
    }
  }

  flush();
  return files;
}
