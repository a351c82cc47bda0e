/**
 * Diff builders shared by the test suites
 */

/**
 * Patch text for one modified file with `added` added lines
 */
export function filePatch(path: string, added: number): string {
  const lines = [
    `diff --git a/${path} b/${path}`,
    'index 1111111..2222222 100644',
    `--- a/${path}`,
    `+++ b/${path}`,
    `@@ -1,1 +1,${added + 1} @@`,
    ' unchanged',
  ];
  for (let i = 1; i <= added; i++) {
    lines.push(`+line ${i}`);
  }
  return lines.join('\n');
}

/**
 * Raw diff (newline terminated) for files given as [path, addedLines]
 */
export function buildDiff(files: Array<[string, number]>): string {
  return files.map(([path, added]) => filePatch(path, added)).join('\n') + '\n';
}
