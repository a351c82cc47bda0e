/**
 * Diff Processing Module
 *
 * Parsing, directory grouping and atomic splitting of unified diffs.
 */

export { parseDiff, extractHeaderPath } from './parser.js';

export { groupByDirectory, pathSegments, type GroupOptions } from './grouper.js';

export {
  splitGroups,
  planAtomicDiffs,
  meetsMinDiffs,
  countAddedLoc,
  groupPatchText,
  shouldExplode,
  fileTitle,
  groupTitle,
} from './splitter.js';

export {
  ROOT_GROUP_KEY,
  type FileChange,
  type DirectoryGroup,
  type AtomicDiff,
  type SplitThresholds,
} from './types.js';
