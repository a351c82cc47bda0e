/**
 * Type definitions for diff parsing and splitting
 */

/**
 * One modified file in a unified diff
 */
export interface FileChange {
  /** File path (the b/ side of the diff header) */
  path: string;
  /** Header line plus every following line up to the next file header */
  patchText: string;
}

/**
 * File changes sharing a top-level path segment
 */
export interface DirectoryGroup {
  /** First path segment of the members, or ROOT_GROUP_KEY */
  key: string;
  /** Members in diff order */
  members: FileChange[];
}

/**
 * A self-contained slice of a pull request
 */
export interface AtomicDiff {
  title: string;
  patchText: string;
}

/**
 * Thresholds driving the split decision
 */
export interface SplitThresholds {
  /** Added-line limit per group; above it the group is exploded */
  maxLoc: number;
  /** Group count at or above which every group is exploded */
  maxDirs: number;
  /** Fewer atomic diffs than this rejects the whole pull request */
  minDiffs: number;
}

/**
 * Group key used for files at the repository root when they are grouped
 */
export const ROOT_GROUP_KEY = '.';
