/**
 * Directory grouping
 *
 * Partitions file changes by their top-level directory. Map iteration
 * order follows the first occurrence of each directory in the diff.
 */

import type { DirectoryGroup, FileChange } from './types.js';
import { ROOT_GROUP_KEY } from './types.js';

export interface GroupOptions {
  /**
   * Collect files with no directory component into one ROOT_GROUP_KEY group.
   * When false they belong to no group and are left out of the split.
   */
  groupRootFiles?: boolean;
}

/**
 * Non-empty `/`-separated segments of a path
 */
export function pathSegments(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * Group file changes by first path segment
 */
export function groupByDirectory(
  files: FileChange[],
  options: GroupOptions = {}
): Map<string, DirectoryGroup> {
  const groups = new Map<string, DirectoryGroup>();

  for (const file of files) {
    const segments = pathSegments(file.path);
    let key: string;
    if (segments.length > 1 && segments[0] !== undefined) {
      key = segments[0];
    } else if (options.groupRootFiles) {
      key = ROOT_GROUP_KEY;
    } else {
      continue;
    }

    const group = groups.get(key);
    if (group) {
      group.members.push(file);
    } else {
      groups.set(key, { key, members: [file] });
    }
  }

  return groups;
}
