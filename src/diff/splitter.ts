/**
 * Atomic splitting
 *
 * Decides per directory group whether it stays one atomic diff or is
 * exploded into one diff per file, then applies the minimum-output
 * quality filter to the whole pull request.
 */

import type { AtomicDiff, DirectoryGroup, SplitThresholds } from './types.js';
import { ROOT_GROUP_KEY } from './types.js';

/**
 * Count added lines in a patch, ignoring `+++` file markers
 */
export function countAddedLoc(patchText: string): number {
  let count = 0;
  for (const line of patchText.split('\n')) {
    if (line.startsWith('+') && !line.startsWith('+++')) {
      count++;
    }
  }
  return count;
}

/**
 * Concatenated patch text of a group's members, in diff order
 */
export function groupPatchText(group: DirectoryGroup): string {
  return group.members.map((member) => member.patchText).join('\n');
}

export function fileTitle(path: string): string {
  return `Update ${path}`;
}

export function groupTitle(key: string): string {
  return key === ROOT_GROUP_KEY ? 'Update repository root' : `Update ${key} directory`;
}

/**
 * Whether a group must be exploded into per-file diffs
 *
 * `groupCount` is the total for the pull request, so the maxDirs rule hits
 * every group or none; only addedLoc differs between groups.
 */
export function shouldExplode(
  addedLoc: number,
  groupCount: number,
  thresholds: Pick<SplitThresholds, 'maxLoc' | 'maxDirs'>
): boolean {
  return addedLoc > thresholds.maxLoc || groupCount >= thresholds.maxDirs;
}

/**
 * Apply the per-group keep/explode decision, without the quality filter
 *
 * @param groups - Groups in diff order
 * @param thresholds - maxLoc and maxDirs
 * @returns Atomic diffs in group order, members in diff order
 */
export function planAtomicDiffs(
  groups: Map<string, DirectoryGroup> | DirectoryGroup[],
  thresholds: Pick<SplitThresholds, 'maxLoc' | 'maxDirs'>
): AtomicDiff[] {
  const groupList = Array.isArray(groups) ? groups : [...groups.values()];
  const groupCount = groupList.length;
  const atomicDiffs: AtomicDiff[] = [];

  for (const group of groupList) {
    const patchText = groupPatchText(group);
    const addedLoc = countAddedLoc(patchText);

    if (shouldExplode(addedLoc, groupCount, thresholds)) {
      for (const member of group.members) {
        atomicDiffs.push({ title: fileTitle(member.path), patchText: member.patchText });
      }
    } else {
      atomicDiffs.push({ title: groupTitle(group.key), patchText });
    }
  }

  return atomicDiffs;
}

/**
 * Quality filter: a pull request must yield at least `minDiffs` atomic diffs
 */
export function meetsMinDiffs(atomicDiffs: AtomicDiff[], minDiffs: number): boolean {
  return atomicDiffs.length >= minDiffs;
}

/**
 * Split directory groups into atomic diffs
 *
 * @returns Atomic diffs, or undefined when fewer than `minDiffs` were produced
 */
export function splitGroups(
  groups: Map<string, DirectoryGroup> | DirectoryGroup[],
  thresholds: SplitThresholds
): AtomicDiff[] | undefined {
  const atomicDiffs = planAtomicDiffs(groups, thresholds);
  return meetsMinDiffs(atomicDiffs, thresholds.minDiffs) ? atomicDiffs : undefined;
}
