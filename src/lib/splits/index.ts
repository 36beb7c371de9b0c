import type { Instant } from '../clock/index.js';
import { MAX_SPLITS } from './types.js';
import type { AscendResult, CloseResult, Split, SplitResult, SplitRow, SplitTree } from './types.js';

export type {
  Split,
  SplitTree,
  SplitError,
  SplitResult,
  CloseResult,
  AscendResult,
  SplitRow,
} from './types.js';
export { MAX_SPLITS } from './types.js';

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Create an empty tree with nothing active. */
export function createSplitTree(): SplitTree {
  return { splits: [], active: null };
}

// ---------------------------------------------------------------------------
// Mutations (each returns a new tree)
// ---------------------------------------------------------------------------

/**
 * Append a running split under `parent` (the active split by default) and make
 * it active. `offsetMs` is the session elapsed time at which it starts. The
 * parent must exist and still be running.
 */
export function openSplit(
  tree: SplitTree,
  name: string,
  offsetMs: number,
  now: Instant,
  parent: number | null = tree.active,
): SplitResult {
  if (tree.splits.length >= MAX_SPLITS) return { ok: false, reason: 'capacity-exceeded' };

  let level = 0;
  if (parent !== null) {
    const parentSplit = tree.splits[parent];
    if (parentSplit === undefined || parentSplit.endOffsetMs !== null) {
      return { ok: false, reason: 'no-active-split' };
    }
    level = parentSplit.level + 1;
  }

  const split: Split = {
    name,
    startOffsetMs: offsetMs,
    endOffsetMs: null,
    startedAt: now.wall.toISOString(),
    endedAt: null,
    parent,
    level,
  };
  const index = tree.splits.length;
  return { ok: true, tree: { splits: [...tree.splits, split], active: index }, index };
}

/** Like `openSplit`, but only beneath an active split. */
export function openNestedSplit(
  tree: SplitTree,
  name: string,
  offsetMs: number,
  now: Instant,
): SplitResult {
  if (tree.active === null) return { ok: false, reason: 'no-active-split' };
  return openSplit(tree, name, offsetMs, now, tree.active);
}

/**
 * Stop the active split at `offsetMs` and hand focus to its parent.
 * With nothing active the tree is returned unchanged.
 */
export function closeActive(tree: SplitTree, offsetMs: number, now: Instant): CloseResult {
  const index = tree.active;
  if (index === null) return { tree, closed: null };
  const split = tree.splits[index];
  if (split === undefined) return { tree, closed: null };

  const closed: Split = {
    ...split,
    endOffsetMs: Math.max(offsetMs, split.startOffsetMs),
    endedAt: now.wall.toISOString(),
  };
  return {
    tree: {
      splits: tree.splits.map((s, i) => (i === index ? closed : s)),
      active: split.parent,
    },
    closed: index,
  };
}

/** Move focus to the active split's parent, leaving the split itself running. */
export function ascend(tree: SplitTree): AscendResult {
  const index = tree.active;
  if (index === null) return { tree, left: null };
  const split = tree.splits[index];
  if (split === undefined) return { tree, left: null };
  return { tree: { ...tree, active: split.parent }, left: index };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Duration of a split; open splits run up to `totalElapsedMs`. */
export function getSplitDurationMs(split: Split, totalElapsedMs: number): number {
  const end = split.endOffsetMs ?? totalElapsedMs;
  return Math.max(0, end - split.startOffsetMs);
}

/** The active split followed by its ancestors, innermost first. */
export function getOpenStack(tree: SplitTree): number[] {
  const stack: number[] = [];
  let index = tree.active;
  while (index !== null && stack.length < tree.splits.length) {
    const split = tree.splits[index];
    if (split === undefined) break;
    stack.push(index);
    index = split.parent;
  }
  return stack;
}

export function hasCapacity(tree: SplitTree): boolean {
  return tree.splits.length < MAX_SPLITS;
}

/** Rows in insertion order, with open splits measured up to `totalElapsedMs`. */
export function snapshotSplits(tree: SplitTree, totalElapsedMs: number): SplitRow[] {
  return tree.splits.map((split, index) => {
    const open = split.endOffsetMs === null;
    const endMs = split.endOffsetMs ?? Math.max(totalElapsedMs, split.startOffsetMs);
    return {
      index,
      name: split.name,
      level: split.level,
      open,
      active: index === tree.active,
      startMs: split.startOffsetMs,
      endMs,
      durationMs: getSplitDurationMs(split, totalElapsedMs),
    };
  });
}
