/** Maximum number of splits a single session can hold. */
export const MAX_SPLITS = 100;

/**
 * A named, timed interval. Offsets are session elapsed time (pause-aware),
 * not raw clock readings, so a paused session never inflates a split.
 */
export interface Split {
  name: string;
  startOffsetMs: number;
  /** Null while the split is running. Set once, never changed afterwards. */
  endOffsetMs: number | null;
  startedAt: string; // ISO 8601
  endedAt: string | null; // ISO 8601
  /** Index of the parent split, or null for a top-level split. */
  parent: number | null;
  /** 0 for top-level splits, parent level + 1 otherwise. */
  level: number;
}

/** Append-only collection of splits plus the index of the active (innermost open) split. */
export interface SplitTree {
  splits: readonly Split[];
  active: number | null;
}

export type SplitError = 'capacity-exceeded' | 'no-active-split';

export type SplitResult =
  | { ok: true; tree: SplitTree; index: number }
  | { ok: false; reason: SplitError };

export interface CloseResult {
  tree: SplitTree;
  /** Index of the split that was closed, or null when nothing was active. */
  closed: number | null;
}

export interface AscendResult {
  tree: SplitTree;
  /** Index of the split the pointer moved away from, or null when nothing was active. */
  left: number | null;
}

/** One split as seen at a given session elapsed time. */
export interface SplitRow {
  index: number;
  name: string;
  level: number;
  open: boolean;
  active: boolean;
  startMs: number;
  endMs: number;
  durationMs: number;
}
