import { formatDuration } from '../clock/index.js';
import type { SessionState } from '../session/index.js';
import { MAX_SPLITS, getOpenStack, snapshotSplits } from '../splits/index.js';
import type { SplitRow, SplitTree } from '../splits/index.js';
import type { DrawModel, DrawRow } from './types.js';

export type { DrawModel, DrawRow } from './types.js';

export const TITLE = '=== Split Stopwatch ===';

export const CONTROLS: readonly string[] = [
  'Controls: s start/pause | c continue | r reset | g subgoal | n nested subgoal',
  '          h stop subgoal | u up | d redraw | t save log | q quit',
];

/** Format one split row as `NN) start -> end = duration name`. */
export function formatSplitRow(row: SplitRow): string {
  const number = String(row.index + 1).padStart(2, ' ');
  return `${number}) ${formatDuration(row.startMs)} -> ${formatDuration(row.endMs)} = ${formatDuration(row.durationMs)} ${row.name}`;
}

/** Derive a frame from the current state at `totalElapsedMs`. */
export function buildDrawModel(
  session: SessionState,
  tree: SplitTree,
  totalElapsedMs: number,
): DrawModel {
  const rows: DrawRow[] = snapshotSplits(tree, totalElapsedMs).map((row) => ({
    text: formatSplitRow(row),
    indent: row.level * 2,
    open: row.open,
  }));

  return {
    title: TITLE,
    goalLine: `Goal  : ${session.goal ?? '(none)'}`,
    timeLine: `Time  : ${formatDuration(totalElapsedMs)}`,
    statusLine: buildStatusLine(session, tree),
    splitsHeader: `Subgoals (${tree.splits.length}/${MAX_SPLITS}):`,
    rows,
    controls: CONTROLS,
  };
}

function buildStatusLine(session: SessionState, tree: SplitTree): string {
  const status = `State : ${session.status}`;
  const path = getOpenStack(tree)
    .reverse()
    .map((index) => tree.splits[index]?.name ?? '?');
  return path.length > 0 ? `${status}  Active: ${path.join(' > ')}` : status;
}
