import { formatClockMinute, formatClockSecond, formatDuration } from '../clock/index.js';
import type { Instant } from '../clock/index.js';
import { getTotalElapsedMs } from '../session/index.js';
import type { SessionState } from '../session/index.js';
import { getSplitDurationMs } from '../splits/index.js';
import type { SplitTree } from '../splits/index.js';
import type { LogClock, LogRecord } from './types.js';

export type { LogClock, LogRecord } from './types.js';

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

/**
 * Convert a session into logbook records: one for the goal, then one per
 * closed split in insertion order. Open splits are left out. Returns an empty
 * list when no session was ever started.
 */
export function exportSession(session: SessionState, tree: SplitTree, now: Instant): LogRecord[] {
  if (session.goal === null || session.startedAt === null) return [];

  const totalMs = getTotalElapsedMs(session, now);
  const records: LogRecord[] = [
    {
      depth: 1,
      title: session.goal,
      clock: { start: session.startedAt, end: now.wall.toISOString(), precision: 'minute' },
      durationMs: totalMs,
    },
  ];

  for (const split of tree.splits) {
    if (split.endOffsetMs === null || split.endedAt === null) continue;
    records.push({
      depth: split.level + 2,
      title: split.name,
      clock: { start: split.startedAt, end: split.endedAt, precision: 'second' },
      durationMs: getSplitDurationMs(split, totalMs),
    });
  }

  return records;
}

// ---------------------------------------------------------------------------
// Org-mode text
// ---------------------------------------------------------------------------

/** Render one record as an org heading with a LOGBOOK drawer, followed by a blank line. */
export function formatLogRecord(record: LogRecord): string {
  const lines = [
    `${'*'.repeat(record.depth)} ${record.title}`,
    '  :LOGBOOK:',
    `  CLOCK: [${formatClock(record.clock, 'start')}]--[${formatClock(record.clock, 'end')}] => ${formatDuration(record.durationMs)}`,
    '  :END:',
    '',
  ];
  return `${lines.join('\n')}\n`;
}

/** Render a whole save as the text appended to the logbook file. */
export function formatLogbook(records: readonly LogRecord[]): string {
  return records.map(formatLogRecord).join('');
}

function formatClock(clock: LogClock, edge: 'start' | 'end'): string {
  const date = new Date(clock[edge]);
  return clock.precision === 'minute' ? formatClockMinute(date) : formatClockSecond(date);
}
