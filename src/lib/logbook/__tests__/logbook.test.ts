import { describe, it, expect } from 'vitest';
import { exportSession, formatLogRecord, formatLogbook } from '../index.js';
import type { LogRecord } from '../types.js';
import type { Instant } from '../../clock/index.js';
import { createSession, startSession, stopSession } from '../../session/index.js';
import type { SessionState } from '../../session/index.js';
import {
  closeActive,
  createSplitTree,
  openNestedSplit,
  openSplit,
} from '../../splits/index.js';
import type { SplitResult, SplitTree } from '../../splits/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Local wall time 09:00:00 on 2026-03-02 plus `seconds`. */
function t(seconds: number): Instant {
  return { mono: seconds * 1000, wall: new Date(2026, 2, 2, 9, 0, seconds) };
}

function opened(result: SplitResult): SplitTree {
  if (!result.ok) throw new Error(result.reason);
  return result.tree;
}

/**
 * The "Write report" session: Draft opened at 0s, Outline nested at 1s and
 * closed at 5s, Draft closed at 10s, then paused at 10s.
 */
function writeReport(): { session: SessionState; tree: SplitTree } {
  let session = startSession('Write report', t(0));
  let tree = opened(openSplit(createSplitTree(), 'Draft', 0, t(0)));
  tree = opened(openNestedSplit(tree, 'Outline', 1000, t(1)));
  tree = closeActive(tree, 5000, t(5)).tree;
  tree = closeActive(tree, 10_000, t(10)).tree;
  session = stopSession(session, t(10));
  return { session, tree };
}

// ---------------------------------------------------------------------------
// exportSession
// ---------------------------------------------------------------------------

describe('exportSession', () => {
  it('returns nothing for a session that never started', () => {
    expect(exportSession(createSession(), createSplitTree(), t(0))).toEqual([]);
  });

  it('produces one session record plus one per closed split', () => {
    const { session, tree } = writeReport();
    const records = exportSession(session, tree, t(10));

    expect(records).toEqual([
      {
        depth: 1,
        title: 'Write report',
        clock: { start: t(0).wall.toISOString(), end: t(10).wall.toISOString(), precision: 'minute' },
        durationMs: 10_000,
      },
      {
        depth: 2,
        title: 'Draft',
        clock: { start: t(0).wall.toISOString(), end: t(10).wall.toISOString(), precision: 'second' },
        durationMs: 10_000,
      },
      {
        depth: 3,
        title: 'Outline',
        clock: { start: t(1).wall.toISOString(), end: t(5).wall.toISOString(), precision: 'second' },
        durationMs: 4000,
      },
    ]);
  });

  it('skips splits that are still open', () => {
    let session = startSession('Goal', t(0));
    let tree = opened(openSplit(createSplitTree(), 'Done', 0, t(0)));
    tree = closeActive(tree, 2000, t(2)).tree;
    tree = opened(openSplit(tree, 'Running', 3000, t(3)));
    tree = opened(openNestedSplit(tree, 'Also running', 4000, t(4)));
    session = stopSession(session, t(6));

    const records = exportSession(session, tree, t(6));
    expect(records.map((r) => [r.depth, r.title])).toEqual([
      [1, 'Goal'],
      [2, 'Done'],
    ]);
  });

  it('uses pause-aware elapsed time for the session duration', () => {
    const session = stopSession(startSession('Goal', t(0)), t(3));
    const [record] = exportSession(session, createSplitTree(), t(63));
    expect(record?.durationMs).toBe(3000);
    expect(record?.clock.end).toBe(t(63).wall.toISOString());
  });

  it('is not deduplicated across saves', () => {
    const { session, tree } = writeReport();
    const once = formatLogbook(exportSession(session, tree, t(10)));
    const twice = once + formatLogbook(exportSession(session, tree, t(10)));
    expect(twice.split('* Write report\n')).toHaveLength(3);
  });
});

// ---------------------------------------------------------------------------
// Org formatting
// ---------------------------------------------------------------------------

describe('formatLogRecord', () => {
  it('prints a session heading with minute precision', () => {
    const record: LogRecord = {
      depth: 1,
      title: 'Write report',
      clock: { start: t(0).wall.toISOString(), end: t(600).wall.toISOString(), precision: 'minute' },
      durationMs: 600_000,
    };
    expect(formatLogRecord(record)).toBe(
      [
        '* Write report',
        '  :LOGBOOK:',
        '  CLOCK: [2026-03-02 09:00]--[2026-03-02 09:10] => 00:10:00.000',
        '  :END:',
        '',
        '',
      ].join('\n'),
    );
  });
});

describe('formatLogbook', () => {
  it('renders the Write report session', () => {
    const { session, tree } = writeReport();
    const text = formatLogbook(exportSession(session, tree, t(10)));

    expect(text).toBe(
      [
        '* Write report',
        '  :LOGBOOK:',
        '  CLOCK: [2026-03-02 09:00]--[2026-03-02 09:00] => 00:00:10.000',
        '  :END:',
        '',
        '** Draft',
        '  :LOGBOOK:',
        '  CLOCK: [2026-03-02 09:00:00]--[2026-03-02 09:00:10] => 00:00:10.000',
        '  :END:',
        '',
        '*** Outline',
        '  :LOGBOOK:',
        '  CLOCK: [2026-03-02 09:00:01]--[2026-03-02 09:00:05] => 00:00:04.000',
        '  :END:',
        '',
        '',
      ].join('\n'),
    );
  });

  it('renders nothing for no records', () => {
    expect(formatLogbook([])).toBe('');
  });
});
