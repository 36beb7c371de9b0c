import { monoSinceMs } from '../clock/index.js';
import type { Instant } from '../clock/index.js';
import type { SessionState } from './types.js';

export type { SessionState, SessionStatus } from './types.js';

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Create an idle session with no goal. */
export function createSession(): SessionState {
  return {
    status: 'idle',
    goal: null,
    startedAt: null,
    segmentStartMs: null,
    elapsedBeforePauseMs: 0,
  };
}

// ---------------------------------------------------------------------------
// State transitions
// ---------------------------------------------------------------------------

/**
 * Start a fresh session for `goal`. Valid from any status: a running or paused
 * session is discarded, not resumed.
 */
export function startSession(goal: string, now: Instant): SessionState {
  return {
    status: 'running',
    goal,
    startedAt: now.wall.toISOString(),
    segmentStartMs: now.mono,
    elapsedBeforePauseMs: 0,
  };
}

/** Pause a running session, folding the current segment into the total. */
export function stopSession(state: SessionState, now: Instant): SessionState {
  if (state.status !== 'running') return state;
  return {
    ...state,
    status: 'paused',
    segmentStartMs: null,
    elapsedBeforePauseMs: state.elapsedBeforePauseMs + currentSegmentMs(state, now),
  };
}

/** Resume a paused session. Idle and running sessions are returned unchanged. */
export function resumeSession(state: SessionState, now: Instant): SessionState {
  if (state.status !== 'paused') return state;
  return {
    ...state,
    status: 'running',
    segmentStartMs: now.mono,
  };
}

/** Drop the goal and all elapsed time. Valid from any status. */
export function resetSession(): SessionState {
  return createSession();
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Total elapsed milliseconds, excluding paused intervals. */
export function getTotalElapsedMs(state: SessionState, now: Instant): number {
  return state.elapsedBeforePauseMs + currentSegmentMs(state, now);
}

export function isRunning(state: SessionState): boolean {
  return state.status === 'running';
}

function currentSegmentMs(state: SessionState, now: Instant): number {
  if (state.status !== 'running' || state.segmentStartMs === null) return 0;
  return monoSinceMs(state.segmentStartMs, now);
}
