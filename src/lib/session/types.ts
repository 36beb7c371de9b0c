/** Possible session statuses. */
export type SessionStatus = 'idle' | 'running' | 'paused';

/** State of the main goal's stopwatch. */
export interface SessionState {
  status: SessionStatus;
  /** Main goal; null until a session is started. */
  goal: string | null;
  /** Wall-clock time (ISO 8601) the session was started. */
  startedAt: string | null;
  /** Monotonic ms at the start of the current running segment. Null unless running. */
  segmentStartMs: number | null;
  /** Milliseconds accumulated by the segments that ended before the current one. */
  elapsedBeforePauseMs: number;
}
