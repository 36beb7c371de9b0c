/** Clock range of a record. `precision` picks how the wall times are printed. */
export interface LogClock {
  start: string; // ISO 8601
  end: string; // ISO 8601
  precision: 'minute' | 'second';
}

/** One org-mode heading with its LOGBOOK clock line. */
export interface LogRecord {
  /** Number of leading stars: 1 for the session, split level + 2 for splits. */
  depth: number;
  title: string;
  clock: LogClock;
  durationMs: number;
}
