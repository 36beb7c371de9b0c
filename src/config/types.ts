/** Runtime configuration for the stopwatch. */
export interface AppConfig {
  /** Org file each save is appended to. */
  logFile: string;
  /** Period of the display refresh tick, in milliseconds. */
  tickIntervalMs: number;
  /** Write diagnostics to stderr. */
  debug: boolean;
}

/** Default configuration. */
export const DEFAULT_CONFIG: AppConfig = {
  logFile: 'done.org',
  tickIntervalMs: 50,
  debug: false,
};

export const MIN_TICK_INTERVAL_MS = 10;
export const MAX_TICK_INTERVAL_MS = 1000;
