import { formatTimeOfDay } from './clock/index.js';

export enum DebugTag {
  APP = '[ App ]',
  INPUT = '[ Input ]',
  LOGBOOK = '[ Logbook ]',
}

type LineSink = (line: string) => void;

const stderrSink: LineSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Opt-in diagnostics. Off by default: stderr shares the terminal with the
 * stopwatch display, so anything written here lands on top of it.
 */
export class DebugLogger {
  private static enabled = false;
  private static sink: LineSink = stderrSink;

  public static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  public static isEnabled(): boolean {
    return this.enabled;
  }

  /** Redirect output; pass nothing to restore stderr. */
  public static setSink(sink?: LineSink): void {
    this.sink = sink ?? stderrSink;
  }

  public static log(tag: DebugTag, message: string, details?: unknown): void {
    if (!this.enabled) {
      return;
    }

    this.sink(`${formatTimeOfDay(new Date())} ${tag} ${message}`);
    if (details !== undefined) {
      this.sink(describe(details));
    }
  }
}

function describe(details: unknown): string {
  if (details instanceof Error) {
    return details.stack ?? `${details.name}: ${details.message}`;
  }
  if (typeof details === 'string') {
    return details;
  }
  return JSON.stringify(details, null, 2) ?? String(details);
}
