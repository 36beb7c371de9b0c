import { EventEmitter } from 'eventemitter3';

/** Events handled by the consumer loop, in arrival order. */
export type AppEvent = { type: 'tick' } | { type: 'input'; key: string };

/**
 * Single-consumer queue that merges the tick and input producers.
 * At most one tick waits in the queue at a time; a tick that arrives while
 * another is still pending carries no new information and is dropped.
 */
export class EventQueue {
  private readonly pending: AppEvent[] = [];
  private waiter: ((event: AppEvent) => void) | null = null;

  push(event: AppEvent): void {
    const waiter = this.waiter;
    if (waiter !== null) {
      this.waiter = null;
      waiter(event);
      return;
    }
    if (event.type === 'tick' && this.pending.some((e) => e.type === 'tick')) return;
    this.pending.push(event);
  }

  /** Resolve with the oldest pending event, waiting for one if needed. */
  next(): Promise<AppEvent> {
    const event = this.pending.shift();
    if (event !== undefined) return Promise.resolve(event);
    if (this.waiter !== null) {
      return Promise.reject(new Error('EventQueue supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  get size(): number {
    return this.pending.length;
  }
}

export interface TickEvents {
  tick: [];
}

/** Fixed-rate tick producer. */
export class TickSource extends EventEmitter<TickEvents> {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly intervalMs: number) {
    super();
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => {
      this.emit('tick');
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
