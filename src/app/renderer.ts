/** Character-grid output used by the painter. Rows and columns are 0-based. */
export interface Renderer {
  clear(): void;
  moveTo(row: number, col: number): void;
  /** Erase from the cursor to the end of the line. */
  clearLine(): void;
  print(text: string): void;
  flush(): void;
}

/** Minimal writable surface; `process.stdout` satisfies it. */
export interface TextSink {
  readonly writable: boolean;
  write(chunk: string): boolean;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

const ESC = '\u001b[';

/**
 * Buffers ANSI escape sequences and writes them in one chunk on flush.
 * A write error reported by the sink is rethrown by the next flush.
 */
export class AnsiRenderer implements Renderer {
  private buffer = '';
  private failure: Error | null = null;

  constructor(private readonly sink: TextSink) {
    sink.on('error', (err) => {
      this.failure = err;
    });
  }

  clear(): void {
    this.buffer += `${ESC}2J${ESC}H`;
  }

  moveTo(row: number, col: number): void {
    this.buffer += `${ESC}${row + 1};${col + 1}H`;
  }

  clearLine(): void {
    this.buffer += `${ESC}K`;
  }

  print(text: string): void {
    this.buffer += text;
  }

  flush(): void {
    if (this.failure !== null) throw this.failure;
    if (!this.sink.writable) throw new Error('Terminal output is no longer writable');
    const chunk = this.buffer;
    this.buffer = '';
    if (chunk.length > 0) this.sink.write(chunk);
  }
}
