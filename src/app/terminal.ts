import { emitKeypressEvents } from 'node:readline';
import type { Key } from 'node:readline';
import { createInterface } from 'node:readline/promises';
import { EventEmitter } from 'eventemitter3';
import { DebugLogger, DebugTag } from '../lib/debug-log.js';

/** Reads one line of text from the user; null when the user cancels. */
export interface LineReader {
  prompt(message: string): Promise<string | null>;
}

/** Keyboard side of the terminal. A tty `ReadStream` in production. */
export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface KeyEvents {
  key: [key: string];
}

const SHOW_CURSOR = '\u001b[?25h';
const HIDE_CURSOR = '\u001b[?25l';

/**
 * Owns the process-wide terminal state: raw mode, keypress decoding and the
 * cursor. `acquire` and `release` bracket the program; `release` is safe to
 * call on any exit path, including after a failed `acquire`.
 *
 * Emits `key` for every character typed while acquired. Ctrl+C is reported as
 * `q`, since raw mode swallows SIGINT. At a prompt, Ctrl+C and Ctrl+D cancel
 * the prompt instead.
 */
export class TerminalSession extends EventEmitter<KeyEvents> implements LineReader {
  private acquired = false;
  private listening = false;

  constructor(
    private readonly input: KeyInput,
    private readonly output: NodeJS.WritableStream,
  ) {
    super();
  }

  acquire(): void {
    if (this.acquired) return;
    this.acquired = true;
    emitKeypressEvents(this.input);
    this.output.write(HIDE_CURSOR);
    this.listen();
  }

  release(): void {
    if (!this.acquired) return;
    this.acquired = false;
    this.unlisten();
    this.input.pause();
    this.output.write(`${SHOW_CURSOR}\n`);
  }

  /**
   * Leave raw mode, read one line and return it trimmed. Keys typed meanwhile
   * go to the line editor, not to `key` listeners. Resolves null when the line
   * editor is closed with Ctrl+C or Ctrl+D.
   */
  async prompt(message: string): Promise<string | null> {
    this.unlisten();
    this.output.write(SHOW_CURSOR);
    const rl = createInterface({ input: this.input, output: this.output, terminal: true });
    try {
      const answer = await rl.question(message);
      return answer.trim();
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        DebugLogger.log(DebugTag.INPUT, 'Prompt cancelled', err.message);
        return null;
      }
      throw err;
    } finally {
      rl.close();
      this.output.write(HIDE_CURSOR);
      if (this.acquired) this.listen();
    }
  }

  private readonly onKeypress = (text: string | undefined, key: Key | undefined): void => {
    if (key?.ctrl && key.name === 'c') {
      this.emit('key', 'q');
      return;
    }
    if (text === undefined || text.length === 0) {
      DebugLogger.log(DebugTag.INPUT, `Unprintable key ${key?.name ?? '?'}`);
      return;
    }
    this.emit('key', text);
  };

  private listen(): void {
    if (this.listening) return;
    this.listening = true;
    if (this.input.isTTY) this.input.setRawMode?.(true);
    this.input.on('keypress', this.onKeypress);
    this.input.resume();
  }

  private unlisten(): void {
    if (!this.listening) return;
    this.listening = false;
    this.input.off('keypress', this.onKeypress);
    if (this.input.isTTY) this.input.setRawMode?.(false);
  }
}
