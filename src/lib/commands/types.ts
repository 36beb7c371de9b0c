import type { LogRecord } from '../logbook/index.js';
import type { SessionState } from '../session/index.js';
import type { SplitTree } from '../splits/index.js';

/** Everything the consumer loop owns. Replaced wholesale on each transition. */
export interface AppState {
  session: SessionState;
  tree: SplitTree;
}

/** Commands reachable from the keyboard. */
export type Command =
  | 'start-stop'
  | 'resume'
  | 'reset'
  | 'open-split'
  | 'open-nested-split'
  | 'close-split'
  | 'ascend'
  | 'redraw'
  | 'save-log'
  | 'quit';

/** What a prompt answer will be used for. */
export type PromptTarget = 'goal' | 'split' | 'nested-split';

/** Side effects requested by a handler, performed by the consumer loop in order. */
export type Effect =
  | { type: 'render'; full: boolean }
  | { type: 'prompt'; message: string; target: PromptTarget }
  | { type: 'persist'; records: LogRecord[] }
  | { type: 'terminate' };

export interface Transition {
  state: AppState;
  effects: Effect[];
}
