import type { Instant } from '../clock/index.js';
import { exportSession } from '../logbook/index.js';
import {
  createSession,
  getTotalElapsedMs,
  isRunning,
  resetSession,
  resumeSession,
  startSession,
  stopSession,
} from '../session/index.js';
import {
  ascend,
  closeActive,
  createSplitTree,
  hasCapacity,
  openNestedSplit,
  openSplit,
} from '../splits/index.js';
import type { SplitResult } from '../splits/index.js';
import type { AppState, Command, Effect, PromptTarget, Transition } from './types.js';

export type { AppState, Command, Effect, PromptTarget, Transition } from './types.js';

// ---------------------------------------------------------------------------
// Key bindings
// ---------------------------------------------------------------------------

export const KEY_BINDINGS: ReadonlyMap<string, Command> = new Map<string, Command>([
  ['s', 'start-stop'],
  ['c', 'resume'],
  ['r', 'reset'],
  ['g', 'open-split'],
  ['n', 'open-nested-split'],
  ['h', 'close-split'],
  ['u', 'ascend'],
  ['d', 'redraw'],
  ['t', 'save-log'],
  ['q', 'quit'],
]);

/** Map a key to its command. Case-sensitive; unbound keys give null. */
export function parseKey(key: string): Command | null {
  return KEY_BINDINGS.get(key) ?? null;
}

export const PROMPTS: Record<PromptTarget, string> = {
  goal: 'Enter main goal: ',
  split: 'Enter subgoal name: ',
  'nested-split': 'Enter nested subgoal name: ',
};

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

const FULL_RENDER: Effect = { type: 'render', full: true };
const LIVE_RENDER: Effect = { type: 'render', full: false };

export function createAppState(): AppState {
  return { session: createSession(), tree: createSplitTree() };
}

/**
 * Apply a keyboard command. A command whose precondition does not hold
 * returns the state unchanged with no effects.
 */
export function handleCommand(state: AppState, command: Command, now: Instant): Transition {
  const { session, tree } = state;

  switch (command) {
    case 'start-stop':
      if (isRunning(session)) {
        return changed({ ...state, session: stopSession(session, now) });
      }
      return prompt(state, 'goal');

    case 'resume':
      if (session.status !== 'paused') return unchanged(state);
      return changed({ ...state, session: resumeSession(session, now) });

    case 'reset':
      return changed({ session: resetSession(), tree: createSplitTree() });

    case 'open-split':
      if (!isRunning(session) || !hasCapacity(tree)) return unchanged(state);
      return prompt(state, 'split');

    case 'open-nested-split':
      if (!isRunning(session) || tree.active === null || !hasCapacity(tree)) {
        return unchanged(state);
      }
      return prompt(state, 'nested-split');

    case 'close-split': {
      const result = closeActive(tree, getTotalElapsedMs(session, now), now);
      if (result.closed === null) return unchanged(state);
      return changed({ ...state, tree: result.tree });
    }

    case 'ascend': {
      const result = ascend(tree);
      if (result.left === null) return unchanged(state);
      return changed({ ...state, tree: result.tree });
    }

    case 'redraw':
      return { state, effects: [FULL_RENDER] };

    case 'save-log': {
      if (session.status !== 'paused') return unchanged(state);
      const records = exportSession(session, tree, now);
      if (records.length === 0) return unchanged(state);
      return { state, effects: [{ type: 'persist', records }] };
    }

    case 'quit':
      return { state, effects: [{ type: 'terminate' }] };
  }
}

/**
 * Finish a command that asked for a line of text. Preconditions are checked
 * again since the answer arrives later; the screen is always repainted to
 * clear the prompt.
 */
export function handlePromptAnswer(
  state: AppState,
  target: PromptTarget,
  answer: string,
  now: Instant,
): Transition {
  const { session, tree } = state;

  if (target === 'goal') {
    return changed({ session: startSession(answer, now), tree: createSplitTree() });
  }

  if (!isRunning(session)) return changed(state);

  const offsetMs = getTotalElapsedMs(session, now);
  const result: SplitResult =
    target === 'split'
      ? openSplit(tree, answer, offsetMs, now)
      : openNestedSplit(tree, answer, offsetMs, now);

  return changed(result.ok ? { ...state, tree: result.tree } : state);
}

/** The user backed out of a prompt with Ctrl+C or Ctrl+D: quit, like `q`. */
export function handlePromptCancel(state: AppState): Transition {
  return { state, effects: [{ type: 'terminate' }] };
}

/** Periodic tick: refresh the live parts of the display while running. */
export function handleTick(state: AppState): Transition {
  return { state, effects: isRunning(state.session) ? [LIVE_RENDER] : [] };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function changed(state: AppState): Transition {
  return { state, effects: [FULL_RENDER] };
}

function unchanged(state: AppState): Transition {
  return { state, effects: [] };
}

function prompt(state: AppState, target: PromptTarget): Transition {
  return { state, effects: [{ type: 'prompt', message: PROMPTS[target], target }] };
}
