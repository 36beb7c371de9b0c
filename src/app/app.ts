import type { Clock, Instant } from '../lib/clock/index.js';
import {
  createAppState,
  handleCommand,
  handlePromptAnswer,
  handlePromptCancel,
  handleTick,
  parseKey,
} from '../lib/commands/index.js';
import type { AppState, Transition } from '../lib/commands/index.js';
import { DebugLogger, DebugTag } from '../lib/debug-log.js';
import { formatLogbook } from '../lib/logbook/index.js';
import { buildDrawModel } from '../lib/render/index.js';
import type { DrawModel } from '../lib/render/index.js';
import { getTotalElapsedMs } from '../lib/session/index.js';
import type { EventQueue } from './event-queue.js';
import type { SaveResult } from './logbook-file.js';
import { paintFull, paintLive, promptRow } from './painter.js';
import type { Renderer } from './renderer.js';
import type { LineReader } from './terminal.js';

export interface AppDeps {
  clock: Clock;
  queue: EventQueue;
  renderer: Renderer;
  lineReader: LineReader;
  /** Append formatted logbook text. Failures are reported, never thrown. */
  persist: (text: string) => Promise<SaveResult>;
}

function modelAt(state: AppState, now: Instant): DrawModel {
  return buildDrawModel(state.session, state.tree, getTotalElapsedMs(state.session, now));
}

/**
 * Consumer loop. Takes events from the queue one at a time and is the only
 * place state is replaced. Resolves with the final state when a quit command
 * is handled; rejects when painting fails.
 */
export async function runApp(deps: AppDeps): Promise<AppState> {
  const { clock, queue, renderer, lineReader, persist } = deps;
  let state = createAppState();

  // Performs the effects of one transition in order. Returns true on terminate.
  async function perform(transition: Transition): Promise<boolean> {
    state = transition.state;

    for (const effect of transition.effects) {
      switch (effect.type) {
        case 'render': {
          const model = modelAt(state, clock.now());
          if (effect.full) paintFull(renderer, model);
          else paintLive(renderer, model);
          break;
        }

        case 'prompt': {
          renderer.moveTo(promptRow(modelAt(state, clock.now())), 0);
          renderer.clearLine();
          renderer.flush();
          const answer = await lineReader.prompt(effect.message);
          const next =
            answer === null
              ? handlePromptCancel(state)
              : handlePromptAnswer(state, effect.target, answer, clock.now());
          if (await perform(next)) {
            return true;
          }
          break;
        }

        case 'persist': {
          const result = await persist(formatLogbook(effect.records));
          if (result.ok) {
            DebugLogger.log(DebugTag.LOGBOOK, `Saved ${effect.records.length} record(s)`);
          } else {
            DebugLogger.log(DebugTag.LOGBOOK, 'Failed to save logbook', result.error);
          }
          break;
        }

        case 'terminate':
          return true;
      }
    }
    return false;
  }

  paintFull(renderer, modelAt(state, clock.now()));

  for (;;) {
    const event = await queue.next();

    if (event.type === 'tick') {
      await perform(handleTick(state));
      continue;
    }

    const command = parseKey(event.key);
    if (command === null) {
      DebugLogger.log(DebugTag.INPUT, `Ignored key ${JSON.stringify(event.key)}`);
      continue;
    }

    DebugLogger.log(DebugTag.APP, `Command ${command}`);
    if (await perform(handleCommand(state, command, clock.now()))) {
      return state;
    }
  }
}
