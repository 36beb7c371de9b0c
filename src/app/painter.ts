import type { DrawModel } from '../lib/render/index.js';
import type { Renderer } from './renderer.js';

// Fixed screen layout (0-based rows).
const TITLE_ROW = 0;
const GOAL_ROW = 1;
const TIME_ROW = 2;
const STATUS_ROW = 3;
const HEADER_ROW = 4;
export const FIRST_SPLIT_ROW = 5;

/** Clear the screen and paint the whole frame. */
export function paintFull(renderer: Renderer, model: DrawModel): void {
  renderer.clear();
  line(renderer, TITLE_ROW, 0, model.title);
  line(renderer, GOAL_ROW, 0, model.goalLine);
  line(renderer, TIME_ROW, 0, model.timeLine);
  line(renderer, STATUS_ROW, 0, model.statusLine);
  line(renderer, HEADER_ROW, 0, model.splitsHeader);
  model.rows.forEach((row, i) => {
    line(renderer, FIRST_SPLIT_ROW + i, row.indent, row.text);
  });
  const controlsRow = FIRST_SPLIT_ROW + model.rows.length + 1;
  model.controls.forEach((text, i) => {
    line(renderer, controlsRow + i, 0, text);
  });
  renderer.flush();
}

/** Repaint only what changes between ticks: time, status and open splits. */
export function paintLive(renderer: Renderer, model: DrawModel): void {
  line(renderer, TIME_ROW, 0, model.timeLine);
  line(renderer, STATUS_ROW, 0, model.statusLine);
  model.rows.forEach((row, i) => {
    if (row.open) line(renderer, FIRST_SPLIT_ROW + i, row.indent, row.text);
  });
  renderer.flush();
}

/** First free row below the frame, where prompts are printed. */
export function promptRow(model: DrawModel): number {
  return FIRST_SPLIT_ROW + model.rows.length + 1 + model.controls.length + 1;
}

function line(renderer: Renderer, row: number, col: number, text: string): void {
  renderer.moveTo(row, col);
  renderer.print(text);
  renderer.clearLine();
}
