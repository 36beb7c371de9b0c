/** A split row ready to paint. `indent` is in columns (level * 2). */
export interface DrawRow {
  text: string;
  indent: number;
  open: boolean;
}

/**
 * Everything the terminal painter needs for one frame.
 * Built fresh from session + split state; holds no references back into it.
 */
export interface DrawModel {
  title: string;
  goalLine: string;
  timeLine: string;
  statusLine: string;
  splitsHeader: string;
  rows: DrawRow[];
  controls: readonly string[];
}
