// ---------------------------------------------------------------------------
// Duration and wall-clock formatting
// ---------------------------------------------------------------------------

function pad(n: number, width = 2): string {
  return n.toString().padStart(width, '0');
}

/**
 * Format a duration as HH:MM:SS.mmm. Hours grow past two digits when needed;
 * negative and fractional inputs are clamped and floored.
 */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const millis = total % 1000;
  const totalSeconds = Math.floor(total / 1000);
  const seconds = totalSeconds % 60;
  const minutes = Math.floor(totalSeconds / 60) % 60;
  const hours = Math.floor(totalSeconds / 3600);

  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
}

/** Local date and time to the minute: `YYYY-MM-DD HH:MM`. */
export function formatClockMinute(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** Local date and time to the second: `YYYY-MM-DD HH:MM:SS`. */
export function formatClockSecond(date: Date): string {
  return `${formatDate(date)} ${formatTimeOfDay(date)}`;
}

/** Local time of day: `HH:MM:SS`. */
export function formatTimeOfDay(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
