import { appendFile } from 'node:fs/promises';

export type SaveResult = { ok: true } | { ok: false; reason: 'error'; error: unknown };

/** Append text to the logbook, creating the file if it does not exist. */
export async function appendLogbook(path: string, text: string): Promise<SaveResult> {
  try {
    await appendFile(path, text, 'utf8');
    return { ok: true };
  } catch (error) {
    return { ok: false, reason: 'error', error };
  }
}
