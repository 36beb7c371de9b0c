#!/usr/bin/env node
import { appendLogbook } from './app/logbook-file.js';
import { runApp } from './app/app.js';
import { EventQueue, TickSource } from './app/event-queue.js';
import { AnsiRenderer } from './app/renderer.js';
import { TerminalSession } from './app/terminal.js';
import { loadConfig } from './config/index.js';
import { systemClock } from './lib/clock/index.js';
import { DebugLogger, DebugTag } from './lib/debug-log.js';

async function main(): Promise<void> {
  const config = loadConfig(process.argv.slice(2), process.env);
  DebugLogger.setEnabled(config.debug);
  DebugLogger.log(DebugTag.APP, 'Starting', config);

  const queue = new EventQueue();
  const ticks = new TickSource(config.tickIntervalMs);
  const terminal = new TerminalSession(process.stdin, process.stdout);

  ticks.on('tick', () => queue.push({ type: 'tick' }));
  terminal.on('key', (key) => queue.push({ type: 'input', key }));

  try {
    terminal.acquire();
    ticks.start();
    await runApp({
      clock: systemClock,
      queue,
      renderer: new AnsiRenderer(process.stdout),
      lineReader: terminal,
      persist: (text) => appendLogbook(config.logFile, text),
    });
  } finally {
    ticks.stop();
    terminal.release();
  }
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`splitwatch: ${message}\n`);
    process.exit(1);
  },
);
