import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, applySetting, loadConfig } from '../index.js';

describe('loadConfig', () => {
  it('returns the defaults with no arguments and an empty environment', () => {
    expect(loadConfig([], {})).toEqual({ logFile: 'done.org', tickIntervalMs: 50, debug: false });
  });

  it('takes the log file from the first positional argument', () => {
    expect(loadConfig(['notes/today.org'], {}).logFile).toBe('notes/today.org');
  });

  it('ignores extra positional arguments', () => {
    expect(loadConfig(['a.org', 'b.org'], {}).logFile).toBe('a.org');
  });

  it('reads the environment', () => {
    const config = loadConfig([], {
      SPLITWATCH_LOG_FILE: 'env.org',
      SPLITWATCH_TICK_MS: '100',
      SPLITWATCH_DEBUG: 'true',
    });
    expect(config).toEqual({ logFile: 'env.org', tickIntervalMs: 100, debug: true });
  });

  it('prefers the positional argument over the environment', () => {
    expect(loadConfig(['cli.org'], { SPLITWATCH_LOG_FILE: 'env.org' }).logFile).toBe('cli.org');
  });

  it('does not modify the defaults', () => {
    loadConfig(['x.org'], { SPLITWATCH_DEBUG: '1' });
    expect(DEFAULT_CONFIG.logFile).toBe('done.org');
    expect(DEFAULT_CONFIG.debug).toBe(false);
  });
});

describe('applySetting', () => {
  it('ignores a blank log file', () => {
    expect(applySetting(DEFAULT_CONFIG, 'log_file', '   ')).toBe(DEFAULT_CONFIG);
  });

  it('trims the log file path', () => {
    expect(applySetting(DEFAULT_CONFIG, 'log_file', ' log.org ').logFile).toBe('log.org');
  });

  it('accepts tick intervals from 10 to 1000 ms', () => {
    expect(applySetting(DEFAULT_CONFIG, 'tick_ms', '10').tickIntervalMs).toBe(10);
    expect(applySetting(DEFAULT_CONFIG, 'tick_ms', '1000').tickIntervalMs).toBe(1000);
  });

  it('rejects out-of-range or non-integer tick intervals', () => {
    for (const value of ['9', '1001', '-50', '2.5', 'fast', '']) {
      expect(applySetting(DEFAULT_CONFIG, 'tick_ms', value)).toBe(DEFAULT_CONFIG);
    }
  });

  it('parses debug flags', () => {
    expect(applySetting(DEFAULT_CONFIG, 'debug', '1').debug).toBe(true);
    expect(applySetting(DEFAULT_CONFIG, 'debug', 'TRUE').debug).toBe(true);
    expect(applySetting({ ...DEFAULT_CONFIG, debug: true }, 'debug', '0').debug).toBe(false);
    expect(applySetting(DEFAULT_CONFIG, 'debug', 'maybe')).toBe(DEFAULT_CONFIG);
  });
});
