import { DEFAULT_CONFIG, MAX_TICK_INTERVAL_MS, MIN_TICK_INTERVAL_MS } from './types.js';
import type { AppConfig } from './types.js';

export type { AppConfig } from './types.js';
export { DEFAULT_CONFIG } from './types.js';

/** Environment variables read by `loadConfig`, mapped to config keys. */
export const ENV_KEYS = {
  SPLITWATCH_LOG_FILE: 'log_file',
  SPLITWATCH_TICK_MS: 'tick_ms',
  SPLITWATCH_DEBUG: 'debug',
} as const;

type SettingKey = (typeof ENV_KEYS)[keyof typeof ENV_KEYS];

/**
 * Build the configuration from CLI arguments (without the node and script
 * paths) and the environment. The first positional argument is the log file
 * and wins over `SPLITWATCH_LOG_FILE`. Values that fail validation are
 * ignored, leaving the default in place.
 */
export function loadConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
): AppConfig {
  let config: AppConfig = { ...DEFAULT_CONFIG };

  for (const [envKey, key] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined) {
      config = applySetting(config, key, value);
    }
  }

  const [logFile] = argv;
  if (logFile !== undefined) {
    config = applySetting(config, 'log_file', logFile);
  }

  return config;
}

/** Apply one key/value pair, returning the config unchanged when the value is invalid. */
export function applySetting(config: AppConfig, key: SettingKey, value: string): AppConfig {
  switch (key) {
    case 'log_file': {
      const path = value.trim();
      return path.length > 0 ? { ...config, logFile: path } : config;
    }
    case 'tick_ms': {
      if (!/^\d+$/.test(value.trim())) return config;
      const ms = Number(value.trim());
      if (ms < MIN_TICK_INTERVAL_MS || ms > MAX_TICK_INTERVAL_MS) return config;
      return { ...config, tickIntervalMs: ms };
    }
    case 'debug': {
      const flag = value.trim().toLowerCase();
      if (flag === '1' || flag === 'true') return { ...config, debug: true };
      if (flag === '0' || flag === 'false' || flag === '') return { ...config, debug: false };
      return config;
    }
  }
}
