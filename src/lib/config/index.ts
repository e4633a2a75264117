import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, DEFAULT_CONFIG } from './types';
import type { Config } from './types';
import { validateConfig } from './schema';

export type { Config, Pair } from './types';
export { ConfigError, DEFAULT_CONFIG } from './types';
export { ConfigSchema, validateConfig } from './schema';
export {
  CONFIG_FILE_NAME,
  SESSION_LOG_FILE_NAME,
  getConfigDir,
  getConfigPath,
  getSessionLogPath,
} from './paths';

/**
 * Load the widget configuration from `configPath`.
 *
 * A missing file is created with the defaults. Missing keys fall back to
 * their defaults and unknown keys are ignored. Anything unreadable or
 * invalid throws a {@link ConfigError}.
 */
export function loadConfig(configPath: string): Config {
  if (!fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    return { ...DEFAULT_CONFIG };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${configPath}: ${message}`, configPath, [message]);
  }

  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(`${configPath}: ${result.errors.join('; ')}`, configPath, result.errors);
  }
  return result.config;
}

function writeDefaultConfig(configPath: string): void {
  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${configPath}: could not write defaults: ${message}`, configPath, [message]);
  }
}
