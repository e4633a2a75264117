import os from 'node:os';
import path from 'node:path';

export const CONFIG_FILE_NAME = 'desk-stopwatch.json';
export const SESSION_LOG_FILE_NAME = 'desk-stopwatch.log';

/**
 * Per-user configuration directory for the given platform:
 * `$XDG_CONFIG_HOME` or `~/.config` on Linux, `~/Library/Application Support`
 * on macOS, `%APPDATA%` on Windows.
 */
export function getConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
): string {
  switch (platform) {
    case 'darwin':
      return path.join(home, 'Library', 'Application Support');
    case 'win32':
      return env.APPDATA || path.join(home, 'AppData', 'Roaming');
    default:
      return env.XDG_CONFIG_HOME || path.join(home, '.config');
  }
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

export function getSessionLogPath(): string {
  return path.join(getConfigDir(), SESSION_LOG_FILE_NAME);
}
