import fs from 'node:fs';
import path from 'node:path';
import { formatElapsed } from '@/lib/display/index';
import type { Session } from '@/lib/timer/types';
import type { Config } from '@/lib/config/types';

/** Where the widget hands the session log after every toggle. */
export interface SessionStore {
  /** Persist the full, ordered session list. Throws on failure. */
  save(sessions: readonly Session[]): void;
}

export class SessionStoreError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = 'SessionStoreError';
  }
}

/**
 * One line per session: its duration as `HH:MM:SS` followed by
 * `active` or `pause`.
 */
export function serializeSessions(sessions: readonly Session[]): string {
  return sessions
    .map((s) => `${formatElapsed(s.end - s.start, true)} ${s.isPause ? 'pause' : 'active'}`)
    .join('\n');
}

/** Overwrites a log file with the whole session list on every save. */
export class FileSessionStore implements SessionStore {
  constructor(readonly filePath: string) {}

  save(sessions: readonly Session[]): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, serializeSessions(sessions));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SessionStoreError(`Failed to write ${this.filePath}: ${message}`, this.filePath);
    }
  }
}

/** Used when session logging is turned off. */
export class NoopSessionStore implements SessionStore {
  save(): void {}
}

/** Pick the store for the configured `store_last_session` flag. */
export function createSessionStore(
  config: Pick<Config, 'store_last_session'>,
  filePath: string,
): SessionStore {
  return config.store_last_session ? new FileSessionStore(filePath) : new NoopSessionStore();
}
