/** A `[width, height]` or `[x, y]` pair handed to the window host. */
export type Pair = [number, number];

/**
 * Widget configuration as stored on disk. Keys are snake_case to match the
 * file format.
 */
export interface Config {
  /** Minutes of running time before the clock turns yellow. */
  warn_after_minutes: number;
  /** Minutes of running time before the clock turns red. */
  danger_after_minutes: number;
  window_size: Pair;
  window_position: Pair;
  always_on_top: boolean;
  start_unpaused: boolean;
  /** Write the session log after every toggle. */
  store_last_session: boolean;
}

/** Default configuration, written to disk on first run. */
export const DEFAULT_CONFIG: Config = {
  warn_after_minutes: 45,
  danger_after_minutes: 60,
  window_size: [150, 80],
  window_position: [40, 40],
  always_on_top: false,
  start_unpaused: false,
  store_last_session: true,
};

/** Raised when the config file cannot be read or does not validate. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly problems: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
