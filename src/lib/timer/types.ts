/** Whether the stopwatch is currently counting. */
export type TimerStatus = 'running' | 'paused';

/**
 * One closed interval of either active tracking or a break.
 * Timestamps are whole seconds since the Unix epoch; `end >= start`.
 */
export interface Session {
  isPause: boolean;
  start: number;
  end: number;
}

/** Serializable stopwatch state. `anchor` is an ISO 8601 string. */
export interface TimerState {
  paused: boolean;
  /** When the current, not yet closed, interval began. */
  anchor: string;
  /** Closed intervals in the order they ended. Append-only. */
  sessions: readonly Session[];
}
