import type { Session, TimerState, TimerStatus } from './types';

export type { Session, TimerState, TimerStatus } from './types';

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Create a fresh stopwatch anchored at `now`. Paused unless told otherwise. */
export function createTimer(now: Date, startUnpaused = false): TimerState {
  return {
    paused: !startUnpaused,
    anchor: now.toISOString(),
    sessions: [],
  };
}

// ---------------------------------------------------------------------------
// State transitions
// ---------------------------------------------------------------------------

/**
 * Close the open interval, record it, and flip between running and paused.
 * Resuming re-anchors at `now`, so a resumed run counts from zero; pausing
 * keeps the anchor of the run that just ended.
 */
export function toggleTimer(state: TimerState, now: Date): TimerState {
  return {
    paused: !state.paused,
    anchor: state.paused ? now.toISOString() : state.anchor,
    sessions: [...state.sessions, closeSession(state, now)],
  };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function getTimerStatus(state: TimerState): TimerStatus {
  return state.paused ? 'paused' : 'running';
}

/**
 * Whole seconds since the current run started, or 0 while paused.
 * A clock that moved backwards past the anchor reads as 0.
 */
export function getElapsedSeconds(state: TimerState, now: Date): number {
  if (state.paused) return 0;
  return Math.max(0, Math.floor(diffSeconds(state.anchor, now)));
}

/**
 * Number of breaks taken: closed pause intervals that follow active time.
 * The idle interval before the first run is not a break.
 */
export function getPauseCount(state: TimerState): number {
  return state.sessions.filter((s, i) => s.isPause && i > 0).length;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function closeSession(state: TimerState, now: Date): Session {
  const start = toEpochSeconds(new Date(state.anchor));
  return {
    isPause: state.paused,
    start,
    end: Math.max(start, toEpochSeconds(now)),
  };
}

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** Seconds between an ISO timestamp and a Date. */
function diffSeconds(isoString: string, now: Date): number {
  return (now.getTime() - new Date(isoString).getTime()) / 1000;
}
