import { getDisplayState, thresholdsFromMinutes } from '@/lib/display/index';
import type { DisplayState } from '@/lib/display/types';
import { createTimer, toggleTimer } from '@/lib/timer/index';
import type { TimerState } from '@/lib/timer/types';
import type { Config } from '@/lib/config/types';
import type { SessionStore } from '@/lib/sessions/index';

/** Tick cadence while the clock is counting. */
export const RUNNING_TICK_MS = 500;
/** Tick cadence while paused; the label is static so redraws can be rare. */
export const PAUSED_TICK_MS = 5000;

/** Anything that can paint a display state. */
export interface Screen {
  render(state: DisplayState): void;
}

export interface WidgetOptions {
  config: Config;
  store: SessionStore;
  screen: Screen;
  now?: () => Date;
}

export interface Widget {
  start(): void;
  stop(): void;
  refresh(): void;
  toggle(): void;
  getTimer(): TimerState;
}

export function stateUnchanged(a: DisplayState | null, b: DisplayState): boolean {
  return (
    a !== null &&
    a.label === b.label &&
    a.color === b.color &&
    a.pauseCount === b.pauseCount &&
    a.paused === b.paused
  );
}

/**
 * Drive the stopwatch: own its state, re-render on a timer whose cadence
 * follows the paused/running mode, and persist the session log on toggle.
 */
export function createWidget({ config, store, screen, now = () => new Date() }: WidgetOptions): Widget {
  const thresholds = thresholdsFromMinutes(config.warn_after_minutes, config.danger_after_minutes);

  let timer = createTimer(now(), config.start_unpaused);
  let lastState: DisplayState | null = null;
  let interval: ReturnType<typeof setInterval> | null = null;

  function refresh(): void {
    const state = getDisplayState(timer, now(), thresholds);
    if (stateUnchanged(lastState, state)) return;
    lastState = state;
    screen.render(state);
  }

  function schedule(): void {
    if (interval !== null) clearInterval(interval);
    interval = setInterval(refresh, timer.paused ? PAUSED_TICK_MS : RUNNING_TICK_MS);
  }

  function persist(): void {
    try {
      store.save(timer.sessions);
    } catch (err) {
      console.error('[widget] Failed to store sessions:', err);
    }
  }

  function toggle(): void {
    timer = toggleTimer(timer, now());
    persist();
    refresh();
    if (interval !== null) schedule();
  }

  function start(): void {
    refresh();
    schedule();
  }

  function stop(): void {
    if (interval !== null) clearInterval(interval);
    interval = null;
  }

  return {
    start,
    stop,
    refresh,
    toggle,
    getTimer: () => timer,
  };
}
