export type { HighlightColor, Thresholds, HexColor, Palette, DisplayState } from './types.js';

export { PAUSED_LABEL } from './types.js';

export { HIGHLIGHT_PALETTE } from './palettes.js';

export { formatElapsed } from './format.js';

import type { DisplayState, HexColor, HighlightColor, Thresholds } from './types.js';
import { PAUSED_LABEL } from './types.js';
import { HIGHLIGHT_PALETTE } from './palettes.js';
import { formatElapsed } from './format.js';
import { getElapsedSeconds, getPauseCount } from '@/lib/timer/index';
import type { TimerState } from '@/lib/timer/types';

// ---------------------------------------------------------------------------
// Thresholds
// ---------------------------------------------------------------------------

/** Build second-based thresholds from configured minutes. */
export function thresholdsFromMinutes(warnMinutes: number, dangerMinutes: number): Thresholds {
  return {
    warnAfter: warnMinutes * 60,
    dangerAfter: dangerMinutes * 60,
  };
}

/**
 * Pick the highlight color for an elapsed time. Depends only on its arguments.
 *
 * - both thresholds zero: neutral
 * - above `dangerAfter`: red
 * - above `warnAfter`: yellow
 * - otherwise: green
 */
export function highlightColor(seconds: number, thresholds: Thresholds): HighlightColor {
  const { warnAfter, dangerAfter } = thresholds;

  if (warnAfter === 0 && dangerAfter === 0) return 'neutral';
  if (seconds > dangerAfter) return 'red';
  if (seconds > warnAfter) return 'yellow';
  return 'green';
}

// ---------------------------------------------------------------------------
// Color conversion
// ---------------------------------------------------------------------------

export interface RGB {
  r: number; // 0–255
  g: number; // 0–255
  b: number; // 0–255
}

/** Parse a hex color string (e.g. "#FFFF00") into RGB channels. */
export function hexToRgb(hex: HexColor): RGB {
  return {
    r: parseInt(hex.slice(1, 3), 16),
    g: parseInt(hex.slice(3, 5), 16),
    b: parseInt(hex.slice(5, 7), 16),
  };
}

// ---------------------------------------------------------------------------
// getDisplayState
// ---------------------------------------------------------------------------

/**
 * Compute what the widget shows at `now`: the elapsed clock colored by
 * threshold while running, or the paused label while paused.
 */
export function getDisplayState(
  timer: TimerState,
  now: Date,
  thresholds: Thresholds,
): DisplayState {
  const pauseCount = getPauseCount(timer);

  if (timer.paused) {
    return {
      label: PAUSED_LABEL,
      color: 'neutral',
      hex: HIGHLIGHT_PALETTE.neutral,
      pauseCount,
      paused: true,
    };
  }

  const elapsed = getElapsedSeconds(timer, now);
  const color = highlightColor(elapsed, thresholds);

  return {
    label: formatElapsed(elapsed),
    color,
    hex: HIGHLIGHT_PALETTE[color],
    pauseCount,
    paused: false,
  };
}
