/**
 * Highlight colors for the elapsed-time label.
 * `neutral` is used when thresholds are disabled and while paused.
 */
export type HighlightColor = 'neutral' | 'green' | 'yellow' | 'red';

/**
 * Elapsed-time boundaries in seconds. Both zero disables highlighting.
 * Escalation is strict: a value equal to a boundary is not yet escalated.
 */
export interface Thresholds {
  warnAfter: number;
  dangerAfter: number;
}

/** A hex color string such as "#FF0000". */
export type HexColor = `#${string}`;

export type Palette = Record<HighlightColor, HexColor>;

/**
 * Everything the renderer needs for one frame.
 * Computed on every tick; never stored.
 */
export interface DisplayState {
  label: string;
  color: HighlightColor;
  hex: HexColor;
  pauseCount: number;
  paused: boolean;
}

/** Label shown instead of a running clock while paused. */
export const PAUSED_LABEL = 'PAUSED';
