import { hexToRgb } from '@/lib/display/index';
import type { DisplayState } from '@/lib/display/types';
import type { Config } from '@/lib/config/types';
import type { Screen } from './widget';

const ESC = '\x1b';
const CSI = `${ESC}[`;

export const WINDOW_TITLE = 'desk-stopwatch';

/** Minimal writable surface; `process.stdout` satisfies it. */
export interface Output {
  write(chunk: string): boolean;
}

export type WindowOptions = Pick<Config, 'window_size' | 'window_position' | 'always_on_top'>;

export interface TerminalScreen extends Screen {
  dispose(): void;
}

/** Text lines for a frame: the label, plus the break counter while paused. */
export function renderLines(state: DisplayState): string[] {
  return state.paused ? [state.label, `breaks: ${state.pauseCount}`] : [state.label];
}

/** Wrap text in a 24-bit foreground color. Neutral keeps the terminal default. */
export function colorize(text: string, state: Pick<DisplayState, 'color' | 'hex'>): string {
  if (state.color === 'neutral') return text;
  const { r, g, b } = hexToRgb(state.hex);
  return `${CSI}38;2;${r};${g};${b}m${text}${CSI}39m`;
}

/** Full-screen repaint for one display state. */
export function paintFrame(state: DisplayState): string {
  const [label, ...rest] = renderLines(state);
  const lines = [`${CSI}1m${colorize(label, state)}${CSI}22m`, ...rest];
  return `${CSI}H${CSI}2J${lines.join('\r\n')}`;
}

/**
 * xterm window operations for the configured geometry: title, move to
 * `window_position` and resize to `window_size`, both in pixels.
 */
export function windowSetup(window: WindowOptions): string {
  const [x, y] = window.window_position.map(Math.round);
  const [width, height] = window.window_size.map(Math.round);
  return [
    `${ESC}]0;${WINDOW_TITLE}\x07`,
    `${CSI}3;${x};${y}t`,
    `${CSI}4;${height};${width}t`,
    `${CSI}?25l`,
  ].join('');
}

/** Paint display states into a terminal window. */
export function createTerminalScreen(out: Output, window: WindowOptions): TerminalScreen {
  if (window.always_on_top) {
    console.warn('[screen] always_on_top is not supported by terminal windows; ignoring');
  }
  out.write(windowSetup(window));

  return {
    render(state: DisplayState) {
      out.write(paintFrame(state));
    },
    dispose() {
      out.write(`${CSI}0m${CSI}?25h\r\n`);
    },
  };
}
