import type { Palette } from './types.js';

/** Traffic-light palette for the elapsed-time label. */
export const HIGHLIGHT_PALETTE: Palette = {
  neutral: '#000000',
  green:   '#00FF00',
  yellow:  '#FFFF00',
  red:     '#FF0000',
};
