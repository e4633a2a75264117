const ESC = '\x1b';
const MOUSE_REPORT_PREFIX = `${ESC}[M`;
const MOUSE_ON = `${ESC}[?1000h`;
const MOUSE_OFF = `${ESC}[?1000l`;
const CTRL_C = '\x03';

export type InputAction = 'toggle' | 'quit';

/** The parts of `process.stdin` the widget uses. */
export interface Input {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string) => void): unknown;
  off(event: 'data', listener: (chunk: string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface InputHandlers {
  onToggle(): void;
  onQuit(): void;
}

const MOUSE_REPORT_LENGTH = MOUSE_REPORT_PREFIX.length + 3;

/**
 * Map a chunk of raw terminal input to actions, one per key or click.
 * Key repeat and paste can deliver several keys in one chunk.
 *
 * X10 mouse reports arrive as `ESC [ M b x y`; the low two bits of `b - 32`
 * are the button, with 3 meaning release. Any press toggles. Other escape
 * sequences (arrows, function keys, Alt+key) are skipped whole.
 */
export function parseInput(chunk: string): InputAction[] {
  const actions: InputAction[] = [];
  let i = 0;

  while (i < chunk.length) {
    if (chunk.startsWith(MOUSE_REPORT_PREFIX, i)) {
      if (chunk.length - i < MOUSE_REPORT_LENGTH) break;
      const button = (chunk.charCodeAt(i + MOUSE_REPORT_PREFIX.length) - 32) & 3;
      if (button !== 3) actions.push('toggle');
      i += MOUSE_REPORT_LENGTH;
      continue;
    }

    if (chunk[i] === ESC) {
      i = skipEscapeSequence(chunk, i);
      continue;
    }

    const action = keyAction(chunk[i]);
    if (action) actions.push(action);
    // A pasted CRLF is one enter.
    i += chunk[i] === '\r' && chunk[i + 1] === '\n' ? 2 : 1;
  }

  return actions;
}

function keyAction(key: string): InputAction | null {
  switch (key) {
    case ' ':
    case '\r':
    case '\n':
      return 'toggle';
    case 'q':
    case 'Q':
    case CTRL_C:
      return 'quit';
    default:
      return null;
  }
}

/** Index just past the escape sequence starting at `start`. */
function skipEscapeSequence(chunk: string, start: number): number {
  if (chunk[start + 1] !== '[') return Math.min(chunk.length, start + 2);

  // CSI: parameter and intermediate bytes, then one final byte in @..~
  let i = start + 2;
  while (i < chunk.length) {
    const code = chunk.charCodeAt(i);
    i += 1;
    if (code >= 0x40 && code <= 0x7e) break;
  }
  return i;
}

/**
 * Listen for clicks and keys. Puts the terminal in raw mode with mouse
 * reporting; `detach()` restores both.
 */
export function attachInput(
  input: Input,
  output: { write(chunk: string): boolean },
  handlers: InputHandlers,
): { detach(): void } {
  const onData = (chunk: string) => {
    for (const action of parseInput(chunk)) {
      if (action === 'quit') {
        handlers.onQuit();
        return;
      }
      handlers.onToggle();
    }
  };

  if (input.isTTY) input.setRawMode?.(true);
  input.setEncoding('utf8');
  output.write(MOUSE_ON);
  input.on('data', onData);
  input.resume();

  return {
    detach() {
      input.off('data', onData);
      output.write(MOUSE_OFF);
      if (input.isTTY) input.setRawMode?.(false);
      input.pause();
    },
  };
}
