import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import { parseInput, attachInput } from '../input';

/** Mouse report for a button code and 1-based cell position. */
function mouse(button: number, x = 1, y = 1): string {
  return `\x1b[M${String.fromCharCode(32 + button, 32 + x, 32 + y)}`;
}

/** In-process stand-in for a TTY stdin. */
class MockStdin extends EventEmitter {
  isTTY = true;
  rawMode = false;
  flowing = false;
  encoding: BufferEncoding | null = null;

  setRawMode(mode: boolean) {
    this.rawMode = mode;
    return this;
  }

  setEncoding(encoding: BufferEncoding) {
    this.encoding = encoding;
    return this;
  }

  resume() {
    this.flowing = true;
    return this;
  }

  pause() {
    this.flowing = false;
    return this;
  }
}

function mockOutput() {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
  };
}

describe('parseInput', () => {
  it('toggles on space and enter', () => {
    expect(parseInput(' ')).toEqual(['toggle']);
    expect(parseInput('\r')).toEqual(['toggle']);
    expect(parseInput('\n')).toEqual(['toggle']);
  });

  it('quits on q and Ctrl-C', () => {
    expect(parseInput('q')).toEqual(['quit']);
    expect(parseInput('Q')).toEqual(['quit']);
    expect(parseInput('\x03')).toEqual(['quit']);
  });

  it('toggles on any mouse button press', () => {
    expect(parseInput(mouse(0))).toEqual(['toggle']);
    expect(parseInput(mouse(1, 10, 3))).toEqual(['toggle']);
    expect(parseInput(mouse(2))).toEqual(['toggle']);
  });

  it('ignores mouse button releases', () => {
    expect(parseInput(mouse(3))).toEqual([]);
  });

  it('ignores truncated mouse reports', () => {
    expect(parseInput('\x1b[M ')).toEqual([]);
  });

  it('ignores other keys and escape sequences', () => {
    expect(parseInput('x')).toEqual([]);
    expect(parseInput('\x1b[A')).toEqual([]);
    expect(parseInput('\x1b[15~')).toEqual([]);
    expect(parseInput('\x1bq')).toEqual([]);
    expect(parseInput('\x1b')).toEqual([]);
  });

  it('reads every key of a repeated or pasted chunk', () => {
    expect(parseInput('  ')).toEqual(['toggle', 'toggle']);
    expect(parseInput(' q')).toEqual(['toggle', 'quit']);
    expect(parseInput('x y')).toEqual(['toggle']);
  });

  it('reads keys around mouse reports and escape sequences', () => {
    expect(parseInput(`${mouse(0)}${mouse(3)} `)).toEqual(['toggle', 'toggle']);
    expect(parseInput('\x1b[B q')).toEqual(['toggle', 'quit']);
  });

  it('treats a pasted CRLF as one enter', () => {
    expect(parseInput('\r\n')).toEqual(['toggle']);
  });
});

describe('attachInput', () => {
  it('enables raw mode and mouse reporting', () => {
    const stdin = new MockStdin();
    const out = mockOutput();

    attachInput(stdin, out, { onToggle: vi.fn(), onQuit: vi.fn() });

    expect(stdin.rawMode).toBe(true);
    expect(stdin.encoding).toBe('utf8');
    expect(stdin.flowing).toBe(true);
    expect(out.chunks).toEqual(['\x1b[?1000h']);
  });

  it('dispatches toggles and quits', () => {
    const stdin = new MockStdin();
    const onToggle = vi.fn();
    const onQuit = vi.fn();

    attachInput(stdin, mockOutput(), { onToggle, onQuit });
    stdin.emit('data', ' ');
    stdin.emit('data', mouse(0));
    stdin.emit('data', 'x');
    stdin.emit('data', 'q');

    expect(onToggle).toHaveBeenCalledTimes(2);
    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  it('dispatches each key of a multi-key chunk and stops at quit', () => {
    const stdin = new MockStdin();
    const onToggle = vi.fn();
    const onQuit = vi.fn();

    attachInput(stdin, mockOutput(), { onToggle, onQuit });
    stdin.emit('data', '  q ');

    expect(onToggle).toHaveBeenCalledTimes(2);
    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  it('restores the terminal and stops listening on detach', () => {
    const stdin = new MockStdin();
    const out = mockOutput();
    const onToggle = vi.fn();

    const input = attachInput(stdin, out, { onToggle, onQuit: vi.fn() });
    input.detach();
    stdin.emit('data', ' ');

    expect(onToggle).not.toHaveBeenCalled();
    expect(stdin.rawMode).toBe(false);
    expect(stdin.flowing).toBe(false);
    expect(out.chunks).toEqual(['\x1b[?1000h', '\x1b[?1000l']);
  });

  it('leaves raw mode alone when stdin is not a terminal', () => {
    const stdin = new MockStdin();
    stdin.isTTY = false;

    attachInput(stdin, mockOutput(), { onToggle: vi.fn(), onQuit: vi.fn() });

    expect(stdin.rawMode).toBe(false);
  });
});
