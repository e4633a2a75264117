import type { EventEmitter } from 'node:events';
import { ConfigError, getConfigPath, getSessionLogPath, loadConfig } from '@/lib/config/index';
import type { Config } from '@/lib/config/types';
import { createSessionStore } from '@/lib/sessions/index';
import { createTerminalScreen } from '@/widget/screen';
import { attachInput } from '@/widget/input';
import { createWidget } from '@/widget/widget';

/** Exit statuses for the signals that end the widget: 128 + signal number. */
const SIGNAL_EXIT_CODES = {
  SIGHUP: 129,
  SIGTERM: 143,
} as const;

/**
 * Load the config, or print the problem and exit with status 1.
 * Only a {@link ConfigError} is fatal here; anything else propagates.
 */
export function readConfigOrExit(
  configPath: string = getConfigPath(),
  load: (path: string) => Config = loadConfig,
): Config {
  try {
    return load(configPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Failed to parse config: ${err.message}\n`);
      process.exit(1);
    }
    throw err;
  }
}

/** Wrap a cleanup so it runs at most once, whichever path ends the process. */
export function once(cleanup: () => void): () => void {
  let done = false;
  return () => {
    if (done) return;
    done = true;
    cleanup();
  };
}

/**
 * Run `shutdown` when the process is told to stop or is exiting for any
 * other reason, including an uncaught exception. Signals exit with 128 + n.
 */
export function bindShutdown(
  proc: EventEmitter,
  shutdown: () => void,
  exit: (code: number) => void,
): void {
  for (const signal of ['SIGTERM', 'SIGHUP'] as const) {
    proc.once(signal, () => {
      shutdown();
      exit(SIGNAL_EXIT_CODES[signal]);
    });
  }
  proc.once('exit', shutdown);
}

export function setup(): void {
  const config = readConfigOrExit();
  const store = createSessionStore(config, getSessionLogPath());
  const screen = createTerminalScreen(process.stdout, config);
  const widget = createWidget({ config, store, screen });

  const shutdown = once(() => {
    widget.stop();
    input.detach();
    screen.dispose();
  });
  const input = attachInput(process.stdin, process.stdout, {
    onToggle: widget.toggle,
    onQuit: shutdown,
  });
  bindShutdown(process, shutdown, (code) => process.exit(code));

  widget.start();
}
