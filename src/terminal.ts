/**
 * Node terminal adapter
 *
 * Maps process.stdin/stdout onto the xterm.js-compatible GameTerminal
 * interface, so the game runs in any terminal emulator.
 */

import { type GameTerminal, exitAlternateBuffer, isInAlternateBuffer } from './games/utils';

type DataListener = Parameters<GameTerminal['onData']>[0];

export interface NodeTerminal extends GameTerminal {
  /** Restore cooked mode, main buffer, cursor and colors */
  cleanup: () => void;
}

export class TerminalUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TerminalUnavailableError';
  }
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

export function createNodeTerminal(): NodeTerminal {
  if (!process.stdin.isTTY) {
    throw new TerminalUnavailableError('stdin is not a terminal; sweeper needs an interactive TTY');
  }

  const dataListeners: DataListener[] = [];
  let cleanedUp = false;

  process.stdin.setRawMode(true);
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }
    for (const listener of [...dataListeners]) {
      listener(data);
    }
  });

  function cleanup() {
    if (cleanedUp) return;
    cleanedUp = true;
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    if (isInAlternateBuffer(terminal)) exitAlternateBuffer(terminal, 'terminal cleanup');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  const terminal: NodeTerminal = {
    write: (data: string | Uint8Array, callback?: () => void) => {
      const chunk = typeof data === 'string' ? SYNC_START + data + SYNC_END : data;
      process.stdout.write(chunk, callback);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onData: (listener: DataListener) => {
      dataListeners.push(listener);
      return {
        dispose: () => {
          const idx = dataListeners.indexOf(listener);
          if (idx !== -1) dataListeners.splice(idx, 1);
        },
      };
    },
    cleanup,
  };

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return terminal;
}
