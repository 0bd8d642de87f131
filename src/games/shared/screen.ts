/**
 * Frame-buffered screen
 *
 * Collects one frame (clear + lines) and hands it to the terminal
 * as a single write, so the clear and redraw land together.
 */

import type { GameTerminal } from '../utils';

export interface Screen {
  clearScreen: () => void;
  writeLine: (text: string) => void;
  flush: () => void;
}

export function createScreen(terminal: Pick<GameTerminal, 'write'>): Screen {
  let output = '';

  return {
    clearScreen: () => {
      output += '\x1b[2J\x1b[H';
    },
    writeLine: (text: string) => {
      output += `${text}\r\n`;
    },
    flush: () => {
      if (output === '') return;
      const frame = output;
      output = '';
      terminal.write(frame);
    },
  };
}
