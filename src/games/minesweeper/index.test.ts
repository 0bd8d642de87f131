import { describe, it, expect, vi } from 'vitest';
import { runMinesweeperGame } from './index';
import { isInAlternateBuffer, type GameTerminal } from '../utils';

type DataListener = Parameters<GameTerminal['onData']>[0];

// In-process terminal: records writes and lets the test type keys
function fakeTerminal(cols = 80, rows = 24) {
  const writes: string[] = [];
  const listeners: DataListener[] = [];
  const onData: GameTerminal['onData'] = (listener) => {
    listeners.push(listener);
    return {
      dispose: () => {
        const idx = listeners.indexOf(listener);
        if (idx !== -1) listeners.splice(idx, 1);
      },
    };
  };
  const terminal: GameTerminal = {
    write: (data: string | Uint8Array) => { writes.push(String(data)); },
    onData,
    cols,
    rows,
  };
  return {
    terminal,
    writes,
    type: (data: string) => {
      for (const listener of [...listeners]) listener(data);
    },
  };
}

// 2x2 board; with random() === 0 the single mine lands on (1,1)
const OPTIONS = { width: 2, height: 2, mines: 1, random: () => 0 };

describe('runMinesweeperGame', () => {
  it('enters the alternate buffer and draws the first frame', () => {
    const { terminal, writes } = fakeTerminal();
    const controller = runMinesweeperGame(terminal, OPTIONS);
    expect(isInAlternateBuffer(terminal)).toBe(true);
    expect(writes[3]).toBe('\x1b[2J\x1b[H(#)# \r\n # # \r\n\r\nMines: 1, Flags: 0, Remaining: 1\r\n');
    expect(controller.isRunning).toBe(true);
    controller.stop();
  });

  it('redraws after every key', async () => {
    const { terminal, writes, type } = fakeTerminal();
    const controller = runMinesweeperGame(terminal, OPTIONS);
    type('\x1b[C');
    type('f');
    type('q');
    await expect(controller.done).resolves.toBe('quit');
    expect(writes).toContain('\x1b[2J\x1b[H #(#)\r\n # # \r\n\r\nMines: 1, Flags: 0, Remaining: 1\r\n');
    expect(writes).toContain('\x1b[2J\x1b[H #(F)\r\n # # \r\n\r\nMines: 1, Flags: 1, Remaining: 0\r\n');
  });

  it('ends with the revealed minefield and GAME OVER!', async () => {
    const { terminal, writes, type } = fakeTerminal();
    const controller = runMinesweeperGame(terminal, OPTIONS);
    type(' \x1b[C\x1b[B ');
    await expect(controller.done).resolves.toBe('lose');
    expect(writes.at(-1)).toBe(' 1 # \r\n #(*)\r\n\r\nMines: 1, Flags: 0, Remaining: 1\r\nGAME OVER!\r\n');
    expect(isInAlternateBuffer(terminal)).toBe(false);
    expect(controller.isRunning).toBe(false);
  });

  it('ends with YOU WIN! once every safe tile is open', async () => {
    const { terminal, writes, type } = fakeTerminal();
    const controller = runMinesweeperGame(terminal, OPTIONS);
    type(' \x1b[C \x1b[B\x1b[D ');
    await expect(controller.done).resolves.toBe('win');
    expect(writes.at(-1)).toBe(' 1 1 \r\n(1)# \r\n\r\nMines: 1, Flags: 0, Remaining: 1\r\nYOU WIN!\r\n');
  });

  it('quits silently', async () => {
    const { terminal, writes, type } = fakeTerminal();
    const controller = runMinesweeperGame(terminal, OPTIONS);
    type('q');
    await expect(controller.done).resolves.toBe('quit');
    expect(writes.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
    expect(writes.some(w => w.includes('GAME OVER!') || w.includes('YOU WIN!'))).toBe(false);
  });

  it('resolves quit when stopped', async () => {
    const { terminal } = fakeTerminal();
    const controller = runMinesweeperGame(terminal, OPTIONS);
    controller.stop();
    await expect(controller.done).resolves.toBe('quit');
    expect(isInAlternateBuffer(terminal)).toBe(false);
  });

  it('asks for a bigger terminal when the board does not fit', () => {
    const { terminal, writes } = fakeTerminal(3, 3);
    const controller = runMinesweeperGame(terminal, OPTIONS);
    expect(writes[3]).toBe('\x1b[2J\x1b[HTerminal too small!\r\nNeed: 5x4  Have: 3x3\r\n');
    controller.stop();
  });

  it('rejects done with the first write error and leaves the buffer', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { terminal } = fakeTerminal();
    let calls = 0;
    const failing: GameTerminal = {
      ...terminal,
      write: () => {
        calls++;
        // The three buffer-entry writes succeed; the first frame fails
        if (calls > 3) throw new Error(`EIO#${calls}`);
      },
    };
    const controller = runMinesweeperGame(failing, OPTIONS);
    await expect(controller.done).rejects.toThrow(/^EIO#4$/);
    expect(isInAlternateBuffer(failing)).toBe(false);
    expect(controller.isRunning).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
