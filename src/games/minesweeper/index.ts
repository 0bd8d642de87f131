/**
 * Minesweeper
 *
 * Move the cursor, flag suspected mines, open safe tiles.
 * One key in, one frame out, until a mine goes off or the field is cleared.
 */

import { type GameTerminal, enterAlternateBuffer, exitAlternateBuffer, isInAlternateBuffer } from '../utils';
import { createKeyQueue, InputClosedError, type InputSource } from '../shared/input';
import { createScreen } from '../shared/screen';
import type { Key } from '../shared/keys';
import { type Board, createBoard } from './board';
import { createGameLoop, isTerminalState, type GameState, type KeyBindings } from './gameLoop';
import { outcomeMessage, renderFrame } from './render';

/**
 * Minesweeper Game Controller
 */
export interface MinesweeperController {
  stop: () => void;
  isRunning: boolean;
  board: Board;
  /** Settles with the final state once the game ends */
  done: Promise<GameState>;
}

export interface MinesweeperOptions {
  width: number;
  height: number;
  mines: number;
  random?: () => number;
  /** Defaults to a key queue over terminal.onData */
  input?: InputSource;
  bindings?: KeyBindings;
  color?: boolean;
}

const BUFFER_REASON = 'minesweeper';

export function runMinesweeperGame(terminal: GameTerminal, options: MinesweeperOptions): MinesweeperController {
  const board = createBoard(options.width, options.height, options.mines, options.random);
  const loop = createGameLoop(board, options.bindings);
  const input = options.input ?? createKeyQueue(terminal);
  const screen = createScreen(terminal);
  const color = options.color ?? false;

  let running = true;

  // Row is 2 chars per tile plus the leading gap; board rows + blank + status
  const minCols = board.width * 2 + 1;
  const minRows = board.height + 2;

  function draw() {
    screen.clearScreen();
    const { cols, rows } = terminal;
    if (cols < minCols || rows < minRows) {
      screen.writeLine('Terminal too small!');
      screen.writeLine(`Need: ${minCols}x${minRows}  Have: ${cols}x${rows}`);
    } else {
      for (const line of renderFrame(board, { color })) screen.writeLine(line);
    }
    screen.flush();
  }

  function finish(state: GameState) {
    exitAlternateBuffer(terminal, BUFFER_REASON);
    const message = outcomeMessage(state);
    if (!message) return;
    for (const line of renderFrame(board, { color })) screen.writeLine(line);
    screen.writeLine(message);
    screen.flush();
  }

  // Only reached when play() is already throwing; keep that error
  function leaveAfterFailure() {
    try {
      exitAlternateBuffer(terminal, `${BUFFER_REASON} cleanup`);
    } catch (error) {
      console.warn('[Minesweeper] Could not leave the alternate buffer:', error);
    }
  }

  async function play(): Promise<GameState> {
    try {
      enterAlternateBuffer(terminal, BUFFER_REASON);
      draw();

      while (running) {
        let key: Key;
        try {
          key = await input.readKey();
        } catch (error) {
          if (error instanceof InputClosedError) break;
          throw error;
        }

        const state = loop.step(key);
        if (isTerminalState(state)) {
          finish(state);
          return state;
        }
        draw();
      }

      finish('quit');
      return 'quit';
    } finally {
      running = false;
      input.dispose();
      if (isInAlternateBuffer(terminal)) leaveAfterFailure();
    }
  }

  const controller: MinesweeperController = {
    stop: () => {
      if (!running) return;
      running = false;
      input.dispose();
    },
    get isRunning() { return running; },
    board,
    done: play(),
  };

  return controller;
}

export { createBoard, createBoardFromLayout, BoardConfigError } from './board';
export type { Board, Tile, TileContents, TileVisibility, Position, Direction, BoardState } from './board';
export { createGameLoop, DEFAULT_BINDINGS } from './gameLoop';
export type { GameLoop, GameState, GameAction, KeyBindings } from './gameLoop';
export { renderFrame, renderBoardLines, renderStatusLine, outcomeMessage } from './render';
