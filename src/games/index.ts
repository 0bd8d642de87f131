/**
 * sweeper
 *
 * Minesweeper for xterm.js and the CLI
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run the game: runMinesweeperGame(terminal, { width: 16, height: 16, mines: 32 })
 * 3. Await controller.done for the final state
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  isLightTheme,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
} from './utils';

export type { GameTerminal, PhosphorMode } from './utils';

// Re-export terminal input plumbing
export { parseKey, splitKeys } from './shared/keys';
export type { Key } from './shared/keys';
export { createKeyQueue, InputClosedError } from './shared/input';
export type { InputSource } from './shared/input';
export { createScreen } from './shared/screen';
export type { Screen } from './shared/screen';

// Board logic
export {
  createBoard,
  createBoardFromLayout,
  BoardConfigError,
  moveCursor,
  toggleFlag,
  reveal,
  evaluate,
  tileAt,
  neighbors,
  isInBounds,
  remainingMines,
  countOpenSafe,
} from './minesweeper/board';

export {
  runMinesweeperGame,
  createGameLoop,
  DEFAULT_BINDINGS,
  renderFrame,
  renderBoardLines,
  renderStatusLine,
  outcomeMessage,
} from './minesweeper';

export type {
  MinesweeperController,
  MinesweeperOptions,
  Board,
  Tile,
  TileContents,
  TileVisibility,
  Position,
  Direction,
  BoardState,
  GameLoop,
  GameState,
  GameAction,
  KeyBindings,
} from './minesweeper';
