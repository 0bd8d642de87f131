/**
 * Board rendering
 *
 * Pure Board -> text. The cursor tile is flanked by ( and ) in the
 * gaps either side of it; color is opt-in so plain frames stay comparable.
 */

import { ANSI_RESET } from '../../themes';
import { getCurrentThemeColor, isLightTheme } from '../utils';
import { type Board, type Tile, remainingMines } from './board';
import type { GameState } from './gameLoop';

export interface RenderOptions {
  color?: boolean;
}

// Number colors (1-8)
const NUMBER_COLORS = [
  '',           // 0 - not used
  '\x1b[96m',   // 1 - cyan
  '\x1b[92m',   // 2 - green
  '\x1b[91m',   // 3 - red
  '\x1b[94m',   // 4 - blue
  '\x1b[95m',   // 5 - magenta
  '\x1b[36m',   // 6 - dark cyan
  '\x1b[97m',   // 7 - white
  '\x1b[90m',   // 8 - gray
];

// Darker variants for light backgrounds
const NUMBER_COLORS_LIGHT = [
  '',
  '\x1b[34m',
  '\x1b[32m',
  '\x1b[31m',
  '\x1b[35m',
  '\x1b[33m',
  '\x1b[36m',
  '\x1b[30m',
  '\x1b[90m',
];

const MINE_COLOR = '\x1b[1;91m';
const FLAG_COLOR = '\x1b[1;93m';

export function tileGlyph(tile: Tile): string {
  switch (tile.visibility) {
    case 'hidden':
      return '#';
    case 'flagged':
      return 'F';
    case 'open':
      if (tile.contents.kind === 'mine') return '*';
      return tile.contents.count === 0 ? ' ' : String(tile.contents.count);
  }
}

function colorize(tile: Tile, glyph: string): string {
  let color = '';
  if (tile.visibility === 'hidden') {
    color = `\x1b[2m${getCurrentThemeColor()}`;
  } else if (tile.visibility === 'flagged') {
    color = FLAG_COLOR;
  } else if (tile.contents.kind === 'mine') {
    color = MINE_COLOR;
  } else if (tile.contents.count > 0) {
    const palette = isLightTheme() ? NUMBER_COLORS_LIGHT : NUMBER_COLORS;
    color = palette[tile.contents.count] || getCurrentThemeColor();
  }
  return color ? `${color}${glyph}${ANSI_RESET}` : glyph;
}

/**
 * The gap to the left of column x (x === width is the trailing gap)
 */
function gapBefore(board: Board, x: number, y: number): string {
  if (y !== board.cursor.y) return ' ';
  if (x === board.cursor.x) return '(';
  if (x === board.cursor.x + 1) return ')';
  return ' ';
}

export function renderBoardLines(board: Board, options: RenderOptions = {}): string[] {
  const lines: string[] = [];
  for (let y = 0; y < board.height; y++) {
    let line = gapBefore(board, 0, y);
    for (let x = 0; x < board.width; x++) {
      const tile = board.tiles[x + y * board.width];
      const glyph = tileGlyph(tile);
      line += options.color ? colorize(tile, glyph) : glyph;
      line += gapBefore(board, x + 1, y);
    }
    lines.push(line);
  }
  return lines;
}

export function renderStatusLine(board: Board): string {
  return `Mines: ${board.mineCount}, Flags: ${board.flagCount}, Remaining: ${remainingMines(board)}`;
}

/**
 * Board rows, a blank line, then the status line
 */
export function renderFrame(board: Board, options: RenderOptions = {}): string[] {
  const status = renderStatusLine(board);
  return [
    ...renderBoardLines(board, options),
    '',
    options.color ? `${getCurrentThemeColor()}${status}${ANSI_RESET}` : status,
  ];
}

export function outcomeMessage(state: GameState): string | null {
  switch (state) {
    case 'lose':
      return 'GAME OVER!';
    case 'win':
      return 'YOU WIN!';
    default:
      return null;
  }
}
