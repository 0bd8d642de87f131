/**
 * Minesweeper Board — Pure Game Logic
 *
 * Flat tile grid, mine placement, neighbor counts, cursor,
 * flagging, flood-fill reveal and win/loss evaluation.
 */

// ============================================================================
// Types
// ============================================================================

export type TileContents =
  | { kind: 'mine' }
  | { kind: 'safe'; count: number };

export type TileVisibility = 'hidden' | 'flagged' | 'open';

export interface Tile {
  contents: TileContents;
  visibility: TileVisibility;
}

export interface Position {
  x: number;
  y: number;
}

export interface Board {
  width: number;
  height: number;
  /** Row-major, indexed x + y * width */
  tiles: Tile[];
  cursor: Position;
  mineCount: number;
  flagCount: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export type BoardState = 'continue' | 'win' | 'lose';

export class BoardConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BoardConfigError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0],           [1, 0],
  [-1, 1],  [0, 1],  [1, 1],
];

const DIRECTION_DELTAS: Record<Direction, readonly [number, number]> = {
  up: [0, -1],
  down: [0, 1],
  left: [-1, 0],
  right: [1, 0],
};

// ============================================================================
// Board Creation
// ============================================================================

function assertDimension(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new BoardConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

function mineTile(): Tile {
  return { contents: { kind: 'mine' }, visibility: 'hidden' };
}

function safeTile(): Tile {
  return { contents: { kind: 'safe', count: 0 }, visibility: 'hidden' };
}

/**
 * Shuffle in place (Fisher–Yates). Every permutation is equally likely
 * given a uniform `random` in [0, 1).
 */
function shuffle<T>(items: T[], random: () => number) {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
}

function deriveCounts(board: Board) {
  for (let y = 0; y < board.height; y++) {
    for (let x = 0; x < board.width; x++) {
      if (tileAt(board, x, y).contents.kind !== 'mine') continue;
      for (const n of neighbors(board, x, y)) {
        const contents = tileAt(board, n.x, n.y).contents;
        if (contents.kind === 'safe') contents.count++;
      }
    }
  }
}

/**
 * Build a board with `mineCount` mines spread uniformly over the grid.
 * A mine count larger than the grid is clamped to the number of cells.
 */
export function createBoard(
  width: number,
  height: number,
  mineCount: number,
  random: () => number = Math.random
): Board {
  assertDimension('width', width);
  assertDimension('height', height);

  const size = width * height;
  const mines = Math.min(size, Math.max(0, Math.floor(mineCount) || 0));

  const tiles: Tile[] = [];
  for (let i = 0; i < size; i++) {
    tiles.push(i < mines ? mineTile() : safeTile());
  }
  shuffle(tiles, random);

  const board: Board = {
    width,
    height,
    tiles,
    cursor: { x: 0, y: 0 },
    mineCount: mines,
    flagCount: 0,
  };
  deriveCounts(board);
  return board;
}

/**
 * Build a board from a fixed layout: one string per row,
 * `*` for a mine and `.` for a safe tile.
 */
export function createBoardFromLayout(rows: string[]): Board {
  if (rows.length === 0) {
    throw new BoardConfigError('layout must have at least one row');
  }
  const width = rows[0].length;
  assertDimension('layout width', width);

  const tiles: Tile[] = [];
  let mines = 0;
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new BoardConfigError(`layout row ${y} has length ${row.length}, expected ${width}`);
    }
    for (const ch of row) {
      if (ch === '*') {
        tiles.push(mineTile());
        mines++;
      } else if (ch === '.') {
        tiles.push(safeTile());
      } else {
        throw new BoardConfigError(`unexpected layout character "${ch}" in row ${y}`);
      }
    }
  });

  const board: Board = {
    width,
    height: rows.length,
    tiles,
    cursor: { x: 0, y: 0 },
    mineCount: mines,
    flagCount: 0,
  };
  deriveCounts(board);
  return board;
}

// ============================================================================
// Queries
// ============================================================================

export function isInBounds(board: Board, x: number, y: number): boolean {
  return x >= 0 && x < board.width && y >= 0 && y < board.height;
}

export function tileAt(board: Board, x: number, y: number): Tile {
  if (!isInBounds(board, x, y)) {
    throw new RangeError(`tile (${x}, ${y}) outside ${board.width}x${board.height} board`);
  }
  return board.tiles[x + y * board.width];
}

/** In-bounds grid-adjacent positions, diagonals included. */
export function neighbors(board: Board, x: number, y: number): Position[] {
  const result: Position[] = [];
  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    const nx = x + dx;
    const ny = y + dy;
    if (isInBounds(board, nx, ny)) result.push({ x: nx, y: ny });
  }
  return result;
}

export function remainingMines(board: Board): number {
  return board.mineCount - board.flagCount;
}

export function countOpenSafe(board: Board): number {
  let count = 0;
  for (const tile of board.tiles) {
    if (tile.visibility === 'open' && tile.contents.kind === 'safe') count++;
  }
  return count;
}

// ============================================================================
// Player Actions
// ============================================================================

/** Move one cell, wrapping around every edge. */
export function moveCursor(board: Board, direction: Direction) {
  const [dx, dy] = DIRECTION_DELTAS[direction];
  board.cursor = {
    x: (board.cursor.x + dx + board.width) % board.width,
    y: (board.cursor.y + dy + board.height) % board.height,
  };
}

export function toggleFlag(board: Board) {
  const tile = tileAt(board, board.cursor.x, board.cursor.y);
  switch (tile.visibility) {
    case 'hidden':
      tile.visibility = 'flagged';
      board.flagCount++;
      break;
    case 'flagged':
      tile.visibility = 'hidden';
      board.flagCount = Math.max(0, board.flagCount - 1);
      break;
    case 'open':
      break;
  }
}

/**
 * Open the tile under the cursor, cascading through zero-count tiles.
 * Flagged tiles are never opened. Returns the number of tiles opened.
 */
export function reveal(board: Board): number {
  const start = board.cursor;
  if (tileAt(board, start.x, start.y).visibility !== 'hidden') return 0;

  const queue: Position[] = [start];
  let opened = 0;

  // Positions can be queued more than once; anything no longer hidden is skipped
  for (let i = 0; i < queue.length; i++) {
    const { x, y } = queue[i];
    const tile = tileAt(board, x, y);
    if (tile.visibility !== 'hidden') continue;

    tile.visibility = 'open';
    opened++;

    if (tile.contents.kind === 'safe' && tile.contents.count === 0) {
      for (const n of neighbors(board, x, y)) {
        if (tileAt(board, n.x, n.y).visibility !== 'open') queue.push(n);
      }
    }
  }

  return opened;
}

function openAllMines(board: Board) {
  for (const tile of board.tiles) {
    if (tile.contents.kind === 'mine') tile.visibility = 'open';
  }
}

/**
 * Lose if any mine is open (and expose the whole minefield),
 * win once every safe tile is open, otherwise continue.
 */
export function evaluate(board: Board): BoardState {
  if (board.tiles.some(t => t.visibility === 'open' && t.contents.kind === 'mine')) {
    openAllMines(board);
    return 'lose';
  }

  const explored = board.tiles.every(t => t.contents.kind === 'mine' || t.visibility === 'open');
  return explored ? 'win' : 'continue';
}
