import { describe, it, expect } from 'vitest';
import { createBoardFromLayout, evaluate, reveal, toggleFlag } from './board';
import { outcomeMessage, renderBoardLines, renderFrame, renderStatusLine, tileGlyph } from './render';

describe('tileGlyph', () => {
  it('draws hidden, flagged and open tiles', () => {
    expect(tileGlyph({ contents: { kind: 'mine' }, visibility: 'hidden' })).toBe('#');
    expect(tileGlyph({ contents: { kind: 'safe', count: 2 }, visibility: 'flagged' })).toBe('F');
    expect(tileGlyph({ contents: { kind: 'mine' }, visibility: 'open' })).toBe('*');
    expect(tileGlyph({ contents: { kind: 'safe', count: 0 }, visibility: 'open' })).toBe(' ');
    expect(tileGlyph({ contents: { kind: 'safe', count: 3 }, visibility: 'open' })).toBe('3');
  });
});

describe('renderBoardLines', () => {
  it('brackets the cursor tile at the start of a row', () => {
    const board = createBoardFromLayout(['*..']);
    expect(renderBoardLines(board)).toEqual(['(#)# # ']);
  });

  it('brackets the cursor tile at the end of a row', () => {
    const board = createBoardFromLayout(['*..']);
    board.cursor = { x: 2, y: 0 };
    expect(renderBoardLines(board)).toEqual([' # #(#)']);
  });

  it('only brackets the cursor row', () => {
    const board = createBoardFromLayout(['...', '.*.', '...']);
    reveal(board);
    board.cursor = { x: 2, y: 1 };
    expect(renderBoardLines(board)).toEqual([
      ' 1 # # ',
      ' # #(#)',
      ' # # # ',
    ]);
  });

  it('shows the whole minefield after a loss', () => {
    const board = createBoardFromLayout(['*.*']);
    board.cursor = { x: 1, y: 0 };
    reveal(board);
    board.cursor = { x: 0, y: 0 };
    reveal(board);
    evaluate(board);
    expect(renderBoardLines(board)).toEqual(['(*)2 * ']);
  });

  it('wraps glyphs in ANSI colors when asked', () => {
    const board = createBoardFromLayout(['*']);
    toggleFlag(board);
    expect(renderBoardLines(board, { color: true })).toEqual(['(\x1b[1;93mF\x1b[0m)']);
  });
});

describe('renderStatusLine', () => {
  it('reports mines, flags and remaining', () => {
    const board = createBoardFromLayout(['*..']);
    toggleFlag(board);
    expect(renderStatusLine(board)).toBe('Mines: 1, Flags: 1, Remaining: 0');
  });

  it('shows a negative remaining count when over-flagged', () => {
    const board = createBoardFromLayout(['*..']);
    toggleFlag(board);
    board.cursor = { x: 1, y: 0 };
    toggleFlag(board);
    expect(renderStatusLine(board)).toBe('Mines: 1, Flags: 2, Remaining: -1');
  });
});

describe('renderFrame', () => {
  it('puts a blank line between the board and the status line', () => {
    const board = createBoardFromLayout(['*.']);
    expect(renderFrame(board)).toEqual([
      '(#)# ',
      '',
      'Mines: 1, Flags: 0, Remaining: 1',
    ]);
  });
});

describe('outcomeMessage', () => {
  it('announces wins and losses only', () => {
    expect(outcomeMessage('lose')).toBe('GAME OVER!');
    expect(outcomeMessage('win')).toBe('YOU WIN!');
    expect(outcomeMessage('quit')).toBeNull();
    expect(outcomeMessage('continue')).toBeNull();
  });
});
