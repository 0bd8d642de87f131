/**
 * Minesweeper game loop
 *
 * Turns one key into board actions and reports where the game stands.
 */

import type { Key } from '../shared/keys';
import {
  type Board,
  type BoardState,
  type Direction,
  evaluate,
  moveCursor,
  reveal,
  toggleFlag,
} from './board';

export type GameState = BoardState | 'quit';

export type GameAction =
  | { type: 'move'; direction: Direction }
  | { type: 'flag' }
  | { type: 'reveal' }
  | { type: 'quit' };

/** Character keys, matched case-insensitively */
export interface KeyBindings {
  chars: Record<string, GameAction>;
  enter: GameAction | null;
  escape: GameAction | null;
}

export const DEFAULT_BINDINGS: KeyBindings = {
  chars: {
    w: { type: 'move', direction: 'up' },
    a: { type: 'move', direction: 'left' },
    s: { type: 'move', direction: 'down' },
    d: { type: 'move', direction: 'right' },
    f: { type: 'flag' },
    ' ': { type: 'reveal' },
    q: { type: 'quit' },
  },
  enter: { type: 'reveal' },
  escape: null,
};

export interface GameLoop {
  readonly board: Board;
  readonly state: GameState;
  /** Apply one key; a no-op once the game has ended */
  step: (key: Key) => GameState;
}

export function isTerminalState(state: GameState): boolean {
  return state !== 'continue';
}

export function actionForKey(key: Key, bindings: KeyBindings = DEFAULT_BINDINGS): GameAction | null {
  switch (key.kind) {
    case 'up':
    case 'down':
    case 'left':
    case 'right':
      return { type: 'move', direction: key.kind };
    case 'enter':
      return bindings.enter;
    case 'escape':
      return bindings.escape;
    case 'char': {
      const lower = key.char.toLowerCase();
      return Object.hasOwn(bindings.chars, lower) ? bindings.chars[lower] : null;
    }
    case 'unknown':
      return null;
  }
}

export function createGameLoop(board: Board, bindings: KeyBindings = DEFAULT_BINDINGS): GameLoop {
  let state: GameState = 'continue';

  function apply(action: GameAction | null) {
    if (!action) return;
    switch (action.type) {
      case 'move':
        moveCursor(board, action.direction);
        break;
      case 'flag':
        toggleFlag(board);
        break;
      case 'reveal':
        reveal(board);
        break;
      case 'quit':
        break;
    }
  }

  return {
    board,
    get state() { return state; },
    step: (key: Key) => {
      if (isTerminalState(state)) return state;

      const action = actionForKey(key, bindings);
      if (action?.type === 'quit') {
        state = 'quit';
        return state;
      }

      apply(action);
      state = evaluate(board);
      return state;
    },
  };
}
