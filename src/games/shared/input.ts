/**
 * Key input source
 *
 * Buffers decoded keys from a terminal's onData stream so a game loop
 * can await them one at a time.
 */

import type { GameTerminal } from '../utils';
import { parseKey, splitKeys, type Key } from './keys';

export interface InputSource {
  /** Resolves with the next key; rejects once the source is disposed */
  readKey: () => Promise<Key>;
  dispose: () => void;
}

export class InputClosedError extends Error {
  constructor() {
    super('input source closed');
    this.name = 'InputClosedError';
  }
}

interface PendingRead {
  resolve: (key: Key) => void;
  reject: (error: Error) => void;
}

/**
 * Create an InputSource fed by terminal.onData
 */
export function createKeyQueue(terminal: Pick<GameTerminal, 'onData'>): InputSource {
  const buffered: Key[] = [];
  const waiting: PendingRead[] = [];
  let closed = false;

  const subscription = terminal.onData((data: string) => {
    if (closed) return;
    for (const part of splitKeys(data)) {
      const key = parseKey(part);
      const reader = waiting.shift();
      if (reader) {
        reader.resolve(key);
      } else {
        buffered.push(key);
      }
    }
  });

  return {
    readKey: () => {
      const next = buffered.shift();
      if (next) return Promise.resolve(next);
      if (closed) return Promise.reject(new InputClosedError());
      return new Promise<Key>((resolve, reject) => {
        waiting.push({ resolve, reject });
      });
    },
    dispose: () => {
      if (closed) return;
      closed = true;
      subscription.dispose();
      buffered.length = 0;
      for (const reader of waiting.splice(0)) {
        reader.reject(new InputClosedError());
      }
    },
  };
}
