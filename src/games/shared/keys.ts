/**
 * Key decoding for raw terminal input
 *
 * Maps the byte sequences a terminal sends (CSI / SS3 arrows,
 * CR/LF, lone ESC, printable characters) to a small Key union.
 */

export type Key =
  | { kind: 'up' }
  | { kind: 'down' }
  | { kind: 'left' }
  | { kind: 'right' }
  | { kind: 'enter' }
  | { kind: 'escape' }
  | { kind: 'char'; char: string }
  | { kind: 'unknown'; sequence: string };

const SEQUENCES = new Map<string, Key>([
  ['\x1b[A', { kind: 'up' }],
  ['\x1bOA', { kind: 'up' }],
  ['\x1b[B', { kind: 'down' }],
  ['\x1bOB', { kind: 'down' }],
  ['\x1b[C', { kind: 'right' }],
  ['\x1bOC', { kind: 'right' }],
  ['\x1b[D', { kind: 'left' }],
  ['\x1bOD', { kind: 'left' }],
  ['\r', { kind: 'enter' }],
  ['\n', { kind: 'enter' }],
  ['\x1b', { kind: 'escape' }],
]);

/**
 * Decode one chunk of raw input into a Key
 */
export function parseKey(data: string): Key {
  const known = SEQUENCES.get(data);
  if (known) return known;
  if ([...data].length === 1) return { kind: 'char', char: data };
  return { kind: 'unknown', sequence: data };
}

/**
 * Split a chunk that may hold several keypresses (fast typing, paste)
 * into one entry per key. Escape sequences stay whole, and so does
 * ESC followed by a printable character.
 */
export function splitKeys(data: string): string[] {
  const parts: string[] = [];
  let i = 0;
  while (i < data.length) {
    if (data[i] === '\x1b' && (data[i + 1] === '[' || data[i + 1] === 'O') && i + 2 < data.length) {
      // CSI sequences end at the first byte in @..~
      let end = i + 2;
      while (end < data.length && !/[@-~]/.test(data[end])) end++;
      parts.push(data.slice(i, end + 1));
      i = end + 1;
      continue;
    }
    if (data[i] === '\x1b' && i + 1 < data.length && /[ -~]/.test(data[i + 1])) {
      // Alt+key, or the head of a sequence cut off by the chunk boundary
      parts.push(data.slice(i, i + 2));
      i += 2;
      continue;
    }
    const cp = data.codePointAt(i) ?? 0;
    const ch = String.fromCodePoint(cp);
    parts.push(ch);
    i += ch.length;
  }
  return parts;
}
