/**
 * Interactive setup — `sweeper setup`
 *
 * Pick a preset or a custom board and a color theme with @clack/prompts,
 * then hand the result back to the CLI to play.
 */

import * as p from '@clack/prompts';
import { type GameConfig, MAX_DIMENSION, PRESETS, getPreset } from './config';
import { getThemeModes, themes } from './themes';

function checkWhole(value: string | undefined, min: number, max: number): string | undefined {
  if (!value) return 'A number is required';
  const n = /^\d+$/.test(value) ? Number(value) : NaN;
  if (Number.isNaN(n) || n < min || n > max) {
    return `Enter a whole number from ${min} to ${max}`;
  }
  return undefined;
}

async function askNumber(message: string, initial: number, min: number, max: number): Promise<number | null> {
  const answer = await p.text({
    message,
    placeholder: String(initial),
    defaultValue: String(initial),
    validate: (value) => checkWhole(value || String(initial), min, max),
  });
  if (p.isCancel(answer)) return null;
  return Number(answer || initial);
}

async function askBoard(current: GameConfig): Promise<Pick<GameConfig, 'width' | 'height' | 'mines'> | null> {
  const choice = await p.select({
    message: 'Pick a board:',
    options: [
      ...PRESETS.map(preset => ({
        value: preset.id,
        label: preset.name,
        hint: `${preset.width}x${preset.height}, ${preset.mines} mines`,
      })),
      { value: 'custom', label: 'Custom', hint: 'choose size and mine count' },
    ],
  });
  if (p.isCancel(choice)) return null;

  const preset = getPreset(choice);
  if (preset) {
    return { width: preset.width, height: preset.height, mines: preset.mines };
  }

  const width = await askNumber('Width:', current.width, 1, MAX_DIMENSION);
  if (width === null) return null;
  const height = await askNumber('Height:', current.height, 1, MAX_DIMENSION);
  if (height === null) return null;
  const mines = await askNumber('Mines:', Math.min(current.mines, width * height), 0, width * height);
  if (mines === null) return null;

  return { width, height, mines };
}

/**
 * Run the setup prompts. Resolves with the chosen config, or null if cancelled.
 */
export async function runSetup(current: GameConfig): Promise<GameConfig | null> {
  p.intro('sweeper');

  const board = await askBoard(current);
  if (!board) {
    p.cancel('Cancelled.');
    return null;
  }

  const theme = await p.select({
    message: 'Color theme:',
    initialValue: current.theme,
    options: getThemeModes().map(mode => ({ value: mode, label: themes[mode].name, hint: mode })),
  });
  if (p.isCancel(theme)) {
    p.cancel('Cancelled.');
    return null;
  }

  p.log.info('Arrows or WASD move, SPACE opens, F flags, Q quits.');
  p.outro('Good luck!');

  return { ...current, ...board, theme };
}
