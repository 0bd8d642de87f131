/**
 * Game configuration
 *
 * Board presets and command-line parsing for the sweeper CLI.
 */

import { type PhosphorMode, getThemeModes, isValidThemeMode } from './themes';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface Preset {
  id: string;
  name: string;
  width: number;
  height: number;
  mines: number;
}

export const PRESETS: Preset[] = [
  { id: 'easy', name: 'EASY', width: 9, height: 9, mines: 10 },
  { id: 'reference', name: 'CLASSIC', width: 16, height: 16, mines: 32 },
  { id: 'medium', name: 'MEDIUM', width: 16, height: 16, mines: 40 },
  { id: 'hard', name: 'HARD', width: 30, height: 16, mines: 99 },
];

export const DEFAULT_PRESET_ID = 'reference';

export function getPreset(id: string): Preset | undefined {
  return PRESETS.find(p => p.id === id || p.name.toLowerCase() === id.toLowerCase());
}

function defaultPreset(): Preset {
  const preset = getPreset(DEFAULT_PRESET_ID);
  if (!preset) throw new ConfigError(`missing default preset "${DEFAULT_PRESET_ID}"`);
  return preset;
}

export interface GameConfig {
  width: number;
  height: number;
  mines: number;
  theme: PhosphorMode;
  color: boolean;
}

export type CliCommand =
  | { type: 'play'; config: GameConfig }
  | { type: 'setup'; config: GameConfig }
  | { type: 'help' }
  | { type: 'list-themes' };

export const MAX_DIMENSION = 99;

// Plain decimal digits only: no sign, spaces, hex or exponent
function wholeNumber(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

function parseDimension(flag: string, raw: string | undefined, max: number): number {
  if (raw === undefined || raw.startsWith('--')) {
    throw new ConfigError(`${flag} needs a value`);
  }
  const value = wholeNumber(raw);
  if (value === null || value < 1 || value > max) {
    throw new ConfigError(`${flag} must be a whole number from 1 to ${max}, got "${raw}"`);
  }
  return value;
}

function parseMineCount(raw: string | undefined): number {
  if (raw === undefined || raw.startsWith('--')) {
    throw new ConfigError('--mines needs a value');
  }
  const value = wholeNumber(raw);
  if (value === null) {
    throw new ConfigError(`--mines must be a whole number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse argv (without node and script) into a command.
 * Width/height/mines override the chosen preset; mines larger than
 * the board are clamped later by the board itself.
 */
export function parseArgs(argv: string[]): CliCommand {
  const args = [...argv];

  if (args.includes('--help') || args.includes('-h')) return { type: 'help' };
  if (args.includes('--list-themes')) return { type: 'list-themes' };

  const base = defaultPreset();
  const config: GameConfig = {
    width: base.width,
    height: base.height,
    mines: base.mines,
    theme: 'cyan',
    color: true,
  };

  let setup = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case 'setup':
        setup = true;
        break;
      case '--preset': {
        const raw = args[++i];
        const preset = raw === undefined ? undefined : getPreset(raw);
        if (!preset) {
          throw new ConfigError(`--preset must be one of ${PRESETS.map(p => p.id).join(', ')}`);
        }
        config.width = preset.width;
        config.height = preset.height;
        config.mines = preset.mines;
        break;
      }
      case '--width':
        config.width = parseDimension(arg, args[++i], MAX_DIMENSION);
        break;
      case '--height':
        config.height = parseDimension(arg, args[++i], MAX_DIMENSION);
        break;
      case '--mines':
        config.mines = parseMineCount(args[++i]);
        break;
      case '--theme': {
        const raw = args[++i];
        if (raw === undefined || !isValidThemeMode(raw)) {
          throw new ConfigError(`--theme must be one of ${getThemeModes().join(', ')}`);
        }
        config.theme = raw;
        break;
      }
      case '--no-color':
        config.color = false;
        break;
      default:
        throw new ConfigError(`unknown argument "${arg}"`);
    }
  }

  return setup ? { type: 'setup', config } : { type: 'play', config };
}
