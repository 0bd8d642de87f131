/**
 * sweeper
 *
 * Terminal Minesweeper for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runMinesweeperGame, setTheme } from 'sweeper-cli';
 *   setTheme('cyan');
 *   const controller = runMinesweeperGame(terminal, { width: 16, height: 16, mines: 32 });
 *   const state = await controller.done;
 *
 * CLI usage:
 *   npx sweeper-cli
 */

export * from './games';

export {
  PRESETS,
  DEFAULT_PRESET_ID,
  getPreset,
  parseArgs,
  ConfigError,
  type Preset,
  type GameConfig,
  type CliCommand,
} from './config';

export {
  themes,
  getAnsiColor,
  getThemeModes,
  isValidThemeMode,
  ANSI_RESET,
  type ThemeInfo,
} from './themes';
