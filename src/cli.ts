/**
 * CLI entry point for sweeper
 *
 * Parses arguments, sets the theme, wires the Node terminal adapter
 * to the game and exits once the game is over.
 */

import { type CliCommand, ConfigError, type GameConfig, PRESETS, parseArgs } from './config';
import { createNodeTerminal, type NodeTerminal } from './terminal';
import { runMinesweeperGame } from './games/minesweeper';
import { setTheme } from './games/utils';
import { getThemeModes, themes } from './themes';

function printHelp() {
  console.log(`
  sweeper — Minesweeper in your terminal

  Usage:
    sweeper                      Play the classic 16x16 board with 32 mines
    sweeper setup                Pick board and theme interactively
    sweeper --preset <id>        Play a preset board
    sweeper --width <n> --height <n> --mines <n>
                                 Play a custom board
    sweeper --theme <theme>      Set color theme
    sweeper --no-color           Plain glyphs, no ANSI colors
    sweeper --list-themes        List color themes
    sweeper --help               Show this help

  Presets:
    ${PRESETS.map(p => `${p.id.padEnd(12)} ${p.width}x${p.height}, ${p.mines} mines`).join('\n    ')}

  Controls:
    Arrow keys / WASD    Move cursor
    SPACE / Enter        Open tile
    F                    Flag / unflag
    Q                    Quit
`);
}

function fail(message: string, terminal?: NodeTerminal): never {
  terminal?.cleanup();
  console.error(`Error: ${message}`);
  process.exit(1);
}

function openTerminal(): NodeTerminal {
  try {
    return createNodeTerminal();
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error));
  }
}

async function play(config: GameConfig) {
  setTheme(config.theme);

  const terminal = openTerminal();
  process.stdout.on('error', (error: Error) => {
    fail(`terminal write failed: ${error.message}`, terminal);
  });

  const controller = runMinesweeperGame(terminal, {
    width: config.width,
    height: config.height,
    mines: config.mines,
    color: config.color,
  });

  try {
    await controller.done;
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error), terminal);
  }

  terminal.cleanup();
  process.exit(0);
}

async function main() {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigError) fail(`${error.message}\nRun sweeper --help for usage.`);
    throw error;
  }

  switch (command.type) {
    case 'help':
      printHelp();
      return;
    case 'list-themes':
      for (const mode of getThemeModes()) {
        console.log(`  ${mode.padEnd(16)} ${themes[mode].name}`);
      }
      return;
    case 'setup': {
      const { runSetup } = await import('./setup');
      const config = await runSetup(command.config);
      if (!config) return;
      await play(config);
      return;
    }
    case 'play':
      await play(command.config);
      return;
  }
}

main().catch((error: unknown) => {
  fail(error instanceof Error ? error.stack ?? error.message : String(error));
});
