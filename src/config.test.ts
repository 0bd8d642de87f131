import { describe, it, expect } from 'vitest';
import { ConfigError, getPreset, parseArgs } from './config';

describe('parseArgs', () => {
  it('plays the classic 16x16 board with 32 mines by default', () => {
    expect(parseArgs([])).toEqual({
      type: 'play',
      config: { width: 16, height: 16, mines: 32, theme: 'cyan', color: true },
    });
  });

  it('recognises help and theme listing', () => {
    expect(parseArgs(['--help'])).toEqual({ type: 'help' });
    expect(parseArgs(['-h'])).toEqual({ type: 'help' });
    expect(parseArgs(['--list-themes'])).toEqual({ type: 'list-themes' });
  });

  it('applies a preset', () => {
    expect(parseArgs(['--preset', 'easy'])).toEqual({
      type: 'play',
      config: { width: 9, height: 9, mines: 10, theme: 'cyan', color: true },
    });
  });

  it('lets size flags override the preset that came before them', () => {
    const command = parseArgs(['--preset', 'hard', '--width', '20', '--mines', '50']);
    expect(command).toEqual({
      type: 'play',
      config: { width: 20, height: 16, mines: 50, theme: 'cyan', color: true },
    });
  });

  it('keeps a mine count larger than the board for the board to clamp', () => {
    const command = parseArgs(['--width', '3', '--height', '3', '--mines', '40']);
    expect(command).toEqual({
      type: 'play',
      config: { width: 3, height: 3, mines: 40, theme: 'cyan', color: true },
    });
  });

  it('reads theme and color flags', () => {
    expect(parseArgs(['--theme', 'amber', '--no-color'])).toEqual({
      type: 'play',
      config: { width: 16, height: 16, mines: 32, theme: 'amber', color: false },
    });
  });

  it('returns a setup command', () => {
    const command = parseArgs(['setup', '--theme', 'green']);
    expect(command.type).toBe('setup');
  });

  it('rejects bad values', () => {
    expect(() => parseArgs(['--width', '0'])).toThrow(ConfigError);
    expect(() => parseArgs(['--height', 'ten'])).toThrow(ConfigError);
    expect(() => parseArgs(['--mines', '-1'])).toThrow(ConfigError);
    expect(() => parseArgs(['--mines'])).toThrow(ConfigError);
    expect(() => parseArgs(['--preset', 'impossible'])).toThrow(ConfigError);
    expect(() => parseArgs(['--theme', 'plaid'])).toThrow(ConfigError);
    expect(() => parseArgs(['--frobnicate'])).toThrow(ConfigError);
  });

  it('accepts plain decimal digits only', () => {
    expect(() => parseArgs(['--width', '0x10'])).toThrow('--width must be a whole number from 1 to 99, got "0x10"');
    expect(() => parseArgs(['--height', '1e1'])).toThrow(ConfigError);
    expect(() => parseArgs(['--mines', ' 5'])).toThrow('--mines must be a whole number, got " 5"');
    expect(() => parseArgs(['--mines', '+5'])).toThrow(ConfigError);
    expect(() => parseArgs(['--mines', '5.0'])).toThrow(ConfigError);
    expect(parseArgs(['--width', '010', '--mines', '0'])).toEqual({
      type: 'play',
      config: { width: 10, height: 16, mines: 0, theme: 'cyan', color: true },
    });
  });

  it('names the flag in the error', () => {
    expect(() => parseArgs(['--width', '500'])).toThrow('--width must be a whole number from 1 to 99, got "500"');
  });
});

describe('getPreset', () => {
  it('finds presets by id or display name', () => {
    expect(getPreset('medium')?.mines).toBe(40);
    expect(getPreset('Classic')?.id).toBe('reference');
    expect(getPreset('nope')).toBeUndefined();
  });
});
