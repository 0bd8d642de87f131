/**
 * Terminal color themes
 *
 * ANSI escape codes for the board accent color, plus display names
 * for the theme picker and --list-themes.
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'cyan'
  | 'cyanLight'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'ice'
  | 'solarized'
  | 'solarizedLight'
  | 'nord'
  | 'highcontrast';

export interface ThemeInfo {
  /** Display name */
  name: string;
  /** Accent color for grid, hidden tiles and status line */
  ansi: string;
  /** Light background themes need dark text */
  light: boolean;
}

/**
 * All theme definitions
 */
export const themes: Record<PhosphorMode, ThemeInfo> = {
  cyan: { name: 'Cyberpunk', ansi: '\x1b[96m', light: false },
  cyanLight: { name: 'Cyberpunk Light', ansi: '\x1b[38;5;31m', light: true },
  amber: { name: 'Fallout', ansi: '\x1b[93m', light: false },
  green: { name: 'Matrix', ansi: '\x1b[92m', light: false },
  white: { name: 'Ghost', ansi: '\x1b[97m', light: false },
  hotpink: { name: 'Synthwave', ansi: '\x1b[95m', light: false },
  blood: { name: 'Blood', ansi: '\x1b[91m', light: false },
  ice: { name: 'Ice', ansi: '\x1b[96m', light: false },
  solarized: { name: 'Solarized', ansi: '\x1b[36m', light: false },
  solarizedLight: { name: 'Solarized Light', ansi: '\x1b[38;5;66m', light: true },
  nord: { name: 'Nord', ansi: '\x1b[96m', light: false },
  highcontrast: { name: 'High Contrast', ansi: '\x1b[97m', light: false },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode].ansi;
}

/**
 * Check if a theme is light (needs dark text)
 */
export function isLightTheme(mode: PhosphorMode): boolean {
  return themes[mode].light;
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return VALID_THEME_MODES.has(value);
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';
