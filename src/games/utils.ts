/**
 * Shared utilities for games
 *
 * This module provides the terminal seam and theme-aware utilities.
 * The theme must be configured by the consuming application via setTheme().
 */

import type { Terminal } from '@xterm/xterm';
import {
  type PhosphorMode,
  getAnsiColor,
  isLightTheme as checkLightTheme,
} from '../themes';

/**
 * The slice of an xterm.js Terminal the games need.
 * A real xterm.js Terminal satisfies it, and so does the Node adapter.
 */
export type GameTerminal = Pick<Terminal, 'write' | 'onData' | 'cols' | 'rows'>;

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: PhosphorMode = 'cyan';

/**
 * Set the current theme mode
 * Call this from your app when the theme changes
 */
export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

export function getTheme(): PhosphorMode {
  return currentTheme;
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string }>();

/**
 * Enter alternate screen buffer with state tracking.
 * Safe to call multiple times - will log warning but not double-enter.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  // Forget the buffer first so a failing write cannot leave it marked as entered
  alternateBufferState.delete(terminal);

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Theme Color Utilities
// ============================================================================

/**
 * Get current theme color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Check if current theme is a light theme (needs dark text)
 */
export function isLightTheme(): boolean {
  return checkLightTheme(currentTheme);
}

// Re-export PhosphorMode type for convenience
export type { PhosphorMode } from '../themes';
