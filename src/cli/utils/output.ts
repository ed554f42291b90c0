/**
 * CLI output utilities for ondd commands.
 *
 * Provides shared formatting and output helpers for consistent
 * command-line output across all CLI commands.
 *
 * @module cli/utils/output
 */

// =============================================================================
// Colors
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const ansiColors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/**
 * Wrap text in a color code
 */
export function colorize(text: string, color: string): string {
  return `${color}${text}${ansiColors.reset}`;
}

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Format a success message
 */
export function successMessage(message: string): string {
  return colorize(`[OK] ${message}`, ansiColors.green);
}

/**
 * Format an error message
 */
export function errorMessage(message: string): string {
  return colorize(`[ERROR] ${message}`, ansiColors.red);
}

/**
 * Format an info message
 */
export function infoMessage(message: string): string {
  return colorize(`[INFO] ${message}`, ansiColors.cyan);
}

/**
 * Message text of anything thrown
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Serialize records for `--json` output. Dates become ISO strings.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

// =============================================================================
// Progress Display
// =============================================================================

/**
 * Create a text-based progress bar
 *
 * @param percent - Completion, 0-100
 */
export function createProgressBar(percent: number, width: number = 20): string {
  const clamped = Math.min(Math.max(percent, 0), 100);
  const filled = Math.round((clamped / 100) * width);
  const empty = width - filled;
  const bar = '█'.repeat(filled) + '░'.repeat(empty);
  return `[${bar}] ${Math.round(clamped).toString().padStart(3)}%`;
}
