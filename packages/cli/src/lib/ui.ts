/**
 * CLI UI Design System
 *
 * - Minimal, clean output
 * - Commands and paths highlighted
 * - Stage progress as [n/total]
 * - No heavy decorations
 */

import chalk from "chalk";

// =============================================================================
// Theme
// =============================================================================

export const theme = {
  // Text hierarchy
  title: chalk.white.bold,
  muted: chalk.gray,

  // Status colors
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,

  // Commands and paths
  command: chalk.cyan,
  path: chalk.white,
} as const;

// =============================================================================
// Symbols
// =============================================================================

export const symbols = {
  success: theme.success("✓"),
  error: theme.error("✗"),
  warning: theme.warning("!"),

  bullet: theme.muted("•"),
} as const;

// =============================================================================
// Formatters
// =============================================================================

/** Format a CLI command */
export function command(cmd: string): string {
  return theme.command(cmd);
}

/** Format a file path */
export function path(p: string): string {
  return theme.path(p);
}

// =============================================================================
// Layout Helpers
// =============================================================================

/** Indent text by level */
export function indent(level = 1): string {
  return "  ".repeat(level);
}

/** Pad string to width */
export function pad(text: string, width: number): string {
  const stripped = stripAnsi(text);
  return text + " ".repeat(Math.max(0, width - stripped.length));
}

// =============================================================================
// Components
// =============================================================================

/** Section header */
export function header(title: string): string {
  return theme.title(title);
}

/**
 * Key-value pair for labeled data
 * e.g., "Mode         pinned-package"
 */
export function keyValue(key: string, value: string, keyWidth = 12): string {
  return `${theme.muted(pad(key, keyWidth))} ${value}`;
}

/** Simple list with bullets */
export function list(items: string[], marker: string = symbols.bullet): string {
  return items.map((item) => `${indent()}${marker} ${item}`).join("\n");
}

// =============================================================================
// Status Messages
// =============================================================================

export function success(message: string): string {
  return `${symbols.success} ${message}`;
}

export function error(message: string): string {
  return `${symbols.error} ${theme.error(message)}`;
}

export function warning(message: string): string {
  return `${symbols.warning} ${message}`;
}

// =============================================================================
// Progress
// =============================================================================

/**
 * Step indicator for multi-step operations
 * e.g., "[2/4] system-dependencies"
 */
export function step(current: number, total: number, message: string): string {
  return `${theme.muted(`[${current}/${total}]`)} ${message}`;
}

/**
 * Verification check line
 * e.g., "✓ installed-version  spotizerr-auth 1.1.1"
 */
export function check(passed: boolean, name: string, detail: string): string {
  const symbol = passed ? symbols.success : symbols.error;
  return `${symbol} ${pad(name, 20)} ${theme.muted(detail)}`;
}

// =============================================================================
// Utility Functions
// =============================================================================

/** Strip ANSI codes for width calculations */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ignore
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");
}

// =============================================================================
// Export
// =============================================================================

export const ui = {
  theme,
  symbols,

  command,
  path,

  indent,
  pad,

  header,
  keyValue,
  list,

  success,
  error,
  warning,

  step,
  check,

  stripAnsi,
};
