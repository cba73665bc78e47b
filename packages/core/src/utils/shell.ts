// Characters that never need quoting in a POSIX shell word
const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single argument for a POSIX shell. Safe words pass through
 * unchanged; anything else is wrapped in single quotes.
 */
export function quoteShellArg(value: string): string {
  if (value.length === 0) {
    return "''";
  }
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Join an argument vector into a shell command line.
 */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(quoteShellArg).join(" ");
}

/**
 * Render environment assignments as a `KEY=value` prefix for a command.
 */
export function formatEnvPrefix(env: Readonly<Record<string, string>>): string {
  return Object.entries(env)
    .map(([key, value]) => `${key}=${quoteShellArg(value)}`)
    .join(" ");
}
