/**
 * Verbose Output Helpers
 *
 * Formats external commands for --verbose CLI output.
 * Used by ExecCommandRunner to print commands to stderr before execution.
 */

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[cmd] ';

/**
 * ANSI SGR 90 (bright black / gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0, reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Quote one argument for display if it would be ambiguous unquoted.
 */
export function quoteArg(arg: string): string {
  if (arg === '') {
    return "''";
  }
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Format a command line for verbose output.
 *
 * Produces a single `[cmd] program arg...` line followed by a newline,
 * optionally wrapped in ANSI gray when `ansi` is true. Data piped to stdin
 * is never shown since it may carry key material.
 *
 * @param command - Program name
 * @param args - Program arguments
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(command: string, args: readonly string[], ansi: boolean): string {
  const line = `${PREFIX}${[command, ...args].map(quoteArg).join(' ')}\n`;

  if (ansi) {
    return `${ANSI_GRAY}${line}${ANSI_RESET}`;
  }

  return line;
}
