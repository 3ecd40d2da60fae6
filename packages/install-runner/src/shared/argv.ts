/**
 * Helpers for argv display and shell composition
 */

const NEEDS_QUOTING = /[^\w@%+=:,./-]/;

/**
 * Quote one argument for a POSIX shell. Plain words are left untouched.
 */
export function quoteArg(arg: string): string {
  if (arg !== '' && !NEEDS_QUOTING.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render an argv as a shell command line
 */
export function formatArgv(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ');
}

/**
 * Render a pipeline as a shell command line
 */
export function formatPipeline(commands: readonly (readonly string[])[]): string {
  return commands.map(formatArgv).join(' | ');
}

/**
 * Exit status of a pipeline under `set -o pipefail`: the status of the
 * rightmost command that exited non-zero, or 0 when every command succeeded.
 */
export function pipefailStatus(exitCodes: readonly number[]): number {
  for (let i = exitCodes.length - 1; i >= 0; i--) {
    if (exitCodes[i] !== 0) {
      return exitCodes[i];
    }
  }
  return 0;
}
