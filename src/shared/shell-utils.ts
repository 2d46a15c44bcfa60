/**
 * Quotes a value for safe use as a single POSIX shell argument.
 * Wraps it in single quotes and closes/reopens the quote around embedded ones.
 */
export function escapeShellArg(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}
