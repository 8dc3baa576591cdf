/**
 * POSIX shell quoting for values interpolated into remote command lines
 */

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single shell word. Values made only of safe characters are left bare.
 */
export function shellQuote(value: string): string {
  if (value === '') return "''";
  if (SAFE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Quote a path while keeping a leading `~/` expandable by the remote shell
 */
export function quotePath(path: string): string {
  if (path === '~') return path;
  if (path.startsWith('~/')) {
    const rest = path.slice(2);
    return rest === '' ? '~/' : `~/${shellQuote(rest)}`;
  }
  return shellQuote(path);
}
