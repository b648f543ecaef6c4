/**
 * Single-quote a value for POSIX shells.
 * `it's` becomes `'it'\''s'`.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}
