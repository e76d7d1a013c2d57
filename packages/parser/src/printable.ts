/**
 * Printable ASCII: space (32) through tilde (126).
 * Shared by string extraction and the raw text character statistics.
 */
export function isPrintable(code: number): boolean {
  return code >= 32 && code <= 126;
}
