/**
 * Environment Variable Parsing Utilities
 */

/**
 * Split a delimited string into trimmed, non-empty items.
 *
 * The default delimiter accepts commas and newlines, so both
 * `a,b` and a multi-line value produce the same list.
 *
 * @example
 * parseList(' key-a ,\nkey-b,,') // ['key-a', 'key-b']
 */
export function parseList(value: string | undefined, delimiter: string | RegExp = /[,\r\n]+/): string[] {
  if (!value) return [];
  return value
    .split(delimiter)
    .map((s) => s.trim())
    .filter(Boolean);
}
