export enum Conjunction {
  AND = 'and',
  OR = 'or',
}

/**
 * Converts the array of string items to a single textual string where elements are
 * comma-separated, and an "and" is inserted as necessary, e.g.
 * `['a'] => 'a'`
 * `['a', 'b'] => 'a and b'`
 * `['a', 'b', 'c'] => 'a, b, and c'`
 *
 * Oxford commas are used.
 *
 * @param items - The items to be converted to text
 * @param joinWord - The conjunction placed before the last item
 * @returns The resulting textual string
 */
export function listToText(items: readonly string[] | null | undefined, joinWord = Conjunction.AND): string {
  if (!items) return '';
  switch (items.length) {
    case 0: return '';
    case 1: return items[0];
    case 2: return items.join(` ${joinWord} `);
    default: {
      const result = items.concat(); // Copies the array
      result[result.length - 1] = `${joinWord} ${result[result.length - 1]}`;
      return result.join(', ');
    }
  }
}

/**
 * Truncates a string to the specified number of characters. The last
 * three characters are replaced with '...'.
 *
 * @param s - The string to truncate
 * @param n - The maximum number of characters to keep
 *
 * @returns The truncated string
 */
export function truncateString(s: string, n: number): string {
  let truncatedString = s;
  if (s.length > n) {
    if (n < 3) {
      truncatedString = '...';
    } else {
      truncatedString = `${s.slice(0, n - 3)}...`;
    }
  }
  return truncatedString;
}

/**
 * Returns true if a string is an integer.
 * @param value - the value to check
 * @returns true if it is an integer and false otherwise
 */
export function isInteger(value: string): boolean {
  return /^-?\d+$/.test(value);
}

/**
 * Returns true if a string is a float (with a decimal point).
 * @param value - the value to check
 * @returns true if it is a float and false otherwise
 */
export function isFloat(value: string): boolean {
  return /^-?\d*\.\d+$/.test(value);
}

/**
 * Returns true if a string is a boolean literal.
 * @param value - the value to check
 * @returns true if it is 'true' or 'false', ignoring case
 */
export function isBoolean(value: string): boolean {
  return /^(true|false)$/i.test(value);
}

/**
 * Parses a boolean literal. Anything other than 'true' (ignoring case) is false.
 * @param value - the value to parse
 * @returns the parsed boolean
 */
export function parseBoolean(value: string): boolean {
  return value.toLowerCase() === 'true';
}

/**
 * Returns true if the string is a finite decimal number (integer, float or exponent form)
 * @param value - the value to check
 */
export function isNumeric(value: string): boolean {
  return value.trim() !== '' && Number.isFinite(Number(value));
}
