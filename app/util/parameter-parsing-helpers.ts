import { isNumeric } from './string';

/**
 * Tag class for denoting errors during parsing
 *
 */
export class ParameterParseError extends Error { }

/**
 * Helper function for parameters that parses and validates numerical values.
 * If the input string is not numerical, a ParameterParseError is thrown.
 *
 * @param valueStr - the unparsed number as it appears in the input
 * @returns the parsed result
 * @throws ParameterParseError - if there are errors while parsing (e.g., a NaN)
 */
export function parseNumber(valueStr: string | number): number {
  const parsedNumber = typeof valueStr === 'number' ? valueStr : Number(valueStr);
  if ((typeof valueStr === 'string' && valueStr.trim() === '') || !Number.isFinite(parsedNumber)) {
    throw new ParameterParseError(`'${valueStr}' must be a number.`);
  }
  return parsedNumber;
}

/**
 * Returns the parameter as parsed as an array of comma-separated values if
 * it was a string, or just returns the array if it's already parsed. Returns
 * an empty array if the parameter is null or undefined.
 * @param value - The parameter value to parse (either an array or a string)
 */
export function parseMultiValueParameter(value: string[] | string | null | undefined): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value;
  }
  return value.split(',').map((v) => v.trim()).filter((v) => v.length > 0);
}

/**
 * Given a bbox value, parse it into a list of numbers after performing validations
 *
 * @param value - bbox value, either comma-separated or already split
 * @returns An array of 4 numbers (minimum x, minimum y, maximum x, maximum y) or 6 numbers
 * when the bbox carries a vertical range (minimum x, minimum y, minimum z, maximum x,
 * maximum y, maximum z)
 * @throws ParameterParseError - if the bbox does not have 4 or 6 numbers or is inverted
 */
export function parseBbox(value: string | ReadonlyArray<string | number>): number[] {
  const parts = typeof value === 'string' ? value.split(',') : value;
  const bbox = parts.map(parseNumber);
  if (bbox.length !== 4 && bbox.length !== 6) {
    throw new ParameterParseError('bbox can only have 4 or 6 numbers.');
  }
  const half = bbox.length / 2;
  // only y (and z) must be ordered, x may cross the antimeridian
  for (let i = 1; i < half; i++) {
    if (bbox[i] > bbox[i + half]) {
      throw new ParameterParseError(`bbox minimum ${bbox[i]} is greater than maximum ${bbox[i + half]}.`);
    }
  }
  return bbox;
}

/**
 * Parses an RFC 3339 date-time into milliseconds since the epoch
 * @param value - the date-time string
 * @returns the number of milliseconds
 * @throws ParameterParseError - if the value is not a date-time
 */
export function parseDatetimeMillis(value: string): number {
  const millis = Date.parse(value);
  if (Number.isNaN(millis)) {
    throw new ParameterParseError(`'${value}' is not a valid RFC 3339 date-time.`);
  }
  return millis;
}

const repeatingIntervalRegex = /^R(\d+)\/([^/]+)\/([^/]+)$/i;

/**
 * Formats a computed dimension value without floating point noise such as 0.30000000000000004
 * @param value - the number to format
 */
function formatStep(value: number): string {
  return String(Number(value.toPrecision(12)));
}

/**
 * Expands the values advertised for a custom dimension. Services may list every value, give a
 * single comma-separated string, or use the repeating interval notation `R<count>/<start>/<step>`
 * which stands for `count` values starting at `start` and increasing by `step`.
 *
 * @param rawValues - the values as advertised by the service
 * @returns the ordered list of legal values as strings
 */
export function expandDimensionValues(rawValues: ReadonlyArray<string | number>): string[] {
  const values: string[] = [];
  for (const raw of rawValues) {
    if (typeof raw === 'number') {
      values.push(String(raw));
      continue;
    }
    const match = raw.trim().match(repeatingIntervalRegex);
    if (match && isNumeric(match[2]) && isNumeric(match[3])) {
      const count = parseInt(match[1], 10);
      const start = Number(match[2]);
      const step = Number(match[3]);
      for (let i = 0; i < count; i++) {
        values.push(formatStep(start + i * step));
      }
    } else {
      values.push(...parseMultiValueParameter(raw));
    }
  }
  return values;
}
