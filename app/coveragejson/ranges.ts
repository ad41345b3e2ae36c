import type { Parameter } from '../models/collection';
import type {
  Axis, Range, RangeDataType, RangeValue,
} from '../models/coverage';
import { DecodeError } from '../util/errors';
import { isRecord } from '../util/object';
import { truncateString } from '../util/string';
import { axisSize, findAxis } from './axes';

export interface DecodedRange {
  range: Range;
  warnings: string[];
}

function isRangeValue(value: unknown): value is RangeValue {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

function inferDataType(values: readonly RangeValue[]): RangeDataType {
  const present = values.filter((v): v is number | string => v !== null);
  if (present.some((v) => typeof v === 'string')) return 'string';
  return present.every((v) => Number.isInteger(v)) ? 'integer' : 'float';
}

function isRangeDataType(value: unknown): value is RangeDataType {
  return value === 'float' || value === 'integer' || value === 'string';
}

/**
 * Checks the values against the declared data type. Mismatches are reported, never fatal:
 * the values are kept as given.
 */
function dataTypeWarnings(name: string, dataType: RangeDataType, values: readonly RangeValue[], parameter?: Parameter): string[] {
  const warnings: string[] = [];
  const offending = values.find((v) => {
    if (v === null) return false;
    if (dataType === 'string') return typeof v !== 'string';
    return typeof v !== 'number' || (dataType === 'integer' && !Number.isInteger(v));
  });
  if (offending !== undefined) {
    warnings.push(`Range ${name} is declared ${dataType} but holds the value ${truncateString(String(offending), 40)}`);
  }
  if (parameter?.dataType && parameter.dataType !== dataType) {
    warnings.push(`Range ${name} is ${dataType} but parameter ${parameter.id} is declared ${parameter.dataType}`);
  }
  return warnings;
}

/**
 * Decodes an NdArray range. The axis order comes from `axisNames`, or from the domain when the
 * range does not name its axes; the shape must match the sizes of those axes and the number
 * of values must be the product of the shape.
 *
 * @param name - the parameter name (key in `ranges`)
 * @param raw - the range object
 * @param axes - the decoded domain axes
 * @param parameter - the parameter definition, if any
 * @returns the range and any data type warnings
 * @throws DecodeError - UnsupportedRangeEncoding, MalformedCoverage or RangeShapeMismatch
 */
export function decodeRange(name: string, raw: unknown, axes: readonly Axis[], parameter?: Parameter): DecodedRange {
  if (typeof raw === 'string') {
    throw new DecodeError('UnsupportedRangeEncoding', `Range ${name} is a link to ${raw}, only embedded ranges are decoded`);
  }
  if (!isRecord(raw)) {
    throw new DecodeError('MalformedCoverage', `Range ${name} must be an object`);
  }
  if (raw.type !== undefined && raw.type !== 'NdArray') {
    throw new DecodeError('UnsupportedRangeEncoding', `Range ${name} is a ${String(raw.type)}, only NdArray is supported`);
  }
  if (!Array.isArray(raw.values) || !raw.values.every(isRangeValue)) {
    throw new DecodeError('MalformedCoverage', `Range ${name} values must be numbers, strings or null`);
  }
  const values: RangeValue[] = raw.values;

  let axisNames: string[];
  if (raw.axisNames === undefined) {
    axisNames = axes.map((a) => a.name);
  } else if (Array.isArray(raw.axisNames) && raw.axisNames.every((a) => typeof a === 'string')) {
    axisNames = raw.axisNames;
  } else {
    throw new DecodeError('MalformedCoverage', `Range ${name} axisNames must be a list of axis names`);
  }

  const expectedShape = axisNames.map((axisName) => {
    const axis = findAxis(axes, axisName);
    if (!axis) {
      throw new DecodeError('MalformedCoverage', `Range ${name} refers to unknown axis ${axisName}`);
    }
    return axisSize(axis);
  });

  let shape = expectedShape;
  if (raw.shape !== undefined) {
    if (!Array.isArray(raw.shape) || !raw.shape.every((s) => Number.isInteger(s))) {
      throw new DecodeError('MalformedCoverage', `Range ${name} shape must be a list of integers`);
    }
    shape = raw.shape;
    if (shape.length !== expectedShape.length || shape.some((size, i) => size !== expectedShape[i])) {
      throw new DecodeError(
        'RangeShapeMismatch',
        `Range ${name} has shape [${shape.join(', ')}] but its axes ${axisNames.join(', ')} have sizes [${expectedShape.join(', ')}]`,
      );
    }
  }

  const count = shape.reduce((product, size) => product * size, 1);
  if (values.length !== count) {
    throw new DecodeError(
      'RangeShapeMismatch',
      `Range ${name} has ${values.length} values but its axes ${axisNames.join(', ') || '(none)'} require ${count}`,
    );
  }

  const warnings: string[] = [];
  let dataType: RangeDataType;
  if (isRangeDataType(raw.dataType)) {
    dataType = raw.dataType;
    warnings.push(...dataTypeWarnings(name, dataType, values, parameter));
  } else {
    dataType = inferDataType(values);
    warnings.push(`Range ${name} has no valid dataType, using ${dataType}`);
  }

  return {
    range: {
      parameter: name, dataType, axisNames, shape, values,
    },
    warnings,
  };
}

/**
 * Returns the value of a range at the given axis indices. Axes the range does not depend on
 * are ignored and axes of the range missing from `indices` are taken at index 0.
 *
 * @param range - the range
 * @param indices - index per axis name
 * @returns the value, null for no data
 */
export function valueAt(range: Range, indices: Readonly<Record<string, number>>): RangeValue {
  let offset = 0;
  range.axisNames.forEach((axisName, i) => {
    offset = offset * range.shape[i] + (indices[axisName] ?? 0);
  });
  return range.values[offset];
}

export type NestedValues = RangeValue | NestedValues[];

/**
 * Reshapes the flat values of a range into nested arrays, one level per axis in the range's
 * declared axis order, e.g. `values[y][x]` for axis names `['y', 'x']`
 *
 * @param range - the range
 * @returns the nested values, or the single value of a range without axes
 */
export function reshape(range: Range): NestedValues {
  const build = (depth: number, offset: number): NestedValues => {
    if (depth === range.shape.length) return range.values[offset];
    const stride = range.shape.slice(depth + 1).reduce((product, size) => product * size, 1);
    const nested: NestedValues[] = [];
    for (let i = 0; i < range.shape[depth]; i++) {
      nested.push(build(depth + 1, offset + i * stride));
    }
    return nested;
  };
  return build(0, 0);
}
