import type {
  Axis, AxisValue, PolygonAxis, PrimitiveAxis, TupleAxis,
} from '../models/coverage';
import { DecodeError } from '../util/errors';
import { isRecord } from '../util/object';

/**
 * Returns `num` evenly spaced values from `start` to `stop`, both included
 *
 * @param start - the first value
 * @param stop - the last value
 * @param num - the number of values
 * @returns the values
 */
export function linspace(start: number, stop: number, num: number): number[] {
  if (num === 1) return [start];
  const step = (stop - start) / (num - 1);
  const values: number[] = [];
  for (let i = 0; i < num; i++) {
    values.push(i === num - 1 ? stop : start + i * step);
  }
  return values;
}

function isAxisValue(value: unknown): value is AxisValue {
  return (typeof value === 'number' && Number.isFinite(value)) || typeof value === 'string';
}

function isPosition(value: unknown): value is number[] {
  return Array.isArray(value) && value.length >= 2 && value.every((v) => typeof v === 'number');
}

function isPolygon(value: unknown): value is number[][][] {
  return Array.isArray(value) && value.length > 0
    && value.every((ring) => Array.isArray(ring) && ring.every(isPosition));
}

function coordinateNames(name: string, raw: Record<string, unknown>): string[] {
  const { coordinates } = raw;
  if (!Array.isArray(coordinates) || coordinates.length === 0 || !coordinates.every((c) => typeof c === 'string')) {
    throw new DecodeError('MalformedCoverage', `Axis ${name} must list its coordinates`);
  }
  return coordinates;
}

function decodePrimitiveAxis(name: string, raw: Record<string, unknown>): PrimitiveAxis {
  if (Array.isArray(raw.values)) {
    if (raw.values.length === 0 || !raw.values.every(isAxisValue)) {
      throw new DecodeError('MalformedCoverage', `Axis ${name} must have at least one number or string value`);
    }
    return { kind: 'primitive', name, values: raw.values, regular: false };
  }
  const { start, stop, num } = raw;
  if (typeof start === 'number' && typeof stop === 'number' && typeof num === 'number') {
    if (!Number.isInteger(num) || num < 1) {
      throw new DecodeError('MalformedCoverage', `Axis ${name} must have a positive integer num`);
    }
    return { kind: 'primitive', name, values: linspace(start, stop, num), regular: true };
  }
  throw new DecodeError('MalformedCoverage', `Axis ${name} needs either values or start, stop and num`);
}

function decodeTupleAxis(name: string, raw: Record<string, unknown>): TupleAxis {
  const coordinates = coordinateNames(name, raw);
  const { values } = raw;
  if (!Array.isArray(values) || values.length === 0) {
    throw new DecodeError('MalformedCoverage', `Axis ${name} must have at least one tuple`);
  }
  const tuples: AxisValue[][] = [];
  for (const tuple of values) {
    if (!Array.isArray(tuple) || tuple.length !== coordinates.length || !tuple.every(isAxisValue)) {
      throw new DecodeError(
        'MalformedCoverage',
        `Axis ${name} tuples must have ${coordinates.length} values (${coordinates.join(', ')})`,
      );
    }
    tuples.push(tuple);
  }
  return { kind: 'tuple', name, coordinates, values: tuples };
}

function decodePolygonAxis(name: string, raw: Record<string, unknown>): PolygonAxis {
  const coordinates = coordinateNames(name, raw);
  const { values } = raw;
  if (!Array.isArray(values) || values.length === 0 || !values.every(isPolygon)) {
    throw new DecodeError('MalformedCoverage', `Axis ${name} must have at least one polygon`);
  }
  return { kind: 'polygon', name, coordinates, values };
}

/**
 * Decodes the axes of a domain, keeping their declaration order. Regular axes are expanded
 * into explicit values.
 *
 * @param raw - the `domain.axes` object
 * @returns the axes
 * @throws DecodeError - MalformedCoverage if an axis cannot be read
 */
export function decodeAxes(raw: unknown): Axis[] {
  if (!isRecord(raw) || Object.keys(raw).length === 0) {
    throw new DecodeError('MalformedCoverage', 'domain.axes must be an object with at least one axis');
  }
  return Object.entries(raw).map(([name, definition]): Axis => {
    if (!isRecord(definition)) {
      throw new DecodeError('MalformedCoverage', `Axis ${name} must be an object`);
    }
    switch (definition.dataType ?? 'primitive') {
      case 'primitive':
        return decodePrimitiveAxis(name, definition);
      case 'tuple':
        return decodeTupleAxis(name, definition);
      case 'polygon':
        return decodePolygonAxis(name, definition);
      default:
        throw new DecodeError('MalformedCoverage', `Axis ${name} has unknown data type ${String(definition.dataType)}`);
    }
  });
}

export function axisSize(axis: Axis): number {
  return axis.values.length;
}

export function findAxis(axes: readonly Axis[], name: string): Axis | undefined {
  return axes.find((a) => a.name === name);
}

export function findPrimitiveAxis(axes: readonly Axis[], name: string): PrimitiveAxis | undefined {
  const axis = findAxis(axes, name);
  return axis?.kind === 'primitive' ? axis : undefined;
}

// The first composite axis of the domain, usually named `composite`
export function findCompositeAxis(axes: readonly Axis[]): TupleAxis | PolygonAxis | undefined {
  for (const axis of axes) {
    if (axis.kind !== 'primitive') return axis;
  }
  return undefined;
}
