import type {
  Capabilities, CustomDimension, QueryCapability, QueryKind,
} from '../models/collection';
import type {
  DerivedExtents, DimensionSelection, QueryInputs, TemporalSelection, VerticalSelection,
} from '../models/query-descriptor';
import {
  DimensionValueInvalidError, ExtentConflictError, TemporalOutOfRangeError, UnknownParameterError,
  UnsupportedCrsError, UnsupportedOutputFormatError, UnsupportedQueryKindError, VerticalLevelNotSupportedError,
} from '../util/errors';
import { ParameterParseError, parseDatetimeMillis } from '../util/parameter-parsing-helpers';
import { isNumeric, listToText } from '../util/string';

//
// Each exported function checks one of the rules a query must satisfy against the
// capabilities of its collection (or instance). The builder runs them in order and the
// saved query freshness check runs each of them on its own.
//

/**
 * Returns true if two advertised values denote the same value, comparing numerically when
 * both are numbers so that `850` matches `850.0`
 */
function sameValue(a: string, b: string): boolean {
  if (a === b) return true;
  return isNumeric(a) && isNumeric(b) && Number(a) === Number(b);
}

function withinBounds(value: number, min: number | null | undefined, max: number | null | undefined): boolean {
  return (min === null || min === undefined || value >= min) && (max === null || max === undefined || value <= max);
}

/**
 * Rule 1: the query kind must be offered by the collection (or instance).
 *
 * @returns the capability of the query kind
 * @throws UnsupportedQueryKindError
 */
export function checkQueryKind(capabilities: Capabilities, kind: QueryKind): QueryCapability {
  const capability = capabilities.queries[kind];
  if (!capability || !capabilities.supportedQueryKinds.includes(kind)) {
    const supported = listToText(capabilities.supportedQueryKinds);
    throw new UnsupportedQueryKindError(
      `Collection ${capabilities.id} does not support ${kind} queries, supported: ${supported || 'none'}`,
      'kind',
    );
  }
  return capability;
}

/**
 * Rule 3: an extent derived from the geometry cannot also be selected by the user.
 *
 * @throws ExtentConflictError
 */
export function checkDerivedExtents(derived: DerivedExtents, inputs: QueryInputs): void {
  if (derived.vertical && inputs.vertical) {
    throw new ExtentConflictError(
      'The vertical extent is taken from the geometry and cannot also be selected',
      'vertical',
    );
  }
  if (derived.temporal && inputs.temporal) {
    throw new ExtentConflictError(
      'The temporal extent is taken from the geometry and cannot also be selected',
      'temporal',
    );
  }
}

/**
 * Returns the temporal bounds of the collection in milliseconds. Open ends are null; when no
 * interval is advertised the bounds of the listed values are used.
 */
function temporalBounds(capabilities: Capabilities): [number | null, number | null] | undefined {
  const extent = capabilities.extent.temporal;
  if (!extent) return undefined;
  if (extent.interval) {
    const [start, end] = extent.interval;
    return [start ? Date.parse(start) : null, end ? Date.parse(end) : null];
  }
  const times = extent.values.map((v) => Date.parse(v)).filter((t) => !Number.isNaN(t));
  if (times.length === 0) return [null, null];
  return [Math.min(...times), Math.max(...times)];
}

function parseInstant(value: string, field: string): number {
  try {
    return parseDatetimeMillis(value);
  } catch (e) {
    if (e instanceof ParameterParseError) {
      throw new TemporalOutOfRangeError(e.message, field);
    }
    throw e;
  }
}

/**
 * Rule 4: the temporal selection must fall within the temporal extent and an interval must
 * not end before it starts.
 *
 * @throws TemporalOutOfRangeError
 */
export function checkTemporal(capabilities: Capabilities, temporal: TemporalSelection): void {
  const bounds = temporalBounds(capabilities);
  if (!bounds) {
    throw new TemporalOutOfRangeError(`Collection ${capabilities.id} has no temporal extent`, 'temporal');
  }
  const [min, max] = bounds;
  const check = (value: string, field: string): number => {
    const time = parseInstant(value, field);
    if (!withinBounds(time, min, max)) {
      throw new TemporalOutOfRangeError(`${value} is outside of the temporal extent of ${capabilities.id}`, field);
    }
    return time;
  };

  if (temporal.type === 'instant') {
    check(temporal.value, 'temporal');
    return;
  }
  if (temporal.from === null && temporal.to === null) {
    throw new TemporalOutOfRangeError('A time interval needs at least one bound', 'temporal');
  }
  const from = temporal.from === null ? null : check(temporal.from, 'temporal.from');
  const to = temporal.to === null ? null : check(temporal.to, 'temporal.to');
  if (from !== null && to !== null && from > to) {
    throw new TemporalOutOfRangeError(`Interval start ${temporal.from} is after its end ${temporal.to}`, 'temporal');
  }
}

/**
 * Returns true if the level is one of the vertical levels of the collection, or within its
 * vertical interval when no levels are listed
 */
export function isVerticalLevelSupported(capabilities: Capabilities, level: string): boolean {
  const extent = capabilities.extent.vertical;
  if (!extent) return false;
  if (extent.levels.length > 0) {
    return extent.levels.some((l) => sameValue(l, level));
  }
  if (extent.interval && isNumeric(level)) {
    return withinBounds(Number(level), extent.interval[0], extent.interval[1]);
  }
  return false;
}

/**
 * Rule 5: every selected level must be a vertical level of the collection.
 *
 * @throws VerticalLevelNotSupportedError
 */
export function checkVertical(capabilities: Capabilities, vertical: VerticalSelection): void {
  if (!capabilities.extent.vertical) {
    throw new VerticalLevelNotSupportedError(`Collection ${capabilities.id} has no vertical extent`, 'vertical');
  }
  if (vertical.levels.length === 0) {
    throw new VerticalLevelNotSupportedError('At least one vertical level must be selected', 'vertical');
  }
  vertical.levels.forEach((level, i) => {
    if (!isVerticalLevelSupported(capabilities, level)) {
      throw new VerticalLevelNotSupportedError(`Vertical level ${level} is not offered by ${capabilities.id}`, `vertical.levels[${i}]`);
    }
  });
  if (vertical.asRange && !vertical.levels.every(isNumeric)) {
    throw new VerticalLevelNotSupportedError('Only numeric vertical levels can be sent as a range', 'vertical');
  }
}

/**
 * Returns the numeric bounds of a dimension: its interval, or the bounds of its values when
 * they are all numeric
 */
export function dimensionBounds(dimension: CustomDimension): [number, number] | undefined {
  if (dimension.interval) return dimension.interval;
  if (dimension.values.length > 0 && dimension.values.every(isNumeric)) {
    const numbers = dimension.values.map(Number);
    return [Math.min(...numbers), Math.max(...numbers)];
  }
  return undefined;
}

function isLegalValue(dimension: CustomDimension, value: string): boolean {
  if (dimension.values.length > 0) {
    return dimension.values.some((v) => sameValue(v, value));
  }
  const bounds = dimensionBounds(dimension);
  return bounds !== undefined && isNumeric(value) && withinBounds(Number(value), bounds[0], bounds[1]);
}

/**
 * Checks a single dimension selection against its declaration
 *
 * @returns a message describing the problem, or undefined if the selection is valid
 */
export function dimensionProblem(dimension: CustomDimension | undefined, name: string, selection: DimensionSelection): string | undefined {
  if (!dimension) {
    return `Unknown dimension ${name}`;
  }
  switch (selection.kind) {
    case 'single':
      return isLegalValue(dimension, selection.value) ? undefined : `${selection.value} is not a value of dimension ${name}`;
    case 'multiple': {
      if (selection.values.length === 0) return `Select at least one value of dimension ${name}`;
      if (dimension.cardinality === 'single' && selection.values.length > 1) {
        return `Dimension ${name} takes a single value`;
      }
      const illegal = selection.values.find((v) => !isLegalValue(dimension, v));
      return illegal === undefined ? undefined : `${illegal} is not a value of dimension ${name}`;
    }
    case 'range': {
      const bounds = dimensionBounds(dimension);
      if (dimension.cardinality === 'single' || !bounds) {
        return `Dimension ${name} does not take a range`;
      }
      if (selection.min > selection.max) {
        return `Range minimum ${selection.min} is greater than its maximum ${selection.max}`;
      }
      if (!withinBounds(selection.min, bounds[0], bounds[1]) || !withinBounds(selection.max, bounds[0], bounds[1])) {
        return `Range ${selection.min}/${selection.max} is outside of ${bounds[0]}/${bounds[1]} for dimension ${name}`;
      }
      return undefined;
    }
    default:
      return `Unknown selection for dimension ${name}`;
  }
}

// query parameters written by the request serializer, which a dimension selection would clash with
export const standardQueryParameters: ReadonlySet<string> = new Set([
  'coords', 'within', 'within-units', 'bbox', 'z', 'datetime', 'parameter-name', 'crs', 'f',
  'corridor-width', 'width-units', 'corridor-height', 'height-units', 'resolution-x', 'resolution-y', 'resolution-z',
]);

/**
 * Rule 6: every dimension selection must name a declared dimension that is not a standard
 * query parameter and satisfy its cardinality.
 *
 * @throws DimensionValueInvalidError
 */
export function checkDimensions(capabilities: Capabilities, dimensions: Record<string, DimensionSelection>): void {
  for (const [name, selection] of Object.entries(dimensions)) {
    if (standardQueryParameters.has(name.toLowerCase())) {
      throw new DimensionValueInvalidError(
        `Dimension ${name} cannot be selected, ${name} is a standard query parameter`,
        `dimensions.${name}`,
      );
    }
    const dimension = capabilities.extent.custom.find((d) => d.id === name);
    const problem = dimensionProblem(dimension, name, selection);
    if (problem) {
      throw new DimensionValueInvalidError(problem, `dimensions.${name}`);
    }
  }
}

/**
 * Rule 7: every selected parameter must be a parameter of the collection.
 *
 * @throws UnknownParameterError
 */
export function checkParameters(capabilities: Capabilities, parameters: readonly string[]): void {
  const known = new Set(capabilities.parameters.map((p) => p.id));
  parameters.forEach((parameter, i) => {
    if (!known.has(parameter)) {
      throw new UnknownParameterError(`Collection ${capabilities.id} has no parameter ${parameter}`, `parameters[${i}]`);
    }
  });
}

export function advertisedOutputFormats(capabilities: Capabilities, capability?: QueryCapability): string[] {
  return capability?.outputFormats ?? capabilities.outputFormats;
}

export function advertisedOutputCrs(capabilities: Capabilities, capability?: QueryCapability): string[] {
  return capability?.crsDetails?.map((d) => d.crs) ?? capabilities.outputCrs;
}

/**
 * Rule 8 (format): the output format must be advertised by the query or the collection. When
 * none is given the query's default format, then the first advertised one, is used.
 *
 * @returns the output format, undefined if none is given or advertised
 * @throws UnsupportedOutputFormatError
 */
export function resolveOutputFormat(capabilities: Capabilities, capability: QueryCapability | undefined, format?: string): string | undefined {
  const advertised = advertisedOutputFormats(capabilities, capability);
  if (format === undefined) {
    return capability?.defaultOutputFormat ?? advertised[0];
  }
  if (advertised.length > 0 && !advertised.includes(format)) {
    throw new UnsupportedOutputFormatError(
      `Output format ${format} is not supported, use one of ${listToText(advertised)}`,
      'outputFormat',
    );
  }
  return format;
}

/**
 * Rule 8 (CRS): the output CRS must be advertised by the query or the collection. When none is
 * given the first advertised one is used.
 *
 * @returns the output CRS, undefined if none is given or advertised
 * @throws UnsupportedCrsError
 */
export function resolveOutputCrs(capabilities: Capabilities, capability: QueryCapability | undefined, crs?: string): string | undefined {
  const advertised = advertisedOutputCrs(capabilities, capability);
  if (crs === undefined) {
    return advertised[0];
  }
  if (advertised.length > 0 && !advertised.includes(crs)) {
    throw new UnsupportedCrsError(`Output CRS ${crs} is not supported, use one of ${listToText(advertised)}`, 'outputCrs');
  }
  return crs;
}
