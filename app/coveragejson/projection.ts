import { unitLabel } from '../models/collection';
import type {
  AxisValue, Coverage, PolygonAxis, PrimitiveAxis, RangeValue, TupleAxis,
} from '../models/coverage';
import { DecodeError } from '../util/errors';
import { findCompositeAxis, findPrimitiveAxis } from './axes';
import { valueAt } from './ranges';

export type ParameterValues = Record<string, RangeValue>;

export interface PointProjection {
  domainType: 'Point';
  crs: string;
  // x, y and z when the domain has one
  position: number[];
  time?: AxisValue;
  values: ParameterValues;
}

export interface SeriesProjection {
  domainType: 'PointSeries' | 'VerticalProfile';
  crs: string;
  position: number[];
  // t for a PointSeries, z for a VerticalProfile
  axis: 't' | 'z';
  steps: AxisValue[];
  // per parameter, one (step, value) pair per step
  series: Record<string, [AxisValue, RangeValue][]>;
}

export interface PointFeature {
  position: number[];
  values: ParameterValues;
}

export interface MultiPointProjection {
  domainType: 'MultiPoint';
  crs: string;
  time?: AxisValue;
  points: PointFeature[];
}

export interface TrajectoryProjection {
  domainType: 'Trajectory';
  crs: string;
  // x, y and z when the trajectory has heights
  positions: number[][];
  times?: AxisValue[];
  // per parameter, one value per position
  values: Record<string, RangeValue[]>;
}

export interface PolygonFeature {
  polygon: number[][][];
  values: ParameterValues;
}

export interface PolygonProjection {
  domainType: 'Polygon' | 'MultiPolygon';
  crs: string;
  time?: AxisValue;
  polygons: PolygonFeature[];
}

export interface GridBand {
  parameter: string;
  // e.g. `t_2024-01-01T00:00:00Z_z_850`, empty when the range only spans x and y
  label: string;
  // name for a raster layer, e.g. `temperature-[K]_t_2024-01-01T00:00:00Z`
  name: string;
  // the value of every other axis this band is taken at
  coordinates: Record<string, AxisValue>;
  // values[yIndex][xIndex]
  values: RangeValue[][];
}

export interface GridProjection {
  domainType: 'Grid';
  crs: string;
  x: AxisValue[];
  y: AxisValue[];
  bands: GridBand[];
}

export type Projection =
  | PointProjection
  | SeriesProjection
  | MultiPointProjection
  | TrajectoryProjection
  | PolygonProjection
  | GridProjection;

function requirePrimitive(coverage: Coverage, name: string): PrimitiveAxis {
  const axis = findPrimitiveAxis(coverage.axes, name);
  if (!axis) {
    throw new DecodeError('UnsupportedDomainAxisCombination', `${coverage.domainType} domain requires a ${name} axis`);
  }
  return axis;
}

function numeric(value: AxisValue | undefined, name: string): number {
  if (typeof value !== 'number') {
    throw new DecodeError('MalformedCoverage', `Coordinate ${name} must be a number, found ${String(value)}`);
  }
  return value;
}

function singlePosition(coverage: Coverage): number[] {
  const position = [
    numeric(requirePrimitive(coverage, 'x').values[0], 'x'),
    numeric(requirePrimitive(coverage, 'y').values[0], 'y'),
  ];
  const z = findPrimitiveAxis(coverage.axes, 'z');
  if (z && z.values.length === 1) position.push(numeric(z.values[0], 'z'));
  return position;
}

function singleTime(coverage: Coverage): AxisValue | undefined {
  return findPrimitiveAxis(coverage.axes, 't')?.values[0];
}

function valuesAt(coverage: Coverage, indices: Readonly<Record<string, number>>): ParameterValues {
  const values: ParameterValues = {};
  for (const [name, range] of Object.entries(coverage.ranges)) {
    values[name] = valueAt(range, indices);
  }
  return values;
}

function requireTupleAxis(coverage: Coverage): TupleAxis {
  const axis = findCompositeAxis(coverage.axes);
  if (axis?.kind !== 'tuple') {
    throw new DecodeError('UnsupportedDomainAxisCombination', `${coverage.domainType} domain requires a tuple composite axis`);
  }
  return axis;
}

function requirePolygonAxis(coverage: Coverage): PolygonAxis {
  const axis = findCompositeAxis(coverage.axes);
  if (axis?.kind !== 'polygon') {
    throw new DecodeError('UnsupportedDomainAxisCombination', `${coverage.domainType} domain requires a polygon composite axis`);
  }
  return axis;
}

/**
 * Returns the x, y (and z) of each tuple of a composite axis, and the times when the tuples
 * carry a t coordinate
 */
function tuplePositions(axis: TupleAxis, fixedZ?: AxisValue): { positions: number[][], times?: AxisValue[] } {
  const xi = axis.coordinates.indexOf('x');
  const yi = axis.coordinates.indexOf('y');
  const zi = axis.coordinates.indexOf('z');
  const ti = axis.coordinates.indexOf('t');
  const positions = axis.values.map((tuple) => {
    const position = [numeric(tuple[xi], 'x'), numeric(tuple[yi], 'y')];
    if (zi >= 0) position.push(numeric(tuple[zi], 'z'));
    else if (fixedZ !== undefined) position.push(numeric(fixedZ, 'z'));
    return position;
  });
  return ti >= 0 ? { positions, times: axis.values.map((tuple) => tuple[ti]) } : { positions };
}

function projectPoint(coverage: Coverage): PointProjection {
  const projection: PointProjection = {
    domainType: 'Point',
    crs: coverage.crs,
    position: singlePosition(coverage),
    values: valuesAt(coverage, {}),
  };
  const time = singleTime(coverage);
  if (time !== undefined) projection.time = time;
  return projection;
}

function projectSeries(coverage: Coverage, domainType: 'PointSeries' | 'VerticalProfile'): SeriesProjection {
  const axisName = domainType === 'PointSeries' ? 't' : 'z';
  const steps = requirePrimitive(coverage, axisName).values;
  const position = [
    numeric(requirePrimitive(coverage, 'x').values[0], 'x'),
    numeric(requirePrimitive(coverage, 'y').values[0], 'y'),
  ];
  if (axisName === 't') {
    const z = findPrimitiveAxis(coverage.axes, 'z');
    if (z) position.push(numeric(z.values[0], 'z'));
  }
  const series: Record<string, [AxisValue, RangeValue][]> = {};
  for (const [name, range] of Object.entries(coverage.ranges)) {
    series[name] = steps.map((step, i): [AxisValue, RangeValue] => [step, valueAt(range, { [axisName]: i })]);
  }
  return {
    domainType, crs: coverage.crs, position, axis: axisName, steps, series,
  };
}

function projectMultiPoint(coverage: Coverage): MultiPointProjection {
  const composite = requireTupleAxis(coverage);
  const { positions } = tuplePositions(composite);
  const projection: MultiPointProjection = {
    domainType: 'MultiPoint',
    crs: coverage.crs,
    points: positions.map((position, i) => ({ position, values: valuesAt(coverage, { [composite.name]: i }) })),
  };
  const time = singleTime(coverage);
  if (time !== undefined) projection.time = time;
  return projection;
}

function projectTrajectory(coverage: Coverage): TrajectoryProjection {
  const composite = requireTupleAxis(coverage);
  const fixedZ = findPrimitiveAxis(coverage.axes, 'z')?.values[0];
  const { positions, times } = tuplePositions(composite, fixedZ);
  const values: Record<string, RangeValue[]> = {};
  for (const [name, range] of Object.entries(coverage.ranges)) {
    values[name] = positions.map((_position, i) => valueAt(range, { [composite.name]: i }));
  }
  const projection: TrajectoryProjection = {
    domainType: 'Trajectory', crs: coverage.crs, positions, values,
  };
  if (times) projection.times = times;
  return projection;
}

function projectPolygons(coverage: Coverage, domainType: 'Polygon' | 'MultiPolygon'): PolygonProjection {
  const composite = requirePolygonAxis(coverage);
  const xi = composite.coordinates.indexOf('x');
  const yi = composite.coordinates.indexOf('y');
  const projection: PolygonProjection = {
    domainType,
    crs: coverage.crs,
    polygons: composite.values.map((polygon, i) => ({
      polygon: polygon.map((ring) => ring.map((position) => [position[xi], position[yi]])),
      values: valuesAt(coverage, { [composite.name]: i }),
    })),
  };
  const time = singleTime(coverage);
  if (time !== undefined) projection.time = time;
  return projection;
}

/**
 * Returns every combination of indices of the given axes, the last axis varying fastest
 */
function indexCombinations(sizes: readonly number[]): number[][] {
  let combinations: number[][] = [[]];
  for (const size of sizes) {
    const next: number[][] = [];
    for (const combination of combinations) {
      for (let i = 0; i < size; i++) next.push([...combination, i]);
    }
    combinations = next;
  }
  return combinations;
}

function bandName(coverage: Coverage, parameter: string, label: string): string {
  const unit = unitLabel(coverage.parameters[parameter]);
  const start = unit ? `${parameter}-[${unit}]` : parameter;
  return label ? `${start}_${label}` : start;
}

/**
 * Splits every range of a grid into 2D bands, one per combination of values of the range's
 * other axes (t, z or custom ones). The bands follow the axis order the range declares.
 */
function projectGrid(coverage: Coverage): GridProjection {
  const x = requirePrimitive(coverage, 'x');
  const y = requirePrimitive(coverage, 'y');
  const bands: GridBand[] = [];
  for (const [parameter, range] of Object.entries(coverage.ranges)) {
    const otherAxes = range.axisNames
      .filter((name) => name !== 'x' && name !== 'y')
      .map((name) => requirePrimitive(coverage, name));
    for (const combination of indexCombinations(otherAxes.map((a) => a.values.length))) {
      const indices: Record<string, number> = {};
      const coordinates: Record<string, AxisValue> = {};
      otherAxes.forEach((axis, i) => {
        indices[axis.name] = combination[i];
        coordinates[axis.name] = axis.values[combination[i]];
      });
      const label = otherAxes.map((axis) => `${axis.name}_${coordinates[axis.name]}`).join('_');
      const values = y.values.map((_yValue, yi) => x.values.map((_xValue, xi) => valueAt(range, { ...indices, x: xi, y: yi })));
      bands.push({
        parameter, label, name: bandName(coverage, parameter, label), coordinates, values,
      });
    }
  }
  return {
    domainType: 'Grid', crs: coverage.crs, x: x.values, y: y.values, bands,
  };
}

/**
 * Projects a coverage into geometries with attached values, dispatching on its domain type.
 *
 * @param coverage - the decoded coverage
 * @returns the projection for the domain type
 * @throws DecodeError - if the axes do not fit the domain type
 */
export function project(coverage: Coverage): Projection {
  switch (coverage.domainType) {
    case 'Point':
      return projectPoint(coverage);
    case 'PointSeries':
    case 'VerticalProfile':
      return projectSeries(coverage, coverage.domainType);
    case 'MultiPoint':
      return projectMultiPoint(coverage);
    case 'Trajectory':
      return projectTrajectory(coverage);
    case 'Polygon':
    case 'MultiPolygon':
      return projectPolygons(coverage, coverage.domainType);
    case 'Grid':
      return projectGrid(coverage);
    default: {
      const unknownType: never = coverage.domainType;
      throw new DecodeError('UnsupportedDomainType', `Domain type ${String(unknownType)} is not supported`);
    }
  }
}
