import type { Parameter } from './collection';
import type { DecodeError } from '../util/errors';

export const domainTypes = [
  'Point', 'PointSeries', 'VerticalProfile', 'MultiPoint', 'Grid', 'Trajectory', 'Polygon', 'MultiPolygon',
] as const;
export type DomainType = typeof domainTypes[number];

/**
 * Returns true if the string is one of the domain types the decoder supports
 * @param value - the value to check
 */
export function isDomainType(value: string): value is DomainType {
  const types: readonly string[] = domainTypes;
  return types.includes(value);
}

export type AxisValue = number | string;

// An axis of single values, either listed or synthesized from start, stop and num
export interface PrimitiveAxis {
  kind: 'primitive';
  name: string;
  values: AxisValue[];
  regular: boolean;
}

// An axis whose values are coordinate tuples, e.g. `['t', 'x', 'y']` along a trajectory
export interface TupleAxis {
  kind: 'tuple';
  name: string;
  coordinates: string[];
  values: AxisValue[][];
}

// An axis whose values are polygons given as rings of positions
export interface PolygonAxis {
  kind: 'polygon';
  name: string;
  coordinates: string[];
  values: number[][][][];
}

export type Axis = PrimitiveAxis | TupleAxis | PolygonAxis;

export interface ReferenceSystem {
  type: string;
  id?: string;
  wkt?: string;
}

export interface ReferenceSystemBinding {
  coordinates: string[];
  system: ReferenceSystem;
}

export type RangeDataType = 'float' | 'integer' | 'string';

// null marks a value with no data
export type RangeValue = number | string | null;

export interface Range {
  parameter: string;
  dataType: RangeDataType;
  axisNames: string[];
  shape: number[];
  values: RangeValue[];
}

export interface Coverage {
  type: 'Coverage';
  id?: string;
  domainType: DomainType;
  axes: Axis[];
  referencing: ReferenceSystemBinding[];
  // the horizontal CRS, e.g. `EPSG:4326`, or WKT when the service gives one
  crs: string;
  parameters: Record<string, Parameter>;
  ranges: Record<string, Range>;
  // data type inconsistencies that did not stop decoding
  warnings: string[];
}

export interface CoverageMemberError {
  index: number;
  error: DecodeError;
}

export interface CoverageCollection {
  type: 'CoverageCollection';
  domainType?: DomainType;
  parameters: Record<string, Parameter>;
  coverages: Coverage[];
  errors: CoverageMemberError[];
}
