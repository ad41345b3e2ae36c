import type { QueryKind } from './collection';
import type { LineString } from '../util/wkt';

export type HttpMethod = 'GET' | 'POST';

export interface PositionGeometry {
  kind: 'position';
  point: [number, number];
}

export interface RadiusGeometry {
  kind: 'radius';
  point: [number, number];
  within: number;
  withinUnits: string;
}

export interface AreaGeometry {
  kind: 'area';
  // POLYGON or MULTIPOLYGON WKT, a bbox is converted to a POLYGON
  polygon: string;
}

export interface CubeGeometry {
  kind: 'cube';
  bbox: [number, number, number, number];
  zRange?: [number, number];
}

export interface CorridorGeometry {
  kind: 'corridor';
  lineString: LineString;
  width: number;
  widthUnits: string;
  height: number;
  heightUnits: string;
  resolutionX?: number;
  resolutionY?: number;
  resolutionZ?: number;
}

export interface TrajectoryGeometry {
  kind: 'trajectory';
  lineString: LineString;
}

export interface LocationsGeometry {
  kind: 'locations';
  locationId: string;
}

export interface ItemsGeometry {
  kind: 'items';
  itemId: string;
}

export type QueryGeometry =
  | PositionGeometry
  | RadiusGeometry
  | AreaGeometry
  | CubeGeometry
  | CorridorGeometry
  | TrajectoryGeometry
  | LocationsGeometry
  | ItemsGeometry;

/**
 * The geometry a user supplies for a query. Which fields are required, and which are
 * forbidden, depends on the query kind.
 */
export interface GeometryInput {
  point?: number[];
  within?: number;
  withinUnits?: string;
  polygon?: string;
  bbox?: string | number[];
  zRange?: number[];
  lineString?: string | LineString;
  width?: number;
  widthUnits?: string;
  height?: number;
  heightUnits?: string;
  resolutionX?: number;
  resolutionY?: number;
  resolutionZ?: number;
  locationId?: string;
  itemId?: string;
  // identifiers offered by the service for locations and items queries
  availableIds?: string[];
}

export type TemporalSelection =
  | { type: 'instant'; value: string }
  | { type: 'interval'; from: string | null; to: string | null };

export interface VerticalSelection {
  levels: string[];
  // send the levels as `z=min/max` instead of a list
  asRange?: boolean;
}

export type DimensionSelection =
  | { kind: 'single'; value: string }
  | { kind: 'multiple'; values: string[] }
  | { kind: 'range'; min: number; max: number };

export interface QueryInputs {
  geometry?: GeometryInput;
  temporal?: TemporalSelection;
  vertical?: VerticalSelection;
  dimensions?: Record<string, DimensionSelection>;
  parameters?: string[];
  outputFormat?: string;
  outputCrs?: string;
  method?: HttpMethod;
}

// Extents taken from the geometry (z or m ordinates, or a cube's z range) instead of selectors
export interface DerivedExtents {
  vertical: boolean;
  temporal: boolean;
}

export interface QueryDescriptor {
  kind: QueryKind;
  collectionId: string;
  instanceId?: string;
  geometry: QueryGeometry;
  temporal?: TemporalSelection;
  vertical?: VerticalSelection;
  dimensions: Record<string, DimensionSelection>;
  // empty means all parameters
  parameters: string[];
  outputFormat?: string;
  outputCrs?: string;
  method: HttpMethod;
  derivedExtents: DerivedExtents;
}
