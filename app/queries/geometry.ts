import type { QueryCapability, QueryKind } from '../models/collection';
import type {
  CorridorGeometry, CubeGeometry, DerivedExtents, GeometryInput, QueryGeometry,
} from '../models/query-descriptor';
import { GeometryKindMismatchError, MalformedWktError } from '../util/errors';
import { ParameterParseError, parseBbox } from '../util/parameter-parsing-helpers';
import { listToText } from '../util/string';
import {
  type LineString, bboxToPolygonWkt, parseLineString, parseWktGeometry, pointToWkt, serializeLineString,
} from '../util/wkt';

type GeometryField = keyof GeometryInput;

const allowedFields: Record<QueryKind, GeometryField[]> = {
  position: ['point'],
  radius: ['point', 'within', 'withinUnits'],
  area: ['polygon', 'bbox'],
  cube: ['bbox', 'zRange'],
  corridor: ['lineString', 'width', 'widthUnits', 'height', 'heightUnits', 'resolutionX', 'resolutionY', 'resolutionZ'],
  trajectory: ['lineString'],
  locations: ['locationId', 'availableIds'],
  items: ['itemId', 'availableIds'],
};

function mismatch(kind: QueryKind, field: string, message: string): GeometryKindMismatchError {
  return new GeometryKindMismatchError(`${kind} query ${message}`, `geometry.${field}`);
}

function requirePoint(kind: QueryKind, input: GeometryInput): [number, number] {
  const { point } = input;
  if (!point || point.length !== 2 || !point.every(Number.isFinite)) {
    throw mismatch(kind, 'point', 'requires exactly one point with x and y');
  }
  return [point[0], point[1]];
}

function requirePositive(kind: QueryKind, input: GeometryInput, field: 'within' | 'width' | 'height'): number {
  const value = input[field];
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    throw mismatch(kind, field, `requires a positive ${field}`);
  }
  return value;
}

function requireUnits(
  kind: QueryKind,
  input: GeometryInput,
  field: 'withinUnits' | 'widthUnits' | 'heightUnits',
  advertised: string[] | undefined,
): string {
  const value = input[field];
  if (!value) {
    throw mismatch(kind, field, `requires ${field}`);
  }
  if (advertised && advertised.length > 0 && !advertised.includes(value)) {
    throw mismatch(kind, field, `${field} must be one of ${listToText(advertised)}`);
  }
  return value;
}

function optionalResolution(kind: QueryKind, input: GeometryInput, field: 'resolutionX' | 'resolutionY' | 'resolutionZ'): number | undefined {
  const value = input[field];
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw mismatch(kind, field, `${field} must be a positive integer`);
  }
  return value;
}

function requireLineString(kind: QueryKind, input: GeometryInput): LineString {
  const { lineString } = input;
  if (lineString === undefined) {
    throw mismatch(kind, 'lineString', 'requires a line string');
  }
  try {
    // parsed line strings are re-read so that they satisfy the same rules as WKT input
    const text = typeof lineString === 'string'
      ? lineString
      : serializeLineString(lineString.dimensionality, lineString.coordinates);
    return parseLineString(text);
  } catch (e) {
    if (e instanceof MalformedWktError) {
      throw mismatch(kind, 'lineString', `requires a valid line string: ${e.message}`);
    }
    throw e;
  }
}

function requireBbox(kind: QueryKind, input: GeometryInput): number[] {
  if (input.bbox === undefined) {
    throw mismatch(kind, 'bbox', 'requires a bbox');
  }
  try {
    return parseBbox(input.bbox);
  } catch (e) {
    if (e instanceof ParameterParseError) {
      throw mismatch(kind, 'bbox', e.message);
    }
    throw e;
  }
}

function requireIdentifier(kind: QueryKind, input: GeometryInput, field: 'locationId' | 'itemId'): string {
  const value = input[field];
  if (!value || value.trim() === '') {
    throw mismatch(kind, field, `requires a non-empty ${field}`);
  }
  if (input.availableIds && !input.availableIds.includes(value)) {
    throw mismatch(kind, field, `${field} '${value}' is not offered by the service`);
  }
  return value;
}

/**
 * Checks that the geometry the user supplied is exactly the shape the query kind takes and
 * converts it to the descriptor geometry.
 *
 * @param kind - the query kind
 * @param input - the user supplied geometry
 * @param capability - the query capability, for advertised units
 * @returns the geometry payload
 * @throws GeometryKindMismatchError - if a required field is missing or invalid, or a field
 * the kind does not take is present
 */
export function buildGeometry(kind: QueryKind, input: GeometryInput = {}, capability?: QueryCapability): QueryGeometry {
  const allowed: readonly string[] = allowedFields[kind];
  for (const [field, value] of Object.entries(input)) {
    if (value !== undefined && !allowed.includes(field)) {
      throw mismatch(kind, field, `does not take ${field}`);
    }
  }

  switch (kind) {
    case 'position':
      return { kind, point: requirePoint(kind, input) };
    case 'radius':
      return {
        kind,
        point: requirePoint(kind, input),
        within: requirePositive(kind, input, 'within'),
        withinUnits: requireUnits(kind, input, 'withinUnits', capability?.withinUnits),
      };
    case 'area': {
      if ((input.polygon === undefined) === (input.bbox === undefined)) {
        throw mismatch(kind, 'polygon', 'requires either a polygon or a bbox');
      }
      if (input.polygon !== undefined) {
        try {
          parseWktGeometry(input.polygon, ['Polygon', 'MultiPolygon']);
        } catch (e) {
          if (e instanceof ParameterParseError) {
            throw mismatch(kind, 'polygon', e.message);
          }
          throw e;
        }
        return { kind, polygon: input.polygon };
      }
      return { kind, polygon: bboxToPolygonWkt(requireBbox(kind, input)) };
    }
    case 'cube': {
      const bbox = requireBbox(kind, input);
      if (bbox.length !== 4) {
        throw mismatch(kind, 'bbox', 'requires a two dimensional bbox, give heights as zRange');
      }
      const geometry: CubeGeometry = { kind, bbox: [bbox[0], bbox[1], bbox[2], bbox[3]] };
      const { zRange } = input;
      if (zRange !== undefined) {
        if (zRange.length !== 2 || !zRange.every(Number.isFinite) || zRange[0] > zRange[1]) {
          throw mismatch(kind, 'zRange', 'zRange must be a minimum and a maximum height');
        }
        geometry.zRange = [zRange[0], zRange[1]];
      }
      return geometry;
    }
    case 'corridor': {
      const geometry: CorridorGeometry = {
        kind,
        lineString: requireLineString(kind, input),
        width: requirePositive(kind, input, 'width'),
        widthUnits: requireUnits(kind, input, 'widthUnits', capability?.widthUnits),
        height: requirePositive(kind, input, 'height'),
        heightUnits: requireUnits(kind, input, 'heightUnits', capability?.heightUnits),
      };
      const resolutionX = optionalResolution(kind, input, 'resolutionX');
      if (resolutionX !== undefined) geometry.resolutionX = resolutionX;
      const resolutionY = optionalResolution(kind, input, 'resolutionY');
      if (resolutionY !== undefined) geometry.resolutionY = resolutionY;
      const resolutionZ = optionalResolution(kind, input, 'resolutionZ');
      if (resolutionZ !== undefined) geometry.resolutionZ = resolutionZ;
      return geometry;
    }
    case 'trajectory':
      return { kind, lineString: requireLineString(kind, input) };
    case 'locations':
      return { kind, locationId: requireIdentifier(kind, input, 'locationId') };
    case 'items':
      return { kind, itemId: requireIdentifier(kind, input, 'itemId') };
    default: {
      const unknownKind: never = kind;
      throw new GeometryKindMismatchError(`Unknown query kind ${String(unknownKind)}`, 'kind');
    }
  }
}

/**
 * Returns which extents are taken from the geometry. A line string with z ordinates fixes the
 * vertical extent and one with m ordinates the temporal extent; a cube's z range fixes the
 * vertical extent.
 *
 * @param geometry - the descriptor geometry
 * @returns the derived extents
 */
export function deriveExtents(geometry: QueryGeometry): DerivedExtents {
  switch (geometry.kind) {
    case 'corridor':
    case 'trajectory': {
      const { dimensionality } = geometry.lineString;
      return {
        vertical: dimensionality === 'XYZ' || dimensionality === 'XYZM',
        temporal: dimensionality === 'XYM' || dimensionality === 'XYZM',
      };
    }
    case 'cube':
      return { vertical: geometry.zRange !== undefined, temporal: false };
    default:
      return { vertical: false, temporal: false };
  }
}

/**
 * Returns which extent selectors a user may set for the geometry
 *
 * @param geometry - the descriptor geometry
 * @returns true for each selector that is enabled
 */
export function extentSelectors(geometry: QueryGeometry): DerivedExtents {
  const derived = deriveExtents(geometry);
  return { vertical: !derived.vertical, temporal: !derived.temporal };
}

/**
 * Returns the value of the `coords` query parameter for the geometry, if the kind takes one
 *
 * @param geometry - the descriptor geometry
 * @returns the WKT, or undefined for cube, locations and items queries
 */
export function geometryCoords(geometry: QueryGeometry): string | undefined {
  switch (geometry.kind) {
    case 'position':
    case 'radius':
      return pointToWkt(geometry.point[0], geometry.point[1]);
    case 'area':
      return geometry.polygon;
    case 'corridor':
    case 'trajectory':
      return serializeLineString(geometry.lineString.dimensionality, geometry.lineString.coordinates);
    default:
      return undefined;
  }
}
