import wellknown from 'wellknown';
import type { Geometry } from 'geojson';
import { MalformedWktError } from './errors';
import { ParameterParseError } from './parameter-parsing-helpers';

export type LineStringDimensionality = 'XY' | 'XYZ' | 'XYM' | 'XYZM';

export interface LineString {
  dimensionality: LineStringDimensionality;
  coordinates: number[][];
}

export const arityByDimensionality: Record<LineStringDimensionality, number> = {
  XY: 2,
  XYZ: 3,
  XYM: 3,
  XYZM: 4,
};

const modifierByDimensionality: Record<LineStringDimensionality, string> = {
  XY: '',
  XYZ: ' Z',
  XYM: ' M',
  XYZM: ' ZM',
};

const dimensionalityByModifier: Record<string, LineStringDimensionality> = {
  Z: 'XYZ',
  M: 'XYM',
  ZM: 'XYZM',
};

const numberRegex = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const delimiters = new Set([',', '(', ')']);

/**
 * Cursor over LINESTRING text that remembers the offset of every token so that errors
 * can point at the exact place parsing stopped
 */
class LineStringReader {
  pos = 0;

  constructor(private readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  skipWhitespace(): void {
    while (!this.done && /\s/.test(this.peek())) this.pos += 1;
  }

  readWord(): string {
    const start = this.pos;
    while (!this.done && /[A-Za-z]/.test(this.peek())) this.pos += 1;
    return this.text.slice(start, this.pos);
  }

  readToken(): string {
    const start = this.pos;
    while (!this.done && !/\s/.test(this.peek()) && !delimiters.has(this.peek())) this.pos += 1;
    return this.text.slice(start, this.pos);
  }
}

/**
 * Reads the dimensionality modifier (Z, M or ZM) following the LINESTRING keyword, if any
 *
 * @param reader - reader positioned after the keyword
 * @returns the dimensionality of the line string
 * @throws MalformedWktError - if the modifier is not recognized
 */
function readDimensionality(reader: LineStringReader): LineStringDimensionality {
  reader.skipWhitespace();
  if (!/[A-Za-z]/.test(reader.peek())) {
    return 'XY';
  }
  const start = reader.pos;
  const modifier = reader.readWord().toUpperCase();
  if (modifier === 'EMPTY') {
    throw new MalformedWktError('vertices', 'LINESTRING EMPTY has no vertices, at least 2 are required', start);
  }
  const dimensionality = dimensionalityByModifier[modifier];
  if (!dimensionality) {
    throw new MalformedWktError('keyword', `Unknown LINESTRING modifier '${modifier}', expected Z, M or ZM`, start);
  }
  return dimensionality;
}

/**
 * Reads one vertex, i.e. whitespace separated numbers up to the next ',' or ')'
 *
 * @param reader - reader positioned at the start of the vertex
 * @returns the coordinates of the vertex
 * @throws MalformedWktError - if a token is not a finite number
 */
function readVertex(reader: LineStringReader): number[] {
  const values: number[] = [];
  for (;;) {
    reader.skipWhitespace();
    if (reader.done || reader.peek() === ',' || reader.peek() === ')') {
      return values;
    }
    if (reader.peek() === '(') {
      throw new MalformedWktError('parentheses', "Unexpected '(' inside the coordinate list", reader.pos);
    }
    const start = reader.pos;
    const token = reader.readToken();
    const value = Number(token);
    if (!numberRegex.test(token)) {
      throw new MalformedWktError('token', `'${token}' is not a number`, start);
    }
    if (!Number.isFinite(value)) {
      throw new MalformedWktError('token', `'${token}' is not a finite number`, start);
    }
    values.push(value);
  }
}

/**
 * Parses a WKT LINESTRING, LINESTRING Z, LINESTRING M or LINESTRING ZM. Keywords are
 * case-insensitive, the modifier may be written without a space (`LINESTRINGZ`) and every
 * vertex must carry exactly the number of coordinates its tag implies.
 *
 * @param text - the WKT text
 * @returns the dimensionality tag and the ordered vertices
 * @throws MalformedWktError - naming the structural problem and its position
 */
export function parseLineString(text: string): LineString {
  const reader = new LineStringReader(text);
  reader.skipWhitespace();
  const keywordStart = reader.pos;
  const keyword = reader.readWord();
  const upper = keyword.toUpperCase();
  // compact form of the modifier, e.g. LINESTRINGZ
  const compactModifier = upper.startsWith('LINESTRING') ? upper.slice('LINESTRING'.length) : undefined;
  if (compactModifier === undefined || (compactModifier && !dimensionalityByModifier[compactModifier])) {
    throw new MalformedWktError('keyword', `Expected LINESTRING but found '${keyword || reader.peek()}'`, keywordStart);
  }
  const dimensionality = compactModifier ? dimensionalityByModifier[compactModifier] : readDimensionality(reader);
  const arity = arityByDimensionality[dimensionality];
  const tag = `LINESTRING${modifierByDimensionality[dimensionality]}`;

  reader.skipWhitespace();
  if (reader.peek() !== '(') {
    throw new MalformedWktError('parentheses', `Expected '(' after ${tag}`, reader.pos);
  }
  reader.pos += 1;

  const coordinates: number[][] = [];
  for (;;) {
    reader.skipWhitespace();
    const vertexStart = reader.pos;
    const vertex = readVertex(reader);
    if (vertex.length !== arity) {
      throw new MalformedWktError(
        'arity',
        `Vertex ${coordinates.length + 1} has ${vertex.length} coordinates but ${tag} requires ${arity}`,
        vertexStart,
      );
    }
    coordinates.push(vertex);
    if (reader.peek() === ',') {
      reader.pos += 1;
    } else if (reader.peek() === ')') {
      reader.pos += 1;
      break;
    } else {
      throw new MalformedWktError('parentheses', "Missing closing ')'", reader.pos);
    }
  }

  reader.skipWhitespace();
  if (!reader.done) {
    const reason = reader.peek() === ')' || reader.peek() === '(' ? 'parentheses' : 'token';
    throw new MalformedWktError(reason, `Unexpected '${reader.peek()}' after the coordinate list`, reader.pos);
  }
  if (coordinates.length < 2) {
    throw new MalformedWktError('vertices', `${tag} has ${coordinates.length} vertex, at least 2 are required`, text.length);
  }
  return { dimensionality, coordinates };
}

/**
 * Writes a line string in canonical form, e.g. `LINESTRING Z (1 2 3, 4 5 6)`: upper case
 * keyword, one space before the modifier and the '(', vertices separated by ', ' and numbers as
 * `String` writes them. `serializeLineString` after `parseLineString` gives back the input only
 * when the input is canonical; `linestring(1.0 2,3 4)` parses but is written
 * `LINESTRING (1 2, 3 4)`.
 *
 * @param dimensionality - the dimensionality tag
 * @param coordinates - the vertices, each with the arity the tag implies
 * @returns the WKT text
 * @throws MalformedWktError - if a vertex has the wrong arity or there are fewer than 2
 */
export function serializeLineString(
  dimensionality: LineStringDimensionality,
  coordinates: ReadonlyArray<ReadonlyArray<number>>,
): string {
  const arity = arityByDimensionality[dimensionality];
  let text = `LINESTRING${modifierByDimensionality[dimensionality]} (`;
  coordinates.forEach((vertex, i) => {
    if (vertex.length !== arity || !vertex.every(Number.isFinite)) {
      throw new MalformedWktError('arity', `Vertex ${i + 1} must have ${arity} finite coordinates`, text.length);
    }
    text += `${i > 0 ? ', ' : ''}${vertex.map(String).join(' ')}`;
  });
  if (coordinates.length < 2) {
    throw new MalformedWktError('vertices', 'A line string requires at least 2 vertices', text.length);
  }
  return `${text})`;
}

/**
 * Parses any WKT geometry into GeoJSON using wellknown and checks its type.
 *
 * @param wkt - The WKT string
 * @param supportedTypes - GeoJSON geometry types accepted
 * @returns GeoJSON geometry representation of the WKT string
 * @throws ParameterParseError if it cannot be parsed or the type is not supported
 */
export function parseWktGeometry(wkt: string, supportedTypes: readonly Geometry['type'][]): Geometry {
  const geometry = wellknown.parse(wkt);
  if (!geometry) {
    throw new ParameterParseError(`Unable to parse WKT string ${wkt}.`);
  }
  if (!supportedTypes.includes(geometry.type)) {
    throw new ParameterParseError(`Unsupported WKT type ${geometry.type}.`);
  }
  return geometry;
}

/**
 * Validate a WKT string, throwing if wellknown cannot parse it.
 *
 * @param wkt - The WKT string to be validated.
 * @throws ParameterParseError if the WKT string is invalid.
 */
export function validateWkt(wkt: string): void {
  if (!wellknown.parse(wkt)) {
    throw new ParameterParseError(`Invalid WKT string: ${wkt}`);
  }
}

/**
 * Converts a west, south, east, north bounding box to a closed polygon ring. The heights of a
 * six number bbox are dropped.
 *
 * @param bbox - the bounding box
 * @returns WKT of the form `POLYGON((w s, e s, e n, w n, w s))`
 */
export function bboxToPolygonWkt(bbox: readonly number[]): string {
  const half = bbox.length / 2;
  const [west, south] = bbox;
  const [east, north] = bbox.slice(half);
  const ring = [[west, south], [east, south], [east, north], [west, north], [west, south]];
  return `POLYGON((${ring.map((p) => p.join(' ')).join(', ')}))`;
}

export function pointToWkt(x: number, y: number): string {
  return `POINT(${x} ${y})`;
}
