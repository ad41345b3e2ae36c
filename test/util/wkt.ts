import { describe, it } from 'mocha';
import { expect } from 'chai';
import { MalformedWktError } from '../../app/util/errors';
import { ParameterParseError } from '../../app/util/parameter-parsing-helpers';
import {
  bboxToPolygonWkt, parseLineString, parseWktGeometry, pointToWkt, serializeLineString, validateWkt,
} from '../../app/util/wkt';

/**
 * Returns the MalformedWktError thrown when parsing the text
 */
function parseError(text: string): MalformedWktError {
  try {
    parseLineString(text);
  } catch (e) {
    if (e instanceof MalformedWktError) return e;
    throw e;
  }
  throw new Error(`Expected ${text} to be rejected`);
}

describe('util/wkt', function () {
  describe('#parseLineString', function () {
    it('parses a two dimensional line string', function () {
      expect(parseLineString('LINESTRING (0 0, 10 5, 20 10)')).to.eql({
        dimensionality: 'XY',
        coordinates: [[0, 0], [10, 5], [20, 10]],
      });
    });

    it('parses the Z, M and ZM tags', function () {
      expect(parseLineString('LINESTRING Z (1 2 3, 4 5 6)').dimensionality).to.equal('XYZ');
      expect(parseLineString('LINESTRING M (1 2 1704067200, 4 5 1704070800)').dimensionality).to.equal('XYM');
      expect(parseLineString('LINESTRING ZM (1 2 3 4, 5 6 7 8)').coordinates).to.eql([[1, 2, 3, 4], [5, 6, 7, 8]]);
    });

    it('accepts lower case keywords, exponents and extra whitespace', function () {
      expect(parseLineString('  linestring z( -1.5 2e1 .5 ,3 4 5 )  ')).to.eql({
        dimensionality: 'XYZ',
        coordinates: [[-1.5, 20, 0.5], [3, 4, 5]],
      });
    });

    it('accepts the modifier written without a space', function () {
      expect(parseLineString('LINESTRINGZ (1 2 3, 4 5 6)').dimensionality).to.equal('XYZ');
      expect(parseLineString('LINESTRINGM(1 2 3, 4 5 6)').dimensionality).to.equal('XYM');
      expect(parseLineString('linestringzm (1 2 3 4, 5 6 7 8)').dimensionality).to.equal('XYZM');
    });

    it('rejects an unknown modifier written without a space', function () {
      const error = parseError('LINESTRINGQ (1 2, 3 4)');
      expect(error.reason).to.equal('keyword');
      expect(error.position).to.equal(0);
    });

    it('round trips canonical text for every tag', function () {
      for (const text of ['LINESTRING (1 2, 3 4)', 'LINESTRING Z (1 2 3, 4 5 6)', 'LINESTRING M (1 2 3, 4 5 6)', 'LINESTRING ZM (1 2 3 4, 5 6 7 8)']) {
        const parsed = parseLineString(text);
        expect(serializeLineString(parsed.dimensionality, parsed.coordinates)).to.equal(text);
      }
    });

    it('rejects another geometry keyword', function () {
      const error = parseError('POINT (1 2)');
      expect(error.reason).to.equal('keyword');
      expect(error.position).to.equal(0);
    });

    it('rejects an unknown modifier', function () {
      const error = parseError('LINESTRING Q (1 2, 3 4)');
      expect(error.reason).to.equal('keyword');
      expect(error.position).to.equal(11);
    });

    it('rejects a missing opening parenthesis', function () {
      const error = parseError('LINESTRING 1 2, 3 4');
      expect(error.reason).to.equal('parentheses');
      expect(error.position).to.equal(11);
    });

    it('rejects a missing closing parenthesis', function () {
      const error = parseError('LINESTRING (1 2, 3 4');
      expect(error.reason).to.equal('parentheses');
      expect(error.position).to.equal(20);
    });

    it('rejects a token that is not a number', function () {
      const error = parseError('LINESTRING (1 2, 3 x)');
      expect(error.reason).to.equal('token');
      expect(error.position).to.equal(19);
    });

    it('rejects a coordinate that overflows to infinity', function () {
      const error = parseError('LINESTRING (1e400 0, 1 1)');
      expect(error.reason).to.equal('token');
      expect(error.position).to.equal(12);
      expect(error.message).to.equal("'1e400' is not a finite number (at position 12)");
    });

    it('rejects a vertex whose arity does not match the tag', function () {
      const error = parseError('LINESTRING Z (1 2 3, 4 5)');
      expect(error.reason).to.equal('arity');
      expect(error.position).to.equal(21);
      expect(error.message).to.equal('Vertex 2 has 2 coordinates but LINESTRING Z requires 3 (at position 21)');
    });

    it('rejects a line string with a single vertex', function () {
      const error = parseError('LINESTRING (1 2)');
      expect(error.reason).to.equal('vertices');
      expect(error.position).to.equal(16);
    });

    it('rejects LINESTRING EMPTY', function () {
      expect(parseError('LINESTRING EMPTY').reason).to.equal('vertices');
    });

    it('rejects text after the coordinate list', function () {
      const error = parseError('LINESTRING (1 2, 3 4) extra');
      expect(error.reason).to.equal('token');
      expect(error.position).to.equal(22);
    });
  });

  describe('#serializeLineString', function () {
    it('writes text that is not canonical in canonical form', function () {
      const parsed = parseLineString('linestring(1.0 2,3   4)');
      expect(serializeLineString(parsed.dimensionality, parsed.coordinates)).to.equal('LINESTRING (1 2, 3 4)');
    });

    it('rejects a vertex with the wrong arity', function () {
      expect(() => serializeLineString('XYM', [[1, 2, 3], [4, 5]])).to.throw(MalformedWktError, 'Vertex 2 must have 3 finite coordinates');
    });

    it('rejects fewer than two vertices', function () {
      expect(() => serializeLineString('XY', [[1, 2]])).to.throw(MalformedWktError, 'at least 2 vertices');
    });
  });

  describe('#parseWktGeometry', function () {
    it('parses a supported geometry into GeoJSON', function () {
      expect(parseWktGeometry('POLYGON((0 0, 1 0, 1 1, 0 0))', ['Polygon'])).to.eql({
        type: 'Polygon',
        coordinates: [[[0, 0], [1, 0], [1, 1], [0, 0]]],
      });
    });

    it('rejects an unsupported geometry type', function () {
      expect(() => parseWktGeometry('POINT(1 2)', ['Polygon'])).to.throw(ParameterParseError, 'Unsupported WKT type Point.');
    });

    it('rejects text that is not WKT', function () {
      expect(() => validateWkt('not wkt')).to.throw(ParameterParseError, 'Invalid WKT string: not wkt');
    });
  });

  describe('geometry helpers', function () {
    it('converts a bbox to a closed polygon', function () {
      expect(bboxToPolygonWkt([-10, 40, 30, 70])).to.equal('POLYGON((-10 40, 30 40, 30 70, -10 70, -10 40))');
    });

    it('writes a point', function () {
      expect(pointToWkt(7.5, -3)).to.equal('POINT(7.5 -3)');
    });
  });
});
