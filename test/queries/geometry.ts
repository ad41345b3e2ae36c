import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  buildGeometry, deriveExtents, extentSelectors, geometryCoords,
} from '../../app/queries/geometry';
import { GeometryKindMismatchError } from '../../app/util/errors';
import { loadCollection } from '../helpers/resources';

describe('queries/geometry', function () {
  const metar = loadCollection('metar');

  describe('#buildGeometry', function () {
    describe('for position queries', function () {
      it('takes a single point', function () {
        expect(buildGeometry('position', { point: [10, 50] })).to.eql({ kind: 'position', point: [10, 50] });
      });

      it('rejects points without exactly two coordinates', function () {
        expect(() => buildGeometry('position', { point: [10] }))
          .to.throw(GeometryKindMismatchError, 'position query requires exactly one point with x and y');
      });

      it('rejects fields the kind does not take', function () {
        expect(() => buildGeometry('position', { point: [10, 50], within: 5 }))
          .to.throw(GeometryKindMismatchError, 'position query does not take within')
          .with.property('field', 'geometry.within');
      });
    });

    describe('for radius queries', function () {
      it('takes a point, a distance and its units', function () {
        expect(buildGeometry('radius', { point: [1, 2], within: 5, withinUnits: 'km' }, metar.queries.radius))
          .to.eql({ kind: 'radius', point: [1, 2], within: 5, withinUnits: 'km' });
      });

      it('rejects units the query does not advertise', function () {
        expect(() => buildGeometry('radius', { point: [1, 2], within: 5, withinUnits: 'nm' }, metar.queries.radius))
          .to.throw(GeometryKindMismatchError, 'radius query withinUnits must be one of km and mi');
      });

      it('rejects distances that are not positive', function () {
        expect(() => buildGeometry('radius', { point: [1, 2], within: 0, withinUnits: 'km' }))
          .to.throw(GeometryKindMismatchError, 'radius query requires a positive within');
      });
    });

    describe('for area queries', function () {
      it('converts a bbox to a polygon', function () {
        expect(buildGeometry('area', { bbox: '0,0,10,10' }))
          .to.eql({ kind: 'area', polygon: 'POLYGON((0 0, 10 0, 10 10, 0 10, 0 0))' });
      });

      it('drops the heights of a six number bbox', function () {
        expect(buildGeometry('area', { bbox: [0, 0, 100, 10, 10, 500] }))
          .to.eql({ kind: 'area', polygon: 'POLYGON((0 0, 10 0, 10 10, 0 10, 0 0))' });
      });

      it('keeps polygon WKT as it is', function () {
        const polygon = 'MULTIPOLYGON(((0 0, 1 0, 1 1, 0 0)))';
        expect(buildGeometry('area', { polygon })).to.eql({ kind: 'area', polygon });
      });

      it('requires exactly one of a polygon and a bbox', function () {
        expect(() => buildGeometry('area', { polygon: 'POLYGON((0 0, 1 0, 1 1, 0 0))', bbox: [0, 0, 1, 1] }))
          .to.throw(GeometryKindMismatchError, 'area query requires either a polygon or a bbox');
      });

      it('rejects WKT of other geometry types', function () {
        expect(() => buildGeometry('area', { polygon: 'POINT(1 2)' }))
          .to.throw(GeometryKindMismatchError, 'area query Unsupported WKT type Point.');
      });
    });

    describe('for cube queries', function () {
      it('takes a bbox and an optional height range', function () {
        expect(buildGeometry('cube', { bbox: [0, 0, 10, 10], zRange: [100, 500] }))
          .to.eql({ kind: 'cube', bbox: [0, 0, 10, 10], zRange: [100, 500] });
      });

      it('rejects a bbox with heights', function () {
        expect(() => buildGeometry('cube', { bbox: [0, 0, 100, 10, 10, 500] }))
          .to.throw(GeometryKindMismatchError, 'cube query requires a two dimensional bbox, give heights as zRange');
      });

      it('rejects an inverted height range', function () {
        expect(() => buildGeometry('cube', { bbox: [0, 0, 10, 10], zRange: [500, 100] }))
          .to.throw(GeometryKindMismatchError, 'cube query zRange must be a minimum and a maximum height');
      });
    });

    describe('for corridor queries', function () {
      const corridor = {
        lineString: 'LINESTRING Z (0 0 850, 1 1 500)', width: 10, widthUnits: 'km', height: 100, heightUnits: 'm',
      };

      it('parses the line string and takes the corridor size', function () {
        expect(buildGeometry('corridor', { ...corridor, resolutionX: 4 }, metar.queries.corridor)).to.eql({
          kind: 'corridor',
          lineString: { dimensionality: 'XYZ', coordinates: [[0, 0, 850], [1, 1, 500]] },
          width: 10,
          widthUnits: 'km',
          height: 100,
          heightUnits: 'm',
          resolutionX: 4,
        });
      });

      it('rejects resolutions that are not positive integers', function () {
        expect(() => buildGeometry('corridor', { ...corridor, resolutionX: 0 }))
          .to.throw(GeometryKindMismatchError, 'corridor query resolutionX must be a positive integer');
      });

      it('rejects height units the query does not advertise', function () {
        expect(() => buildGeometry('corridor', { ...corridor, heightUnits: 'ft' }, metar.queries.corridor))
          .to.throw(GeometryKindMismatchError, 'corridor query heightUnits must be one of m');
      });
    });

    describe('for trajectory queries', function () {
      it('accepts a parsed line string', function () {
        const lineString = { dimensionality: 'XYM' as const, coordinates: [[0, 0, 1704067200], [1, 1, 1704070800]] };
        expect(buildGeometry('trajectory', { lineString })).to.eql({ kind: 'trajectory', lineString });
      });

      it('reports where a malformed line string stopped parsing', function () {
        expect(() => buildGeometry('trajectory', { lineString: 'LINESTRING (1 2)' })).to.throw(
          GeometryKindMismatchError,
          'trajectory query requires a valid line string: LINESTRING has 1 vertex, at least 2 are required (at position 16)',
        );
      });
    });

    describe('for locations and items queries', function () {
      it('takes an identifier offered by the service', function () {
        expect(buildGeometry('locations', { locationId: 'EGLL', availableIds: ['EGLL'] }))
          .to.eql({ kind: 'locations', locationId: 'EGLL' });
      });

      it('rejects identifiers the service does not offer', function () {
        expect(() => buildGeometry('locations', { locationId: 'KJFK', availableIds: ['EGLL'] }))
          .to.throw(GeometryKindMismatchError, "locations query locationId 'KJFK' is not offered by the service");
      });

      it('rejects blank identifiers', function () {
        expect(() => buildGeometry('items', { itemId: ' ' }))
          .to.throw(GeometryKindMismatchError, 'items query requires a non-empty itemId');
      });
    });
  });

  describe('#deriveExtents', function () {
    it('takes the vertical extent from z ordinates', function () {
      const geometry = buildGeometry('trajectory', { lineString: 'LINESTRING ZM (0 0 850 1, 1 1 500 2)' });
      expect(deriveExtents(geometry)).to.eql({ vertical: true, temporal: true });
    });

    it('takes the vertical extent from the height range of a cube', function () {
      expect(deriveExtents({ kind: 'cube', bbox: [0, 0, 1, 1], zRange: [0, 10] })).to.eql({ vertical: true, temporal: false });
      expect(deriveExtents({ kind: 'cube', bbox: [0, 0, 1, 1] })).to.eql({ vertical: false, temporal: false });
    });
  });

  describe('#extentSelectors', function () {
    it('disables the selectors of derived extents', function () {
      const geometry = buildGeometry('trajectory', { lineString: 'LINESTRING Z (0 0 850, 1 1 500)' });
      expect(extentSelectors(geometry)).to.eql({ vertical: false, temporal: true });
    });
  });

  describe('#geometryCoords', function () {
    it('writes points as WKT', function () {
      expect(geometryCoords({ kind: 'position', point: [10, 50] })).to.equal('POINT(10 50)');
    });

    it('writes line strings in canonical form', function () {
      const geometry = buildGeometry('trajectory', { lineString: 'linestring m(0 0 1,1 1 2)' });
      expect(geometryCoords(geometry)).to.equal('LINESTRING M (0 0 1, 1 1 2)');
    });

    it('returns undefined for kinds without coords', function () {
      expect(geometryCoords({ kind: 'cube', bbox: [0, 0, 1, 1] })).to.equal(undefined);
      expect(geometryCoords({ kind: 'items', itemId: 'a' })).to.equal(undefined);
    });
  });
});
