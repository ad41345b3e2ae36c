import { describe, it } from 'mocha';
import { expect } from 'chai';
import type { QueryInputs } from '../../app/models/query-descriptor';
import { build, selectMethod } from '../../app/queries/query-builder';
import {
  DimensionValueInvalidError, ExtentConflictError, GeometryKindMismatchError, UnsupportedQueryKindError,
} from '../../app/util/errors';
import { loadCollection, loadInstance } from '../helpers/resources';

describe('queries/query-builder', function () {
  const metar = loadCollection('metar');
  const forecast = loadCollection('forecast');

  describe('#build', function () {
    it('builds a descriptor with the advertised defaults', function () {
      const descriptor = build(metar, undefined, 'position', {
        geometry: { point: [10, 50] },
        temporal: { type: 'instant', value: '2024-01-15T00:00:00Z' },
        parameters: ['temperature'],
      });
      expect(descriptor).to.eql({
        kind: 'position',
        collectionId: 'metar',
        geometry: { kind: 'position', point: [10, 50] },
        temporal: { type: 'instant', value: '2024-01-15T00:00:00Z' },
        dimensions: {},
        parameters: ['temperature'],
        outputFormat: 'CoverageJSON',
        outputCrs: 'EPSG:4326',
        method: 'GET',
        derivedExtents: { vertical: false, temporal: false },
      });
    });

    it('does not share arrays with the inputs', function () {
      const inputs: QueryInputs = { geometry: { point: [10, 50] }, parameters: ['temperature'], vertical: { levels: ['850'] } };
      const descriptor = build(metar, undefined, 'position', inputs);
      expect(descriptor.parameters).to.not.equal(inputs.parameters);
      expect(descriptor.vertical?.levels).to.not.equal(inputs.vertical?.levels);
    });

    it('targets an instance and uses its narrowed capabilities', function () {
      const descriptor = build(forecast, loadInstance('run-2024-02-01T00'), 'area', { geometry: { bbox: [0, 45, 10, 55] } });
      expect(descriptor.instanceId).to.equal('run-2024-02-01T00');
      expect(descriptor.geometry).to.eql({ kind: 'area', polygon: 'POLYGON((0 45, 10 45, 10 55, 0 55, 0 45))' });
      expect(descriptor.outputFormat).to.equal('CoverageJSON');
      expect(descriptor.outputCrs).to.equal(undefined);
    });

    it('marks extents taken from the geometry', function () {
      const descriptor = build(metar, undefined, 'trajectory', { geometry: { lineString: 'LINESTRING M (0 0 1704067200, 1 1 1704070800)' } });
      expect(descriptor.derivedExtents).to.eql({ vertical: false, temporal: true });
    });

    describe('when several rules fail', function () {
      it('reports an unsupported query kind first', function () {
        expect(() => build(forecast, undefined, 'area', { geometry: { point: [1, 2] }, parameters: ['unknown'] }))
          .to.throw(UnsupportedQueryKindError);
      });

      it('reports the geometry before the parameters', function () {
        expect(() => build(metar, undefined, 'position', { geometry: { point: [1] }, parameters: ['unknown'] }))
          .to.throw(GeometryKindMismatchError);
      });

      it('reports an extent conflict before the temporal extent', function () {
        expect(() => build(metar, undefined, 'trajectory', {
          geometry: { lineString: 'LINESTRING M (0 0 1, 1 1 2)' },
          temporal: { type: 'instant', value: '1999-01-01T00:00:00Z' },
        })).to.throw(ExtentConflictError);
      });

      it('reports the dimensions before the parameters', function () {
        expect(() => build(metar, undefined, 'position', {
          geometry: { point: [1, 2] },
          dimensions: { member: { kind: 'single', value: '9' } },
          parameters: ['unknown'],
        })).to.throw(DimensionValueInvalidError);
      });
    });

    it('reports a coordinate that overflows as a geometry mismatch', function () {
      expect(() => build(metar, undefined, 'trajectory', { geometry: { lineString: 'LINESTRING (1e400 0, 1 1)' } }))
        .to.throw(
          GeometryKindMismatchError,
          "trajectory query requires a valid line string: '1e400' is not a finite number (at position 12)",
        )
        .with.property('field', 'geometry.lineString');
    });

    it('does not share dimension values with the inputs', function () {
      const values = ['1', '2'];
      const descriptor = build(metar, undefined, 'position', {
        geometry: { point: [10, 50] },
        dimensions: { member: { kind: 'multiple', values } },
      });
      values.push('3');
      expect(descriptor.dimensions.member).to.eql({ kind: 'multiple', values: ['1', '2'] });
    });

    it('honours an instance narrowing the supported kinds', function () {
      expect(() => build(forecast, loadInstance('run-2024-02-01T12'), 'area', { geometry: { bbox: [0, 45, 10, 55] } }))
        .to.throw(UnsupportedQueryKindError, 'Collection forecast does not support area queries, supported: position');
    });

    it('switches to POST when the geometry is larger than the threshold', function () {
      const descriptor = build(metar, undefined, 'position', { geometry: { point: [10, 50] } }, { postGeometryThreshold: 10 });
      expect(descriptor.method).to.equal('POST');
    });
  });

  describe('#selectMethod', function () {
    it('keeps a requested POST', function () {
      expect(selectMethod({ kind: 'position', point: [1, 2] }, 'POST', 2048)).to.equal('POST');
    });

    it('uses GET for small geometries and kinds without coords', function () {
      expect(selectMethod({ kind: 'position', point: [1, 2] }, undefined, 2048)).to.equal('GET');
      expect(selectMethod({ kind: 'items', itemId: 'a' }, 'GET', 0)).to.equal('GET');
    });
  });
});
