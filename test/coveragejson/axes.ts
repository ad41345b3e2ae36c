import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  decodeAxes, findCompositeAxis, findPrimitiveAxis, linspace,
} from '../../app/coveragejson/axes';
import { DecodeError } from '../../app/util/errors';

describe('coveragejson/axes', function () {
  describe('#linspace', function () {
    it('includes both ends', function () {
      expect(linspace(0, 10, 3)).to.eql([0, 5, 10]);
    });

    it('returns the start alone when num is 1', function () {
      expect(linspace(4, 8, 1)).to.eql([4]);
    });

    it('ends exactly on the stop value', function () {
      const values = linspace(0, 1, 11);
      expect(values).to.have.length(11);
      expect(values[10]).to.equal(1);
    });
  });

  describe('#decodeAxes', function () {
    it('keeps listed values and the declaration order', function () {
      const axes = decodeAxes({ t: { values: ['2024-01-01T00:00:00Z'] }, x: { values: [1, 2] } });
      expect(axes).to.eql([
        {
          kind: 'primitive', name: 't', values: ['2024-01-01T00:00:00Z'], regular: false,
        },
        {
          kind: 'primitive', name: 'x', values: [1, 2], regular: false,
        },
      ]);
    });

    it('expands regular axes', function () {
      const [x] = decodeAxes({ x: { start: -10, stop: 10, num: 5 } });
      expect(x).to.eql({
        kind: 'primitive', name: 'x', values: [-10, -5, 0, 5, 10], regular: true,
      });
    });

    it('decodes tuple axes', function () {
      const [composite] = decodeAxes({
        composite: { dataType: 'tuple', coordinates: ['x', 'y'], values: [[1, 2], [3, 4]] },
      });
      expect(composite).to.eql({
        kind: 'tuple', name: 'composite', coordinates: ['x', 'y'], values: [[1, 2], [3, 4]],
      });
    });

    it('decodes polygon axes', function () {
      const ring = [[0, 0], [1, 0], [1, 1], [0, 0]];
      const [composite] = decodeAxes({
        composite: { dataType: 'polygon', coordinates: ['x', 'y'], values: [[ring]] },
      });
      expect(composite).to.eql({
        kind: 'polygon', name: 'composite', coordinates: ['x', 'y'], values: [[ring]],
      });
    });

    it('rejects an empty axes object', function () {
      expect(() => decodeAxes({})).to.throw(DecodeError, 'domain.axes must be an object with at least one axis')
        .with.property('kind', 'MalformedCoverage');
    });

    it('rejects a regular axis without a positive integer num', function () {
      expect(() => decodeAxes({ x: { start: 0, stop: 1, num: 0 } }))
        .to.throw(DecodeError, 'Axis x must have a positive integer num');
    });

    it('rejects an axis with neither values nor start, stop and num', function () {
      expect(() => decodeAxes({ x: { start: 0 } }))
        .to.throw(DecodeError, 'Axis x needs either values or start, stop and num');
    });

    it('rejects tuples of the wrong length', function () {
      expect(() => decodeAxes({
        composite: { dataType: 'tuple', coordinates: ['t', 'x', 'y'], values: [['2024-01-01T00:00:00Z', 1]] },
      })).to.throw(DecodeError, 'Axis composite tuples must have 3 values (t, x, y)');
    });

    it('rejects unknown axis data types', function () {
      expect(() => decodeAxes({ x: { dataType: 'weird', values: [1] } }))
        .to.throw(DecodeError, 'Axis x has unknown data type weird');
    });
  });

  describe('#findPrimitiveAxis and #findCompositeAxis', function () {
    const axes = decodeAxes({
      composite: { dataType: 'tuple', coordinates: ['x', 'y'], values: [[1, 2]] },
      t: { values: ['2024-01-01T00:00:00Z'] },
    });

    it('finds primitive axes by name', function () {
      expect(findPrimitiveAxis(axes, 't')?.values).to.eql(['2024-01-01T00:00:00Z']);
      expect(findPrimitiveAxis(axes, 'composite')).to.equal(undefined);
    });

    it('finds the composite axis', function () {
      expect(findCompositeAxis(axes)?.name).to.equal('composite');
    });
  });
});
