import { describe, it } from 'mocha';
import { expect } from 'chai';
import { project } from '../../app/coveragejson/projection';
import { decodeCollection, decodeCoverage, gridDocument, trajectoryDocument } from '../helpers/coverages';
import { readResource } from '../helpers/resources';

describe('coveragejson/projection', function () {
  describe('when projecting a point', function () {
    it('returns the position, time and values', function () {
      expect(project(decodeCoverage(readResource('coveragejson/point.covjson')))).to.eql({
        domainType: 'Point',
        crs: 'EPSG:4326',
        position: [-10.1, -40.2],
        time: '2013-01-13T00:00:00Z',
        values: { Pop_Density: 1022.8037350177765 },
      });
    });
  });

  describe('when projecting a point series', function () {
    it('returns one value per time step', function () {
      const series = decodeCollection(readResource('coveragejson/point-series-collection.covjson')).coverages[0];
      expect(project(series)).to.eql({
        domainType: 'PointSeries',
        crs: 'EPSG:4326',
        position: [5, 45],
        axis: 't',
        steps: ['2024-01-01T00:00:00Z', '2024-01-01T06:00:00Z', '2024-01-01T12:00:00Z'],
        series: {
          temperature: [
            ['2024-01-01T00:00:00Z', 280.5],
            ['2024-01-01T06:00:00Z', null],
            ['2024-01-01T12:00:00Z', 281.25],
          ],
        },
      });
    });
  });

  describe('when projecting a vertical profile', function () {
    it('steps along the z axis', function () {
      const coverage = decodeCoverage({
        type: 'Coverage',
        domain: {
          domainType: 'VerticalProfile',
          axes: { x: { values: [5] }, y: { values: [45] }, z: { values: [1000, 850] } },
        },
        ranges: { temperature: { dataType: 'float', values: [288.5, 281] } },
      });
      const projection = project(coverage);
      expect(projection.domainType === 'VerticalProfile' && projection.series).to.eql({
        temperature: [[1000, 288.5], [850, 281]],
      });
    });
  });

  describe('when projecting a multipoint', function () {
    it('returns the values of each point', function () {
      const coverage = decodeCoverage({
        type: 'Coverage',
        domain: {
          domainType: 'MultiPoint',
          axes: {
            composite: { dataType: 'tuple', coordinates: ['x', 'y'], values: [[1, 2], [3, 4]] },
            t: { values: ['2024-01-01T00:00:00Z'] },
          },
        },
        ranges: { visibility: { dataType: 'integer', axisNames: ['composite'], values: [9000, 200] } },
      });
      expect(project(coverage)).to.eql({
        domainType: 'MultiPoint',
        crs: 'EPSG:4326',
        time: '2024-01-01T00:00:00Z',
        points: [
          { position: [1, 2], values: { visibility: 9000 } },
          { position: [3, 4], values: { visibility: 200 } },
        ],
      });
    });
  });

  describe('when projecting a trajectory', function () {
    it('returns the positions at the fixed height, the times and a value list per parameter', function () {
      const coverage = decodeCoverage(trajectoryDocument, { defaultCrs: 'EPSG:3857' });
      expect(project(coverage)).to.eql({
        domainType: 'Trajectory',
        crs: 'EPSG:3857',
        positions: [[1, 2, 850], [3, 4, 850]],
        times: ['2024-01-01T00:00:00Z', '2024-01-01T01:00:00Z'],
        values: { wind_speed: [5.5, 6] },
      });
    });
  });

  describe('when projecting a polygon', function () {
    it('returns the x and y of each ring', function () {
      const coverage = decodeCoverage({
        type: 'Coverage',
        domain: {
          domainType: 'Polygon',
          axes: {
            composite: { dataType: 'polygon', coordinates: ['x', 'y'], values: [[[[0, 0], [2, 0], [2, 2], [0, 0]]]] },
          },
        },
        ranges: { precipitation: { dataType: 'float', axisNames: ['composite'], values: [1.5] } },
      });
      expect(project(coverage)).to.eql({
        domainType: 'Polygon',
        crs: 'EPSG:4326',
        polygons: [{ polygon: [[[0, 0], [2, 0], [2, 2], [0, 0]]], values: { precipitation: 1.5 } }],
      });
    });
  });

  describe('when projecting a grid', function () {
    const projection = project(decodeCoverage(gridDocument));

    it('returns the x and y values', function () {
      expect(projection).to.include({ domainType: 'Grid', crs: 'EPSG:4326' });
      expect(projection.domainType === 'Grid' && [projection.x, projection.y]).to.eql([[0, 5, 10], [50, 51]]);
    });

    it('returns one band per time step and one for a range without time', function () {
      if (projection.domainType !== 'Grid') throw new Error('Expected a grid projection');
      expect(projection.bands.map((b) => b.name)).to.eql([
        'temperature-[K]_t_2024-01-01T00:00:00Z',
        'temperature-[K]_t_2024-01-01T06:00:00Z',
        'humidity-[percent]',
      ]);
      expect(projection.bands.map((b) => b.coordinates)).to.eql([
        { t: '2024-01-01T00:00:00Z' },
        { t: '2024-01-01T06:00:00Z' },
        {},
      ]);
    });

    it('indexes band values by row then column whatever the axis order of the range', function () {
      if (projection.domainType !== 'Grid') throw new Error('Expected a grid projection');
      expect(projection.bands.map((b) => b.values)).to.eql([
        [[1, 2, 3], [4, 5, 6]],
        [[7, 8, 9], [10, null, 12]],
        [[60, 62, 64], [61, 63, 65]],
      ]);
    });
  });
});
