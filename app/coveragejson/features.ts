import type {
  Feature, FeatureCollection, GeoJsonProperties, Geometry,
} from 'geojson';
import type { AxisValue, RangeValue } from '../models/coverage';
import type { GridProjection, Projection } from './projection';

function feature(geometry: Geometry, properties: GeoJsonProperties): Feature {
  return { type: 'Feature', geometry, properties };
}

function withTime(values: Record<string, RangeValue>, time: AxisValue | undefined): GeoJsonProperties {
  return time === undefined ? { ...values } : { ...values, t: time };
}

/**
 * One point per grid cell and band label, carrying the value of every parameter that has a
 * band with that label
 */
function gridFeatures(projection: GridProjection): Feature[] {
  const labels = [...new Set(projection.bands.map((b) => b.label))];
  const features: Feature[] = [];
  for (const label of labels) {
    const bands = projection.bands.filter((b) => b.label === label);
    projection.y.forEach((y, yi) => {
      projection.x.forEach((x, xi) => {
        const properties: Record<string, AxisValue | RangeValue> = { ...bands[0].coordinates };
        for (const band of bands) {
          properties[band.parameter] = band.values[yi][xi];
        }
        features.push(feature({ type: 'Point', coordinates: [Number(x), Number(y)] }, properties));
      });
    });
  }
  return features;
}

function projectionFeatures(projection: Projection): Feature[] {
  switch (projection.domainType) {
    case 'Point':
      return [feature({ type: 'Point', coordinates: projection.position }, withTime(projection.values, projection.time))];
    case 'PointSeries':
    case 'VerticalProfile': {
      const { axis, series } = projection;
      return projection.steps.map((step, i) => {
        const properties: Record<string, AxisValue | RangeValue> = { [axis]: step };
        for (const [name, pairs] of Object.entries(series)) {
          properties[name] = pairs[i][1];
        }
        const position = axis === 'z' ? [...projection.position, Number(step)] : projection.position;
        return feature({ type: 'Point', coordinates: position }, properties);
      });
    }
    case 'MultiPoint':
      return projection.points.map((p) => feature({ type: 'Point', coordinates: p.position }, withTime(p.values, projection.time)));
    case 'Trajectory': {
      const properties: Record<string, RangeValue[] | AxisValue[]> = { ...projection.values };
      if (projection.times) properties.t = projection.times;
      return [feature({ type: 'LineString', coordinates: projection.positions }, properties)];
    }
    case 'Polygon':
    case 'MultiPolygon':
      return projection.polygons.map((p) => feature({ type: 'Polygon', coordinates: p.polygon }, withTime(p.values, projection.time)));
    case 'Grid':
      return gridFeatures(projection);
    default:
      return [];
  }
}

/**
 * Converts a projection into GeoJSON features for a vector layer. Every value is kept:
 * series give one feature per step, trajectories one line with a value list per parameter and
 * grids one point per cell.
 *
 * @param projection - the projection of a coverage
 * @returns the features
 */
export function toFeatureCollection(projection: Projection): FeatureCollection {
  return { type: 'FeatureCollection', features: projectionFeatures(projection) };
}
