import type { Axis, DomainType } from '../models/coverage';
import { DecodeError } from '../util/errors';
import { axisSize, findAxis, findCompositeAxis } from './axes';

type AxisRule = 'single' | 'any' | 'absent';

interface DomainLayout {
  // rules for the primitive axes x, y, z and t
  primitive: Record<'x' | 'y' | 'z' | 't', AxisRule>;
  composite?: 'tuple' | 'polygon';
  // a single polygon for Polygon domains
  singleComposite?: boolean;
  // axes other than x, y, z, t and the composite axis
  extraAxes: boolean;
}

const layouts: Record<DomainType, DomainLayout> = {
  Point: { primitive: { x: 'single', y: 'single', z: 'single', t: 'single' }, extraAxes: false },
  PointSeries: { primitive: { x: 'single', y: 'single', z: 'single', t: 'any' }, extraAxes: false },
  VerticalProfile: { primitive: { x: 'single', y: 'single', z: 'any', t: 'single' }, extraAxes: false },
  MultiPoint: {
    primitive: { x: 'absent', y: 'absent', z: 'absent', t: 'single' }, composite: 'tuple', extraAxes: false,
  },
  Trajectory: {
    primitive: { x: 'absent', y: 'absent', z: 'single', t: 'absent' }, composite: 'tuple', extraAxes: false,
  },
  Grid: { primitive: { x: 'any', y: 'any', z: 'any', t: 'any' }, extraAxes: true },
  Polygon: {
    primitive: { x: 'absent', y: 'absent', z: 'absent', t: 'single' }, composite: 'polygon', singleComposite: true, extraAxes: false,
  },
  MultiPolygon: {
    primitive: { x: 'absent', y: 'absent', z: 'absent', t: 'single' }, composite: 'polygon', extraAxes: false,
  },
};

// axes each domain type cannot do without
const requiredAxes: Record<DomainType, string[]> = {
  Point: ['x', 'y'],
  PointSeries: ['x', 'y', 't'],
  VerticalProfile: ['x', 'y', 'z'],
  MultiPoint: [],
  Trajectory: [],
  Grid: ['x', 'y'],
  Polygon: [],
  MultiPolygon: [],
};

function unsupported(domainType: DomainType, reason: string): DecodeError {
  return new DecodeError('UnsupportedDomainAxisCombination', `${domainType} domain ${reason}`);
}

/**
 * Checks that the axes of a domain form a layout the domain type is decoded with, instead of
 * guessing a layout for an unexpected combination.
 *
 * @param domainType - the domain type
 * @param axes - the decoded axes
 * @throws DecodeError - UnsupportedDomainAxisCombination, or MalformedCoverage for x or y
 * values that are not numbers
 */
export function checkDomainAxes(domainType: DomainType, axes: readonly Axis[]): void {
  const layout = layouts[domainType];

  for (const name of requiredAxes[domainType]) {
    if (!findAxis(axes, name)) {
      throw unsupported(domainType, `requires a ${name} axis`);
    }
  }

  for (const name of ['x', 'y', 'z', 't'] as const) {
    const axis = findAxis(axes, name);
    if (!axis) continue;
    const rule = layout.primitive[name];
    if (axis.kind !== 'primitive' || rule === 'absent') {
      throw unsupported(domainType, `cannot have a ${axis.kind} ${name} axis`);
    }
    if (rule === 'single' && axisSize(axis) !== 1) {
      throw unsupported(domainType, `requires a single value on the ${name} axis, found ${axisSize(axis)}`);
    }
    if ((name === 'x' || name === 'y') && !axis.values.every((v) => typeof v === 'number')) {
      throw new DecodeError('MalformedCoverage', `${domainType} domain requires numeric values on the ${name} axis`);
    }
  }

  const composite = findCompositeAxis(axes);
  if (layout.composite) {
    if (!composite || composite.kind !== layout.composite) {
      throw unsupported(domainType, `requires a ${layout.composite} composite axis`);
    }
    if (!composite.coordinates.includes('x') || !composite.coordinates.includes('y')) {
      throw unsupported(domainType, `composite axis must have x and y coordinates, found ${composite.coordinates.join(', ')}`);
    }
    if (layout.singleComposite && axisSize(composite) !== 1) {
      throw unsupported(domainType, `requires exactly one polygon, found ${axisSize(composite)}`);
    }
    if (domainType === 'MultiPoint' && composite.coordinates.includes('t')) {
      throw unsupported(domainType, 'composite axis cannot carry time');
    }
  }

  const known = new Set<string>(['x', 'y', 'z', 't']);
  if (composite) known.add(composite.name);
  for (const axis of axes) {
    if (known.has(axis.name)) continue;
    if (axis.kind !== 'primitive' || !layout.extraAxes) {
      throw unsupported(domainType, `cannot have the axis ${axis.name}`);
    }
  }
  if (composite && !layout.composite) {
    throw unsupported(domainType, `cannot have the composite axis ${composite.name}`);
  }
}
