import type { AxisValue, Coverage } from '../models/coverage';
import { findPrimitiveAxis } from './axes';

function millis(value: AxisValue | undefined): number {
  return typeof value === 'string' ? Date.parse(value) : NaN;
}

/**
 * Returns the number of seconds between the first two values of the t axis, e.g. to step
 * through a time series
 *
 * @param coverage - the decoded coverage
 * @returns the step, or undefined without a t axis of at least two date-times
 */
export function timeStep(coverage: Coverage): number | undefined {
  const t = findPrimitiveAxis(coverage.axes, 't');
  if (!t || t.values.length < 2) return undefined;
  const step = (millis(t.values[1]) - millis(t.values[0])) / 1000;
  return Number.isNaN(step) ? undefined : step;
}

/**
 * Returns the first and last value of the t axis
 *
 * @param coverage - the decoded coverage
 * @returns the range, or undefined without a t axis of date-times
 */
export function timeRange(coverage: Coverage): [string, string] | undefined {
  const t = findPrimitiveAxis(coverage.axes, 't');
  if (!t) return undefined;
  const first = t.values[0];
  const last = t.values[t.values.length - 1];
  if (Number.isNaN(millis(first)) || Number.isNaN(millis(last))) return undefined;
  return [String(first), String(last)];
}
