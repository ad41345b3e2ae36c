import type { ReferenceSystemBinding } from '../models/coverage';
import { DecodeError } from '../util/errors';
import { isRecord } from '../util/object';

const crs84Regex = /CRS:?84$/i;
const epsgUriRegex = /\/def\/crs\/EPSG\/[^/]+\/(\d+)$/i;
const epsgUrnRegex = /^urn:ogc:def:crs:EPSG:[^:]*:(\d+)$/i;
const epsgCodeRegex = /^EPSG:(\d+)$/i;

/**
 * Normalises a CRS identifier to the `EPSG:<code>` form where one exists. CRS84 is treated
 * as `EPSG:4326`; identifiers that are not recognised are returned unchanged.
 *
 * @param id - e.g. `http://www.opengis.net/def/crs/EPSG/0/3857`
 * @returns e.g. `EPSG:3857`
 */
export function normalizeCrs(id: string): string {
  const trimmed = id.trim();
  if (crs84Regex.test(trimmed)) return 'EPSG:4326';
  const match = trimmed.match(epsgUriRegex) ?? trimmed.match(epsgUrnRegex) ?? trimmed.match(epsgCodeRegex);
  return match ? `EPSG:${match[1]}` : trimmed;
}

/**
 * Decodes `referencing` into its bindings of coordinate names to reference systems. A missing
 * referencing falls back to a geographic binding of x and y to the default CRS.
 *
 * @param raw - the referencing array, if any
 * @param defaultCrs - the CRS declared by the service
 * @returns the bindings
 * @throws DecodeError - MalformedCoverage if a binding has no coordinates or system
 */
export function decodeReferencing(raw: unknown, defaultCrs: string): ReferenceSystemBinding[] {
  if (raw === undefined) {
    return [{ coordinates: ['x', 'y'], system: { type: 'GeographicCRS', id: defaultCrs } }];
  }
  if (!Array.isArray(raw)) {
    throw new DecodeError('MalformedCoverage', 'referencing must be an array');
  }
  return raw.map((binding, i): ReferenceSystemBinding => {
    if (!isRecord(binding) || !Array.isArray(binding.coordinates) || !isRecord(binding.system)) {
      throw new DecodeError('MalformedCoverage', `referencing[${i}] must have coordinates and a system`);
    }
    const coordinates = binding.coordinates.filter((c): c is string => typeof c === 'string');
    const { system } = binding;
    const decoded: ReferenceSystemBinding = {
      coordinates,
      system: { type: typeof system.type === 'string' ? system.type : 'Unknown' },
    };
    if (typeof system.id === 'string') decoded.system.id = system.id;
    if (typeof system.wkt === 'string') decoded.system.wkt = system.wkt;
    return decoded;
  });
}

/**
 * Returns the horizontal CRS of a coverage: the WKT of the system bound to x and y when the
 * service gives one, otherwise its normalised identifier, otherwise the default CRS.
 *
 * @param referencing - the decoded bindings
 * @param defaultCrs - the CRS declared by the service
 * @returns the CRS
 */
export function horizontalCrs(referencing: readonly ReferenceSystemBinding[], defaultCrs: string): string {
  const binding = referencing.find((b) => b.coordinates.includes('x') && b.coordinates.includes('y'));
  if (binding?.system.wkt) return binding.system.wkt;
  return normalizeCrs(binding?.system.id ?? defaultCrs);
}
