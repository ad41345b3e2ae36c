import type { DimensionSelection, HttpMethod, QueryDescriptor, TemporalSelection, VerticalSelection } from '../models/query-descriptor';
import env, { type PostBodyEncoding } from '../util/env';
import { geometryCoords } from './geometry';

const unboundedDatetime = '..';

export interface EdrRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface RequestOptions {
  postBodyEncoding?: PostBodyEncoding;
  // headers added to the request, e.g. from a credentials provider
  headers?: Record<string, string>;
}

export function temporalParameter(temporal: TemporalSelection): string {
  if (temporal.type === 'instant') return temporal.value;
  return `${temporal.from ?? unboundedDatetime}/${temporal.to ?? unboundedDatetime}`;
}

export function verticalParameter(vertical: VerticalSelection): string {
  if (vertical.asRange) {
    const levels = vertical.levels.map(Number);
    return `${Math.min(...levels)}/${Math.max(...levels)}`;
  }
  return vertical.levels.join(',');
}

export function dimensionParameter(selection: DimensionSelection): string {
  switch (selection.kind) {
    case 'single': return selection.value;
    case 'multiple': return selection.values.join(',');
    default: return `${selection.min}/${selection.max}`;
  }
}

/**
 * Returns the EDR query parameters of a descriptor, sorted by name so that identical
 * descriptors always give identical query strings.
 *
 * @param descriptor - the query descriptor
 * @returns ordered name and value pairs
 */
export function queryParameters(descriptor: QueryDescriptor): [string, string][] {
  const params: Record<string, string> = {};
  const { geometry } = descriptor;
  const coords = geometryCoords(geometry);
  if (coords !== undefined) params.coords = coords;

  switch (geometry.kind) {
    case 'radius':
      params.within = String(geometry.within);
      params['within-units'] = geometry.withinUnits;
      break;
    case 'cube':
      params.bbox = geometry.bbox.join(',');
      if (geometry.zRange) params.z = geometry.zRange.join('/');
      break;
    case 'corridor':
      params['corridor-width'] = String(geometry.width);
      params['width-units'] = geometry.widthUnits;
      params['corridor-height'] = String(geometry.height);
      params['height-units'] = geometry.heightUnits;
      if (geometry.resolutionX !== undefined) params['resolution-x'] = String(geometry.resolutionX);
      if (geometry.resolutionY !== undefined) params['resolution-y'] = String(geometry.resolutionY);
      if (geometry.resolutionZ !== undefined) params['resolution-z'] = String(geometry.resolutionZ);
      break;
    default:
      break;
  }

  // dimension names never clash with the standard parameters, the builder rejects them
  for (const [name, selection] of Object.entries(descriptor.dimensions)) {
    params[name] = dimensionParameter(selection);
  }
  if (descriptor.parameters.length > 0) params['parameter-name'] = descriptor.parameters.join(',');
  if (descriptor.temporal) params.datetime = temporalParameter(descriptor.temporal);
  if (descriptor.vertical) params.z = verticalParameter(descriptor.vertical);
  if (descriptor.outputCrs !== undefined) params.crs = descriptor.outputCrs;
  if (descriptor.outputFormat !== undefined) params.f = descriptor.outputFormat;

  return Object.keys(params).sort().map((name) => [name, params[name]]);
}

/**
 * Returns the path of the query endpoint relative to the service root, e.g.
 * `/collections/metar/instances/latest/position` or `/collections/metar/locations/EGLL`
 *
 * @param descriptor - the query descriptor
 */
export function endpointPath(descriptor: QueryDescriptor): string {
  let path = `/collections/${encodeURIComponent(descriptor.collectionId)}`;
  if (descriptor.instanceId !== undefined) {
    path += `/instances/${encodeURIComponent(descriptor.instanceId)}`;
  }
  const { geometry } = descriptor;
  switch (geometry.kind) {
    case 'locations':
      return `${path}/locations/${encodeURIComponent(geometry.locationId)}`;
    case 'items':
      return `${path}/items/${encodeURIComponent(geometry.itemId)}`;
    default:
      return `${path}/${geometry.kind}`;
  }
}

/**
 * Joins a service root URL and a path, keeping any path prefix of the root
 *
 * @param serverUrl - the service root, e.g. `https://example.com/edr/`
 * @param path - the path starting with a slash
 */
export function joinUrl(serverUrl: string, path: string): string {
  return `${serverUrl.replace(/\/+$/, '')}${path}`;
}

/**
 * Converts a descriptor into the HTTP request handed to the transport. GET requests carry
 * the parameters in the query string, POST requests in a form or JSON body.
 *
 * @param descriptor - the query descriptor
 * @param serverUrl - the service root URL
 * @param options - request options
 * @returns the request
 */
export function toRequest(descriptor: QueryDescriptor, serverUrl: string, options: RequestOptions = {}): EdrRequest {
  const params = queryParameters(descriptor);
  const url = joinUrl(serverUrl, endpointPath(descriptor));
  const headers = { ...options.headers };

  if (descriptor.method === 'GET') {
    const query = new URLSearchParams(params).toString();
    return { method: 'GET', url: query ? `${url}?${query}` : url, headers };
  }

  const encoding = options.postBodyEncoding ?? env.postBodyEncoding;
  if (encoding === 'json') {
    headers['Content-Type'] = 'application/json';
    return { method: 'POST', url, headers, body: JSON.stringify(Object.fromEntries(params)) };
  }
  headers['Content-Type'] = 'application/x-www-form-urlencoded';
  return { method: 'POST', url, headers, body: new URLSearchParams(params).toString() };
}
