import _ from 'lodash';
import type { Collection, Instance, QueryKind } from '../models/collection';
import { effectiveCapabilities } from '../models/collection';
import type {
  HttpMethod, QueryDescriptor, QueryGeometry, QueryInputs,
} from '../models/query-descriptor';
import env from '../util/env';
import logger from '../util/log';
import { buildGeometry, deriveExtents, geometryCoords } from './geometry';
import {
  checkDerivedExtents, checkDimensions, checkParameters, checkQueryKind, checkTemporal, checkVertical,
  resolveOutputCrs, resolveOutputFormat,
} from './query-rules';

export interface BuildOptions {
  // size in bytes of the coords parameter above which the query is sent as a POST
  postGeometryThreshold?: number;
}

/**
 * Chooses the HTTP method. Large geometries do not fit in a URL so they are POSTed.
 *
 * @param geometry - the descriptor geometry
 * @param requested - the method the caller asked for, if any
 * @param threshold - the maximum size in bytes of a coords parameter sent with GET
 * @returns the method
 */
export function selectMethod(geometry: QueryGeometry, requested: HttpMethod | undefined, threshold: number): HttpMethod {
  if (requested === 'POST') return 'POST';
  const coords = geometryCoords(geometry);
  if (coords !== undefined && Buffer.byteLength(coords, 'utf8') > threshold) {
    return 'POST';
  }
  return 'GET';
}

/**
 * Builds a validated query descriptor for a collection (or one of its instances). The rules
 * are checked in a fixed order and the first one that fails is thrown:
 *
 * 1. the query kind is supported
 * 2. the geometry matches the query kind
 * 3. extents derived from the geometry are not also selected
 * 4. the temporal selection is within the temporal extent
 * 5. the vertical levels are offered
 * 6. the dimension selections are valid
 * 7. the parameters are known
 * 8. the output format and CRS are advertised
 *
 * @param collection - the collection to query
 * @param instance - the instance to query, if any
 * @param kind - the query kind
 * @param inputs - what the user selected
 * @param options - build options
 * @returns the query descriptor
 * @throws QueryValidationError - the subclass of the first rule that fails
 */
export function build(
  collection: Collection,
  instance: Instance | undefined,
  kind: QueryKind,
  inputs: QueryInputs = {},
  options: BuildOptions = {},
): QueryDescriptor {
  const capabilities = effectiveCapabilities(collection, instance);
  const capability = checkQueryKind(capabilities, kind);
  const geometry = buildGeometry(kind, inputs.geometry, capability);
  const derivedExtents = deriveExtents(geometry);
  checkDerivedExtents(derivedExtents, inputs);
  if (inputs.temporal) checkTemporal(capabilities, inputs.temporal);
  if (inputs.vertical) checkVertical(capabilities, inputs.vertical);
  const dimensions = inputs.dimensions ?? {};
  checkDimensions(capabilities, dimensions);
  const parameters = inputs.parameters ?? [];
  checkParameters(capabilities, parameters);
  const outputFormat = resolveOutputFormat(capabilities, capability, inputs.outputFormat);
  const outputCrs = resolveOutputCrs(capabilities, capability, inputs.outputCrs);

  const descriptor: QueryDescriptor = {
    kind,
    collectionId: collection.id,
    geometry,
    dimensions: _.cloneDeep(dimensions),
    parameters: [...parameters],
    method: selectMethod(geometry, inputs.method, options.postGeometryThreshold ?? env.postGeometryThreshold),
    derivedExtents,
  };
  if (instance) descriptor.instanceId = instance.id;
  if (inputs.temporal) descriptor.temporal = { ...inputs.temporal };
  if (inputs.vertical) descriptor.vertical = { ...inputs.vertical, levels: [...inputs.vertical.levels] };
  if (outputFormat !== undefined) descriptor.outputFormat = outputFormat;
  if (outputCrs !== undefined) descriptor.outputCrs = outputCrs;

  logger.debug(`Built ${kind} query for collection ${collection.id}`, { component: 'query-builder', method: descriptor.method });
  return descriptor;
}
