import * as fs from 'fs';
import * as path from 'path';
import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';
import _ from 'lodash';
import { v4 as uuid } from 'uuid';
import { buildGeometry, deriveExtents } from '../queries/geometry';
import type { BuildOptions } from '../queries/query-builder';
import { build } from '../queries/query-builder';
import {
  checkQueryKind, checkTemporal, checkVertical, dimensionProblem, resolveOutputCrs, resolveOutputFormat,
} from '../queries/query-rules';
import env from '../util/env';
import { QueryValidationError, SavedQueryError } from '../util/errors';
import logger from '../util/log';
import { isRecord } from '../util/object';
import type { Collection, Instance } from './collection';
import { effectiveCapabilities } from './collection';
import type {
  GeometryInput, QueryDescriptor, QueryGeometry, QueryInputs,
} from './query-descriptor';

export const CURRENT_SCHEMA_VERSION = '0.2.0';

/**
 * A query descriptor saved with the server it targets so that it can be listed, renamed
 * and replayed later
 */
export interface SavedQueryRecord {
  id: string;
  serverUrl: string;
  collectionId: string;
  instanceId?: string;
  descriptor: QueryDescriptor;
  name: string;
  // ISO 8601
  createdAt: string;
}

// The record as written to storage
type StoredRecord = SavedQueryRecord & { version: string };

/**
 * Reads the JSON schema of the given version
 *
 * @param version - the schema version
 * @returns the parsed schema
 */
function readSchema(version: string): SchemaObject {
  const schemaPath = path.join(__dirname, '..', 'schemas', 'saved-query', version, `saved-query-v${version}.json`);
  return JSON.parse(fs.readFileSync(schemaPath).toString());
}

interface SchemaVersion {
  version: string;
  schema: SchemaObject;
  // converts a record of the next newer version to this version
  down?: (model: Record<string, unknown>) => Record<string, unknown>;
  // converts a record of this version to the next newer version
  up?: (model: Record<string, unknown>) => Record<string, unknown>;
}

let _ajv: Ajv;
let _schemaVersions: SchemaVersion[];
let _validators: Map<string, ValidateFunction>;
let _currentValidator: ValidateFunction<StoredRecord>;
let _geometryValidator: ValidateFunction<QueryGeometry>;

function ajv(): Ajv {
  if (!_ajv) _ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
  return _ajv;
}

/**
 * @returns a memoized validator for the geometry of a descriptor
 */
function geometryValidator(): ValidateFunction<QueryGeometry> {
  if (_geometryValidator) return _geometryValidator;
  validators();
  _geometryValidator = ajv().compile<QueryGeometry>({
    $ref: `saved-query-v${CURRENT_SCHEMA_VERSION}.json#/properties/descriptor/properties/geometry`,
  });
  return _geometryValidator;
}

/**
 * Memoized list of schema objects in order of descending version number.
 * @returns a memoized list of schema objects in order of descending version number.
 */
function schemaVersions(): SchemaVersion[] {
  if (_schemaVersions) return _schemaVersions;
  _schemaVersions = [
    {
      version: '0.2.0',
      schema: readSchema('0.2.0'),
      down: (model): Record<string, unknown> => {
        const reverted = _.cloneDeep(model);
        if (isRecord(reverted.descriptor)) {
          delete reverted.descriptor.derivedExtents;
        }
        return reverted;
      },
    },
    {
      version: '0.1.0',
      schema: readSchema('0.1.0'),
      // 0.1.0 records did not store the extents taken from the geometry
      up: (model): Record<string, unknown> => {
        const upgraded = _.cloneDeep(model);
        if (isRecord(upgraded.descriptor)) {
          const { geometry } = upgraded.descriptor;
          const valid = geometryValidator();
          upgraded.descriptor.derivedExtents = valid(geometry)
            ? deriveExtents(geometry)
            : { vertical: false, temporal: false };
        }
        return upgraded;
      },
    },
  ];
  return _schemaVersions;
}

/**
 * @returns memoized validators for every schema version, keyed by version
 */
function validators(): Map<string, ValidateFunction> {
  if (_validators) return _validators;
  _validators = new Map();
  for (const { schema, version } of schemaVersions()) {
    _validators.set(version, ajv().compile(schema));
  }
  return _validators;
}

/**
 * @returns the memoized validator of the current schema version
 */
function currentValidator(): ValidateFunction<StoredRecord> {
  if (_currentValidator) return _currentValidator;
  const current = schemaVersions().find((v) => v.version === CURRENT_SCHEMA_VERSION);
  if (!current) {
    throw new RangeError(`Missing saved query schema ${CURRENT_SCHEMA_VERSION}`);
  }
  validators();
  // compiled against its own reference so that it does not clash with the registered $id
  _currentValidator = ajv().compile<StoredRecord>({ $ref: `saved-query-v${CURRENT_SCHEMA_VERSION}.json` });
  return _currentValidator;
}

/**
 * Creates a saved query record for a descriptor. The default name is the collection id
 * followed by the time of creation, e.g. `temperature [2024-01-01T00:00:00]`.
 *
 * @param serverUrl - the EDR server the descriptor targets
 * @param descriptor - the query descriptor
 * @param name - the name of the record
 * @param now - the time of creation
 * @returns the record
 */
export function createSavedQuery(serverUrl: string, descriptor: QueryDescriptor, name?: string, now = new Date()): SavedQueryRecord {
  const createdAt = now.toISOString();
  const record: SavedQueryRecord = {
    id: uuid(),
    serverUrl,
    collectionId: descriptor.collectionId,
    descriptor: _.cloneDeep(descriptor),
    name: name?.trim() || `${descriptor.collectionId} [${createdAt.split('.')[0]}]`,
    createdAt,
  };
  if (descriptor.instanceId !== undefined) record.instanceId = descriptor.instanceId;
  return record;
}

/**
 * Returns a copy of the record with a new name
 *
 * @param record - the record
 * @param name - the new name, surrounding whitespace is dropped
 * @returns the renamed record
 * @throws SavedQueryError - if the name is empty
 */
export function rename(record: SavedQueryRecord, name: string): SavedQueryRecord {
  const trimmed = name.trim();
  if (trimmed === '') {
    throw new SavedQueryError('A saved query name cannot be empty');
  }
  return { ...record, name: trimmed };
}

/**
 * Serializes a record to JSON, converting it to an older schema version if requested.
 *
 * @param record - the record
 * @param version - the schema version to write
 * @returns the JSON text of the record
 * @throws RangeError - if the version is not a known schema version
 * @throws TypeError - if the record does not satisfy the schema
 */
export function serialize(record: SavedQueryRecord, version = env.savedQuerySchemaVersion): string {
  let toWrite: Record<string, unknown> = {
    version: CURRENT_SCHEMA_VERSION,
    id: record.id,
    serverUrl: record.serverUrl,
    collectionId: record.collectionId,
    instanceId: record.instanceId,
    descriptor: JSON.parse(JSON.stringify(record.descriptor)),
    name: record.name,
    createdAt: record.createdAt,
  };
  toWrite = _.omitBy(toWrite, _.isUndefined);

  let matchingSchema: SchemaVersion | undefined;
  for (const schemaVersion of schemaVersions()) {
    if (schemaVersion.version === version) {
      matchingSchema = schemaVersion;
      break;
    }
    if (!schemaVersion.down) {
      break;
    }
    toWrite = schemaVersion.down(toWrite);
  }

  if (!matchingSchema) {
    throw new RangeError(`Unable to produce saved query schema version ${version}`);
  }
  toWrite.version = version;

  const validate = validators().get(version);
  if (!validate || !validate(toWrite)) {
    logger.error(`Invalid saved query JSON: ${JSON.stringify(toWrite)}`, { component: 'saved-query' });
    throw new TypeError(`Invalid JSON produced: ${ajv().errorsText(validate?.errors)}`);
  }

  return JSON.stringify(toWrite);
}

/**
 * Reads a record written by `serialize`, upgrading records of older schema versions.
 *
 * @param blob - the JSON text or bytes of the record
 * @returns the record
 * @throws SavedQueryError - if the blob is not a valid record of a known schema version
 */
export function deserialize(blob: string | Buffer): SavedQueryRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(blob.toString());
  } catch (e) {
    throw new SavedQueryError(`Saved query is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(parsed) || typeof parsed.version !== 'string') {
    throw new SavedQueryError('Saved query has no schema version');
  }
  const { version } = parsed;
  const versions = schemaVersions();
  const index = versions.findIndex((v) => v.version === version);
  const validate = validators().get(version);
  if (index < 0 || !validate) {
    throw new SavedQueryError(`Saved query schema version ${version} is not supported`);
  }
  if (!validate(parsed)) {
    throw new SavedQueryError(`Saved query is not a valid version ${version} record: ${ajv().errorsText(validate.errors)}`);
  }

  let model: Record<string, unknown> = parsed;
  for (let i = index; i > 0; i--) {
    const { up } = versions[i];
    if (!up) {
      throw new SavedQueryError(`Saved query schema version ${versions[i].version} cannot be upgraded`);
    }
    model = up(model);
  }
  model.version = CURRENT_SCHEMA_VERSION;

  const validateCurrent = currentValidator();
  if (!validateCurrent(model)) {
    throw new SavedQueryError(`Saved query could not be upgraded from version ${version}: ${ajv().errorsText(validateCurrent.errors)}`);
  }
  const record: SavedQueryRecord = {
    id: model.id,
    serverUrl: model.serverUrl,
    collectionId: model.collectionId,
    descriptor: model.descriptor,
    name: model.name,
    createdAt: model.createdAt,
  };
  if (model.instanceId !== undefined) record.instanceId = model.instanceId;
  return record;
}

/**
 * Returns the inputs the builder needs to rebuild a geometry
 *
 * @param geometry - the descriptor geometry
 * @returns the geometry input
 */
export function geometryInput(geometry: QueryGeometry): GeometryInput {
  switch (geometry.kind) {
    case 'position':
      return { point: [...geometry.point] };
    case 'radius':
      return { point: [...geometry.point], within: geometry.within, withinUnits: geometry.withinUnits };
    case 'area':
      return { polygon: geometry.polygon };
    case 'cube':
      return geometry.zRange
        ? { bbox: [...geometry.bbox], zRange: [...geometry.zRange] }
        : { bbox: [...geometry.bbox] };
    case 'corridor': {
      const input: GeometryInput = {
        lineString: geometry.lineString,
        width: geometry.width,
        widthUnits: geometry.widthUnits,
        height: geometry.height,
        heightUnits: geometry.heightUnits,
      };
      if (geometry.resolutionX !== undefined) input.resolutionX = geometry.resolutionX;
      if (geometry.resolutionY !== undefined) input.resolutionY = geometry.resolutionY;
      if (geometry.resolutionZ !== undefined) input.resolutionZ = geometry.resolutionZ;
      return input;
    }
    case 'trajectory':
      return { lineString: geometry.lineString };
    case 'locations':
      return { locationId: geometry.locationId };
    case 'items':
      return { itemId: geometry.itemId };
    default:
      return {};
  }
}

/**
 * Returns the inputs that rebuild the descriptor of a record
 *
 * @param descriptor - the saved descriptor
 * @returns the builder inputs
 */
export function descriptorInputs(descriptor: QueryDescriptor): QueryInputs {
  const inputs: QueryInputs = {
    geometry: geometryInput(descriptor.geometry),
    dimensions: _.cloneDeep(descriptor.dimensions),
    parameters: [...descriptor.parameters],
    method: descriptor.method,
  };
  if (descriptor.temporal) inputs.temporal = { ...descriptor.temporal };
  if (descriptor.vertical) inputs.vertical = { ...descriptor.vertical, levels: [...descriptor.vertical.levels] };
  if (descriptor.outputFormat !== undefined) inputs.outputFormat = descriptor.outputFormat;
  if (descriptor.outputCrs !== undefined) inputs.outputCrs = descriptor.outputCrs;
  return inputs;
}

export interface StaleField {
  // e.g. `parameters[2]`, `dimensions.member` or `outputCrs`
  field: string;
  reason: string;
}

export interface FreshnessReport {
  fresh: boolean;
  stale: StaleField[];
}

/**
 * Runs a single check, recording the field it rejects instead of throwing
 *
 * @returns the result of the check, undefined if it failed
 */
function collectStale<T>(stale: StaleField[], check: () => T): T | undefined {
  try {
    return check();
  } catch (e) {
    if (!(e instanceof QueryValidationError)) throw e;
    stale.push({ field: e.field, reason: e.message });
    return undefined;
  }
}

/**
 * Checks a saved query against the current capabilities of its collection. Every rule is
 * checked on its own so that all stale fields are reported, not only the first one.
 *
 * @param record - the saved query
 * @param collection - the collection as currently advertised
 * @param instance - the instance as currently advertised, if the record targets one
 * @returns the stale fields
 */
export function checkFreshness(record: SavedQueryRecord, collection: Collection, instance?: Instance): FreshnessReport {
  const stale: StaleField[] = [];
  const { descriptor } = record;
  if (record.collectionId !== collection.id) {
    stale.push({ field: 'collection', reason: `Saved query targets collection ${record.collectionId}, not ${collection.id}` });
  }
  let target: Instance | undefined;
  if (record.instanceId !== undefined) {
    if (instance?.id === record.instanceId) {
      target = instance;
    } else {
      stale.push({ field: 'instance', reason: `Instance ${record.instanceId} is no longer offered by ${collection.id}` });
    }
  }
  const capabilities = effectiveCapabilities(collection, target);

  const capability = collectStale(stale, () => checkQueryKind(capabilities, descriptor.kind));
  if (capability) {
    collectStale(stale, () => buildGeometry(descriptor.kind, geometryInput(descriptor.geometry), capability));
  }
  const { temporal, vertical } = descriptor;
  if (temporal) collectStale(stale, () => checkTemporal(capabilities, temporal));
  if (vertical) collectStale(stale, () => checkVertical(capabilities, vertical));

  for (const [name, selection] of Object.entries(descriptor.dimensions)) {
    const problem = dimensionProblem(capabilities.extent.custom.find((d) => d.id === name), name, selection);
    if (problem) stale.push({ field: `dimensions.${name}`, reason: problem });
  }
  const known = new Set(capabilities.parameters.map((p) => p.id));
  descriptor.parameters.forEach((parameter, i) => {
    if (!known.has(parameter)) {
      stale.push({ field: `parameters[${i}]`, reason: `Collection ${collection.id} has no parameter ${parameter}` });
    }
  });
  if (descriptor.outputFormat !== undefined) {
    collectStale(stale, () => resolveOutputFormat(capabilities, capability, descriptor.outputFormat));
  }
  if (descriptor.outputCrs !== undefined) {
    collectStale(stale, () => resolveOutputCrs(capabilities, capability, descriptor.outputCrs));
  }

  return { fresh: stale.length === 0, stale };
}

function isField(field: string, name: string): boolean {
  return field === name || field.startsWith(`${name}.`) || field.startsWith(`${name}[`);
}

export interface PruneResult {
  record: SavedQueryRecord;
  // stale fields that cannot be dropped, such as the query kind or the geometry
  remaining: StaleField[];
}

/**
 * Drops the stale selections of a record that the query can do without: parameters,
 * dimensions, the temporal and vertical selections and the output format and CRS (which then
 * fall back to the advertised defaults on replay).
 *
 * @param record - the saved query
 * @param report - the freshness report of the record
 * @returns the pruned record and the stale fields that remain
 */
export function pruneStaleFields(record: SavedQueryRecord, report: FreshnessReport): PruneResult {
  const descriptor = _.cloneDeep(record.descriptor);
  const remaining: StaleField[] = [];
  const staleParameters = new Set<number>();

  for (const stale of report.stale) {
    const parameterMatch = /^parameters\[(\d+)\]$/.exec(stale.field);
    if (parameterMatch) {
      staleParameters.add(Number(parameterMatch[1]));
    } else if (stale.field.startsWith('dimensions.')) {
      delete descriptor.dimensions[stale.field.slice('dimensions.'.length)];
    } else if (isField(stale.field, 'temporal')) {
      delete descriptor.temporal;
    } else if (isField(stale.field, 'vertical')) {
      delete descriptor.vertical;
    } else if (stale.field === 'outputFormat') {
      delete descriptor.outputFormat;
    } else if (stale.field === 'outputCrs') {
      delete descriptor.outputCrs;
    } else {
      remaining.push(stale);
    }
  }
  descriptor.parameters = descriptor.parameters.filter((_parameter, i) => !staleParameters.has(i));

  return { record: { ...record, descriptor }, remaining };
}

/**
 * Rebuilds the descriptor of a saved query through the query builder, so that it is checked
 * against the current capabilities of the collection.
 *
 * @param record - the saved query
 * @param collection - the collection as currently advertised
 * @param instance - the instance the record targets, if any
 * @param options - build options
 * @returns the rebuilt descriptor
 * @throws SavedQueryError - if the record targets another collection or instance
 * @throws QueryValidationError - if a rule no longer holds
 */
export function replay(record: SavedQueryRecord, collection: Collection, instance?: Instance, options: BuildOptions = {}): QueryDescriptor {
  if (record.collectionId !== collection.id) {
    throw new SavedQueryError(`Saved query ${record.name} targets collection ${record.collectionId}, not ${collection.id}`);
  }
  if (record.instanceId !== undefined && instance?.id !== record.instanceId) {
    throw new SavedQueryError(`Saved query ${record.name} targets instance ${record.instanceId}`);
  }
  const target = record.instanceId === undefined ? undefined : instance;
  return build(collection, target, record.descriptor.kind, descriptorInputs(record.descriptor), options);
}
