import _ from 'lodash';
import { SchemaError } from '../util/errors';
import { deepFreeze, isNumberArray, isRecord } from '../util/object';
import { expandDimensionValues } from '../util/parameter-parsing-helpers';
import { isNumeric } from '../util/string';

export const queryKinds = ['position', 'radius', 'area', 'cube', 'corridor', 'trajectory', 'locations', 'items'] as const;
export type QueryKind = typeof queryKinds[number];

/**
 * Returns true if the string names one of the EDR query kinds
 * @param value - the value to check
 */
export function isQueryKind(value: string): value is QueryKind {
  const kinds: readonly string[] = queryKinds;
  return kinds.includes(value);
}

export type ParameterDataType = 'integer' | 'float' | 'string';

export interface Unit {
  label?: string;
  symbol?: string;
}

export interface ObservedProperty {
  id?: string;
  label: string;
}

export interface Parameter {
  id: string;
  label: string;
  description?: string;
  unit?: Unit;
  dataType?: ParameterDataType;
  observedProperty?: ObservedProperty;
  categoryEncoding?: Record<string, number | number[]>;
}

export interface SpatialExtent {
  bbox: number[];
  crs?: string;
}

export interface TemporalExtent {
  // open ends are null
  interval?: [string | null, string | null];
  values: string[];
  trs?: string;
}

export interface VerticalExtent {
  interval?: [number | null, number | null];
  levels: string[];
  vrs?: string;
}

export type DimensionCardinality = 'single' | 'multiple' | 'range';

export interface CustomDimension {
  id: string;
  values: string[];
  interval?: [number, number];
  reference?: string;
  cardinality: DimensionCardinality;
}

export interface Extent {
  spatial: SpatialExtent;
  temporal?: TemporalExtent;
  vertical?: VerticalExtent;
  custom: CustomDimension[];
}

export interface CrsDetail {
  crs: string;
  wkt?: string;
}

export interface QueryCapability {
  kind: QueryKind;
  href?: string;
  title?: string;
  outputFormats?: string[];
  defaultOutputFormat?: string;
  crsDetails?: CrsDetail[];
  withinUnits?: string[];
  widthUnits?: string[];
  heightUnits?: string[];
}

export type QueryCapabilities = Partial<Record<QueryKind, QueryCapability>>;

export interface Collection {
  id: string;
  title: string;
  description?: string;
  extent: Extent;
  queries: QueryCapabilities;
  supportedQueryKinds: QueryKind[];
  hasInstances: boolean;
  outputFormats: string[];
  outputCrs: string[];
  parameters: Parameter[];
}

/**
 * An instance narrows any part of its collection's capabilities, fields it leaves out
 * are inherited
 */
export interface Instance {
  id: string;
  title?: string;
  extent?: Partial<Extent>;
  queries?: QueryCapabilities;
  supportedQueryKinds?: QueryKind[];
  outputFormats?: string[];
  outputCrs?: string[];
  parameters?: Parameter[];
}

// The capabilities a query is validated against once instance overrides are applied
export type Capabilities = Omit<Collection, 'hasInstances'> & { instanceId?: string };

/**
 * Parses a JSON document given as text, bytes or an already parsed value
 *
 * @param raw - the document
 * @returns the parsed JSON value
 * @throws SchemaError - if the text is not JSON
 */
export function parseDocument(raw: unknown): unknown {
  const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
  if (typeof text !== 'string') {
    return text;
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new SchemaError(`Capability document is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/**
 * EDR allows most human readable strings to be given per language, e.g. `{ "en": "Wind" }`.
 * Returns the string itself or the first translation.
 *
 * @param value - a string or a language map
 * @returns the string, or undefined if there is none
 */
export function i18nString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (isRecord(value)) {
    return Object.values(value).find((v): v is string => typeof v === 'string');
  }
  return undefined;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string | number => typeof v === 'string' || typeof v === 'number').map(String);
}

function optionalStringList(value: unknown): string[] | undefined {
  return Array.isArray(value) ? stringList(value) : undefined;
}

function optionalNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && isNumeric(value)) return Number(value);
  return null;
}

/**
 * EDR extents carry intervals as an array of pairs of which only the first one is used
 * @param value - `[[a, b]]` or `[a, b]`
 * @returns the first pair, or undefined if there is none
 */
function firstPair(value: unknown): [unknown, unknown] | undefined {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  const pair = Array.isArray(value[0]) ? value[0] : value;
  return pair.length >= 2 ? [pair[0], pair[1]] : undefined;
}

function parseDataType(value: unknown): ParameterDataType | undefined {
  switch (typeof value === 'string' ? value.toLowerCase() : undefined) {
    case 'int': case 'integer':
      return 'integer';
    case 'float': case 'double': case 'number':
      return 'float';
    case 'string': case 'categorical':
      return 'string';
    default:
      return undefined;
  }
}

function parseUnit(value: unknown): Unit | undefined {
  if (typeof value === 'string') return { label: value, symbol: value };
  if (!isRecord(value)) return undefined;
  const symbol = isRecord(value.symbol) ? i18nString(value.symbol.value) : i18nString(value.symbol);
  const label = i18nString(value.label);
  if (label === undefined && symbol === undefined) return undefined;
  const unit: Unit = {};
  if (label !== undefined) unit.label = label;
  if (symbol !== undefined) unit.symbol = symbol;
  return unit;
}

function parseCategoryEncoding(value: unknown): Record<string, number | number[]> | undefined {
  if (!isRecord(value)) return undefined;
  const encoding: Record<string, number | number[]> = {};
  for (const [category, code] of Object.entries(value)) {
    if (typeof code === 'number' || isNumberArray(code)) {
      encoding[category] = code;
    }
  }
  return encoding;
}

/**
 * Parses a parameter definition from a `parameter_names` map or a CoverageJSON parameters map.
 * The label falls back to the observed property label and finally to the parameter id.
 *
 * @param id - the parameter id (map key)
 * @param raw - the parameter definition
 * @returns the parameter
 */
export function parseParameter(id: string, raw: unknown): Parameter {
  const definition: Record<string, unknown> = isRecord(raw) ? raw : {};
  const observed = isRecord(definition.observedProperty) ? definition.observedProperty : undefined;
  const observedLabel = observed ? i18nString(observed.label) : undefined;
  const parameter: Parameter = {
    id,
    label: i18nString(definition.label) ?? observedLabel ?? id,
  };
  const description = i18nString(definition.description);
  if (description !== undefined) parameter.description = description;
  const unit = parseUnit(definition.unit);
  if (unit) parameter.unit = unit;
  const dataType = parseDataType(definition['data-type'] ?? definition.dataType);
  if (dataType) parameter.dataType = dataType;
  if (observed) {
    parameter.observedProperty = { label: observedLabel ?? id };
    if (typeof observed.id === 'string') parameter.observedProperty.id = observed.id;
  }
  const categoryEncoding = parseCategoryEncoding(definition.categoryEncoding);
  if (categoryEncoding) parameter.categoryEncoding = categoryEncoding;
  return parameter;
}

function parseParameters(raw: unknown): Parameter[] {
  if (!isRecord(raw)) return [];
  return Object.entries(raw).map(([id, definition]) => parseParameter(id, definition));
}

function parseSpatialExtent(raw: unknown, path: string): SpatialExtent {
  if (!isRecord(raw)) {
    throw new SchemaError('spatial extent is missing', path);
  }
  const bbox = Array.isArray(raw.bbox) && Array.isArray(raw.bbox[0]) ? raw.bbox[0] : raw.bbox;
  if (!isNumberArray(bbox) || (bbox.length !== 4 && bbox.length !== 6)) {
    throw new SchemaError('bbox must be an array of 4 or 6 numbers', `${path}.bbox`);
  }
  const spatial: SpatialExtent = { bbox };
  if (typeof raw.crs === 'string') spatial.crs = raw.crs;
  return spatial;
}

function parseTemporalExtent(raw: unknown): TemporalExtent | undefined {
  if (!isRecord(raw)) return undefined;
  const temporal: TemporalExtent = { values: stringList(raw.values) };
  const pair = firstPair(raw.interval);
  if (pair) {
    temporal.interval = [
      typeof pair[0] === 'string' && pair[0] !== '..' ? pair[0] : null,
      typeof pair[1] === 'string' && pair[1] !== '..' ? pair[1] : null,
    ];
  }
  if (typeof raw.trs === 'string') temporal.trs = raw.trs;
  return temporal;
}

function parseVerticalExtent(raw: unknown): VerticalExtent | undefined {
  if (!isRecord(raw)) return undefined;
  const vertical: VerticalExtent = { levels: stringList(raw.values) };
  const pair = firstPair(raw.interval);
  if (pair) vertical.interval = [optionalNumber(pair[0]), optionalNumber(pair[1])];
  if (typeof raw.vrs === 'string') vertical.vrs = raw.vrs;
  return vertical;
}

/**
 * Parses a custom dimension. Listed values are expanded; a dimension with one legal value is
 * a single selection, with several a multiple selection, and with only an interval a range.
 *
 * @param raw - the dimension as advertised
 * @param path - the location of the dimension in the document, for errors
 * @returns the dimension
 * @throws SchemaError - if the dimension has no id
 */
function parseCustomDimension(raw: unknown, path: string): CustomDimension {
  if (!isRecord(raw) || typeof raw.id !== 'string' || raw.id === '') {
    throw new SchemaError('custom dimension id is missing', path);
  }
  const rawValues = typeof raw.values === 'string' ? [raw.values] : stringList(raw.values);
  const values = expandDimensionValues(rawValues);
  const dimension: CustomDimension = {
    id: raw.id,
    values,
    cardinality: values.length === 1 ? 'single' : 'multiple',
  };
  const pair = firstPair(raw.interval);
  const min = pair ? optionalNumber(pair[0]) : null;
  const max = pair ? optionalNumber(pair[1]) : null;
  if (min !== null && max !== null) {
    dimension.interval = [min, max];
    if (values.length === 0) dimension.cardinality = 'range';
  }
  if (typeof raw.reference === 'string') dimension.reference = raw.reference;
  return dimension;
}

function parseExtent(raw: unknown, path: string): Extent {
  if (!isRecord(raw)) {
    throw new SchemaError('extent is missing', path);
  }
  const extent: Extent = {
    spatial: parseSpatialExtent(raw.spatial, `${path}.spatial`),
    custom: Array.isArray(raw.custom)
      ? raw.custom.map((c, i) => parseCustomDimension(c, `${path}.custom[${i}]`))
      : [],
  };
  const temporal = parseTemporalExtent(raw.temporal);
  if (temporal) extent.temporal = temporal;
  const vertical = parseVerticalExtent(raw.vertical);
  if (vertical) extent.vertical = vertical;
  return extent;
}

function parseCrsDetails(raw: unknown): CrsDetail[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  return raw.filter(isRecord).filter((d) => typeof d.crs === 'string').map((d) => {
    const detail: CrsDetail = { crs: String(d.crs) };
    if (typeof d.wkt === 'string') detail.wkt = d.wkt;
    return detail;
  });
}

function parseQueryCapability(kind: QueryKind, raw: unknown): QueryCapability {
  const query: QueryCapability = { kind };
  const link: Record<string, unknown> = isRecord(raw) && isRecord(raw.link) ? raw.link : {};
  if (typeof link.href === 'string') query.href = link.href;
  if (typeof link.title === 'string') query.title = link.title;
  const variables: Record<string, unknown> = isRecord(link.variables) ? link.variables : {};
  const outputFormats = optionalStringList(variables.output_formats);
  if (outputFormats) query.outputFormats = outputFormats;
  if (typeof variables.default_output_format === 'string') query.defaultOutputFormat = variables.default_output_format;
  const crsDetails = parseCrsDetails(variables.crs_details);
  if (crsDetails) query.crsDetails = crsDetails;
  const withinUnits = optionalStringList(variables.within_units);
  if (withinUnits) query.withinUnits = withinUnits;
  const widthUnits = optionalStringList(variables.width_units);
  if (widthUnits) query.widthUnits = widthUnits;
  const heightUnits = optionalStringList(variables.height_units);
  if (heightUnits) query.heightUnits = heightUnits;
  return query;
}

/**
 * Parses the `data_queries` map into the supported query kinds. Kinds this module does not
 * know are ignored, as is the `instances` entry, which only signals that instances exist.
 */
function parseQueries(raw: unknown, path: string): QueryCapabilities {
  if (!isRecord(raw)) {
    throw new SchemaError('data_queries is missing', path);
  }
  const queries: QueryCapabilities = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isQueryKind(key)) {
      queries[key] = parseQueryCapability(key, value);
    }
  }
  return queries;
}

function hasInstancesLink(raw: Record<string, unknown>): boolean {
  if (isRecord(raw.data_queries) && 'instances' in raw.data_queries) return true;
  return Array.isArray(raw.links)
    && raw.links.some((l) => isRecord(l) && typeof l.href === 'string' && l.href.includes('/instances'));
}

function supportedKinds(queries: QueryCapabilities): QueryKind[] {
  return queryKinds.filter((kind) => queries[kind] !== undefined);
}

function parseCollectionObject(raw: unknown, path: string): Collection {
  if (!isRecord(raw)) {
    throw new SchemaError('collection must be an object', path);
  }
  if (typeof raw.id !== 'string' || raw.id === '') {
    throw new SchemaError('collection id is missing', `${path}.id`);
  }
  const queries = parseQueries(raw.data_queries, `${path}.data_queries`);
  const collection: Collection = {
    id: raw.id,
    title: i18nString(raw.title) ?? raw.id,
    extent: parseExtent(raw.extent, `${path}.extent`),
    queries,
    supportedQueryKinds: supportedKinds(queries),
    hasInstances: hasInstancesLink(raw),
    outputFormats: stringList(raw.output_formats),
    outputCrs: stringList(raw.crs),
    parameters: parseParameters(raw.parameter_names),
  };
  const description = i18nString(raw.description);
  if (description !== undefined) collection.description = description;
  return collection;
}

/**
 * Parses a `/collections` document into the collections it lists.
 *
 * @param raw - the document as text, bytes or parsed JSON
 * @returns the immutable collections
 * @throws SchemaError - if the document or any collection is malformed
 */
export function parseCapabilities(raw: unknown): Collection[] {
  const document = parseDocument(raw);
  if (!isRecord(document) || !Array.isArray(document.collections)) {
    throw new SchemaError('collections array is missing', 'collections');
  }
  return deepFreeze(document.collections.map((c, i) => parseCollectionObject(c, `collections[${i}]`)));
}

/**
 * Parses a `/collections/{collectionId}` document.
 *
 * @param raw - the document as text, bytes or parsed JSON
 * @returns the immutable collection
 * @throws SchemaError - if the collection is malformed
 */
export function parseCollectionDetail(raw: unknown): Collection {
  return deepFreeze(parseCollectionObject(parseDocument(raw), 'collection'));
}

function parseInstanceObject(raw: unknown, path: string): Instance {
  if (!isRecord(raw) || typeof raw.id !== 'string' || raw.id === '') {
    throw new SchemaError('instance id is missing', `${path}.id`);
  }
  const instance: Instance = { id: raw.id };
  const title = i18nString(raw.title);
  if (title !== undefined) instance.title = title;
  if (isRecord(raw.extent)) {
    const extent: Partial<Extent> = {};
    if (isRecord(raw.extent.spatial)) extent.spatial = parseSpatialExtent(raw.extent.spatial, `${path}.extent.spatial`);
    const temporal = parseTemporalExtent(raw.extent.temporal);
    if (temporal) extent.temporal = temporal;
    const vertical = parseVerticalExtent(raw.extent.vertical);
    if (vertical) extent.vertical = vertical;
    if (Array.isArray(raw.extent.custom)) {
      extent.custom = raw.extent.custom.map((c, i) => parseCustomDimension(c, `${path}.extent.custom[${i}]`));
    }
    instance.extent = extent;
  }
  if (raw.data_queries !== undefined) {
    instance.queries = parseQueries(raw.data_queries, `${path}.data_queries`);
    instance.supportedQueryKinds = supportedKinds(instance.queries);
  }
  if (Array.isArray(raw.output_formats)) instance.outputFormats = stringList(raw.output_formats);
  if (Array.isArray(raw.crs)) instance.outputCrs = stringList(raw.crs);
  if (isRecord(raw.parameter_names)) instance.parameters = parseParameters(raw.parameter_names);
  return instance;
}

/**
 * Parses a `/collections/{collectionId}/instances` document.
 *
 * @param raw - the document as text, bytes or parsed JSON
 * @returns the immutable instances
 * @throws SchemaError - if the document or any instance is malformed
 */
export function parseInstances(raw: unknown): Instance[] {
  const document = parseDocument(raw);
  if (!isRecord(document) || !Array.isArray(document.instances)) {
    throw new SchemaError('instances array is missing', 'instances');
  }
  return deepFreeze(document.instances.map((c, i) => parseInstanceObject(c, `instances[${i}]`)));
}

/**
 * Merges an instance's narrowed capabilities over its collection's.
 *
 * @param collection - the parent collection
 * @param instance - the selected instance, if any
 * @returns the capabilities a query must satisfy
 */
export function effectiveCapabilities(collection: Collection, instance?: Instance): Capabilities {
  const base: Capabilities = _.omit(collection, 'hasInstances');
  if (!instance) {
    return base;
  }
  const narrowed = instance.extent ?? {};
  return {
    ...base,
    instanceId: instance.id,
    extent: {
      spatial: narrowed.spatial ?? collection.extent.spatial,
      temporal: narrowed.temporal ?? collection.extent.temporal,
      vertical: narrowed.vertical ?? collection.extent.vertical,
      custom: narrowed.custom ?? collection.extent.custom,
    },
    queries: instance.queries ?? collection.queries,
    supportedQueryKinds: instance.supportedQueryKinds ?? collection.supportedQueryKinds,
    outputFormats: instance.outputFormats ?? collection.outputFormats,
    outputCrs: instance.outputCrs ?? collection.outputCrs,
    parameters: instance.parameters ?? collection.parameters,
  };
}

/**
 * Returns the label of a parameter's unit, falling back to its symbol
 * @param parameter - the parameter
 */
export function unitLabel(parameter: Parameter | undefined): string | undefined {
  return parameter?.unit?.label ?? parameter?.unit?.symbol;
}
