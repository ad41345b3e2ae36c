export {
  queryKinds, isQueryKind, parseCapabilities, parseCollectionDetail, parseInstances, parseParameter,
  effectiveCapabilities, unitLabel, i18nString,
} from './models/collection';
export type {
  QueryKind, Parameter, ParameterDataType, Unit, ObservedProperty, SpatialExtent, TemporalExtent,
  VerticalExtent, CustomDimension, DimensionCardinality, Extent, CrsDetail, QueryCapability,
  QueryCapabilities, Collection, Instance, Capabilities,
} from './models/collection';
export type {
  HttpMethod, QueryGeometry, GeometryInput, TemporalSelection, VerticalSelection, DimensionSelection,
  QueryInputs, DerivedExtents, QueryDescriptor,
} from './models/query-descriptor';
export { domainTypes, isDomainType } from './models/coverage';
export type {
  DomainType, AxisValue, Axis, PrimitiveAxis, TupleAxis, PolygonAxis, ReferenceSystem,
  ReferenceSystemBinding, RangeDataType, RangeValue, Range, Coverage, CoverageCollection,
  CoverageMemberError,
} from './models/coverage';
export {
  CURRENT_SCHEMA_VERSION, createSavedQuery, rename, serialize, deserialize, checkFreshness,
  pruneStaleFields, replay,
} from './models/saved-query';
export type {
  SavedQueryRecord, StaleField, FreshnessReport, PruneResult,
} from './models/saved-query';
export { default as SavedQueryCatalog } from './models/saved-query-catalog';
export type { RecordStore } from './models/saved-query-catalog';

export { build, selectMethod } from './queries/query-builder';
export type { BuildOptions } from './queries/query-builder';
export { toRequest, queryParameters, endpointPath } from './queries/request';
export type { EdrRequest, RequestOptions } from './queries/request';

export { decode } from './coveragejson/decoder';
export type { DecodeOptions } from './coveragejson/decoder';
export { reshape, valueAt } from './coveragejson/ranges';
export type { NestedValues } from './coveragejson/ranges';
export { project } from './coveragejson/projection';
export type {
  Projection, PointProjection, SeriesProjection, MultiPointProjection, TrajectoryProjection,
  PolygonProjection, GridProjection, GridBand,
} from './coveragejson/projection';
export { toFeatureCollection } from './coveragejson/features';
export { timeStep, timeRange } from './coveragejson/time';

export { parseLineString, serializeLineString, validateWkt } from './util/wkt';
export type { LineString, LineStringDimensionality } from './util/wkt';
export { suggestFileName, extensionFor } from './util/content-type';

export { default as EdrClient, parseFeatureSummaries } from './client/edr-client';
export type {
  EdrClientOptions, FeatureSummary, LandingPage, Link,
} from './client/edr-client';
export { default as AxiosTransport } from './client/axios-transport';
export type { Transport, TransportResponse, CredentialsProvider } from './client/transport';
export { createSchemaCache, fetchServerSchema } from './util/cache/schema-cache';
export type { SchemaCache, ServerSchema } from './util/cache/schema-cache';

export {
  EdrError, SchemaError, QueryValidationError, UnsupportedQueryKindError, GeometryKindMismatchError,
  ExtentConflictError, TemporalOutOfRangeError, VerticalLevelNotSupportedError,
  DimensionValueInvalidError, UnknownParameterError, UnsupportedOutputFormatError, UnsupportedCrsError,
  DecodeError, MalformedWktError, SavedQueryError, TransportError, HttpError, ServiceResponseError,
  getCodeForError,
} from './util/errors';
export type { QueryValidationErrorKind, DecodeErrorKind, MalformedWktReason } from './util/errors';
export { default as logger } from './util/log';
export { default as env } from './util/env';
