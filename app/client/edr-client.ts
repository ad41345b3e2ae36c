import type { Geometry } from 'geojson';
import type { Logger } from 'winston';
import type { DecodeOptions } from '../coveragejson/decoder';
import { decode } from '../coveragejson/decoder';
import { normalizeCrs } from '../coveragejson/referencing';
import type { Collection, Instance } from '../models/collection';
import {
  i18nString, parseCapabilities, parseCollectionDetail, parseDocument, parseInstances,
} from '../models/collection';
import type { Coverage, CoverageCollection } from '../models/coverage';
import type { QueryDescriptor } from '../models/query-descriptor';
import type { EdrRequest, RequestOptions } from '../queries/request';
import { joinUrl, toRequest } from '../queries/request';
import { SchemaError, ServiceResponseError } from '../util/errors';
import defaultLogger from '../util/log';
import { isRecord } from '../util/object';
import { truncateString } from '../util/string';
import AxiosTransport from './axios-transport';
import type { CredentialsProvider, Transport, TransportResponse } from './transport';

export interface Link {
  href: string;
  rel?: string;
  type?: string;
  title?: string;
}

export interface LandingPage {
  title?: string;
  description?: string;
  links: Link[];
}

// A location or item offered by a collection
export interface FeatureSummary {
  id: string;
  label?: string;
  geometry?: Geometry;
}

export interface EdrClientOptions {
  transport?: Transport;
  credentials?: CredentialsProvider;
  logger?: Logger;
  requestOptions?: RequestOptions;
}

function parseLinks(raw: unknown): Link[] {
  if (!Array.isArray(raw)) return [];
  const links: Link[] = [];
  for (const l of raw) {
    if (!isRecord(l) || typeof l.href !== 'string') continue;
    const link: Link = { href: l.href };
    if (typeof l.rel === 'string') link.rel = l.rel;
    if (typeof l.type === 'string') link.type = l.type;
    if (typeof l.title === 'string') link.title = l.title;
    links.push(link);
  }
  return links;
}

function isGeometry(value: unknown): value is Geometry {
  return isRecord(value) && typeof value.type === 'string'
    && (Array.isArray(value.coordinates) || Array.isArray(value.geometries));
}

/**
 * Parses the GeoJSON FeatureCollection of a locations or items endpoint
 *
 * @param raw - the document as text, bytes or parsed JSON
 * @returns one summary per feature
 * @throws SchemaError - if the document has no features or a feature has no id
 */
export function parseFeatureSummaries(raw: unknown): FeatureSummary[] {
  const document = parseDocument(raw);
  if (!isRecord(document) || !Array.isArray(document.features)) {
    throw new SchemaError('features array is missing', 'features');
  }
  return document.features.map((feature, i): FeatureSummary => {
    const properties: Record<string, unknown> = isRecord(feature) && isRecord(feature.properties) ? feature.properties : {};
    const id = isRecord(feature) && (typeof feature.id === 'string' || typeof feature.id === 'number')
      ? feature.id
      : properties.id;
    if (typeof id !== 'string' && typeof id !== 'number') {
      throw new SchemaError('feature id is missing', `features[${i}].id`);
    }
    const summary: FeatureSummary = { id: String(id) };
    const label = i18nString(properties.name) ?? i18nString(properties.label);
    if (label !== undefined) summary.label = label;
    if (isRecord(feature) && isGeometry(feature.geometry)) summary.geometry = feature.geometry;
    return summary;
  });
}

/**
 * Returns the message of an EDR exception document, if the body is one
 */
function exceptionDescription(response: TransportResponse): string | undefined {
  let document: unknown;
  try {
    document = JSON.parse(response.body.toString('utf8'));
  } catch (e) {
    return response.body.length > 0 ? truncateString(response.body.toString('utf8'), 200) : undefined;
  }
  if (!isRecord(document)) return undefined;
  const description = document.description ?? document.detail ?? document.title;
  return typeof description === 'string' ? description : undefined;
}

/**
 * Client for a single OGC API - EDR server. Metadata endpoints are parsed into the schema
 * model; data queries are built by the query builder and sent as they are.
 */
export default class EdrClient {
  serverUrl: string;

  transport: Transport;

  credentials?: CredentialsProvider;

  logger: Logger;

  requestOptions: RequestOptions;

  constructor(serverUrl: string, options: EdrClientOptions = {}) {
    this.serverUrl = serverUrl;
    this.transport = options.transport ?? new AxiosTransport();
    this.credentials = options.credentials;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'edr-client', serverUrl });
    this.requestOptions = options.requestOptions ?? {};
  }

  /**
   * Sends a request with the server's credentials
   *
   * @param request - the request
   * @returns the response
   * @throws ServiceResponseError - for a non-2xx status
   * @throws TransportError - if the transport fails
   */
  async send(request: EdrRequest): Promise<TransportResponse> {
    const authHeaders = this.credentials ? await this.credentials.authHeaders(this.serverUrl) : {};
    const toSend: EdrRequest = { ...request, headers: { ...request.headers, ...authHeaders } };
    this.logger.info(`${toSend.method} ${toSend.url}`, { request: { method: toSend.method, url: toSend.url, headers: toSend.headers } });

    const startTime = Date.now();
    const response = await this.transport.send(toSend);
    const durationMs = Date.now() - startTime;
    this.logger.debug(`${toSend.url} responded with HTTP ${response.status}`, { durationMs });

    if (response.status < 200 || response.status >= 300) {
      const description = exceptionDescription(response);
      const message = description
        ? `EDR service responded with HTTP ${response.status}: ${description}`
        : `EDR service responded with HTTP ${response.status}`;
      this.logger.error(message, { url: toSend.url });
      throw new ServiceResponseError(response.status, toSend.url, message);
    }
    return response;
  }

  private async getJson(path: string): Promise<Buffer> {
    const response = await this.send({
      method: 'GET',
      url: joinUrl(this.serverUrl, path),
      headers: { Accept: 'application/json', ...this.requestOptions.headers },
    });
    return response.body;
  }

  async landingPage(): Promise<LandingPage> {
    const document = parseDocument(await this.getJson('/'));
    if (!isRecord(document)) {
      throw new SchemaError('landing page must be an object');
    }
    const page: LandingPage = { links: parseLinks(document.links) };
    const title = i18nString(document.title);
    if (title !== undefined) page.title = title;
    const description = i18nString(document.description);
    if (description !== undefined) page.description = description;
    return page;
  }

  /**
   * @returns the conformance classes the server implements
   */
  async conformance(): Promise<string[]> {
    const document = parseDocument(await this.getJson('/conformance'));
    if (!isRecord(document) || !Array.isArray(document.conformsTo)) {
      throw new SchemaError('conformsTo array is missing', 'conformsTo');
    }
    return document.conformsTo.filter((c): c is string => typeof c === 'string');
  }

  async collections(): Promise<Collection[]> {
    return parseCapabilities(await this.getJson('/collections'));
  }

  async collection(collectionId: string): Promise<Collection> {
    return parseCollectionDetail(await this.getJson(`/collections/${encodeURIComponent(collectionId)}`));
  }

  async instances(collectionId: string): Promise<Instance[]> {
    return parseInstances(await this.getJson(`/collections/${encodeURIComponent(collectionId)}/instances`));
  }

  /**
   * @returns the locations offered by a collection, or by one of its instances
   */
  async locations(collectionId: string, instanceId?: string): Promise<FeatureSummary[]> {
    const base = instanceId === undefined
      ? `/collections/${encodeURIComponent(collectionId)}`
      : `/collections/${encodeURIComponent(collectionId)}/instances/${encodeURIComponent(instanceId)}`;
    return parseFeatureSummaries(await this.getJson(`${base}/locations`));
  }

  async items(collectionId: string): Promise<FeatureSummary[]> {
    return parseFeatureSummaries(await this.getJson(`/collections/${encodeURIComponent(collectionId)}/items`));
  }

  /**
   * Sends the data query of a descriptor
   *
   * @param descriptor - a descriptor returned by the query builder
   * @returns the response, whatever its format
   */
  async execute(descriptor: QueryDescriptor): Promise<TransportResponse> {
    return this.send(toRequest(descriptor, this.serverUrl, this.requestOptions));
  }

  /**
   * Sends the data query of a descriptor and decodes the CoverageJSON response
   *
   * @param descriptor - a descriptor returned by the query builder
   * @param collection - the queried collection, whose parameters are used for ranges the
   * response does not describe and whose spatial CRS is used for a domain without referencing
   * @returns the decoded coverage or collection
   * @throws DecodeError - if the response is not CoverageJSON
   */
  async executeCoverage(descriptor: QueryDescriptor, collection?: Collection): Promise<Coverage | CoverageCollection> {
    const response = await this.execute(descriptor);
    const options: DecodeOptions = {};
    if (collection) {
      options.parameters = collection.parameters;
      if (collection.extent.spatial.crs) options.defaultCrs = normalizeCrs(collection.extent.spatial.crs);
    }
    return decode(response.body, options);
  }
}
