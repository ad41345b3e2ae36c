import type { QueryDescriptor } from '../models/query-descriptor';

const extensionsByMediaType: Record<string, string> = {
  'application/prs.coverage+json': '.covjson',
  'application/vnd.cov+json': '.covjson',
  'application/geo+json': '.geojson',
  'application/vnd.geo+json': '.geojson',
  'application/json': '.json',
  'application/netcdf': '.nc',
  'application/x-netcdf': '.nc',
  'application/x-netcdf4': '.nc',
  'image/tiff': '.tiff',
  'image/geotiff': '.tiff',
  'text/csv': '.csv',
  'application/xml': '.xml',
  'text/xml': '.xml',
  'text/html': '.html',
};

// output format names used in EDR `output_formats` lists
const extensionsByFormat: Record<string, string> = {
  coveragejson: '.covjson',
  covjson: '.covjson',
  geojson: '.geojson',
  json: '.json',
  netcdf: '.nc',
  netcdf4: '.nc',
  geotiff: '.tiff',
  tiff: '.tiff',
  csv: '.csv',
};

const defaultExtension = '.dat';
const filenameRegex = /filename\*?=(?:UTF-8'')?"?([^";]+)"?/i;

/**
 * Returns the media type of a Content-Type value without its parameters, in lower case
 *
 * @param contentType - the Content-Type value, e.g. `application/json; charset=utf-8`
 */
export function mediaType(contentType: string): string {
  const [type] = contentType.split(';');
  return type.trim().toLowerCase();
}

/**
 * Returns the file extension for a Content-Type value, including the leading dot
 *
 * @param contentType - the Content-Type value
 * @returns the extension, undefined for unknown media types
 */
export function extensionFor(contentType: string): string | undefined {
  const type = mediaType(contentType);
  if (extensionsByMediaType[type]) return extensionsByMediaType[type];
  // other JSON based types, e.g. application/ld+json
  if (type.endsWith('+json')) return '.json';
  return undefined;
}

function safeFileName(name: string): string {
  return name.replace(/[^\w.-]+/g, '_');
}

export interface ResponseDescription {
  contentType?: string;
  headers: Record<string, string>;
}

/**
 * Suggests a file name to save a query response under. The name from a Content-Disposition
 * header is used when there is one; otherwise the name is made of the collection id and
 * query kind with an extension for the content type (or the requested output format).
 *
 * @param response - the response
 * @param descriptor - the query the response answers
 * @returns the file name
 */
export function suggestFileName(response: ResponseDescription, descriptor: QueryDescriptor): string {
  const disposition = response.headers['content-disposition'];
  const match = disposition ? filenameRegex.exec(disposition) : null;
  if (match) {
    return safeFileName(decodeURIComponent(match[1].trim()));
  }
  const extension = (response.contentType && extensionFor(response.contentType))
    || (descriptor.outputFormat && extensionsByFormat[descriptor.outputFormat.toLowerCase()])
    || defaultExtension;
  const base = descriptor.instanceId
    ? `${descriptor.collectionId}_${descriptor.instanceId}_${descriptor.kind}`
    : `${descriptor.collectionId}_${descriptor.kind}`;
  return `${safeFileName(base)}${extension}`;
}
