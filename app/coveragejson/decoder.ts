import type { Parameter } from '../models/collection';
import { parseParameter } from '../models/collection';
import type {
  Coverage, CoverageCollection, CoverageMemberError, DomainType, Range,
} from '../models/coverage';
import { isDomainType } from '../models/coverage';
import env from '../util/env';
import { DecodeError } from '../util/errors';
import logger from '../util/log';
import { isRecord } from '../util/object';
import { decodeAxes } from './axes';
import { checkDomainAxes } from './domain';
import { decodeRange } from './ranges';
import { decodeReferencing, horizontalCrs } from './referencing';

export interface DecodeOptions {
  // the CRS of the service, used when a coverage has no referencing
  defaultCrs?: string;
  // parameter definitions to use when the document carries none, e.g. from the collection
  parameters?: readonly Parameter[];
}

// What members of a collection inherit from it
interface DecodeContext {
  defaultCrs: string;
  domainType?: unknown;
  referencing?: unknown;
  parameters: Record<string, Parameter>;
}

/**
 * Parses the JSON text of a document, if it was not parsed already
 *
 * @param raw - the document as text, bytes or parsed JSON
 * @returns the parsed value
 * @throws DecodeError - MalformedJSON
 */
function parseDocument(raw: unknown): unknown {
  const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
  if (typeof text !== 'string') return text;
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new DecodeError('MalformedJSON', `CoverageJSON document is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function decodeParameters(raw: unknown): Record<string, Parameter> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new DecodeError('MalformedCoverage', 'parameters must be an object');
  }
  const parameters: Record<string, Parameter> = {};
  for (const [id, definition] of Object.entries(raw)) {
    parameters[id] = parseParameter(id, definition);
  }
  return parameters;
}

function decodeDomainType(raw: unknown): DomainType {
  if (typeof raw !== 'string') {
    throw new DecodeError('MalformedCoverage', 'domainType is missing');
  }
  if (!isDomainType(raw)) {
    throw new DecodeError('UnsupportedDomainType', `Domain type ${raw} is not supported`);
  }
  return raw;
}

/**
 * Decodes a single coverage. Decoding is all or nothing: the first structural problem is
 * thrown and no partial coverage is returned.
 *
 * @param raw - the coverage object
 * @param context - what the coverage inherits from its collection
 * @returns the coverage
 * @throws DecodeError
 */
function decodeCoverage(raw: unknown, context: DecodeContext): Coverage {
  if (!isRecord(raw) || raw.type !== 'Coverage') {
    throw new DecodeError('MalformedCoverage', 'Expected an object of type Coverage');
  }
  const { domain } = raw;
  if (!isRecord(domain)) {
    throw new DecodeError('MalformedCoverage', 'Coverage domain is missing or not embedded');
  }
  const domainType = decodeDomainType(domain.domainType ?? raw.domainType ?? context.domainType);
  const axes = decodeAxes(domain.axes);
  checkDomainAxes(domainType, axes);
  const referencing = decodeReferencing(domain.referencing ?? context.referencing, context.defaultCrs);

  const parameters = { ...context.parameters, ...decodeParameters(raw.parameters) };
  if (!isRecord(raw.ranges)) {
    throw new DecodeError('MalformedCoverage', 'Coverage ranges are missing');
  }
  const ranges: Record<string, Range> = {};
  const warnings: string[] = [];
  for (const [name, rawRange] of Object.entries(raw.ranges)) {
    const parameter = parameters[name];
    if (!parameter) {
      warnings.push(`Range ${name} has no parameter definition`);
    }
    const decoded = decodeRange(name, rawRange, axes, parameter);
    ranges[name] = decoded.range;
    warnings.push(...decoded.warnings);
  }

  const coverage: Coverage = {
    type: 'Coverage',
    domainType,
    axes,
    referencing,
    crs: horizontalCrs(referencing, context.defaultCrs),
    parameters,
    ranges,
    warnings,
  };
  if (typeof raw.id === 'string') coverage.id = raw.id;
  for (const warning of warnings) {
    logger.warn(warning, { component: 'coveragejson' });
  }
  return coverage;
}

function decodeCollection(raw: Record<string, unknown>, context: DecodeContext): CoverageCollection {
  if (!Array.isArray(raw.coverages)) {
    throw new DecodeError('MalformedCoverage', 'CoverageCollection coverages are missing');
  }
  const memberContext: DecodeContext = {
    ...context,
    domainType: raw.domainType,
    referencing: raw.referencing,
    parameters: { ...context.parameters, ...decodeParameters(raw.parameters) },
  };

  const coverages: Coverage[] = [];
  const errors: CoverageMemberError[] = [];
  raw.coverages.forEach((member, index) => {
    try {
      coverages.push(decodeCoverage(member, memberContext));
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e;
      logger.error(`Coverage ${index} of the collection could not be decoded: ${e.message}`, { component: 'coveragejson' });
      errors.push({ index, error: e });
    }
  });

  const collection: CoverageCollection = {
    type: 'CoverageCollection',
    parameters: memberContext.parameters,
    coverages,
    errors,
  };
  if (typeof raw.domainType === 'string' && isDomainType(raw.domainType)) {
    collection.domainType = raw.domainType;
  }
  return collection;
}

/**
 * Decodes a CoverageJSON document. A Coverage is decoded all or nothing; in a
 * CoverageCollection each member is decoded on its own and members that fail are reported in
 * `errors` while the others are returned.
 *
 * @param raw - the document as text, bytes or parsed JSON
 * @param options - decode options
 * @returns the coverage or the collection
 * @throws DecodeError
 */
export function decode(raw: unknown, options: DecodeOptions = {}): Coverage | CoverageCollection {
  const document = parseDocument(raw);
  if (!isRecord(document)) {
    throw new DecodeError('MalformedCoverage', 'CoverageJSON document must be an object');
  }
  const parameters: Record<string, Parameter> = {};
  for (const parameter of options.parameters ?? []) {
    parameters[parameter.id] = parameter;
  }
  const context: DecodeContext = { defaultCrs: options.defaultCrs ?? env.defaultCrs, parameters };

  switch (document.type) {
    case 'Coverage':
      return decodeCoverage(document, context);
    case 'CoverageCollection':
      return decodeCollection(document, context);
    default:
      throw new DecodeError('MalformedCoverage', `Unknown CoverageJSON type ${String(document.type)}`);
  }
}
