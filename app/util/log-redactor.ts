import _ from 'lodash';
import type { Logform } from 'winston';

type TransformableInfo = Logform.TransformableInfo;

// Header and field names whose values must never reach the logs
const sensitiveKeyRegex = /^(authorization|proxy-authorization|cookie|set-cookie|x-api-key|api[-_]?key|access[-_]?token|password)$/i;

const MAX_DEPTH = 6;

/**
 * Redact sensitive values from an object if they exist.
 *
 * @param obj - The object to inspect (for sensitive keys like 'Authorization').
 * @param info - The log entry that holds 'obj'.
 * @param infoPath - The path (list of keys) within 'info' and 'infoClone' that leads to 'obj'.
 * @param infoClone - A clone of 'info' or undefined if no sensitive values have been found.
 * @returns - A clone of 'info' or undefined if no sensitive values have been found.
 */
function redactObject(
  obj: object,
  info: TransformableInfo,
  infoPath: string[],
  infoClone: TransformableInfo | undefined,
): TransformableInfo | undefined {
  if (infoPath.length > MAX_DEPTH) return infoClone;
  let clone = infoClone;
  for (const [key, value] of Object.entries(obj)) {
    if (sensitiveKeyRegex.test(key) && value !== undefined && value !== null) {
      clone = clone || _.cloneDeep(info);
      _.set(clone, [...infoPath, key], '<redacted>');
    } else if (value && typeof value === 'object' && !Buffer.isBuffer(value)) {
      clone = redactObject(value, info, [...infoPath, key], clone);
    }
  }
  return clone;
}

/**
 * Redact sensitive key values from a log entry. The entry passed
 * to the function will be cloned if anything is redacted,
 * otherwise the original object is returned.
 *
 * @param info - the TransformableInfo to inspect
 * @returns - TransformableInfo with sensitive values redacted
 */
export default function redact(info: TransformableInfo): TransformableInfo {
  return redactObject(info, info, [], undefined) || info;
}
