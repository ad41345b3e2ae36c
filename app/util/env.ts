import 'reflect-metadata';
import _ from 'lodash';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import { IsBoolean, IsIn, IsInt, IsNotEmpty, Matches, Min, ValidationError, validateSync } from 'class-validator';
import { isBoolean, isFloat, isInteger, parseBoolean } from './string';

const logger = winston.createLogger({
  transports: [
    new winston.transports.Console(),
  ],
});

//
// env module
// Sets up the configuration of the query kit from the env-defaults file next to this module,
// an optional .env file and process.env (in increasing order of precedence)
//

// Save the original process.env so we can re-use it to override
export const originalEnv = _.cloneDeep(process.env);

export type ConfigValue = number | string | boolean;

export const logLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];
export const postBodyEncodings = ['form', 'json'] as const;
export type PostBodyEncoding = typeof postBodyEncodings[number];
export const schemaVersionRegex = /^\d+\.\d+\.\d+$/;

/**
 * Parse a string env variable to a boolean or number if necessary.
 *
 * @param stringValue - The environment variable value as a string
 * @returns the parsed value
 */
function makeConfigVar(stringValue: string): ConfigValue {
  if (isInteger(stringValue)) {
    return parseInt(stringValue, 10);
  } else if (isFloat(stringValue)) {
    return parseFloat(stringValue);
  } else if (isBoolean(stringValue)) {
    return parseBoolean(stringValue);
  } else {
    return stringValue;
  }
}

/**
 * Returns an object containing environment config properties with snake-cased keys. Loads the
 * properties from this module's env-defaults file, an optional .env file and process.env.
 *
 * @param dotEnvPath - path to the .env file
 * @returns all environment variables in snake case
 */
function loadEnvFromFiles(dotEnvPath?: string): Record<string, string> {
  let envOverrides = {};
  if (dotEnvPath && fs.existsSync(dotEnvPath)) {
    try {
      envOverrides = dotenv.parse(fs.readFileSync(dotEnvPath));
    } catch (e) {
      logger.warn('Could not parse environment overrides from .env file');
      logger.warn(e instanceof Error ? e.message : String(e));
    }
  }
  // Read the env-defaults for this module (relative to this typescript file)
  const envDefaults = dotenv.parse(fs.readFileSync(path.resolve(__dirname, 'env-defaults')));
  const processEnv = _.pickBy(originalEnv, (v): v is string => typeof v === 'string');
  return { ...envDefaults, ...envOverrides, ...processEnv };
}

/**
 * Get any errors from validating the environment - leave out the env object itself
 * from the output.
 *
 * @param env - the EdrEnv instance, including constraints
 * @returns An array of `ValidationError`s
 */
export function getValidationErrors(env: EdrEnv): ValidationError[] {
  return validateSync(env, { validationError: { target: false } });
}

export class EdrEnv {
  @IsIn(logLevels)
  logLevel!: string;

  @IsBoolean()
  textLogger!: boolean;

  @IsNotEmpty()
  defaultCrs!: string;

  @IsInt()
  @Min(1)
  postGeometryThreshold!: number;

  @IsIn(postBodyEncodings)
  postBodyEncoding!: PostBodyEncoding;

  @IsInt()
  @Min(1)
  schemaCacheMaxEntries!: number;

  @IsInt()
  @Min(0)
  schemaCacheTtlMs!: number;

  @IsInt()
  @Min(0)
  requestTimeoutMs!: number;

  @IsNotEmpty()
  userAgent!: string;

  @Matches(schemaVersionRegex)
  savedQuerySchemaVersion!: string;

  /**
   * Validate the configuration.
   * @throws Error on constraint violation
   */
  validate(): void {
    if (originalEnv.SKIP_ENV_VALIDATION !== 'true') {
      const errors = getValidationErrors(this);

      if (errors.length > 0) {
        for (const err of errors) {
          logger.error(err.toString());
        }
        throw (new Error('BAD ENVIRONMENT'));
      }
    }
  }

  /**
   * Constructs the EdrEnv instance.
   * @param dotEnvPath - path to the .env file
   * @param overrides - snake-cased values that take precedence over every other source
   */
  constructor(dotEnvPath = '.env', overrides: Record<string, string> = {}) {
    const env = { ...loadEnvFromFiles(dotEnvPath), ...overrides }; // { CONFIG_NAME: '0', ... }
    const config: Record<string, ConfigValue> = {};
    for (const k of Object.keys(env)) {
      config[_.camelCase(k)] = makeConfigVar(env[k]); // { configName: 0, ... }
    }
    Object.assign(this, config);
  }
}

const envVars = new EdrEnv();
envVars.validate();

export default envVars;
