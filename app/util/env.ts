import 'reflect-metadata';
import _ from 'lodash';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import { IsBoolean, IsIn, IsInt, Matches, Max, Min, ValidationError, validateSync } from 'class-validator';
import { isBoolean, isFloat, isInteger, parseBoolean } from './string';

const logger = winston.createLogger({
  transports: [
    new winston.transports.Console(),
  ],
});

//
// env module
// Loads the configuration used when building catalogs. Values come from the env-defaults
// file next to this module, an optional .env file, and process.env, in increasing order
// of precedence.
//

export type ConfigValue = number | string | boolean;

export const winstonLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

// Level names accepted by the library, mapped to winston levels
const levelAliases: Record<string, string> = {
  TRACE: 'verbose',
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  WARN: 'warn',
  ERROR: 'error',
  CRITICAL: 'error',
};

/**
 * Maps a level name to a winston level. Accepts winston level names as well as
 * TRACE, DEBUG, INFO, WARNING, ERROR and CRITICAL, ignoring case.
 *
 * @param level - the level name
 * @returns the winston level, or undefined if the name is unknown
 */
export function toWinstonLevel(level: string): string | undefined {
  const upper = level.toUpperCase();
  if (upper in levelAliases) {
    return levelAliases[upper];
  }
  const lower = level.toLowerCase();
  return winstonLevels.includes(lower) ? lower : undefined;
}

/**
 * Read-only configuration consumed by the catalog library
 */
export interface StacConfig {
  readonly logLevel: string;
  readonly textLogger: boolean;
  readonly stacVersion: string;
  readonly jsonIndent: number;
}

/**
 * Parse a string env variable to a boolean or number if necessary.
 *
 * @param stringValue - The environment variable value as a string
 * @returns the parsed value
 */
export function makeConfigVar(stringValue: string): ConfigValue {
  if (isInteger(stringValue)) {
    return parseInt(stringValue, 10);
  } else if (isFloat(stringValue)) {
    return parseFloat(stringValue);
  } else if (isBoolean(stringValue)) {
    return parseBoolean(stringValue);
  }
  return stringValue;
}

/**
 * Returns all of the configuration properties with snake-cased keys, loaded from the
 * env-defaults file, the .env file (if any) and process.env.
 *
 * @param dotEnvPath - path to the .env file
 * @returns all environment variables in snake case
 */
function loadEnvFromFiles(dotEnvPath?: string): Record<string, string> {
  let envOverrides: Record<string, string> = {};
  if (dotEnvPath) {
    try {
      envOverrides = dotenv.parse(fs.readFileSync(dotEnvPath));
    } catch (e) {
      logger.warn(`Could not parse environment overrides from ${dotEnvPath}`);
      logger.warn(e instanceof Error ? e.message : String(e));
    }
  }
  const envDefaults = dotenv.parse(fs.readFileSync(path.resolve(__dirname, 'env-defaults')));
  const processEnv = _.pickBy(process.env, (v): v is string => v !== undefined);
  return { ...envDefaults, ...envOverrides, ...processEnv };
}

/**
  Get any errors from validating the environment - leave out the env object itself
  from the output.
  @param env - the StacEnv instance, including constraints
  @returns An array of `ValidationError`s
*/
export function getValidationErrors(env: StacEnv): ValidationError[] {
  return validateSync(env, { validationError: { target: false } });
}

export class StacEnv implements StacConfig {
  @IsIn(winstonLevels)
  logLevel!: string;

  @IsBoolean()
  textLogger!: boolean;

  @Matches(/^\d+\.\d+\.\d+(-[\w.]+)?$/)
  stacVersion!: string;

  @IsInt()
  @Min(0)
  @Max(10)
  jsonIndent!: number;

  /**
  * Validate a set of env vars.
  * @throws Error on constraint violation
  */
  validate(): void {
    if (process.env.SKIP_ENV_VALIDATION !== 'true') {
      const errors = getValidationErrors(this);

      if (errors.length > 0) {
        for (const err of errors) {
          logger.error(err);
        }
        throw (new Error('BAD ENVIRONMENT'));
      }
    }
  }

  /**
   * Constructs the StacEnv instance.
   * @param dotEnvPath - path to the .env file
   */
  constructor(dotEnvPath?: string) {
    const env = loadEnvFromFiles(dotEnvPath); // { CONFIG_NAME: '0', ... }
    const config: Record<string, ConfigValue> = {};
    for (const k of Object.keys(env)) {
      config[_.camelCase(k)] = makeConfigVar(env[k]); // { configName: 0, ... }
    }
    if (typeof config.logLevel === 'string') {
      config.logLevel = toWinstonLevel(config.logLevel) ?? config.logLevel;
    }
    Object.assign(this, config);
  }
}

const env = new StacEnv(fs.existsSync('.env') ? '.env' : undefined);
env.validate();

export default env;
