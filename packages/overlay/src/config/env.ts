/**
 * Environment Variable Configuration
 */

import { ErrorCode, ValidationError } from '@palimpsest/core';
import type { PartialConfiguration } from './types.js';
import { EnvVars } from './types.js';

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parses a boolean environment value; undefined when unset or unrecognized
 */
export function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase().trim();
  if (TRUTHY_VALUES.has(lower)) {
    return true;
  }
  if (FALSY_VALUES.has(lower)) {
    return false;
  }
  return undefined;
}

/**
 * Parses a positive integer environment value
 */
export function parseEnvPositiveInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(
      `${name} must be a positive integer`,
      ErrorCode.INVALID_INPUT,
      { field: name, value, expected: 'positive integer' }
    );
  }
  const parsed = Number.parseInt(value.trim(), 10);
  if (parsed < 1) {
    throw new ValidationError(
      `${name} must be a positive integer`,
      ErrorCode.INVALID_INPUT,
      { field: name, value, expected: 'positive integer' }
    );
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * Reads configuration values from the environment
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfiguration {
  const config: PartialConfiguration = {};

  const database = nonEmpty(env[EnvVars.DB]);
  if (database !== undefined) {
    config.database = database;
  }

  const readonly = parseEnvBoolean(env[EnvVars.DB_READONLY]);
  if (readonly !== undefined) {
    config.readonly = readonly;
  }

  const schema = nonEmpty(env[EnvVars.SCHEMA]);
  if (schema !== undefined) {
    config.schema = schema;
  }

  const autoCreate = parseEnvBoolean(env[EnvVars.DRAFTS_AUTO_CREATE]);
  if (autoCreate !== undefined) {
    config.drafts = { autoCreate };
  }

  const defaultLimit = parseEnvPositiveInteger(EnvVars.READ_LIMIT, env[EnvVars.READ_LIMIT]);
  if (defaultLimit !== undefined) {
    config.read = { defaultLimit };
  }

  return config;
}

/**
 * Config file path given through the environment, if any
 */
export function getEnvConfigPath(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return nonEmpty(env[EnvVars.CONFIG]);
}
