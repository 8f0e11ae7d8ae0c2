/**
 * Configuration Validation
 */

import { ValidationError, ErrorCode } from '@palimpsest/core';
import type { Configuration, PartialConfiguration } from './types.js';
import { MAX_READ_LIMIT } from './defaults.js';

function fail(field: string, message: string, value: unknown, expected?: unknown): never {
  throw new ValidationError(message, ErrorCode.INVALID_INPUT, { field, value, expected });
}

export function validateLimit(field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > MAX_READ_LIMIT) {
    fail(field, `${field} must be an integer between 1 and ${MAX_READ_LIMIT}`, value, `1..${MAX_READ_LIMIT}`);
  }
  return value;
}

export function validatePath(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    fail(field, `${field} must be a non-empty path`, value, 'path');
  }
  return value;
}

export function validateTitleTemplate(value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    fail('drafts.titleTemplate', 'drafts.titleTemplate must be a non-empty string', value, 'string');
  }
  if (value.length > 255) {
    fail('drafts.titleTemplate', 'drafts.titleTemplate must be at most 255 characters', value, '<= 255');
  }
  return value;
}

/**
 * Validates a complete configuration, throwing on the first problem
 */
export function validateConfiguration(config: Configuration): void {
  validatePath('database', config.database);
  validatePath('schema', config.schema);
  validateTitleTemplate(config.drafts.titleTemplate);
  validateLimit('read.defaultLimit', config.read.defaultLimit);
  validateLimit('read.maxLimit', config.read.maxLimit);
  if (config.read.defaultLimit > config.read.maxLimit) {
    fail(
      'read.defaultLimit',
      'read.defaultLimit cannot exceed read.maxLimit',
      config.read.defaultLimit,
      `<= ${config.read.maxLimit}`
    );
  }

  const { readOnlyCollections, restrictedCollections } = config.access;
  const overlap = readOnlyCollections.filter((c) => restrictedCollections.includes(c));
  if (overlap.length > 0) {
    fail(
      'access.readOnlyCollections',
      `Collections cannot be both read-only and restricted: ${overlap.join(', ')}`,
      overlap
    );
  }
}

/**
 * Validates only the fields present in a partial configuration
 */
export function validatePartialConfiguration(partial: PartialConfiguration): void {
  if (partial.database !== undefined) {
    validatePath('database', partial.database);
  }
  if (partial.schema !== undefined) {
    validatePath('schema', partial.schema);
  }
  if (partial.drafts?.titleTemplate !== undefined) {
    validateTitleTemplate(partial.drafts.titleTemplate);
  }
  if (partial.read?.defaultLimit !== undefined) {
    validateLimit('read.defaultLimit', partial.read.defaultLimit);
  }
  if (partial.read?.maxLimit !== undefined) {
    validateLimit('read.maxLimit', partial.read.maxLimit);
  }
}
