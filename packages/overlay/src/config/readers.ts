/**
 * Typed readers for values of parsed YAML documents. Each names the dotted
 * path of the offending value when it has the wrong type.
 */

import { ValidationError, ErrorCode, isAttributeObject } from '@palimpsest/core';

export function typeError(field: string, value: unknown, expected: string): ValidationError {
  return new ValidationError(
    `Configuration value ${field} must be ${expected}`,
    ErrorCode.INVALID_INPUT,
    { field, value, expected }
  );
}

export function readString(source: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw typeError(field, value, 'a string');
  }
  return value;
}

export function readBoolean(source: Record<string, unknown>, key: string, field: string): boolean | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw typeError(field, value, 'a boolean');
  }
  return value;
}

export function readInteger(source: Record<string, unknown>, key: string, field: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw typeError(field, value, 'an integer');
  }
  return value;
}

export function readStringList(source: Record<string, unknown>, key: string, field: string): string[] | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw typeError(field, value, 'a list of strings');
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw typeError(`${field}[${index}]`, item, 'a string');
    }
    return item;
  });
}

export function readSection(
  source: Record<string, unknown>,
  key: string,
  field: string
): Record<string, unknown> | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isAttributeObject(value)) {
    throw typeError(field, value, 'a mapping');
  }
  return value;
}
