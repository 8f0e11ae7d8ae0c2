/**
 * Attribute Codec
 *
 * Converts attribute values to SQLite values and back according to the
 * attribute's declared type.
 */

import {
  AttributeType,
  StorageError,
  ErrorCode,
  isAttributeValue,
  isVersionState,
  type AttributeDefinition,
  type AttributeValue,
  type VersionState,
} from '@palimpsest/core';
import type { Row, SqlValue } from '@palimpsest/storage';

export function encodeAttribute(definition: AttributeDefinition, value: AttributeValue): SqlValue {
  if (value === null) {
    return null;
  }
  if (definition.type === AttributeType.JSON) {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  return JSON.stringify(value);
}

function malformed(what: string, value: unknown): StorageError {
  return new StorageError(`Malformed stored value for ${what}`, ErrorCode.DATABASE_ERROR, {
    field: what,
    value,
  });
}

function toNumber(value: unknown, what: string): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  throw malformed(what, value);
}

export function decodeAttribute(definition: AttributeDefinition, raw: unknown): AttributeValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  switch (definition.type) {
    case AttributeType.BOOLEAN:
      return toNumber(raw, definition.name) !== 0;
    case AttributeType.INTEGER:
    case AttributeType.NUMBER:
      return toNumber(raw, definition.name);
    case AttributeType.JSON: {
      if (typeof raw !== 'string') {
        throw malformed(definition.name, raw);
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        throw malformed(definition.name, raw);
      }
      if (!isAttributeValue(parsed)) {
        throw malformed(definition.name, raw);
      }
      return parsed;
    }
    case AttributeType.STRING:
    case AttributeType.TEXT:
    case AttributeType.DATETIME:
      return typeof raw === 'string' ? raw : String(raw);
    case AttributeType.EMBEDDED:
      return null;
  }
}

// ============================================================================
// System Columns
// ============================================================================

export function readIntegerColumn(row: Row, name: string): number {
  const value = toNumber(row[name], name);
  if (!Number.isSafeInteger(value)) {
    throw malformed(name, row[name]);
  }
  return value;
}

export function readStateColumn(row: Row, name: string): VersionState {
  const value = row[name];
  if (!isVersionState(value)) {
    throw malformed(name, value);
  }
  return value;
}

export function readTextColumn(row: Row, name: string): string {
  const value = row[name];
  if (typeof value !== 'string') {
    throw malformed(name, value);
  }
  return value;
}
