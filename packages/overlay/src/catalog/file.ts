/**
 * Catalog File Loading
 *
 * Reads collection schemas from YAML:
 *
 * ```yaml
 * collections:
 *   news:
 *     sorting_field: sorting
 *     attributes:
 *       title: { type: string, required: true, max_length: 255 }
 *       sorting: integer
 *       links: { type: embedded, collection: links, foreign_field: parent_id }
 *   links:
 *     attributes:
 *       parent_id: integer
 *       uri: { type: string, required: true }
 * ```
 *
 * A child collection targeted by an embedded attribute gets the foreign field
 * as its parent link field unless it names one itself.
 */

import * as fs from 'node:fs';
import * as yaml from 'yaml';
import {
  ValidationError,
  ErrorCode,
  ATTRIBUTE_TYPES,
  isAttributeObject,
  type AttributeType,
  type AttributeValue,
  type AttributeDefinition,
  type CollectionSchema,
} from '@palimpsest/core';
import {
  typeError,
  readString,
  readBoolean,
  readInteger,
  readStringList,
  readSection,
} from '../config/readers.js';
import { ConfiguredSchemaCatalog } from './schema-catalog.js';

export const CATALOG_FILE_NAME = 'collections.yaml';

// ============================================================================
// Value Conversion
// ============================================================================

function isAttributeType(value: string): value is AttributeType {
  return ATTRIBUTE_TYPES.some((type) => type === value);
}

function toAttributeValue(value: unknown, field: string): AttributeValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toAttributeValue(item, `${field}[${index}]`));
  }
  if (isAttributeObject(value)) {
    const result: Record<string, AttributeValue> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toAttributeValue(item, `${field}.${key}`);
    }
    return result;
  }
  throw typeError(field, value, 'a JSON value');
}

function readAllowedValues(section: Record<string, unknown>, field: string): (string | number)[] | undefined {
  const value = section['allowed_values'];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw typeError(`${field}.allowed_values`, value, 'a list');
  }
  return value.map((item, index) => {
    if (typeof item !== 'string' && typeof item !== 'number') {
      throw typeError(`${field}.allowed_values[${index}]`, item, 'a string or number');
    }
    return item;
  });
}

// ============================================================================
// Schema Conversion
// ============================================================================

function parseAttribute(name: string, raw: unknown, field: string): AttributeDefinition {
  // `title: string` is shorthand for `title: { type: string }`
  const section = typeof raw === 'string' ? { type: raw } : raw;
  if (!isAttributeObject(section)) {
    throw typeError(field, raw, 'a type name or a mapping');
  }

  const type = readString(section, 'type', `${field}.type`);
  if (type === undefined || !isAttributeType(type)) {
    throw typeError(`${field}.type`, type, `one of ${ATTRIBUTE_TYPES.join(', ')}`);
  }

  const required = readBoolean(section, 'required', `${field}.required`);
  const maxLength = readInteger(section, 'max_length', `${field}.max_length`);
  const allowedValues = readAllowedValues(section, field);
  const targetCollection = readString(section, 'collection', `${field}.collection`);
  const foreignField = readString(section, 'foreign_field', `${field}.foreign_field`);

  if ((targetCollection === undefined) !== (foreignField === undefined)) {
    throw typeError(field, raw, 'both collection and foreign_field for embedded attributes');
  }

  return {
    name,
    type,
    ...(required !== undefined ? { required } : {}),
    ...(maxLength !== undefined ? { maxLength } : {}),
    ...(allowedValues !== undefined ? { allowedValues } : {}),
    ...('default' in section ? { default: toAttributeValue(section['default'], `${field}.default`) } : {}),
    ...(targetCollection !== undefined && foreignField !== undefined
      ? { embedded: { collection: targetCollection, foreignField } }
      : {}),
  };
}

function parseCollection(name: string, raw: unknown): CollectionSchema {
  const field = `collections.${name}`;
  if (!isAttributeObject(raw)) {
    throw typeError(field, raw, 'a mapping');
  }

  const attributeSection = readSection(raw, 'attributes', `${field}.attributes`);
  if (attributeSection === undefined) {
    throw typeError(`${field}.attributes`, undefined, 'a mapping');
  }
  const attributes = Object.entries(attributeSection).map(([attribute, definition]) =>
    parseAttribute(attribute, definition, `${field}.attributes.${attribute}`)
  );

  const parentLinkField = readString(raw, 'parent_link_field', `${field}.parent_link_field`);
  const containerField = readString(raw, 'container_field', `${field}.container_field`);
  const sortingField = readString(raw, 'sorting_field', `${field}.sorting_field`);
  const hiddenField = readString(raw, 'hidden_field', `${field}.hidden_field`);

  return {
    name,
    attributes,
    identityFields: readStringList(raw, 'identity_fields', `${field}.identity_fields`) ?? [],
    ...(parentLinkField !== undefined ? { parentLinkField } : {}),
    ...(containerField !== undefined ? { containerField } : {}),
    ...(sortingField !== undefined ? { sortingField } : {}),
    ...(hiddenField !== undefined ? { hiddenField } : {}),
  };
}

/**
 * Converts a parsed catalog document into collection schemas
 */
export function parseCatalogDocument(document: unknown): CollectionSchema[] {
  if (!isAttributeObject(document)) {
    throw typeError('collections', document, 'a mapping');
  }
  const collections = readSection(document, 'collections', 'collections');
  if (collections === undefined) {
    throw typeError('collections', undefined, 'a mapping');
  }

  const schemas = Object.entries(collections).map(([name, raw]) => parseCollection(name, raw));

  const derivedLinks = new Map<string, string>();
  for (const schema of schemas) {
    for (const attribute of schema.attributes) {
      if (attribute.embedded) {
        derivedLinks.set(attribute.embedded.collection, attribute.embedded.foreignField);
      }
    }
  }

  return schemas.map((schema) => {
    const derived = derivedLinks.get(schema.name);
    return schema.parentLinkField === undefined && derived !== undefined
      ? { ...schema, parentLinkField: derived }
      : schema;
  });
}

export function parseCatalogYaml(content: string, filePath?: string): CollectionSchema[] {
  let document: unknown;
  try {
    document = yaml.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Failed to parse collection catalog${filePath ? ` (${filePath})` : ''}: ${err instanceof Error ? err.message : String(err)}`,
      ErrorCode.INVALID_INPUT,
      { filePath },
      err instanceof Error ? err : undefined
    );
  }
  return parseCatalogDocument(document);
}

/**
 * Loads and validates a catalog file
 */
export function loadCatalogFile(filePath: string): ConfiguredSchemaCatalog {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(
      `Cannot read collection catalog ${filePath}`,
      ErrorCode.INVALID_INPUT,
      { filePath },
      err instanceof Error ? err : undefined
    );
  }
  return new ConfiguredSchemaCatalog(parseCatalogYaml(content, filePath));
}
