/**
 * Schema Catalog
 *
 * Lookup of collection schemas. The overlay stays collection-agnostic: every
 * per-collection field set (identity fields, parent links, embedded
 * children) comes from here.
 */

import {
  AttributeType,
  ATTRIBUTE_TYPES,
  SYSTEM_COLUMNS,
  ValidationError,
  ErrorCode,
  findAttribute,
  unknownCollection,
  type CollectionSchema,
  type AttributeDefinition,
} from '@palimpsest/core';
import { isValidIdentifier } from '@palimpsest/storage';
import { checkAttributeValue } from './values.js';

// ============================================================================
// Interface
// ============================================================================

export interface SchemaCatalog {
  get(collection: string): CollectionSchema | undefined;
  /** Like get, but throws UNKNOWN_COLLECTION */
  require(collection: string): CollectionSchema;
  list(): CollectionSchema[];
}

// ============================================================================
// Validation
// ============================================================================

function schemaError(collection: string, message: string, field?: string): ValidationError {
  return new ValidationError(
    `Invalid schema for ${collection}: ${message}`,
    ErrorCode.INVALID_INPUT,
    { collection, field }
  );
}

function requireStored(schema: CollectionSchema, field: string | undefined, role: string): void {
  if (field === undefined) {
    return;
  }
  const attribute = findAttribute(schema, field);
  if (!attribute || attribute.type === AttributeType.EMBEDDED) {
    throw schemaError(schema.name, `${role} ${field} must be a stored attribute`, field);
  }
}

function validateAttribute(schema: CollectionSchema, attribute: AttributeDefinition): void {
  const { name } = attribute;
  if (!isValidIdentifier(name)) {
    throw schemaError(schema.name, `attribute name ${name} is not a valid identifier`, name);
  }
  if (SYSTEM_COLUMNS.includes(name)) {
    throw schemaError(schema.name, `attribute ${name} clashes with a system column`, name);
  }
  if (!ATTRIBUTE_TYPES.includes(attribute.type)) {
    throw schemaError(schema.name, `attribute ${name} has unknown type ${attribute.type}`, name);
  }
  if (attribute.maxLength !== undefined) {
    if (attribute.type !== AttributeType.STRING && attribute.type !== AttributeType.TEXT) {
      throw schemaError(schema.name, `maxLength is only allowed on string attributes (${name})`, name);
    }
    if (!Number.isSafeInteger(attribute.maxLength) || attribute.maxLength < 1) {
      throw schemaError(schema.name, `maxLength of ${name} must be a positive integer`, name);
    }
  }
  if (attribute.type === AttributeType.EMBEDDED) {
    if (!attribute.embedded) {
      throw schemaError(schema.name, `embedded attribute ${name} needs a target collection`, name);
    }
    if (attribute.required || attribute.default !== undefined) {
      throw schemaError(schema.name, `embedded attribute ${name} cannot be required or have a default`, name);
    }
  } else if (attribute.embedded) {
    throw schemaError(schema.name, `only embedded attributes may name a target collection (${name})`, name);
  }
  if (attribute.default !== undefined) {
    checkAttributeValue(schema.name, attribute, attribute.default);
  }
}

function validateEmbeddedTarget(
  schema: CollectionSchema,
  attribute: AttributeDefinition,
  schemas: ReadonlyMap<string, CollectionSchema>
): void {
  const target = attribute.embedded;
  if (!target) {
    return;
  }
  const child = schemas.get(target.collection);
  if (!child) {
    throw schemaError(schema.name, `embedded attribute ${attribute.name} targets unknown collection ${target.collection}`, attribute.name);
  }
  if (child.name === schema.name) {
    throw schemaError(schema.name, `embedded attribute ${attribute.name} cannot target its own collection`, attribute.name);
  }
  const foreign = findAttribute(child, target.foreignField);
  if (!foreign || foreign.type !== AttributeType.INTEGER) {
    throw schemaError(
      schema.name,
      `foreign field ${child.name}.${target.foreignField} must be an integer attribute`,
      attribute.name
    );
  }
  if (child.parentLinkField !== target.foreignField) {
    throw schemaError(
      schema.name,
      `${child.name} must declare ${target.foreignField} as its parent link field`,
      attribute.name
    );
  }
}

/**
 * Checks one schema on its own, then every cross-collection reference
 */
export function validateCatalog(schemas: ReadonlyMap<string, CollectionSchema>): void {
  for (const schema of schemas.values()) {
    if (!isValidIdentifier(schema.name)) {
      throw schemaError(schema.name, 'collection name is not a valid identifier');
    }
    const seen = new Set<string>();
    for (const attribute of schema.attributes) {
      if (seen.has(attribute.name)) {
        throw schemaError(schema.name, `attribute ${attribute.name} is declared twice`, attribute.name);
      }
      seen.add(attribute.name);
      validateAttribute(schema, attribute);
    }
    for (const field of schema.identityFields) {
      if (!isValidIdentifier(field)) {
        throw schemaError(schema.name, `identity field ${field} is not a valid identifier`, field);
      }
    }
    requireStored(schema, schema.parentLinkField, 'parent link field');
    if (schema.parentLinkField !== undefined && findAttribute(schema, schema.parentLinkField)?.required) {
      throw schemaError(schema.name, `parent link field ${schema.parentLinkField} cannot be required`, schema.parentLinkField);
    }
    requireStored(schema, schema.containerField, 'container field');
    requireStored(schema, schema.sortingField, 'sorting field');
    requireStored(schema, schema.hiddenField, 'hidden field');
  }

  for (const schema of schemas.values()) {
    for (const attribute of schema.attributes) {
      validateEmbeddedTarget(schema, attribute, schemas);
    }
  }
}

// ============================================================================
// ConfiguredSchemaCatalog
// ============================================================================

/**
 * Catalog built from a fixed list of schemas, validated on construction
 */
export class ConfiguredSchemaCatalog implements SchemaCatalog {
  private readonly schemas = new Map<string, CollectionSchema>();

  constructor(schemas: readonly CollectionSchema[]) {
    for (const schema of schemas) {
      if (this.schemas.has(schema.name)) {
        throw schemaError(schema.name, 'collection is declared twice');
      }
      this.schemas.set(schema.name, schema);
    }
    validateCatalog(this.schemas);
  }

  get(collection: string): CollectionSchema | undefined {
    return this.schemas.get(collection);
  }

  require(collection: string): CollectionSchema {
    const schema = this.schemas.get(collection);
    if (!schema) {
      throw unknownCollection(collection);
    }
    return schema;
  }

  list(): CollectionSchema[] {
    return Array.from(this.schemas.values());
  }
}
