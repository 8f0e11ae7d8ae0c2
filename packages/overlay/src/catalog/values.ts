/**
 * Attribute Value Checks
 *
 * Type, length and allowed-value checks applied to caller input and to
 * schema defaults.
 */

import {
  AttributeType,
  invalidAttribute,
  type AttributeDefinition,
  type AttributeValue,
} from '@palimpsest/core';

function expectedFor(definition: AttributeDefinition): string {
  switch (definition.type) {
    case AttributeType.STRING:
    case AttributeType.TEXT:
      return definition.maxLength !== undefined
        ? `string of at most ${definition.maxLength} characters`
        : 'string';
    case AttributeType.INTEGER:
      return 'integer';
    case AttributeType.NUMBER:
      return 'finite number';
    case AttributeType.BOOLEAN:
      return 'boolean';
    case AttributeType.DATETIME:
      return 'ISO 8601 datetime';
    case AttributeType.JSON:
      return 'JSON value';
    case AttributeType.EMBEDDED:
      return 'records created together with their parent';
  }
}

function matchesType(definition: AttributeDefinition, value: AttributeValue): boolean {
  switch (definition.type) {
    case AttributeType.STRING:
    case AttributeType.TEXT:
      return (
        typeof value === 'string' &&
        (definition.maxLength === undefined || [...value].length <= definition.maxLength)
      );
    case AttributeType.INTEGER:
      return typeof value === 'number' && Number.isSafeInteger(value);
    case AttributeType.NUMBER:
      return typeof value === 'number' && Number.isFinite(value);
    case AttributeType.BOOLEAN:
      return typeof value === 'boolean';
    case AttributeType.DATETIME:
      return typeof value === 'string' && !Number.isNaN(Date.parse(value));
    case AttributeType.JSON:
      return true;
    case AttributeType.EMBEDDED:
      return false;
  }
}

/**
 * Throws INVALID_ATTRIBUTE when `value` does not fit the definition.
 * Null clears optional attributes.
 */
export function checkAttributeValue(
  collection: string,
  definition: AttributeDefinition,
  value: AttributeValue
): void {
  if (value === null) {
    if (definition.required) {
      throw invalidAttribute(collection, definition.name, value, 'a value');
    }
    return;
  }

  if (!matchesType(definition, value)) {
    throw invalidAttribute(collection, definition.name, value, expectedFor(definition));
  }

  const allowed = definition.allowedValues;
  if (allowed !== undefined && allowed.length > 0) {
    const listed = (typeof value === 'string' || typeof value === 'number') && allowed.includes(value);
    if (!listed) {
      throw invalidAttribute(collection, definition.name, value, `one of: ${allowed.join(', ')}`);
    }
  }
}
