/**
 * Attribute values as seen by callers. Stored values are decoded according
 * to the collection schema before they leave the overlay.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export type Attributes = Record<string, AttributeValue>;

export function isAttributeObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks that an unknown value (for example parsed JSON) is an attribute value
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isAttributeValue);
  }
  if (isAttributeObject(value)) {
    return Object.values(value).every(isAttributeValue);
  }
  return false;
}
