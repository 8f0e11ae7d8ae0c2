import { describe, it, expect } from 'vitest';
import { AttributeType, ErrorCode, hasErrorCode, type CollectionSchema } from '@palimpsest/core';
import { ConfiguredSchemaCatalog } from './schema-catalog.js';
import { TEST_SCHEMAS, createTestCatalog } from '../testing/test-utils.js';

function catalogOf(...schemas: CollectionSchema[]): ConfiguredSchemaCatalog {
  return new ConfiguredSchemaCatalog(schemas);
}

describe('ConfiguredSchemaCatalog', () => {
  it('should look up collections by name', () => {
    const catalog = createTestCatalog();
    expect(catalog.get('pages')?.containerField).toBe('pid');
    expect(catalog.get('missing')).toBeUndefined();
    expect(catalog.list().map((s) => s.name)).toEqual(['pages', 'news', 'links', 'content']);
  });

  it('should raise UNKNOWN_COLLECTION from require', () => {
    const catalog = createTestCatalog();
    let caught: unknown;
    try {
      catalog.require('be_users');
    } catch (error) {
      caught = error;
    }
    expect(hasErrorCode(caught, ErrorCode.UNKNOWN_COLLECTION)).toBe(true);
  });

  it('should reject duplicate collections', () => {
    expect(() => new ConfiguredSchemaCatalog([...TEST_SCHEMAS, TEST_SCHEMAS[0]])).toThrow(
      'Invalid schema for pages: collection is declared twice'
    );
  });

  it('should reject attributes named like system columns', () => {
    expect(() =>
      catalogOf({
        name: 'tags',
        identityFields: [],
        attributes: [{ name: 'version_state', type: AttributeType.STRING }],
      })
    ).toThrow('Invalid schema for tags: attribute version_state clashes with a system column');
  });

  it('should reject maxLength on non-string attributes', () => {
    expect(() =>
      catalogOf({
        name: 'tags',
        identityFields: [],
        attributes: [{ name: 'weight', type: AttributeType.INTEGER, maxLength: 3 }],
      })
    ).toThrow('Invalid schema for tags: maxLength is only allowed on string attributes (weight)');
  });

  it('should reject defaults that fail their own attribute', () => {
    expect(() =>
      catalogOf({
        name: 'tags',
        identityFields: [],
        attributes: [{ name: 'kind', type: AttributeType.STRING, allowedValues: ['a', 'b'], default: 'c' }],
      })
    ).toThrow('Invalid value for tags.kind: c');
  });

  it('should require structural fields to be stored attributes', () => {
    expect(() =>
      catalogOf({
        name: 'tags',
        identityFields: [],
        sortingField: 'position',
        attributes: [{ name: 'label', type: AttributeType.STRING }],
      })
    ).toThrow('Invalid schema for tags: sorting field position must be a stored attribute');
  });

  it('should require embedded targets to exist', () => {
    expect(() =>
      catalogOf({
        name: 'news',
        identityFields: [],
        attributes: [
          { name: 'links', type: AttributeType.EMBEDDED, embedded: { collection: 'links', foreignField: 'parent_id' } },
        ],
      })
    ).toThrow('Invalid schema for news: embedded attribute links targets unknown collection links');
  });

  it('should require the child to declare the foreign field as parent link', () => {
    const [, news, links] = TEST_SCHEMAS;
    const unlinked: CollectionSchema = { ...links, parentLinkField: undefined };
    expect(() => catalogOf(news, unlinked)).toThrow(
      'Invalid schema for news: links must declare parent_id as its parent link field'
    );
  });

  it('should reject required parent link fields', () => {
    expect(() =>
      catalogOf({
        name: 'links',
        identityFields: [],
        parentLinkField: 'parent_id',
        attributes: [{ name: 'parent_id', type: AttributeType.INTEGER, required: true }],
      })
    ).toThrow('Invalid schema for links: parent link field parent_id cannot be required');
  });
});
