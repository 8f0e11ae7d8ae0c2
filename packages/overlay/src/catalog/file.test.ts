import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { AttributeType } from '@palimpsest/core';
import { loadCatalogFile, parseCatalogYaml } from './file.js';

const EXAMPLE_CATALOG = fileURLToPath(
  new URL('../../../../examples/.palimpsest/collections.yaml', import.meta.url)
);

describe('parseCatalogYaml', () => {
  it('should convert attributes in declaration order', () => {
    const [pages] = parseCatalogYaml(`
collections:
  pages:
    container_field: pid
    identity_fields: [uid]
    attributes:
      pid: { type: integer, default: 0 }
      title: { type: string, required: true, max_length: 80 }
      doktype: { type: integer, allowed_values: [1, 254] }
      bodytext: text
`);

    expect(pages).toEqual({
      name: 'pages',
      identityFields: ['uid'],
      containerField: 'pid',
      attributes: [
        { name: 'pid', type: AttributeType.INTEGER, default: 0 },
        { name: 'title', type: AttributeType.STRING, required: true, maxLength: 80 },
        { name: 'doktype', type: AttributeType.INTEGER, allowedValues: [1, 254] },
        { name: 'bodytext', type: AttributeType.TEXT },
      ],
    });
  });

  it('should derive the parent link field of embedded children', () => {
    const schemas = parseCatalogYaml(`
collections:
  news:
    attributes:
      title: string
      links: { type: embedded, collection: links, foreign_field: parent_id }
  links:
    attributes:
      parent_id: integer
      uri: string
`);

    expect(schemas[0].attributes[1]).toEqual({
      name: 'links',
      type: AttributeType.EMBEDDED,
      embedded: { collection: 'links', foreignField: 'parent_id' },
    });
    expect(schemas[1].parentLinkField).toBe('parent_id');
  });

  it('should reject unknown attribute types', () => {
    expect(() =>
      parseCatalogYaml(`
collections:
  pages:
    attributes:
      title: varchar
`)
    ).toThrow('Configuration value collections.pages.attributes.title.type must be one of');
  });

  it('should reject embedded attributes without a foreign field', () => {
    expect(() =>
      parseCatalogYaml(`
collections:
  news:
    attributes:
      links: { type: embedded, collection: links }
`)
    ).toThrow('Configuration value collections.news.attributes.links must be both collection and foreign_field');
  });

  it('should require a collections mapping', () => {
    expect(() => parseCatalogYaml('pages: {}\n')).toThrow('Configuration value collections must be a mapping');
  });

  it('should wrap YAML syntax errors', () => {
    expect(() => parseCatalogYaml('collections: [', 'broken.yaml')).toThrow(
      'Failed to parse collection catalog (broken.yaml)'
    );
  });
});

describe('loadCatalogFile', () => {
  it('should load the example catalog', () => {
    const catalog = loadCatalogFile(EXAMPLE_CATALOG);
    expect(catalog.list().map((s) => s.name)).toEqual(['pages', 'content', 'news', 'news_links']);
    expect(catalog.require('news_links').parentLinkField).toBe('parent_id');
  });

  it('should report missing files', () => {
    expect(() => loadCatalogFile('/nonexistent/collections.yaml')).toThrow(
      'Cannot read collection catalog /nonexistent/collections.yaml'
    );
  });
});
