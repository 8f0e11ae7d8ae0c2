import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { ValidationError } from '@palimpsest/core';
import {
  findConfigDir,
  discoverConfigFile,
  parseYamlConfig,
  convertYamlToConfig,
  readConfigFile,
} from './file.js';

describe('parseYamlConfig', () => {
  it('should return an empty object for empty files', () => {
    expect(parseYamlConfig('')).toEqual({});
  });

  it('should reject documents that are not mappings', () => {
    expect(() => parseYamlConfig('- a\n- b\n', 'config.yaml')).toThrow(
      'Configuration file must contain an object (config.yaml)'
    );
  });

  it('should wrap syntax errors', () => {
    expect(() => parseYamlConfig('drafts: [unclosed')).toThrow(ValidationError);
  });
});

describe('convertYamlToConfig', () => {
  it('should convert snake_case sections', () => {
    const parsed = parseYamlConfig(`
database: data/app.db
readonly: true
drafts:
  auto_create: false
  title_template: "Drafts of {principal}"
read:
  default_limit: 10
  max_limit: 50
  embed_children: false
access:
  read_only_collections: [sys_log]
  restricted_collections: [be_users]
  excluded_attributes:
    pages: [tsconfig]
  principals:
    agent-1:
      collections: [pages, tt_content]
      read_only: true
`);

    expect(convertYamlToConfig(parsed, '/srv/site/.palimpsest')).toEqual({
      database: '/srv/site/.palimpsest/data/app.db',
      readonly: true,
      drafts: { autoCreate: false, titleTemplate: 'Drafts of {principal}' },
      read: { defaultLimit: 10, maxLimit: 50, embedChildren: false },
      access: {
        readOnlyCollections: ['sys_log'],
        restrictedCollections: ['be_users'],
        excludedAttributes: { pages: ['tsconfig'] },
        principals: { 'agent-1': { collections: ['pages', 'tt_content'], readOnly: true } },
      },
    });
  });

  it('should keep in-memory databases as they are', () => {
    expect(convertYamlToConfig({ database: ':memory:' }, '/srv')).toEqual({ database: ':memory:' });
  });

  it('should name the offending field', () => {
    expect(() => convertYamlToConfig({ read: { default_limit: 'ten' } })).toThrow(
      'Configuration value read.default_limit must be an integer'
    );
    expect(() => convertYamlToConfig({ access: { read_only_collections: ['ok', 3] } })).toThrow(
      'Configuration value access.read_only_collections[1] must be a string'
    );
  });
});

describe('discovery', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'palimpsest-config-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should walk up to the nearest .palimpsest directory', () => {
    mkdirSync(join(root, '.palimpsest'));
    mkdirSync(join(root, 'a', 'b'), { recursive: true });
    expect(findConfigDir(join(root, 'a', 'b'), {})).toBe(join(root, '.palimpsest'));
  });

  it('should prefer PALIMPSEST_ROOT', () => {
    const other = join(root, 'other');
    mkdirSync(join(other, '.palimpsest'), { recursive: true });
    mkdirSync(join(root, '.palimpsest'));
    expect(findConfigDir(root, { PALIMPSEST_ROOT: other })).toBe(join(other, '.palimpsest'));
  });

  it('should report missing config files', () => {
    mkdirSync(join(root, '.palimpsest'));
    expect(discoverConfigFile(undefined, root, {})).toEqual({
      path: join(root, '.palimpsest', 'config.yaml'),
      exists: false,
    });
  });

  it('should resolve explicit paths', () => {
    expect(discoverConfigFile('missing.yaml', root, {})).toEqual({
      path: resolve('missing.yaml'),
      exists: false,
    });
  });

  it('should read files and resolve paths next to them', () => {
    const dir = join(root, '.palimpsest');
    mkdirSync(dir);
    writeFileSync(join(dir, 'config.yaml'), 'schema: collections.yaml\n');
    expect(readConfigFile(join(dir, 'config.yaml'))).toEqual({
      schema: join(dir, 'collections.yaml'),
    });
  });
});
