import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { VersionState, type PhysicalVersion } from '@palimpsest/core';
import { createTestEnvironment, seedLive, type TestEnvironment } from '../testing/test-utils.js';
import { attributeEquals, dedupeByLogicalId } from './overlay-reader.js';

function version(physicalId: number, originId: number, state: PhysicalVersion['state']): PhysicalVersion {
  return {
    physicalId,
    collection: 'pages',
    originId,
    draftContextId: state === VersionState.LIVE ? 0 : 1,
    state,
    updatedAt: '2024-01-01T00:00:00.000Z',
    attributes: {},
  };
}

describe('dedupeByLogicalId', () => {
  it('should keep the first row per logical id', () => {
    const draft = version(3, 1, VersionState.MODIFIED);
    const created = version(4, 0, VersionState.NEW);
    const live = version(1, 0, VersionState.LIVE);
    const other = version(2, 0, VersionState.LIVE);

    expect(dedupeByLogicalId([draft, created, live, other])).toEqual([draft, created, other]);
  });
});

describe('attributeEquals', () => {
  it('should compare JSON values by content and absent values as null', () => {
    expect(attributeEquals({ a: [1, 2] }, { a: [1, 2] })).toBe(true);
    expect(attributeEquals({ a: [1, 2] }, { a: [2, 1] })).toBe(false);
    expect(attributeEquals(undefined, null)).toBe(true);
    expect(attributeEquals(1, '1')).toBe(false);
    expect(attributeEquals(true, true)).toBe(true);
  });
});

describe('OverlayReader', () => {
  let env: TestEnvironment;

  beforeEach(() => {
    env = createTestEnvironment();
  });

  afterEach(() => {
    env.backend.close();
  });

  const titles = (versions: PhysicalVersion[]): unknown[] => versions.map((v) => v.attributes.title);

  it('should prefer the draft copy inside its own context only', () => {
    const home = seedLive(env.gateway, 'pages', { title: 'Home' });
    seedLive(env.gateway, 'pages', { title: 'About' });
    env.gateway.insert('pages', {
      originId: home,
      draftContextId: 5,
      state: VersionState.MODIFIED,
      attributes: { title: 'Home (draft)' },
    });

    expect(titles(env.reader.effectiveVersions('pages', 5))).toEqual(['Home (draft)', 'About']);
    expect(titles(env.reader.effectiveVersions('pages', 0))).toEqual(['Home', 'About']);
    expect(titles(env.reader.effectiveVersions('pages', 6))).toEqual(['Home', 'About']);
  });

  it('should add new records of the context', () => {
    seedLive(env.gateway, 'pages', { title: 'Home' });
    env.gateway.insert('pages', {
      originId: 0,
      draftContextId: 5,
      state: VersionState.NEW,
      attributes: { title: 'Fresh' },
    });

    expect(titles(env.reader.effectiveVersions('pages', 5))).toEqual(['Fresh', 'Home']);
    expect(titles(env.reader.effectiveVersions('pages', 0))).toEqual(['Home']);
  });

  it('should drop records tombstoned in the context', () => {
    const home = seedLive(env.gateway, 'pages', { title: 'Home' });
    seedLive(env.gateway, 'pages', { title: 'About' });
    env.gateway.insert('pages', {
      originId: home,
      draftContextId: 5,
      state: VersionState.TOMBSTONE,
      attributes: { title: 'Home' },
    });

    expect(titles(env.reader.effectiveVersions('pages', 5))).toEqual(['About']);
    expect(env.reader.effectiveVersion('pages', 5, home)).toBeUndefined();
    expect(env.reader.effectiveVersion('pages', 0, home)?.physicalId).toBe(home);
  });

  it('should filter by container and hidden flag and sort by the sorting field', () => {
    seedLive(env.gateway, 'pages', { pid: 1, sorting: 20, title: 'Second' });
    seedLive(env.gateway, 'pages', { pid: 1, sorting: 10, title: 'First' });
    seedLive(env.gateway, 'pages', { pid: 2, sorting: 5, title: 'Elsewhere' });
    seedLive(env.gateway, 'pages', { pid: 1, sorting: 30, hidden: true, title: 'Hidden' });

    expect(titles(env.reader.list('pages', 0, { container: 1 }))).toEqual(['First', 'Second']);
    expect(titles(env.reader.list('pages', 0, { container: 1, includeHidden: true }))).toEqual([
      'First',
      'Second',
      'Hidden',
    ]);
    expect(titles(env.reader.list('pages', 0))).toEqual(['Elsewhere', 'First', 'Second']);
  });

  it('should sort missing sorting values first and break ties by logical id', () => {
    seedLive(env.gateway, 'pages', { sorting: 1, title: 'B' });
    seedLive(env.gateway, 'pages', { sorting: 1, title: 'A' });
    seedLive(env.gateway, 'pages', { title: 'Unsorted' });

    expect(titles(env.reader.list('pages', 0))).toEqual(['Unsorted', 'B', 'A']);
  });

  it('should filter by attribute values of the effective version', () => {
    const home = seedLive(env.gateway, 'pages', { title: 'Home', pid: 1 });
    seedLive(env.gateway, 'pages', { title: 'Home', pid: 2 });
    const draft = env.gateway.insert('pages', {
      originId: home,
      draftContextId: 5,
      state: VersionState.MODIFIED,
      attributes: { title: 'Start', pid: 1 },
    });

    expect(env.reader.list('pages', 5, { where: { title: 'Home' } }).map((v) => v.attributes.pid)).toEqual([2]);
    expect(env.reader.list('pages', 5, { where: { title: 'Start' } }).map((v) => v.physicalId)).toEqual([draft]);
    expect(env.reader.list('pages', 0, { where: { title: 'Home' } })).toHaveLength(2);
    expect(env.reader.list('pages', 0, { where: { title: 'Home', pid: 3 } })).toEqual([]);
  });

  it('should list effective children of a parent', () => {
    seedLive(env.gateway, 'links', { parent_id: 1, uri: 'https://example.com/b', sorting: 2 });
    const first = seedLive(env.gateway, 'links', { parent_id: 1, uri: 'https://example.com/a', sorting: 1 });
    seedLive(env.gateway, 'links', { parent_id: 2, uri: 'https://example.com/other', sorting: 1 });
    env.gateway.insert('links', {
      originId: first,
      draftContextId: 5,
      state: VersionState.MODIFIED,
      attributes: { parent_id: 1, uri: 'https://example.com/a2', sorting: 3 },
    });

    const target = { collection: 'links', foreignField: 'parent_id' };
    expect(env.reader.children(target, 1, 0).map((v) => v.attributes.uri)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
    ]);
    expect(env.reader.children(target, 1, 5).map((v) => v.attributes.uri)).toEqual([
      'https://example.com/b',
      'https://example.com/a2',
    ]);
  });
});
