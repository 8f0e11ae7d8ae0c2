import { describe, it, expect } from 'vitest';
import type { AccessConfig } from '../config/index.js';
import { createTestCatalog } from '../testing/test-utils.js';
import { AccessOperation, ConfiguredAccessGate, isWriteOperation } from './access-gate.js';

function gate(access: Partial<AccessConfig> = {}): ConfiguredAccessGate {
  return new ConfiguredAccessGate(createTestCatalog(), {
    readOnlyCollections: [],
    restrictedCollections: [],
    excludedAttributes: {},
    principals: {},
    ...access,
  });
}

describe('isWriteOperation', () => {
  it('should treat everything but read as a write', () => {
    expect(isWriteOperation(AccessOperation.READ)).toBe(false);
    expect(isWriteOperation(AccessOperation.MOVE)).toBe(true);
  });
});

describe('ConfiguredAccessGate', () => {
  it('should allow everything without rules', () => {
    const decision = gate().check('agent', 'pages', AccessOperation.UPDATE);
    expect(decision).toEqual({
      allowed: true,
      readableAttributes: ['pid', 'title', 'slug', 'sorting', 'hidden', 'doktype', 'tsconfig'],
      writableAttributes: ['pid', 'title', 'slug', 'sorting', 'hidden', 'doktype', 'tsconfig'],
    });
  });

  it('should keep embedded attributes readable but not writable', () => {
    const decision = gate().check('agent', 'news', AccessOperation.CREATE);
    expect(decision.readableAttributes).toEqual(['title', 'teaser', 'links']);
    expect(decision.writableAttributes).toEqual(['title', 'teaser']);
  });

  it('should never let callers write the parent link', () => {
    const decision = gate().check('agent', 'links', AccessOperation.UPDATE);
    expect(decision.writableAttributes).toEqual(['uri', 'sorting']);
  });

  it('should hide excluded attributes', () => {
    const decision = gate({ excludedAttributes: { pages: ['tsconfig', 'slug'] } }).check(
      'agent',
      'pages',
      AccessOperation.READ
    );
    expect(decision.readableAttributes).toEqual(['pid', 'title', 'sorting', 'hidden', 'doktype']);
    expect(decision.writableAttributes).toEqual(['pid', 'title', 'sorting', 'hidden', 'doktype']);
  });

  it('should deny every operation on restricted collections', () => {
    const decision = gate({ restrictedCollections: ['content'] }).check('agent', 'content', AccessOperation.READ);
    expect(decision.allowed).toBe(false);
    expect(decision.reason).toBe('collection is restricted');
    expect(decision.readOnly).toBe(false);
  });

  it('should allow reads but not writes on read-only collections', () => {
    const access = gate({ readOnlyCollections: ['pages'] });
    expect(access.check('agent', 'pages', AccessOperation.READ).allowed).toBe(true);

    const decision = access.check('agent', 'pages', AccessOperation.DELETE);
    expect(decision.allowed).toBe(false);
    expect(decision.reason).toBe('collection is read-only');
    expect(decision.readOnly).toBe(true);
  });

  it('should limit a principal to its listed collections', () => {
    const access = gate({ principals: { 'content-agent': { collections: ['content'] } } });
    expect(access.check('content-agent', 'content', AccessOperation.CREATE).allowed).toBe(true);
    expect(access.check('content-agent', 'pages', AccessOperation.READ).reason).toBe(
      'collection is not available to this principal'
    );
    expect(access.check('other-agent', 'pages', AccessOperation.READ).allowed).toBe(true);
  });

  it('should keep read-only principals to reads', () => {
    const access = gate({ principals: { auditor: { readOnly: true } } });
    expect(access.check('auditor', 'news', AccessOperation.READ).allowed).toBe(true);

    const decision = access.check('auditor', 'news', AccessOperation.CREATE);
    expect(decision.reason).toBe('principal may only read');
    expect(decision.readOnly).toBe(true);
  });

  it('should reject unknown collections', () => {
    expect(() => gate().check('agent', 'users', AccessOperation.READ)).toThrow();
  });
});
