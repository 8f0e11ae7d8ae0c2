/**
 * Dependent Link Reconciler
 *
 * Creates a parent together with embedded children. The children's link to
 * the parent is a structural field callers cannot write, so it is patched
 * directly on the new draft rows once the parent's id is known. Parent and
 * children are written in one transaction.
 */

import {
  AttributeType,
  createLogger,
  findAttribute,
  invalidAttribute,
  invalidInput,
  invalidParent,
  type Attributes,
  type LogicalId,
} from '@palimpsest/core';
import type { SchemaCatalog } from '../catalog/index.js';
import type { StorageGateway } from '../gateway/index.js';
import type { WriteContext, WriteRouter } from './write-router.js';

const logger = createLogger('dependent-links');

export interface EmbeddedWriteContext extends WriteContext {
  /** Writable attributes of the child collection; defaults as for WriteContext */
  readonly childWritableAttributes?: readonly string[];
}

export class DependentLinkReconciler {
  constructor(
    private readonly gateway: StorageGateway,
    private readonly catalog: SchemaCatalog,
    private readonly router: WriteRouter
  ) {}

  createWithEmbeddedChildren(
    collection: string,
    parentData: Attributes,
    childField: string,
    children: readonly Attributes[],
    context: EmbeddedWriteContext
  ): LogicalId {
    const schema = this.catalog.require(collection);
    const attribute = findAttribute(schema, childField);
    if (!attribute || attribute.type !== AttributeType.EMBEDDED || !attribute.embedded) {
      throw invalidAttribute(collection, childField, childField, 'an embedded attribute');
    }
    if (!Array.isArray(children)) {
      throw invalidInput('children', children, 'a list of records');
    }
    const { collection: childCollection, foreignField } = attribute.embedded;
    const childContext: WriteContext = {
      draftContextId: context.draftContextId,
      principal: context.principal,
      writableAttributes: context.childWritableAttributes,
    };

    const parentId = this.router.route('createWithEmbeddedChildren', collection, () => {
      const createdParent = this.router.create(collection, parentData, context);
      const childIds = children.map((child) => this.router.create(childCollection, child, childContext));

      for (const childId of childIds) {
        const changes = this.gateway.update(childCollection, childId, {
          attributes: { [foreignField]: createdParent },
        });
        if (changes !== 1) {
          throw invalidParent(collection, createdParent, `link of ${childCollection}[${childId}] was not written`);
        }
      }
      return createdParent;
    });

    logger.debug(
      `created ${collection}[${parentId}] with ${children.length} ${childCollection} record(s) in draft ${context.draftContextId}`
    );
    return parentId;
  }
}
