/**
 * Draft Context Selector
 *
 * Finds or lazily creates the draft context a principal's requests run in.
 * Creation relies on the unique index over open contexts: the loser of a
 * creation race re-reads and adopts the winner's row.
 */

import {
  ErrorCode,
  LIVE_CONTEXT_ID,
  contextUnavailable,
  createLogger,
  draftContextNotFound,
  hasErrorCode,
  invalidInput,
  type DraftContextId,
  type DraftContextInfo,
} from '@palimpsest/core';
import type { DraftContextRepository } from './repository.js';

const logger = createLogger('draft-contexts');

export interface DraftContextSelectorOptions {
  /** Create a context when the principal has none */
  autoCreate: boolean;
  /** `{principal}` is replaced with the owner */
  titleTemplate: string;
  /** Storage cannot be written; contexts are never created */
  readonly: boolean;
  now?: () => Date;
}

export class DraftContextSelector {
  private readonly now: () => Date;

  constructor(
    private readonly repository: DraftContextRepository,
    private readonly options: DraftContextSelectorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Context for the principal's next write, created when missing
   */
  select(principal: string): DraftContextId {
    requirePrincipal(principal);

    const existing = this.repository.findOpen(principal);
    if (existing) {
      return existing.id;
    }

    if (this.options.readonly) {
      throw contextUnavailable(principal, 'storage is read-only');
    }
    if (!this.options.autoCreate) {
      throw contextUnavailable(principal, 'automatic draft creation is disabled');
    }

    const title = this.options.titleTemplate.replaceAll('{principal}', principal);
    try {
      const created = this.repository.insert(principal, title, this.now().toISOString());
      logger.info(`Created draft context ${created.id} for ${principal}`);
      return created.id;
    } catch (error) {
      if (hasErrorCode(error, ErrorCode.ALREADY_EXISTS)) {
        const winner = this.repository.findOpen(principal);
        if (winner) {
          logger.debug(`Adopted draft context ${winner.id} created concurrently for ${principal}`);
          return winner.id;
        }
      }
      const cause = error instanceof Error ? error : undefined;
      if (hasErrorCode(error, ErrorCode.DATABASE_READONLY)) {
        throw contextUnavailable(principal, 'storage is read-only', cause);
      }
      logger.error(`Could not create draft context for ${principal}`, error);
      throw contextUnavailable(principal, 'draft context could not be created', cause);
    }
  }

  /**
   * Context reads run in; LIVE_CONTEXT_ID when the principal has none.
   * Never creates a context.
   */
  findActive(principal: string): DraftContextId {
    requirePrincipal(principal);
    return this.repository.findOpen(principal)?.id ?? LIVE_CONTEXT_ID;
  }

  describe(draftContextId: DraftContextId): DraftContextInfo {
    if (draftContextId === LIVE_CONTEXT_ID) {
      return {
        draftContextId: LIVE_CONTEXT_ID,
        title: 'Live',
        ownerPrincipal: null,
        isFrozen: false,
        isLive: true,
      };
    }
    const context = this.repository.getById(draftContextId);
    if (!context) {
      throw draftContextNotFound(draftContextId);
    }
    return {
      draftContextId: context.id,
      title: context.title,
      ownerPrincipal: context.ownerPrincipal,
      isFrozen: context.isFrozen,
      isLive: false,
    };
  }

  /**
   * Freezes a context; its owner's next write gets a new one
   */
  freeze(draftContextId: DraftContextId): void {
    if (draftContextId === LIVE_CONTEXT_ID) {
      throw invalidInput('draftContextId', draftContextId, 'a draft context id');
    }
    try {
      if (!this.repository.freeze(draftContextId)) {
        throw draftContextNotFound(draftContextId);
      }
    } catch (error) {
      if (hasErrorCode(error, ErrorCode.DATABASE_READONLY)) {
        throw contextUnavailable(`context ${draftContextId}`, 'storage is read-only', error);
      }
      throw error;
    }
    logger.info(`Froze draft context ${draftContextId}`);
  }
}

function requirePrincipal(principal: string): void {
  if (principal.trim() === '') {
    throw invalidInput('principal', principal, 'non-empty principal name');
  }
}
