export { DraftContextRepository } from './repository.js';
export { DraftContextSelector, type DraftContextSelectorOptions } from './selector.js';
