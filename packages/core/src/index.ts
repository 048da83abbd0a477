/**
 * @sluice/core: shared contracts for sluice.
 *
 * Errors, JSON types, and the collaborator interfaces the provider layer
 * depends on.
 */

export * from './errors/index.js';
export * from './types/index.js';
export * from './interfaces/index.js';
