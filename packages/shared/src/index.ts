/**
 * @pooled-staking/shared - Shared types, schemas, errors and logging
 *
 * This package contains code shared by the engine and any process embedding it.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './utils/load-env.js';
