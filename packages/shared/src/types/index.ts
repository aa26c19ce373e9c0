/**
 * Shared types for the pooled staking engine
 */

export * from './pool.js';
