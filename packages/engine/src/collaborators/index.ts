/**
 * External collaborators of the pool and their in-process implementations
 */

export * from './access-controller.js';
export * from './native-ledger.js';
export * from './share-token.js';
export * from './wrapped-vault.js';
export * from './provisioning-sink.js';
