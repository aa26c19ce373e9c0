/**
 * @pooled-staking/engine - Deposit/withdrawal accounting core
 */

export * from './math/fixed-point.js';
export * from './capacity/capacity-model.js';
export * from './fees/fee-policy.js';
export * from './params/admin-parameter-store.js';
export * from './accounting/deposit-withdraw-engine.js';
export * from './provisioning/provisioning-gate.js';
export * from './guard/reentrancy-guard.js';
export * from './guard/atomic-scope.js';
export * from './collaborators/index.js';
export * from './pool/staking-pool.js';
export * from './config/pool-config.js';
