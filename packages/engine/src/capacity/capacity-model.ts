/**
 * Capacity Model
 *
 * How much capital the pool may claim before it reaches the current
 * provisioning limit, and how much a depositor could still send.
 */

import type { PoolState } from '@pooled-staking/shared';
import { SCALE, add, divScaled, mul, sub } from '../math/fixed-point.js';
import type { ParameterSnapshot } from '../params/admin-parameter-store.js';

export type CapacityParams = Pick<ParameterSnapshot, 'unitSize' | 'unitsPerLot'>;

export type ClaimState = Pick<PoolState, 'claimedShares'>;

export function capacityLimit(params: CapacityParams): bigint {
  return mul(params.unitSize, params.unitsPerLot);
}

/**
 * Capacity limit plus buffer: the ceiling claimed shares may never cross
 */
export function hardCap(params: CapacityParams & Pick<ParameterSnapshot, 'buffer'>): bigint {
  return add(capacityLimit(params), params.buffer);
}

/**
 * Space left below the capacity limit, zero when claims already exceed it
 */
export function remainingCapacity(pool: ClaimState, params: CapacityParams): bigint {
  const limit = capacityLimit(params);
  return pool.claimedShares >= limit ? 0n : sub(limit, pool.claimedShares);
}

/**
 * Space left below capacity limit plus buffer
 */
export function remainingHardCapacity(
  pool: ClaimState,
  params: CapacityParams & Pick<ParameterSnapshot, 'buffer'>
): bigint {
  const cap = hardCap(params);
  return pool.claimedShares >= cap ? 0n : sub(cap, pool.claimedShares);
}

/**
 * Gross deposit whose net, after the admin fee share of the lot unit cost,
 * fills the remaining capacity. Advisory only: a non-linear fee policy makes
 * it an estimate; the deposit itself checks the real net amount.
 */
export function maxDepositBeforeFee(
  pool: ClaimState,
  params: CapacityParams & Pick<ParameterSnapshot, 'adminFee' | 'lotUnitCost'>
): bigint {
  const remaining = remainingCapacity(pool, params);
  const adminFeePercent = divScaled(params.adminFee, params.lotUnitCost);
  return divScaled(remaining, sub(SCALE, adminFeePercent));
}
