/**
 * Provisioning Gate
 *
 * Authorizes a batch send of pooled capital to the provisioning sink.
 * Claimed shares are left alone: provisioned capital stays claimed until the
 * shares backing it are burned, so custody and accounting diverge on purpose.
 */

import type { BatchAuthorization, ProvisioningBatch } from '@pooled-staking/shared';
import {
  InsufficientBalanceError,
  InvalidParameterError,
  ProvisioningBatchSchema,
} from '@pooled-staking/shared';
import { add, mul } from '../math/fixed-point.js';
import type { DepositWithdrawAccountingEngine } from '../accounting/deposit-withdraw-engine.js';
import type { ParameterSnapshot } from '../params/admin-parameter-store.js';

/**
 * Validate credential arrays: hex widths and equal lengths
 */
export function validateBatch(batch: ProvisioningBatch): ProvisioningBatch {
  const result = ProvisioningBatchSchema.safeParse(batch);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidParameterError(`invalid provisioning batch${where}: ${issue?.message ?? 'rejected'}`);
  }
  return result.data;
}

/**
 * Split a credential set into batches of at most `size` units
 */
export function chunkBatch(batch: ProvisioningBatch, size: number): ProvisioningBatch[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidParameterError('chunk size must be a positive integer', { details: { size } });
  }
  const chunks: ProvisioningBatch[] = [];
  for (let start = 0; start < batch.pubkeys.length; start += size) {
    chunks.push({
      pubkeys: batch.pubkeys.slice(start, start + size),
      signatures: batch.signatures.slice(start, start + size),
      depositDataRoots: batch.depositDataRoots.slice(start, start + size),
    });
  }
  return chunks;
}

export class ProvisioningGate {
  constructor(private readonly engine: DepositWithdrawAccountingEngine) {}

  /**
   * Check that `unitCount` units can be funded from `nativeBalance` while
   * still covering the accrued fee, and advance the provisioned counter
   */
  authorizeBatch(
    unitCount: bigint,
    nativeBalance: bigint,
    params: Pick<ParameterSnapshot, 'unitSize' | 'unitsPerLot'>
  ): BatchAuthorization {
    if (unitCount <= 0n || unitCount > params.unitsPerLot) {
      throw new InvalidParameterError('unit count must be between 1 and unitsPerLot', {
        details: { unitCount, unitsPerLot: params.unitsPerLot },
      });
    }

    // Accrued fee stays in the pool after the batch leaves
    const amount = mul(unitCount, params.unitSize);
    const { accruedFee } = this.engine.getState();
    if (nativeBalance < add(amount, accruedFee)) {
      throw new InsufficientBalanceError('pool balance cannot fund provisioning batch and accrued fee', {
        details: { unitCount, amount, accruedFee, nativeBalance },
      });
    }

    const lotsProvisioned = this.engine.recordProvisioned(unitCount);
    return { unitCount, amount, lotsProvisioned };
  }

  /**
   * Validate a credential batch and authorize one unit per entry
   */
  authorizeCredentials(
    batch: ProvisioningBatch,
    nativeBalance: bigint,
    params: Pick<ParameterSnapshot, 'unitSize' | 'unitsPerLot'>
  ): BatchAuthorization {
    const valid = validateBatch(batch);
    return this.authorizeBatch(BigInt(valid.pubkeys.length), nativeBalance, params);
  }
}
