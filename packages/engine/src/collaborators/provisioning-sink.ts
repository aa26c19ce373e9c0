/**
 * Provisioning sink
 *
 * Irreversible destination of provisioned capital. The pool transfers
 * `unitSize` per unit to the sink's address before calling `provision`.
 */

import type { Address, ProvisioningBatch } from '@pooled-staking/shared';

export interface ProvisioningSink {
  readonly address: Address;
  provision(batch: ProvisioningBatch, withdrawalCredential: string, value: bigint): void;
}

export interface ProvisionedUnit {
  pubkey: string;
  signature: string;
  depositDataRoot: string;
  withdrawalCredential: string;
  amount: bigint;
}

/**
 * Sink that records every unit it receives
 */
export class RecordingProvisioningSink implements ProvisioningSink {
  private readonly units: ProvisionedUnit[] = [];

  constructor(readonly address: Address = 'provisioning-sink') {}

  provision(batch: ProvisioningBatch, withdrawalCredential: string, value: bigint): void {
    const count = BigInt(batch.pubkeys.length);
    const amount = count === 0n ? 0n : value / count;
    batch.pubkeys.forEach((pubkey, index) => {
      this.units.push({
        pubkey,
        signature: batch.signatures[index] ?? '',
        depositDataRoot: batch.depositDataRoots[index] ?? '',
        withdrawalCredential,
        amount,
      });
    });
  }

  getUnits(): readonly ProvisionedUnit[] {
    return this.units;
  }
}
