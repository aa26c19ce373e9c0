/**
 * Admin Parameter Store
 *
 * Operator-controlled pool parameters. Every accounting operation works on a
 * frozen snapshot taken when it starts, so a change made while an operation
 * is in flight only applies to the next one.
 */

import type { Address } from '@pooled-staking/shared';
import { InvalidParameterError, WithdrawalCredentialSchema } from '@pooled-staking/shared';
import { add, checkUint } from '../math/fixed-point.js';
import type { AccessController } from '../collaborators/access-controller.js';
import { DISABLED_FEE_POLICY, describeFeePolicy, type FeePolicy } from '../fees/fee-policy.js';

export interface PoolParameters {
  /** Native capital per provisioning unit, fixed for the life of the pool */
  unitSize: bigint;
  /** Units one provisioning call may create; sets the capacity limit */
  unitsPerLot: bigint;
  /** Flat fee per unit embedded in the lot unit cost */
  adminFee: bigint;
  /** Tolerance above the capacity limit for claimed shares */
  buffer: bigint;
  /** Withdrawal fee is refunded (true) or charged again (false) */
  refundFeesOnWithdraw: boolean;
  feePolicy: FeePolicy;
  /** Destination identifier passed to the provisioning sink */
  withdrawalCredential: string | null;
}

export type ParameterSnapshot = Readonly<PoolParameters & { lotUnitCost: bigint }>;

export type ParameterKey = Exclude<keyof PoolParameters, 'unitSize'>;

export type ParameterValue = string | boolean | null;

export interface ParameterChange {
  key: ParameterKey;
  previous: ParameterValue;
  next: ParameterValue;
  by: Address;
}

export type InitialParameters = Pick<PoolParameters, 'unitSize' | 'unitsPerLot'> &
  Partial<Omit<PoolParameters, 'unitSize' | 'unitsPerLot'>>;

function display(key: ParameterKey, params: PoolParameters): ParameterValue {
  const value = params[key];
  if (key === 'feePolicy') return describeFeePolicy(params.feePolicy);
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'boolean' || typeof value === 'string' || value === null) return value;
  return null;
}

function validateUnitsPerLot(value: bigint): bigint {
  if (value <= 0n) {
    throw new InvalidParameterError('unitsPerLot must be positive', { details: { unitsPerLot: value } });
  }
  return checkUint(value, 'unitsPerLot');
}

function validateCredential(value: string): string {
  const result = WithdrawalCredentialSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidParameterError(`invalid withdrawal credential: ${result.error.issues[0]?.message ?? 'rejected'}`, {
      details: { withdrawalCredential: value },
    });
  }
  return result.data.toLowerCase();
}

function validateAmount(key: string, value: bigint): bigint {
  if (value < 0n) {
    throw new InvalidParameterError(`${key} must not be negative`, { details: { [key]: value } });
  }
  return checkUint(value, key);
}

export class AdminParameterStore {
  private params: PoolParameters;

  constructor(
    initial: InitialParameters,
    private readonly access: AccessController
  ) {
    if (initial.unitSize <= 0n) {
      throw new InvalidParameterError('unitSize must be positive', { details: { unitSize: initial.unitSize } });
    }
    this.params = {
      unitSize: checkUint(initial.unitSize, 'unitSize'),
      unitsPerLot: validateUnitsPerLot(initial.unitsPerLot),
      adminFee: validateAmount('adminFee', initial.adminFee ?? 0n),
      buffer: validateAmount('buffer', initial.buffer ?? 0n),
      refundFeesOnWithdraw: initial.refundFeesOnWithdraw ?? false,
      feePolicy: initial.feePolicy ?? DISABLED_FEE_POLICY,
      withdrawalCredential:
        initial.withdrawalCredential == null ? null : validateCredential(initial.withdrawalCredential),
    };
  }

  /**
   * Frozen copy of the current parameters
   */
  snapshot(): ParameterSnapshot {
    return Object.freeze({
      ...this.params,
      lotUnitCost: add(this.params.unitSize, this.params.adminFee),
    });
  }

  setUnitsPerLot(caller: Address, value: bigint): ParameterChange {
    return this.update(caller, 'unitsPerLot', () => ({ unitsPerLot: validateUnitsPerLot(value) }));
  }

  setAdminFee(caller: Address, value: bigint): ParameterChange {
    return this.update(caller, 'adminFee', () => ({ adminFee: validateAmount('adminFee', value) }));
  }

  setBuffer(caller: Address, value: bigint): ParameterChange {
    return this.update(caller, 'buffer', () => ({ buffer: validateAmount('buffer', value) }));
  }

  setRefundFeesOnWithdraw(caller: Address, value: boolean): ParameterChange {
    return this.update(caller, 'refundFeesOnWithdraw', () => ({ refundFeesOnWithdraw: value }));
  }

  setFeePolicy(caller: Address, value: FeePolicy): ParameterChange {
    return this.update(caller, 'feePolicy', () => ({ feePolicy: value }));
  }

  setWithdrawalCredential(caller: Address, value: string): ParameterChange {
    return this.update(caller, 'withdrawalCredential', () => ({ withdrawalCredential: validateCredential(value) }));
  }

  private update(caller: Address, key: ParameterKey, patch: () => Partial<PoolParameters>): ParameterChange {
    this.access.assertOperator(caller);
    const next = patch();
    const previous = display(key, this.params);
    this.params = { ...this.params, ...next };
    return { key, previous, next: display(key, this.params), by: caller };
  }
}
