/**
 * Deposit/Withdraw Accounting Engine
 *
 * Owns the pool's accounting state and is the only component that writes it.
 * This component is responsible for:
 * - Turning gross deposits into net shares to mint (after the fee policy)
 * - Keeping claimed shares under capacity limit plus buffer
 * - Turning burned shares into net native capital to release
 * - Tracking the operator's accrued fee and the provisioned unit counter
 *
 * Every operation computes all new values first and writes them last, so a
 * failed precondition leaves the state untouched.
 */

import type {
  Address,
  DepositReceipt,
  PoolState,
  SerializedPoolState,
  WithdrawReceipt,
} from '@pooled-staking/shared';
import {
  ArithmeticOverflowError,
  CapacityExceededError,
  InsufficientBalanceError,
  InvalidAmountError,
  InvalidParameterError,
  InvariantViolationError,
  SerializedPoolStateSchema,
} from '@pooled-staking/shared';
import { add, checkUint, sub } from '../math/fixed-point.js';
import { hardCap } from '../capacity/capacity-model.js';
import { quoteDeposit, quoteWithdraw } from '../fees/fee-policy.js';
import type { ParameterSnapshot } from '../params/admin-parameter-store.js';

/**
 * Restorable copy of the engine state
 */
export interface EngineSnapshot {
  readonly state: Readonly<PoolState>;
  readonly migrated: boolean;
}

export interface MigrationResult {
  previous: bigint;
  next: bigint;
}

function assertPositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new InvalidAmountError(`${label} must be positive`, { details: { [label]: amount } });
  }
  checkUint(amount, label);
}

export class DepositWithdrawAccountingEngine {
  private state: PoolState = {
    claimedShares: 0n,
    accruedFee: 0n,
    lotsProvisioned: 0n,
  };
  private migrated = false;

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  getState(): Readonly<PoolState> {
    return Object.freeze({ ...this.state });
  }

  hasMigrated(): boolean {
    return this.migrated;
  }

  // ===========================================================================
  // DEPOSIT
  // ===========================================================================

  /**
   * Account for `grossAmount` of native capital sent by `caller`.
   * Returns the receipt whose `netAmount` is the share amount to mint.
   */
  recordDeposit(grossAmount: bigint, caller: Address, params: ParameterSnapshot): DepositReceipt {
    assertPositive(grossAmount, 'grossAmount');

    const { netAmount, fee } = quoteDeposit(params.feePolicy, grossAmount, caller);

    // Deposit fees always accrue; the refund switch only applies to withdrawals
    const accruedFee = add(this.state.accruedFee, fee);
    const claimedShares = add(this.state.claimedShares, netAmount);
    const cap = hardCap(params);

    if (claimedShares > cap) {
      throw new CapacityExceededError('deposit exceeds pool capacity', {
        details: {
          caller,
          netAmount,
          claimedShares: this.state.claimedShares,
          capacity: cap,
        },
      });
    }

    this.state = { ...this.state, claimedShares, accruedFee };

    return { caller, grossAmount, netAmount, fee, claimedShares };
  }

  // ===========================================================================
  // WITHDRAW
  // ===========================================================================

  /**
   * Account for `amount` shares burned by `caller`. `nativeBalance` is the
   * pool's native capital before anything is released. Returns the receipt
   * whose `netAmount` is the native capital to send back.
   */
  recordWithdraw(
    amount: bigint,
    caller: Address,
    params: ParameterSnapshot,
    nativeBalance: bigint
  ): WithdrawReceipt {
    assertPositive(amount, 'amount');

    const { netAmount, fee } = quoteWithdraw(params.feePolicy, amount, caller);

    let accruedFee: bigint;
    if (params.refundFeesOnWithdraw) {
      if (fee > this.state.accruedFee) {
        throw new ArithmeticOverflowError('refunded fee exceeds accrued fee', {
          details: { fee, accruedFee: this.state.accruedFee },
        });
      }
      accruedFee = sub(this.state.accruedFee, fee);
    } else {
      accruedFee = add(this.state.accruedFee, fee);
    }

    const obligations = add(netAmount, accruedFee);
    if (nativeBalance < obligations) {
      throw new InsufficientBalanceError('pool balance cannot cover withdrawal and accrued fee', {
        details: { caller, netAmount, accruedFee, nativeBalance },
      });
    }

    if (netAmount > this.state.claimedShares) {
      throw new InvariantViolationError('withdrawal exceeds claimed shares', {
        details: { caller, netAmount, claimedShares: this.state.claimedShares },
      });
    }
    const claimedShares = this.state.claimedShares - netAmount;

    this.state = { ...this.state, claimedShares, accruedFee };

    return {
      caller,
      sharesBurned: amount,
      netAmount,
      fee,
      feeRefunded: params.refundFeesOnWithdraw,
      claimedShares,
    };
  }

  // ===========================================================================
  // OPERATOR
  // ===========================================================================

  /**
   * Release accrued fee to the operator. Zero means everything accrued.
   * Only accrued fee is releasable here; buffer capital leaves through burns.
   */
  withdrawAccruedFee(amount: bigint, nativeBalance: bigint): bigint {
    checkUint(amount, 'amount');
    const value = amount === 0n ? this.state.accruedFee : amount;

    if (value > this.state.accruedFee) {
      throw new InsufficientBalanceError('amount exceeds accrued fee', {
        details: { amount: value, accruedFee: this.state.accruedFee },
      });
    }
    if (value > nativeBalance) {
      throw new InsufficientBalanceError('pool balance cannot cover fee withdrawal', {
        details: { amount: value, nativeBalance },
      });
    }

    this.state = { ...this.state, accruedFee: this.state.accruedFee - value };
    return value;
  }

  /**
   * Overwrite claimed shares when porting state from a previous pool.
   * Bypasses capacity checks; allowed once per engine.
   */
  migrateClaimedShares(value: bigint): MigrationResult {
    checkUint(value, 'claimedShares');
    if (this.migrated) {
      throw new InvalidParameterError('claimed shares were already migrated');
    }

    const previous = this.state.claimedShares;
    this.state = { ...this.state, claimedShares: value };
    this.migrated = true;
    return { previous, next: value };
  }

  /**
   * Advance the provisioned unit counter
   */
  recordProvisioned(unitCount: bigint): bigint {
    assertPositive(unitCount, 'unitCount');
    const lotsProvisioned = add(this.state.lotsProvisioned, unitCount);
    this.state = { ...this.state, lotsProvisioned };
    return lotsProvisioned;
  }

  // ===========================================================================
  // ROLLBACK
  // ===========================================================================

  snapshot(): EngineSnapshot {
    return { state: this.getState(), migrated: this.migrated };
  }

  restore(snapshot: EngineSnapshot): void {
    this.state = { ...snapshot.state };
    this.migrated = snapshot.migrated;
  }

  // ===========================================================================
  // SERIALIZATION
  // ===========================================================================

  toJSON(): SerializedPoolState {
    return {
      version: 1,
      timestamp: Date.now(),
      state: {
        claimedShares: this.state.claimedShares.toString(),
        accruedFee: this.state.accruedFee.toString(),
        lotsProvisioned: this.state.lotsProvisioned.toString(),
      },
      migrated: this.migrated,
    };
  }

  static fromJSON(json: string | SerializedPoolState): DepositWithdrawAccountingEngine {
    const raw: unknown = typeof json === 'string' ? JSON.parse(json) : json;
    const result = SerializedPoolStateSchema.safeParse(raw);
    if (!result.success) {
      throw new InvalidParameterError(`invalid serialized pool state: ${result.error.issues.map((i) => i.message).join('; ')}`);
    }

    const engine = new DepositWithdrawAccountingEngine();
    engine.restore({
      state: {
        claimedShares: checkUint(result.data.state.claimedShares, 'claimedShares'),
        accruedFee: checkUint(result.data.state.accruedFee, 'accruedFee'),
        lotsProvisioned: checkUint(result.data.state.lotsProvisioned, 'lotsProvisioned'),
      },
      migrated: result.data.migrated,
    });
    return engine;
  }
}
