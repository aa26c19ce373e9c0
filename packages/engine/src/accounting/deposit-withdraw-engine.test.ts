/**
 * Deposit/Withdraw Accounting Engine Tests
 *
 * Scenario, conservation and atomicity checks for the pool's accounting state.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ArithmeticOverflowError,
  CapacityExceededError,
  InsufficientBalanceError,
  InvalidAmountError,
  InvariantViolationError,
} from '@pooled-staking/shared';
import {
  BasisPointFeePolicy,
  DISABLED_FEE_POLICY,
  UnitFeePolicy,
  enableFeePolicy,
} from '../fees/fee-policy.js';
import type { ParameterSnapshot } from '../params/admin-parameter-store.js';
import { DepositWithdrawAccountingEngine } from './deposit-withdraw-engine.js';

const ALICE = '0xalice';

function params(overrides: Partial<ParameterSnapshot> = {}): ParameterSnapshot {
  return {
    unitSize: 32n,
    unitsPerLot: 2n,
    adminFee: 0n,
    buffer: 10n,
    refundFeesOnWithdraw: false,
    feePolicy: DISABLED_FEE_POLICY,
    withdrawalCredential: null,
    lotUnitCost: 32n,
    ...overrides,
  };
}

describe('DepositWithdrawAccountingEngine', () => {
  let engine: DepositWithdrawAccountingEngine;

  beforeEach(() => {
    engine = new DepositWithdrawAccountingEngine();
  });

  it('should start empty', () => {
    expect(engine.getState()).toEqual({ claimedShares: 0n, accruedFee: 0n, lotsProvisioned: 0n });
    expect(engine.hasMigrated()).toBe(false);
  });

  // ==========================================================================
  // DEPOSIT
  // ==========================================================================

  describe('recordDeposit', () => {
    it('should fill capacity plus buffer and reject the next unit', () => {
      engine.recordDeposit(64n, ALICE, params());
      const receipt = engine.recordDeposit(10n, ALICE, params());

      expect(receipt.claimedShares).toBe(74n);
      expect(() => engine.recordDeposit(1n, ALICE, params())).toThrow(CapacityExceededError);
      expect(() => engine.recordDeposit(1n, ALICE, params())).toThrow('deposit exceeds pool capacity');
      expect(engine.getState().claimedShares).toBe(74n);
    });

    it('should mint the net amount and accrue the fee', () => {
      const feePolicy = enableFeePolicy(new UnitFeePolicy(32n, 1n));

      const receipt = engine.recordDeposit(33n, ALICE, params({ feePolicy }));

      expect(receipt).toEqual({
        caller: ALICE,
        grossAmount: 33n,
        netAmount: 32n,
        fee: 1n,
        claimedShares: 32n,
      });
      expect(engine.getState().accruedFee).toBe(1n);
    });

    it('should accrue deposit fees even when withdrawal fees are refunded', () => {
      const feePolicy = enableFeePolicy(new UnitFeePolicy(32n, 1n));

      engine.recordDeposit(33n, ALICE, params({ feePolicy, refundFeesOnWithdraw: true }));

      expect(engine.getState().accruedFee).toBe(1n);
    });

    it('should check capacity against the net amount', () => {
      const feePolicy = enableFeePolicy(new UnitFeePolicy(32n, 1n));
      const tight = params({ feePolicy, unitsPerLot: 1n, buffer: 0n });

      // 33 gross nets 32, exactly the limit
      expect(engine.recordDeposit(33n, ALICE, tight).claimedShares).toBe(32n);
    });

    it('should reject a zero deposit', () => {
      expect(() => engine.recordDeposit(0n, ALICE, params())).toThrow(InvalidAmountError);
      expect(() => engine.recordDeposit(0n, ALICE, params())).toThrow('grossAmount must be positive');
    });
  });

  // ==========================================================================
  // WITHDRAW
  // ==========================================================================

  describe('recordWithdraw', () => {
    const feePolicy = enableFeePolicy(new UnitFeePolicy(32n, 1n));

    it('should refund the withdrawal fee out of accrued fee', () => {
      engine.recordDeposit(33n, ALICE, params({ feePolicy, refundFeesOnWithdraw: true }));

      const receipt = engine.recordWithdraw(32n, ALICE, params({ feePolicy, refundFeesOnWithdraw: true }), 33n);

      expect(receipt).toEqual({
        caller: ALICE,
        sharesBurned: 32n,
        netAmount: 31n,
        fee: 1n,
        feeRefunded: true,
        claimedShares: 1n,
      });
      expect(engine.getState()).toEqual({ claimedShares: 1n, accruedFee: 0n, lotsProvisioned: 0n });
    });

    it('should charge the withdrawal fee again when refunds are off', () => {
      engine.recordDeposit(33n, ALICE, params({ feePolicy }));

      const receipt = engine.recordWithdraw(32n, ALICE, params({ feePolicy }), 33n);

      expect(receipt.feeRefunded).toBe(false);
      expect(engine.getState()).toEqual({ claimedShares: 1n, accruedFee: 2n, lotsProvisioned: 0n });
    });

    it('should keep enough balance for net amount plus accrued fee', () => {
      engine.recordDeposit(33n, ALICE, params({ feePolicy }));

      // 31 net + 2 accrued > 32
      expect(() => engine.recordWithdraw(32n, ALICE, params({ feePolicy }), 32n)).toThrow(
        InsufficientBalanceError
      );
      expect(engine.getState()).toEqual({ claimedShares: 32n, accruedFee: 1n, lotsProvisioned: 0n });
    });

    it('should fail when the refunded fee exceeds accrued fee', () => {
      engine.migrateClaimedShares(32n);

      expect(() =>
        engine.recordWithdraw(32n, ALICE, params({ feePolicy, refundFeesOnWithdraw: true }), 100n)
      ).toThrow(ArithmeticOverflowError);
      expect(() =>
        engine.recordWithdraw(32n, ALICE, params({ feePolicy, refundFeesOnWithdraw: true }), 100n)
      ).toThrow('refunded fee exceeds accrued fee');
    });

    it('should never drive claimed shares negative', () => {
      expect(() => engine.recordWithdraw(5n, ALICE, params(), 100n)).toThrow(InvariantViolationError);
      expect(() => engine.recordWithdraw(5n, ALICE, params(), 100n)).toThrow(
        'withdrawal exceeds claimed shares'
      );
      expect(engine.getState().claimedShares).toBe(0n);
    });

    it('should reject a zero withdrawal', () => {
      expect(() => engine.recordWithdraw(0n, ALICE, params(), 100n)).toThrow('amount must be positive');
    });
  });

  // ==========================================================================
  // PROPERTIES
  // ==========================================================================

  describe('conservation', () => {
    it('should keep claimed shares equal to net deposits minus net withdrawals', () => {
      const wide = params({ unitsPerLot: 4n, buffer: 0n });
      const steps: Array<['deposit' | 'withdraw', bigint]> = [
        ['deposit', 10n],
        ['deposit', 20n],
        ['withdraw', 5n],
        ['deposit', 40n],
        ['withdraw', 25n],
        ['deposit', 50n],
        ['withdraw', 30n],
      ];

      let balance = 0n;
      let netDeposits = 0n;
      let netWithdrawals = 0n;

      for (const [kind, amount] of steps) {
        if (kind === 'deposit') {
          const receipt = engine.recordDeposit(amount, ALICE, wide);
          balance += amount;
          netDeposits += receipt.netAmount;
        } else {
          const receipt = engine.recordWithdraw(amount, ALICE, wide, balance);
          balance -= receipt.netAmount;
          netWithdrawals += receipt.netAmount;
        }
        expect(engine.getState().claimedShares).toBe(netDeposits - netWithdrawals);
        expect(engine.getState().claimedShares).toBeLessThanOrEqual(128n);
      }

      expect(engine.getState().claimedShares).toBe(60n);
    });

    it('should accrue every fee charged when refunds are off, and release all of it', () => {
      const feePolicy = enableFeePolicy(new BasisPointFeePolicy(100n));
      const roomy = params({ feePolicy, unitSize: 1000n, unitsPerLot: 4n });

      const first = engine.recordDeposit(1000n, ALICE, roomy);
      const second = engine.recordDeposit(2000n, ALICE, roomy);
      const withdrawal = engine.recordWithdraw(500n, ALICE, roomy, 3000n);

      expect(engine.getState().accruedFee).toBe(first.fee + second.fee + withdrawal.fee);
      expect(engine.getState().accruedFee).toBe(35n);

      expect(engine.withdrawAccruedFee(0n, 3000n - withdrawal.netAmount)).toBe(35n);
      expect(engine.getState().accruedFee).toBe(0n);
    });
  });

  // ==========================================================================
  // OPERATOR
  // ==========================================================================

  describe('withdrawAccruedFee', () => {
    beforeEach(() => {
      engine.recordDeposit(33n, ALICE, params({ feePolicy: enableFeePolicy(new UnitFeePolicy(32n, 1n)) }));
    });

    it('should release everything when asked for zero', () => {
      expect(engine.withdrawAccruedFee(0n, 33n)).toBe(1n);
      expect(engine.getState().accruedFee).toBe(0n);
    });

    it('should not release more than accrued', () => {
      expect(() => engine.withdrawAccruedFee(5n, 100n)).toThrow('amount exceeds accrued fee');
    });

    it('should not release more than the pool holds', () => {
      expect(() => engine.withdrawAccruedFee(1n, 0n)).toThrow('pool balance cannot cover fee withdrawal');
      expect(engine.getState().accruedFee).toBe(1n);
    });
  });

  describe('migrateClaimedShares', () => {
    it('should overwrite claimed shares without a capacity check', () => {
      expect(engine.migrateClaimedShares(500n)).toEqual({ previous: 0n, next: 500n });
      expect(engine.getState().claimedShares).toBe(500n);
      expect(engine.hasMigrated()).toBe(true);
    });

    it('should only run once', () => {
      engine.migrateClaimedShares(1n);

      expect(() => engine.migrateClaimedShares(2n)).toThrow('claimed shares were already migrated');
      expect(engine.getState().claimedShares).toBe(1n);
    });
  });

  describe('recordProvisioned', () => {
    it('should advance the provisioned counter monotonically', () => {
      expect(engine.recordProvisioned(2n)).toBe(2n);
      expect(engine.recordProvisioned(1n)).toBe(3n);
      expect(() => engine.recordProvisioned(0n)).toThrow(InvalidAmountError);
    });
  });

  // ==========================================================================
  // SNAPSHOT & SERIALIZATION
  // ==========================================================================

  describe('snapshot', () => {
    it('should restore state and migration flag', () => {
      engine.recordDeposit(10n, ALICE, params());
      const saved = engine.snapshot();

      engine.recordDeposit(5n, ALICE, params());
      engine.migrateClaimedShares(1n);
      engine.restore(saved);

      expect(engine.getState().claimedShares).toBe(10n);
      expect(engine.hasMigrated()).toBe(false);
    });
  });

  describe('toJSON / fromJSON', () => {
    it('should round-trip through a JSON string', () => {
      engine.recordDeposit(33n, ALICE, params({ feePolicy: enableFeePolicy(new UnitFeePolicy(32n, 1n)) }));
      engine.recordProvisioned(1n);
      engine.migrateClaimedShares(40n);

      const restored = DepositWithdrawAccountingEngine.fromJSON(JSON.stringify(engine.toJSON()));

      expect(restored.getState()).toEqual({ claimedShares: 40n, accruedFee: 1n, lotsProvisioned: 1n });
      expect(restored.hasMigrated()).toBe(true);
    });

    it('should serialize amounts as decimal strings', () => {
      engine.recordDeposit(10n, ALICE, params());

      const json = engine.toJSON();

      expect(json.version).toBe(1);
      expect(json.state).toEqual({ claimedShares: '10', accruedFee: '0', lotsProvisioned: '0' });
    });

    it('should reject unknown versions and malformed amounts', () => {
      const base = {
        timestamp: 0,
        state: { claimedShares: '1', accruedFee: '0', lotsProvisioned: '0' },
        migrated: false,
      };

      expect(() => DepositWithdrawAccountingEngine.fromJSON(JSON.stringify({ ...base, version: 2 }))).toThrow(
        'invalid serialized pool state'
      );
      expect(() =>
        DepositWithdrawAccountingEngine.fromJSON({
          ...base,
          version: 1,
          state: { ...base.state, claimedShares: '-1' },
        })
      ).toThrow('invalid serialized pool state: must be a non-negative integer string');
    });
  });
});
