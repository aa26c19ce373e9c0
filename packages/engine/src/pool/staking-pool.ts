/**
 * Staking Pool
 *
 * Entry points of one pooled staking vault. Wires the accounting engine,
 * capacity model, provisioning gate and parameter store to the external
 * collaborators (native custody, share token, wrapped vault, provisioning
 * sink, access control).
 *
 * Every mutating entry point:
 * - holds the pool's re-entrancy guard for its whole duration
 * - works on a parameter snapshot taken when it starts
 * - runs in an atomic scope, so a failure undoes every side effect
 * - emits its event only after the guard is released
 *
 * @example
 * ```typescript
 * const pool = new StakingPool({
 *   parameters: { unitSize: parseScaled('32'), unitsPerLot: 2n, buffer: parseScaled('1') },
 *   collaborators: { native, shareToken, vault, sink, access },
 * });
 *
 * const receipt = pool.deposit('0xdepositor', parseScaled('32'));
 * // receipt.netAmount shares were minted to the depositor
 * ```
 */

import { EventEmitter } from 'events';
import type {
  Address,
  BatchAuthorization,
  DepositReceipt,
  PoolOperation,
  PoolState,
  ProvisioningBatch,
  SerializedPoolState,
  WithdrawReceipt,
} from '@pooled-staking/shared';
import {
  InsufficientBalanceError,
  InvalidAmountError,
  InvalidParameterError,
  InvariantViolationError,
  createSilentLogger,
  isPoolError,
  type Logger,
} from '@pooled-staking/shared';
import {
  DepositWithdrawAccountingEngine,
  type MigrationResult,
} from '../accounting/deposit-withdraw-engine.js';
import {
  capacityLimit,
  hardCap,
  maxDepositBeforeFee,
  remainingCapacity,
} from '../capacity/capacity-model.js';
import type { AccessController } from '../collaborators/access-controller.js';
import type { NativeLedger } from '../collaborators/native-ledger.js';
import type { ProvisioningSink } from '../collaborators/provisioning-sink.js';
import type { ShareToken } from '../collaborators/share-token.js';
import type { WrappedShareVault } from '../collaborators/wrapped-vault.js';
import { describeFeePolicy, type FeePolicy } from '../fees/fee-policy.js';
import { AtomicScope } from '../guard/atomic-scope.js';
import { ReentrancyGuard } from '../guard/reentrancy-guard.js';
import {
  AdminParameterStore,
  type InitialParameters,
  type ParameterChange,
  type ParameterSnapshot,
} from '../params/admin-parameter-store.js';
import { ProvisioningGate } from '../provisioning/provisioning-gate.js';

// =============================================================================
// TYPES
// =============================================================================

export interface StakingPoolCollaborators {
  native: NativeLedger;
  shareToken: ShareToken;
  vault: WrappedShareVault;
  sink: ProvisioningSink;
  access: AccessController;
}

export interface StakingPoolOptions {
  /** The pool's own account in the native ledger and share token */
  address?: Address;
  parameters: InitialParameters;
  collaborators: StakingPoolCollaborators;
  logger?: Logger;
  /** Previously persisted accounting state */
  engine?: DepositWithdrawAccountingEngine;
}

export interface StakeReceipt extends DepositReceipt {
  wrappedShares: bigint;
}

export interface UnstakeReceipt extends WithdrawReceipt {
  wrappedSharesRedeemed: bigint;
}

export interface ProvisionReceipt extends BatchAuthorization {
  pubkeys: string[];
}

export interface FeeWithdrawal {
  amount: bigint;
  recipient: Address;
  accruedFee: bigint;
}

export interface StakingPoolEvents {
  deposit: (receipt: DepositReceipt) => void;
  stake: (receipt: StakeReceipt) => void;
  withdraw: (receipt: WithdrawReceipt) => void;
  unstake: (receipt: UnstakeReceipt) => void;
  provisioned: (receipt: ProvisionReceipt) => void;
  'fee:withdrawn': (withdrawal: FeeWithdrawal) => void;
  'shares:migrated': (result: MigrationResult, by: Address) => void;
  'parameter:updated': (change: ParameterChange) => void;
}

type OperationBody<T> = (tx: AtomicScope, params: ParameterSnapshot) => T;

function assertPositiveAmount(amount: bigint): void {
  if (amount <= 0n) {
    throw new InvalidAmountError('amount must be positive', { details: { amount } });
  }
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class StakingPool extends EventEmitter {
  readonly address: Address;
  private readonly engine: DepositWithdrawAccountingEngine;
  private readonly gate: ProvisioningGate;
  private readonly params: AdminParameterStore;
  private readonly guard = new ReentrancyGuard();
  private readonly logger: Logger;
  private readonly native: NativeLedger;
  private readonly shareToken: ShareToken;
  private readonly vault: WrappedShareVault;
  private readonly sink: ProvisioningSink;
  private readonly access: AccessController;

  constructor(options: StakingPoolOptions) {
    super();
    this.address = options.address ?? 'staking-pool';
    this.engine = options.engine ?? new DepositWithdrawAccountingEngine();
    this.gate = new ProvisioningGate(this.engine);
    this.params = new AdminParameterStore(options.parameters, options.collaborators.access);
    this.logger = (options.logger ?? createSilentLogger()).child({ pool: this.address });
    this.native = options.collaborators.native;
    this.shareToken = options.collaborators.shareToken;
    this.vault = options.collaborators.vault;
    this.sink = options.collaborators.sink;
    this.access = options.collaborators.access;
  }

  // ===========================================================================
  // USER OPERATIONS
  // ===========================================================================

  /**
   * Send `value` native capital, receive net shares
   */
  deposit(caller: Address, value: bigint): DepositReceipt {
    const receipt = this.execute('deposit', caller, (tx, params) => {
      this.access.assertNotPaused();
      assertPositiveAmount(value);
      const deposit = this.acceptDeposit(tx, params, caller, value);
      tx.perform(
        'mint shares',
        () => this.shareToken.mint(caller, deposit.netAmount),
        () => this.shareToken.burn(caller, deposit.netAmount)
      );
      return deposit;
    });

    this.logger.info('Deposit accepted', { ...receipt });
    this.emit('deposit', receipt);
    return receipt;
  }

  /**
   * Deposit and put the minted shares straight into the wrapped vault for
   * `caller`. Returns the receipt with the wrapped shares issued.
   */
  stakeAndDeposit(caller: Address, value: bigint): StakeReceipt {
    const receipt = this.execute('stakeAndDeposit', caller, (tx, params) => {
      this.access.assertNotPaused();
      assertPositiveAmount(value);
      const deposit = this.acceptDeposit(tx, params, caller, value);

      // Shares are minted to the pool, which then deposits them on the caller's behalf
      tx.perform(
        'mint shares to pool',
        () => this.shareToken.mint(this.address, deposit.netAmount),
        () => this.shareToken.burn(this.address, deposit.netAmount)
      );
      // Last step of the scope: if the vault throws, the mint and transfer above are undone
      const wrappedShares = this.vault.deposit(deposit.netAmount, caller, this.address);
      return { ...deposit, wrappedShares };
    });

    this.logger.info('Stake accepted', { ...receipt });
    this.emit('stake', receipt);
    return receipt;
  }

  /**
   * Burn `shares`, receive net native capital
   */
  withdraw(caller: Address, shares: bigint): WithdrawReceipt {
    const receipt = this.execute('withdraw', caller, (tx, params) => {
      this.access.assertNotPaused();
      assertPositiveAmount(shares);
      return this.settleWithdrawal(tx, params, caller, caller, shares);
    });

    this.logger.info('Withdrawal settled', { ...receipt });
    this.emit('withdraw', receipt);
    return receipt;
  }

  /**
   * Redeem `wrappedShares` from the wrapped vault and withdraw the shares
   * they convert to. Every check that can fail runs before the redeem.
   */
  unstakeAndWithdraw(caller: Address, wrappedShares: bigint): UnstakeReceipt {
    const receipt = this.execute('unstakeAndWithdraw', caller, (tx, params) => {
      this.access.assertNotPaused();
      assertPositiveAmount(wrappedShares);

      // Checks run on the previewed amount; nothing fails after the redeem
      if (this.vault.balanceOf(caller) < wrappedShares) {
        throw new InsufficientBalanceError(`${caller} has insufficient wrapped shares`, {
          details: { caller, wrappedShares },
        });
      }
      const shares = this.vault.previewRedeem(wrappedShares);
      if (shares === 0n) {
        throw new InvalidAmountError('wrapped shares redeem to zero shares', { details: { wrappedShares } });
      }
      const withdrawal = this.engine.recordWithdraw(shares, caller, params, this.nativeBalanceUnguarded());

      const redeemed = tx.perform(
        'wrapped vault redeem',
        () => this.vault.redeem(wrappedShares, this.address, caller),
        (assets) => {
          this.vault.deposit(assets, caller, this.address);
        }
      );
      if (redeemed !== shares) {
        throw new InvariantViolationError(`wrapped vault redeemed ${redeemed} shares, previewed ${shares}`, {
          details: { caller, wrappedShares, redeemed, previewed: shares },
        });
      }

      this.burnShares(tx, this.address, shares);
      this.releaseCapital(tx, caller, withdrawal.netAmount);
      return { ...withdrawal, wrappedSharesRedeemed: wrappedShares };
    });

    this.logger.info('Unstake settled', { ...receipt });
    this.emit('unstake', receipt);
    return receipt;
  }

  // ===========================================================================
  // OPERATOR OPERATIONS
  // ===========================================================================

  /**
   * Send one unit of capital per credential entry to the provisioning sink
   */
  provision(caller: Address, batch: ProvisioningBatch): ProvisionReceipt {
    const receipt = this.execute('provision', caller, (tx, params) => {
      this.access.assertOperator(caller);

      const credential = params.withdrawalCredential;
      if (credential === null) {
        throw new InvalidParameterError('withdrawal credential is not set');
      }

      const authorization = this.gate.authorizeCredentials(batch, this.nativeBalanceUnguarded(), params);
      tx.perform(
        'fund provisioning sink',
        () => this.native.transfer(this.address, this.sink.address, authorization.amount),
        () => this.native.transfer(this.sink.address, this.address, authorization.amount)
      );
      this.sink.provision(batch, credential, authorization.amount);
      return { ...authorization, pubkeys: [...batch.pubkeys] };
    });

    this.logger.info('Batch provisioned', {
      unitCount: receipt.unitCount,
      amount: receipt.amount,
      lotsProvisioned: receipt.lotsProvisioned,
    });
    this.emit('provisioned', receipt);
    return receipt;
  }

  /**
   * Pay out accrued fee; an amount of zero withdraws all of it
   */
  withdrawAdminFee(caller: Address, amount: bigint, recipient: Address = caller): FeeWithdrawal {
    const withdrawal = this.execute('withdrawAdminFee', caller, (tx) => {
      this.access.assertOperator(caller);
      const value = this.engine.withdrawAccruedFee(amount, this.nativeBalanceUnguarded());
      if (value > 0n) {
        tx.perform(
          'pay accrued fee',
          () => this.native.transfer(this.address, recipient, value),
          () => this.native.transfer(recipient, this.address, value)
        );
      }
      return { amount: value, recipient, accruedFee: this.engine.getState().accruedFee };
    });

    this.logger.info('Accrued fee withdrawn', { ...withdrawal });
    this.emit('fee:withdrawn', withdrawal);
    return withdrawal;
  }

  /**
   * Break-glass overwrite of claimed shares when porting state from a
   * previous pool. Needs the migrator role, skips capacity checks, and can
   * only happen once.
   */
  migrateShares(caller: Address, claimedShares: bigint): MigrationResult {
    const result = this.execute('migrateShares', caller, () => {
      this.access.assertMigrator(caller);
      return this.engine.migrateClaimedShares(claimedShares);
    });

    this.logger.warn('Claimed shares migrated', { previous: result.previous, next: result.next, by: caller });
    this.emit('shares:migrated', result, caller);
    return result;
  }

  setFeePolicy(caller: Address, feePolicy: FeePolicy): ParameterChange {
    return this.updateParameter(caller, () => this.params.setFeePolicy(caller, feePolicy));
  }

  setUnitsPerLot(caller: Address, unitsPerLot: bigint): ParameterChange {
    return this.updateParameter(caller, () => this.params.setUnitsPerLot(caller, unitsPerLot));
  }

  setAdminFee(caller: Address, adminFee: bigint): ParameterChange {
    return this.updateParameter(caller, () => this.params.setAdminFee(caller, adminFee));
  }

  setBuffer(caller: Address, buffer: bigint): ParameterChange {
    return this.updateParameter(caller, () => this.params.setBuffer(caller, buffer));
  }

  setRefundFeesOnWithdraw(caller: Address, refund: boolean): ParameterChange {
    return this.updateParameter(caller, () => this.params.setRefundFeesOnWithdraw(caller, refund));
  }

  setWithdrawalCredential(caller: Address, credential: string): ParameterChange {
    return this.updateParameter(caller, () => this.params.setWithdrawalCredential(caller, credential));
  }

  // ===========================================================================
  // VIEWS
  // ===========================================================================

  getPoolState(): Readonly<PoolState> {
    this.guard.assertNotEntered('getPoolState');
    return this.engine.getState();
  }

  getParameters(): ParameterSnapshot {
    this.guard.assertNotEntered('getParameters');
    return this.params.snapshot();
  }

  capacityLimit(): bigint {
    this.guard.assertNotEntered('capacityLimit');
    return capacityLimit(this.params.snapshot());
  }

  /**
   * Capacity limit plus buffer
   */
  hardCap(): bigint {
    this.guard.assertNotEntered('hardCap');
    return hardCap(this.params.snapshot());
  }

  remainingCapacity(): bigint {
    this.guard.assertNotEntered('remainingCapacity');
    return remainingCapacity(this.engine.getState(), this.params.snapshot());
  }

  /**
   * Fee-inclusive deposit that would fill the remaining capacity (advisory)
   */
  maxDepositBeforeFee(): bigint {
    this.guard.assertNotEntered('maxDepositBeforeFee');
    return maxDepositBeforeFee(this.engine.getState(), this.params.snapshot());
  }

  nativeBalance(): bigint {
    this.guard.assertNotEntered('nativeBalance');
    return this.nativeBalanceUnguarded();
  }

  /**
   * Accounting state for persistence
   */
  exportState(): SerializedPoolState {
    this.guard.assertNotEntered('exportState');
    return this.engine.toJSON();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private nativeBalanceUnguarded(): bigint {
    return this.native.balanceOf(this.address);
  }

  /**
   * Pull the caller's native capital and account for it
   */
  private acceptDeposit(
    tx: AtomicScope,
    params: ParameterSnapshot,
    caller: Address,
    value: bigint
  ): DepositReceipt {
    tx.perform(
      'receive native capital',
      () => this.native.transfer(caller, this.address, value),
      () => this.native.transfer(this.address, caller, value)
    );
    const deposit = this.engine.recordDeposit(value, caller, params);
    this.logger.debug('Deposit quoted', {
      caller,
      feePolicy: describeFeePolicy(params.feePolicy),
      netAmount: deposit.netAmount,
      fee: deposit.fee,
    });
    return deposit;
  }

  /**
   * Burn `shares` held by `holder`, account, and release net capital to
   * `recipient`. Shares are gone before any capital moves.
   */
  private settleWithdrawal(
    tx: AtomicScope,
    params: ParameterSnapshot,
    holder: Address,
    recipient: Address,
    shares: bigint
  ): WithdrawReceipt {
    this.burnShares(tx, holder, shares);
    const withdrawal = this.engine.recordWithdraw(shares, recipient, params, this.nativeBalanceUnguarded());
    this.releaseCapital(tx, recipient, withdrawal.netAmount);
    return withdrawal;
  }

  private burnShares(tx: AtomicScope, holder: Address, shares: bigint): void {
    tx.perform(
      'burn shares',
      () => this.shareToken.burn(holder, shares),
      () => this.shareToken.mint(holder, shares)
    );
  }

  private releaseCapital(tx: AtomicScope, recipient: Address, amount: bigint): void {
    tx.perform(
      'release native capital',
      () => this.native.transfer(this.address, recipient, amount),
      () => this.native.transfer(recipient, this.address, amount)
    );
  }

  private updateParameter(caller: Address, apply: () => ParameterChange): ParameterChange {
    const change = this.execute('setParameter', caller, () => apply());
    this.logger.info('Parameter updated', { ...change });
    this.emit('parameter:updated', change);
    return change;
  }

  /**
   * Run one mutating operation under the guard with rollback on failure
   */
  private execute<T>(operation: PoolOperation, caller: Address, body: OperationBody<T>): T {
    try {
      return this.guard.run(operation, () => {
        const params = this.params.snapshot();
        const tx = new AtomicScope(operation);
        const saved = this.engine.snapshot();
        tx.onRollback('restore accounting state', () => this.engine.restore(saved));

        try {
          return body(tx, params);
        } catch (error) {
          tx.rollback(error);
          throw error;
        }
      });
    } catch (error) {
      this.logFailure(operation, caller, error);
      throw error;
    }
  }

  private logFailure(operation: PoolOperation, caller: Address, error: unknown): void {
    if (isPoolError(error) && error.code !== 'INVARIANT_VIOLATION') {
      this.logger.warn(`${operation} rejected`, {
        caller,
        code: error.code,
        reason: error.message,
        ...error.details,
      });
      return;
    }
    this.logger.error(`${operation} failed`, {
      caller,
      error: error instanceof Error ? error.message : String(error),
      code: isPoolError(error) ? error.code : undefined,
    });
  }

  // ===========================================================================
  // EVENTS (type-safe)
  // ===========================================================================

  override on<K extends keyof StakingPoolEvents>(event: K, listener: StakingPoolEvents[K]): this {
    return super.on(event, listener);
  }

  override once<K extends keyof StakingPoolEvents>(event: K, listener: StakingPoolEvents[K]): this {
    return super.once(event, listener);
  }

  override emit<K extends keyof StakingPoolEvents>(
    event: K,
    ...args: Parameters<StakingPoolEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
