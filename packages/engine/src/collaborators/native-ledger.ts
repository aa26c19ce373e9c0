/**
 * Native capital custody
 *
 * Balances of the chain's native asset. The pool reads its own balance from
 * here and moves capital with `transfer`.
 */

import type { Address } from '@pooled-staking/shared';
import { InsufficientBalanceError, InvalidAmountError } from '@pooled-staking/shared';
import { add, checkUint } from '../math/fixed-point.js';

export interface NativeLedger {
  balanceOf(account: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): void;
}

export class InMemoryNativeLedger implements NativeLedger {
  private balances = new Map<Address, bigint>();

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /**
   * Mint native capital out of thin air (funding test accounts, rewards)
   */
  credit(account: Address, amount: bigint): void {
    checkUint(amount, 'amount');
    this.balances.set(account, add(this.balanceOf(account), amount));
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new InvalidAmountError('transfer amount must not be negative', { details: { amount } });
    }
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientBalanceError(`${from} has insufficient native balance`, {
        details: { from, balance, amount },
      });
    }
    this.balances.set(from, balance - amount);
    this.balances.set(to, add(this.balanceOf(to), amount));
  }
}
