/**
 * Share token
 *
 * Fungible accounting unit nominally 1:1 with net pooled capital. The pool is
 * the only minter and burner.
 */

import type { Address } from '@pooled-staking/shared';
import { InsufficientBalanceError, InvalidAmountError } from '@pooled-staking/shared';
import { add, checkUint } from '../math/fixed-point.js';

export interface ShareToken {
  mint(to: Address, amount: bigint): void;
  burn(from: Address, amount: bigint): void;
  transfer(from: Address, to: Address, amount: bigint): void;
  balanceOf(account: Address): bigint;
  totalSupply(): bigint;
}

export class InMemoryShareToken implements ShareToken {
  private balances = new Map<Address, bigint>();
  private supply = 0n;

  constructor(readonly symbol = 'pSHARE') {}

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  mint(to: Address, amount: bigint): void {
    this.assertAmount(amount);
    this.supply = add(this.supply, amount);
    this.balances.set(to, add(this.balanceOf(to), amount));
  }

  burn(from: Address, amount: bigint): void {
    this.assertAmount(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientBalanceError(`${from} has insufficient ${this.symbol}`, {
        details: { from, balance, amount },
      });
    }
    this.balances.set(from, balance - amount);
    this.supply -= amount;
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.assertAmount(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientBalanceError(`${from} has insufficient ${this.symbol}`, {
        details: { from, balance, amount },
      });
    }
    this.balances.set(from, balance - amount);
    this.balances.set(to, add(this.balanceOf(to), amount));
  }

  private assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new InvalidAmountError('token amount must not be negative', { details: { amount } });
    }
    checkUint(amount, 'amount');
  }
}
