/**
 * Wrapped share vault
 *
 * Auto-compounding wrapper around the share token. Wrapped shares convert to
 * underlying shares pro rata to the vault's holdings, rounding down.
 */

import type { Address } from '@pooled-staking/shared';
import { InsufficientBalanceError, InvalidAmountError } from '@pooled-staking/shared';
import { add, mulDiv } from '../math/fixed-point.js';
import type { ShareToken } from './share-token.js';

export interface WrappedShareVault {
  readonly address: Address;
  /** Pull `amount` shares from `sender`, credit wrapped shares to `onBehalfOf` */
  deposit(amount: bigint, onBehalfOf: Address, sender: Address): bigint;
  /** Burn `amount` wrapped shares of `owner`, send the underlying shares to `receiver` */
  redeem(amount: bigint, receiver: Address, owner: Address): bigint;
  /** Underlying shares `redeem(amount)` would return right now */
  previewRedeem(amount: bigint): bigint;
  balanceOf(account: Address): bigint;
}

export class InMemoryWrappedShareVault implements WrappedShareVault {
  private balances = new Map<Address, bigint>();
  private supply = 0n;

  constructor(
    private readonly shares: ShareToken,
    readonly address: Address = 'wrapped-vault'
  ) {}

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  totalAssets(): bigint {
    return this.shares.balanceOf(this.address);
  }

  previewDeposit(amount: bigint): bigint {
    const assets = this.totalAssets();
    if (this.supply === 0n || assets === 0n) return amount;
    return mulDiv(amount, this.supply, assets);
  }

  previewRedeem(amount: bigint): bigint {
    if (this.supply === 0n) return 0n;
    return mulDiv(amount, this.totalAssets(), this.supply);
  }

  deposit(amount: bigint, onBehalfOf: Address, sender: Address): bigint {
    if (amount <= 0n) {
      throw new InvalidAmountError('vault deposit must be positive', { details: { amount } });
    }
    const issued = this.previewDeposit(amount);
    if (issued === 0n) {
      throw new InvalidAmountError('vault deposit results in zero wrapped shares', { details: { amount } });
    }
    this.shares.transfer(sender, this.address, amount);
    this.supply = add(this.supply, issued);
    this.balances.set(onBehalfOf, add(this.balanceOf(onBehalfOf), issued));
    return issued;
  }

  redeem(amount: bigint, receiver: Address, owner: Address): bigint {
    if (amount <= 0n) {
      throw new InvalidAmountError('vault redeem must be positive', { details: { amount } });
    }
    const balance = this.balanceOf(owner);
    if (balance < amount) {
      throw new InsufficientBalanceError(`${owner} has insufficient wrapped shares`, {
        details: { owner, balance, amount },
      });
    }
    const assets = this.previewRedeem(amount);
    if (assets === 0n) {
      throw new InvalidAmountError('vault redeem results in zero shares', { details: { amount } });
    }
    this.shares.transfer(this.address, receiver, assets);
    this.balances.set(owner, balance - amount);
    this.supply -= amount;
    return assets;
  }
}
