/**
 * Fee Policy
 *
 * Pluggable fee calculation consulted on every deposit and withdrawal.
 * A disabled policy is an identity pass-through with zero fee.
 */

import type { Address, FeeQuote } from '@pooled-staking/shared';
import { InvalidParameterError } from '@pooled-staking/shared';
import { checkUint, mulDiv, sub, add } from '../math/fixed-point.js';

/**
 * External fee calculation contract
 */
export interface FeePolicyCapability {
  /** Human-readable policy name for logs */
  readonly name: string;
  processDeposit(amount: bigint, caller: Address): FeeQuote;
  processWithdraw(amount: bigint, caller: Address): FeeQuote;
}

export type FeePolicy =
  | { kind: 'disabled' }
  | { kind: 'enabled'; policy: FeePolicyCapability };

export const DISABLED_FEE_POLICY: FeePolicy = Object.freeze({ kind: 'disabled' });

export function enableFeePolicy(policy: FeePolicyCapability): FeePolicy {
  return { kind: 'enabled', policy };
}

function checkQuote(quote: FeeQuote): FeeQuote {
  return {
    netAmount: checkUint(quote.netAmount, 'netAmount'),
    fee: checkUint(quote.fee, 'fee'),
  };
}

/**
 * Quote a deposit; the policy's net amount is used as-is
 */
export function quoteDeposit(feePolicy: FeePolicy, amount: bigint, caller: Address): FeeQuote {
  if (feePolicy.kind === 'disabled') {
    return { netAmount: amount, fee: 0n };
  }
  return checkQuote(feePolicy.policy.processDeposit(amount, caller));
}

export function quoteWithdraw(feePolicy: FeePolicy, amount: bigint, caller: Address): FeeQuote {
  if (feePolicy.kind === 'disabled') {
    return { netAmount: amount, fee: 0n };
  }
  return checkQuote(feePolicy.policy.processWithdraw(amount, caller));
}

export function describeFeePolicy(feePolicy: FeePolicy): string {
  return feePolicy.kind === 'disabled' ? 'disabled' : feePolicy.policy.name;
}

/**
 * Flat fee per provisioning unit.
 *
 * A gross deposit of `unitSize + feePerUnit` nets exactly one unit; a
 * withdrawal of one unit of shares is charged `feePerUnit`.
 */
export class UnitFeePolicy implements FeePolicyCapability {
  readonly name = 'unit-fee';

  constructor(
    private readonly unitSize: bigint,
    private readonly feePerUnit: bigint
  ) {
    if (unitSize <= 0n) {
      throw new InvalidParameterError('unitSize must be positive', { details: { unitSize } });
    }
    checkUint(feePerUnit, 'feePerUnit');
  }

  processDeposit(amount: bigint): FeeQuote {
    const fee = mulDiv(amount, this.feePerUnit, add(this.unitSize, this.feePerUnit));
    return { netAmount: sub(amount, fee), fee };
  }

  processWithdraw(amount: bigint): FeeQuote {
    const fee = mulDiv(amount, this.feePerUnit, this.unitSize);
    return { netAmount: sub(amount, fee), fee };
  }
}

export const BPS_DENOMINATOR = 10_000n;

/**
 * Proportional fee in basis points, same rate in both directions
 */
export class BasisPointFeePolicy implements FeePolicyCapability {
  readonly name = 'basis-point-fee';

  constructor(private readonly feeBps: bigint) {
    if (feeBps < 0n || feeBps > BPS_DENOMINATOR) {
      throw new InvalidParameterError('feeBps must be within 0..10000', { details: { feeBps } });
    }
  }

  processDeposit(amount: bigint): FeeQuote {
    return this.quote(amount);
  }

  processWithdraw(amount: bigint): FeeQuote {
    return this.quote(amount);
  }

  private quote(amount: bigint): FeeQuote {
    const fee = mulDiv(amount, this.feeBps, BPS_DENOMINATOR);
    return { netAmount: sub(amount, fee), fee };
  }
}
