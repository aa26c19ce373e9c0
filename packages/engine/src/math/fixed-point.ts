/**
 * Fixed-Point Ledger
 *
 * Stateless uint256 arithmetic on amounts scaled by 1e18.
 * Division truncates toward zero, so rounding dust stays with the pool.
 */

import {
  ArithmeticOverflowError,
  DivideByZeroError,
  InvalidParameterError,
} from '@pooled-staking/shared';

export const DECIMALS = 18;

export const SCALE = 10n ** 18n;

export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Assert a value fits in uint256
 */
export function checkUint(value: bigint, label = 'value'): bigint {
  if (value < 0n) {
    throw new ArithmeticOverflowError(`${label} underflows uint256`, { details: { [label]: value } });
  }
  if (value > MAX_UINT256) {
    throw new ArithmeticOverflowError(`${label} overflows uint256`, { details: { [label]: value } });
  }
  return value;
}

export function add(a: bigint, b: bigint): bigint {
  return checkUint(checkUint(a, 'a') + checkUint(b, 'b'), 'sum');
}

export function sub(a: bigint, b: bigint): bigint {
  return checkUint(checkUint(a, 'a') - checkUint(b, 'b'), 'difference');
}

export function mul(a: bigint, b: bigint): bigint {
  return checkUint(checkUint(a, 'a') * checkUint(b, 'b'), 'product');
}

/**
 * floor(a * b / denominator) with a uint256 intermediate
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  checkUint(denominator, 'denominator');
  if (denominator === 0n) {
    throw new DivideByZeroError('mulDiv by zero', { details: { a, b } });
  }
  return mul(a, b) / denominator;
}

/**
 * a * b / SCALE
 */
export function mulScaled(a: bigint, b: bigint): bigint {
  return mul(a, b) / SCALE;
}

/**
 * a * SCALE / b
 */
export function divScaled(a: bigint, b: bigint): bigint {
  checkUint(b, 'b');
  if (b === 0n) {
    throw new DivideByZeroError('divScaled by zero', { details: { a } });
  }
  return mul(a, SCALE) / b;
}

/**
 * Parse a decimal string ("32", "0.05") into a scaled amount
 */
export function parseScaled(value: string, decimals = DECIMALS): bigint {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim());
  if (!match) {
    throw new InvalidParameterError(`"${value}" is not a non-negative decimal amount`);
  }
  const whole = match[1] ?? '0';
  const fraction = match[2] ?? '';
  if (fraction.length > decimals) {
    throw new InvalidParameterError(`"${value}" has more than ${decimals} fractional digits`);
  }
  return checkUint(BigInt(whole + fraction.padEnd(decimals, '0')), 'amount');
}

/**
 * Render a scaled amount as a decimal string without trailing zeros
 */
export function formatScaled(value: bigint, decimals = DECIMALS): string {
  checkUint(value, 'amount');
  const unit = 10n ** BigInt(decimals);
  const whole = value / unit;
  const fraction = (value % unit).toString().padStart(decimals, '0').replace(/0+$/, '');
  return fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
}
