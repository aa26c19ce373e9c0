import { describe, it, expect } from 'vitest';
import { ArithmeticOverflowError, DivideByZeroError, InvalidParameterError } from '@pooled-staking/shared';
import {
  MAX_UINT256,
  SCALE,
  add,
  checkUint,
  divScaled,
  formatScaled,
  mul,
  mulDiv,
  mulScaled,
  parseScaled,
  sub,
} from './fixed-point.js';

describe('fixed-point', () => {
  describe('checkUint', () => {
    it('should pass values inside the uint256 range through', () => {
      expect(checkUint(0n)).toBe(0n);
      expect(checkUint(MAX_UINT256)).toBe(MAX_UINT256);
    });

    it('should reject negative values', () => {
      expect(() => checkUint(-1n, 'fee')).toThrow('fee underflows uint256');
    });

    it('should reject values above 2^256 - 1', () => {
      expect(() => checkUint(MAX_UINT256 + 1n)).toThrow(ArithmeticOverflowError);
    });
  });

  describe('checked arithmetic', () => {
    it('should add, subtract and multiply', () => {
      expect(add(2n, 3n)).toBe(5n);
      expect(sub(5n, 3n)).toBe(2n);
      expect(mul(4n, 5n)).toBe(20n);
    });

    it('should throw on overflow instead of wrapping', () => {
      expect(() => add(MAX_UINT256, 1n)).toThrow('sum overflows uint256');
      expect(() => mul(MAX_UINT256, 2n)).toThrow('product overflows uint256');
    });

    it('should throw on underflow', () => {
      expect(() => sub(1n, 2n)).toThrow('difference underflows uint256');
    });
  });

  describe('mulDiv', () => {
    it('should truncate toward zero', () => {
      expect(mulDiv(7n, 3n, 2n)).toBe(10n);
    });

    it('should throw DivideByZeroError for a zero denominator', () => {
      expect(() => mulDiv(1n, 1n, 0n)).toThrow(DivideByZeroError);
    });
  });

  describe('scaled helpers', () => {
    it('should multiply two scaled amounts', () => {
      expect(mulScaled(3n * SCALE / 2n, 2n * SCALE)).toBe(3n * SCALE);
    });

    it('should divide into a scaled ratio', () => {
      expect(divScaled(1n, 3n)).toBe(333_333_333_333_333_333n);
    });

    it('should throw DivideByZeroError when dividing by zero', () => {
      expect(() => divScaled(1n, 0n)).toThrow('divScaled by zero');
    });
  });

  describe('parseScaled', () => {
    it('should parse whole and fractional amounts', () => {
      expect(parseScaled('32')).toBe(32n * SCALE);
      expect(parseScaled('0.05')).toBe(5n * 10n ** 16n);
      expect(parseScaled(' 1.5 ')).toBe(15n * 10n ** 17n);
    });

    it('should honor a custom number of decimals', () => {
      expect(parseScaled('1.5', 6)).toBe(1_500_000n);
    });

    it('should reject negative or malformed input', () => {
      expect(() => parseScaled('-1')).toThrow(InvalidParameterError);
      expect(() => parseScaled('1.')).toThrow('"1." is not a non-negative decimal amount');
      expect(() => parseScaled('abc')).toThrow(InvalidParameterError);
    });

    it('should reject more fractional digits than the scale holds', () => {
      expect(() => parseScaled('0.0000000000000000001')).toThrow('has more than 18 fractional digits');
    });
  });

  describe('formatScaled', () => {
    it('should drop trailing zeros', () => {
      expect(formatScaled(parseScaled('1.50'))).toBe('1.5');
      expect(formatScaled(32n * SCALE)).toBe('32');
    });

    it('should keep the smallest unit visible', () => {
      expect(formatScaled(1n)).toBe('0.000000000000000001');
    });
  });
});
