import { describe, it, expect } from 'vitest';
import {
  CapacityExceededError,
  InsufficientBalanceError,
  PoolError,
  ReentrancyRejectedError,
  isPoolError,
} from './errors.js';

describe('PoolError', () => {
  it('should carry a code and a name per subclass', () => {
    const error = new CapacityExceededError('deposit exceeds pool capacity');

    expect(error).toBeInstanceOf(PoolError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('CAPACITY_EXCEEDED');
    expect(error.name).toBe('CapacityExceededError');
    expect(error.message).toBe('deposit exceeds pool capacity');
  });

  it('should render bigint details as strings and drop undefined ones', () => {
    const error = new InsufficientBalanceError('short', {
      details: { amount: 10n ** 20n, caller: '0xalice', note: undefined },
    });

    expect(error.details).toEqual({ amount: '100000000000000000000', caller: '0xalice' });
  });

  it('should keep the cause', () => {
    const cause = new Error('underlying');
    const error = new ReentrancyRejectedError('nested', { cause });

    expect(error.cause).toBe(cause);
  });
});

describe('isPoolError', () => {
  it('should narrow by code', () => {
    const error: unknown = new CapacityExceededError('full');

    expect(isPoolError(error)).toBe(true);
    expect(isPoolError(error, 'CAPACITY_EXCEEDED')).toBe(true);
    expect(isPoolError(error, 'PAUSED')).toBe(false);
    expect(isPoolError(new Error('plain'))).toBe(false);
  });
});
