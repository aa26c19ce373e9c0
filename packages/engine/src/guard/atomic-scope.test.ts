import { describe, it, expect } from 'vitest';
import { InvariantViolationError, isPoolError } from '@pooled-staking/shared';
import { AtomicScope } from './atomic-scope.js';

describe('AtomicScope', () => {
  it('should undo effects newest first', () => {
    const scope = new AtomicScope('deposit');
    const log: string[] = [];

    scope.onRollback('first', () => log.push('undo first'));
    scope.perform('second', () => 2, (result) => log.push(`undo second ${result}`));
    scope.rollback(new Error('failed'));

    expect(log).toEqual(['undo second 2', 'undo first']);
    expect(scope.size()).toBe(0);
  });

  it('should not register an undo for an effect that threw', () => {
    const scope = new AtomicScope('deposit');

    expect(() =>
      scope.perform(
        'mint',
        () => {
          throw new Error('mint failed');
        },
        () => undefined
      )
    ).toThrow('mint failed');
    expect(scope.size()).toBe(0);
  });

  it('should run every undo and escalate when any of them fails', () => {
    const scope = new AtomicScope('withdraw');
    const original = new Error('release failed');
    let firstUndone = false;

    scope.onRollback('restore', () => {
      firstUndone = true;
    });
    scope.onRollback('re-mint', () => {
      throw new Error('token frozen');
    });

    let caught: unknown;
    try {
      scope.rollback(original);
    } catch (error) {
      caught = error;
    }

    expect(firstUndone).toBe(true);
    expect(caught).toBeInstanceOf(InvariantViolationError);
    expect(isPoolError(caught, 'INVARIANT_VIOLATION')).toBe(true);
    if (!(caught instanceof Error)) throw new Error('expected an error');
    expect(caught.message).toBe('withdraw rollback failed: re-mint');
    expect(caught.cause).toBeInstanceOf(AggregateError);
    if (!(caught.cause instanceof AggregateError)) throw new Error('expected an aggregate cause');
    expect(caught.cause.errors[0]).toBe(original);
  });
});
