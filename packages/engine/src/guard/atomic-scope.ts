/**
 * Atomic Scope
 *
 * Undo log for one pool operation. Each side effect that succeeds registers
 * its compensation; on failure they run newest first.
 */

import { InvariantViolationError } from '@pooled-staking/shared';

export interface Compensation {
  label: string;
  undo: () => void;
}

export class AtomicScope {
  private readonly compensations: Compensation[] = [];

  constructor(readonly operation: string) {}

  onRollback(label: string, undo: () => void): void {
    this.compensations.push({ label, undo });
  }

  /**
   * Register a compensation only once `effect` has succeeded
   */
  perform<T>(label: string, effect: () => T, undo: (result: T) => void): T {
    const result = effect();
    this.onRollback(label, () => undo(result));
    return result;
  }

  /**
   * Run every compensation, newest first. If any of them fails the pool can
   * no longer be trusted, so the failures and the original error are raised
   * together as an invariant violation.
   */
  rollback(error: unknown): void {
    const failures: unknown[] = [];
    const failedLabels: string[] = [];

    while (this.compensations.length > 0) {
      const compensation = this.compensations.pop();
      if (!compensation) break;
      try {
        compensation.undo();
      } catch (undoError) {
        failures.push(undoError);
        failedLabels.push(compensation.label);
      }
    }

    if (failures.length > 0) {
      throw new InvariantViolationError(`${this.operation} rollback failed: ${failedLabels.join(', ')}`, {
        cause: new AggregateError([error, ...failures], `${this.operation} failed and could not be undone`),
        details: { operation: this.operation },
      });
    }
  }

  size(): number {
    return this.compensations.length;
  }
}
