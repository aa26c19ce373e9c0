/**
 * Re-entrancy Guard
 *
 * One exclusive lock per pool. A mutating operation holds it from start to
 * finish; anything that calls back into the pool meanwhile is rejected
 * rather than queued. The lock is released on every exit path.
 */

import { ReentrancyRejectedError } from '@pooled-staking/shared';

export class ReentrancyGuard {
  private active: string | null = null;

  isEntered(): boolean {
    return this.active !== null;
  }

  /**
   * Operation currently holding the lock, if any
   */
  activeOperation(): string | null {
    return this.active;
  }

  run<T>(operation: string, fn: () => T): T {
    this.assertNotEntered(operation);
    this.active = operation;
    try {
      return fn();
    } finally {
      this.active = null;
    }
  }

  /**
   * Throws while a mutating operation is in progress
   */
  assertNotEntered(operation: string): void {
    if (this.active !== null) {
      throw new ReentrancyRejectedError(`${operation} rejected while ${this.active} is in progress`, {
        details: { operation, active: this.active },
      });
    }
  }
}
