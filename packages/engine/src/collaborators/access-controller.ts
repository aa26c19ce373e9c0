/**
 * Access Controller
 *
 * Operator/migrator authorization and the pause switch. The pool only
 * depends on the interface; RoleAccessController is the in-process version.
 */

import { EventEmitter } from 'events';
import type { Address } from '@pooled-staking/shared';
import { PausedError, UnauthorizedError } from '@pooled-staking/shared';

export interface AccessController {
  /** Throws UnauthorizedError unless `caller` may change pool parameters */
  assertOperator(caller: Address): void;
  /** Throws UnauthorizedError unless `caller` may overwrite accounting state */
  assertMigrator(caller: Address): void;
  /** Throws PausedError while user operations are suspended */
  assertNotPaused(): void;
}

export type Role = 'operator' | 'migrator';

export interface AccessControllerEvents {
  'role:granted': (role: Role, account: Address) => void;
  'role:revoked': (role: Role, account: Address) => void;
  paused: (by: Address) => void;
  unpaused: (by: Address) => void;
}

/**
 * Owner-managed roles. The owner holds every role implicitly.
 */
export class RoleAccessController extends EventEmitter implements AccessController {
  private readonly roles: Record<Role, Set<Address>> = {
    operator: new Set(),
    migrator: new Set(),
  };
  private paused = false;

  constructor(readonly owner: Address) {
    super();
  }

  grantRole(caller: Address, role: Role, account: Address): void {
    this.assertOwner(caller);
    this.roles[role].add(account);
    this.emit('role:granted', role, account);
  }

  revokeRole(caller: Address, role: Role, account: Address): void {
    this.assertOwner(caller);
    if (this.roles[role].delete(account)) {
      this.emit('role:revoked', role, account);
    }
  }

  hasRole(role: Role, account: Address): boolean {
    return account === this.owner || this.roles[role].has(account);
  }

  pause(caller: Address): void {
    this.assertOperator(caller);
    this.paused = true;
    this.emit('paused', caller);
  }

  unpause(caller: Address): void {
    this.assertOperator(caller);
    this.paused = false;
    this.emit('unpaused', caller);
  }

  isPaused(): boolean {
    return this.paused;
  }

  assertOperator(caller: Address): void {
    if (!this.hasRole('operator', caller)) {
      throw new UnauthorizedError(`${caller} is not an operator`, { details: { caller } });
    }
  }

  assertMigrator(caller: Address): void {
    if (!this.hasRole('migrator', caller)) {
      throw new UnauthorizedError(`${caller} is not a migrator`, { details: { caller } });
    }
  }

  assertNotPaused(): void {
    if (this.paused) {
      throw new PausedError('pool is paused');
    }
  }

  private assertOwner(caller: Address): void {
    if (caller !== this.owner) {
      throw new UnauthorizedError(`${caller} is not the owner`, { details: { caller } });
    }
  }

  override on<K extends keyof AccessControllerEvents>(event: K, listener: AccessControllerEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof AccessControllerEvents>(
    event: K,
    ...args: Parameters<AccessControllerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
