/**
 * AuthorizationPolicy - capability matrix for the loan engine
 *
 * | Role      | own resources                 | any resource                               |
 * |-----------|-------------------------------|--------------------------------------------|
 * | member    | borrow, return, read, stats   | -                                          |
 * | librarian | borrow, return, read, stats   | return, read, list, overdue, stats, catalog |
 * | admin     | everything                    | everything                                 |
 */

import { USER_ROLES, type UserRole } from '@biblioteca/shared-contracts';
import { LoanError } from '../errors/LoanError';
import type { Actor } from '../entities';

export const LOAN_ACTIONS = {
  BORROW: 'loan.borrow',
  RETURN: 'loan.return',
  READ: 'loan.read',
  LIST_ALL: 'loan.list_all',
  LIST_OVERDUE: 'loan.list_overdue',
  READ_STATS: 'user.stats.read',
  MANAGE_CATALOG: 'catalog.manage',
  CHANGE_ROLE: 'user.role.change',
} as const;

export type LoanAction = (typeof LOAN_ACTIONS)[keyof typeof LOAN_ACTIONS];

interface Capabilities {
  own: ReadonlySet<LoanAction>;
  any: ReadonlySet<LoanAction>;
}

const SELF_SERVICE: LoanAction[] = [LOAN_ACTIONS.BORROW, LOAN_ACTIONS.RETURN, LOAN_ACTIONS.READ, LOAN_ACTIONS.READ_STATS];

const CAPABILITY_MATRIX: Record<UserRole, Capabilities> = {
  [USER_ROLES.MEMBER]: {
    own: new Set(SELF_SERVICE),
    any: new Set<LoanAction>(),
  },
  [USER_ROLES.LIBRARIAN]: {
    own: new Set(SELF_SERVICE),
    any: new Set([
      LOAN_ACTIONS.RETURN,
      LOAN_ACTIONS.READ,
      LOAN_ACTIONS.LIST_ALL,
      LOAN_ACTIONS.LIST_OVERDUE,
      LOAN_ACTIONS.READ_STATS,
      LOAN_ACTIONS.MANAGE_CATALOG,
    ]),
  },
  [USER_ROLES.ADMIN]: {
    own: new Set(Object.values(LOAN_ACTIONS)),
    any: new Set(Object.values(LOAN_ACTIONS)),
  },
};

export class AuthorizationPolicy {
  /**
   * @param resourceOwnerId - user owning the target; omit for actions with no owner
   */
  authorize(actor: Actor, action: LoanAction, resourceOwnerId?: number): boolean {
    const capabilities = CAPABILITY_MATRIX[actor.role];
    if (capabilities.any.has(action)) {
      return true;
    }
    return resourceOwnerId !== undefined && resourceOwnerId === actor.userId && capabilities.own.has(action);
  }

  enforce(actor: Actor, action: LoanAction, resourceOwnerId?: number): void {
    if (!this.authorize(actor, action, resourceOwnerId)) {
      throw LoanError.forbidden(`Not allowed to perform ${action}`);
    }
  }
}
