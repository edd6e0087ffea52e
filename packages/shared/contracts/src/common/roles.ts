/**
 * User Roles - Single Source of Truth
 * All services should import from @biblioteca/shared-contracts
 *
 * Role definitions:
 * - ADMIN: Full administration, including role changes
 * - LIBRARIAN: Catalog management and processing of any patron's loans
 * - MEMBER: Regular patron (default for all new registrations)
 *
 * Roles are consumed through the loan-service capability matrix; call sites
 * never compare role strings directly.
 */

export const USER_ROLES = {
  ADMIN: 'admin',
  LIBRARIAN: 'librarian',
  MEMBER: 'member',
} as const;

export type UserRole = (typeof USER_ROLES)[keyof typeof USER_ROLES];

export const VALID_ROLES: readonly UserRole[] = [USER_ROLES.ADMIN, USER_ROLES.LIBRARIAN, USER_ROLES.MEMBER] as const;

export function isValidRole(role: string): role is UserRole {
  return VALID_ROLES.some(valid => valid === role);
}

/**
 * Normalize role string to UserRole
 * Handles case-insensitivity and defaults to MEMBER for unknown roles
 */
export function normalizeRole(role: string | undefined | null): UserRole {
  if (!role) {
    return USER_ROLES.MEMBER;
  }

  const lowerRole = role.trim().toLowerCase();

  if (isValidRole(lowerRole)) {
    return lowerRole;
  }

  return USER_ROLES.MEMBER;
}
