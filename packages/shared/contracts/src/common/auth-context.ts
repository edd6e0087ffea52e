/**
 * AuthContext - Authenticated actor identity
 *
 * The gateway authenticates the caller and forwards `x-user-id` / `x-user-role`.
 * Services trust these headers and build an AuthContext from them.
 */

import { normalizeRole, type UserRole } from './roles.js';

export interface AuthContext {
  /** Positive integer user id, or null when no identity was forwarded */
  userId: number | null;
  role: UserRole;
  isAuthenticated: boolean;
}

export interface AuthHeaders {
  'x-user-id'?: string;
  'x-user-role'?: string;
}

export function parseUserId(raw: string | undefined | null): number | null {
  if (!raw || !/^\d+$/.test(raw.trim())) {
    return null;
  }
  const id = Number(raw.trim());
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function createAuthContext(userId: number | null, rawRole: string | undefined | null): AuthContext {
  return {
    userId,
    role: normalizeRole(rawRole),
    isAuthenticated: userId !== null,
  };
}

export function createAuthContextFromHeaders(headers: AuthHeaders): AuthContext {
  return createAuthContext(parseUserId(headers['x-user-id']), headers['x-user-role']);
}
