import type { UserRole } from '@biblioteca/shared-contracts';

export interface LibraryUser {
  id: number;
  email: string;
  fullName: string;
  role: UserRole;
}

/** Authenticated caller as forwarded by the gateway */
export interface Actor {
  userId: number;
  role: UserRole;
}
