import type { ScopeId } from '../auth/scopes.js';

export type RoleId = string;

export const Roles = {
  CUSTOMER: 'Customer',
  SUPPORT: 'Support',
  WAREHOUSE_STAFF: 'Warehouse staff',
  CONTENT_MANAGER: 'Content manager',
  MARKETING_MANAGER: 'Marketing manager',
  ADMIN: 'Admin',
} as const satisfies Record<string, RoleId>;

export interface CredentialRecord {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  roles: RoleId[];
  hashedPassword: string;
  deleted: boolean;
  createdAt: string;
  updatedAt: string | null;
}

/** What leaves the service: never the password hash. */
export type PublicUser = Omit<CredentialRecord, 'hashedPassword'>;

export interface RoleRecord {
  machineName: RoleId;
  name: string;
  scopes: ScopeId[];
  createdAt: string;
  updatedAt: string | null;
}

export function toPublicUser(record: CredentialRecord): PublicUser {
  const { hashedPassword: _hashedPassword, ...rest } = record;
  return rest;
}

/** A customer-only account belongs to the shop's clients, not its staff. */
export function isClient(record: Pick<CredentialRecord, 'roles'>): boolean {
  return record.roles.length === 1 && record.roles[0] === Roles.CUSTOMER;
}
