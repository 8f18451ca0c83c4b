/**
 * Actor (caller identity) types
 *
 * Identities arrive already authenticated; the engine only needs the id and
 * the role to decide what the caller may do.
 */

export const ACTOR_ROLES = ['member', 'reviewer', 'admin', 'super_admin'] as const;

export type ActorRole = (typeof ACTOR_ROLES)[number];

// Approval authority a role carries; every privileged tier above admin acts as admin
export type Authority = 'member' | 'reviewer' | 'admin';

export const ROLE_AUTHORITY: Record<ActorRole, Authority> = {
  member: 'member',
  reviewer: 'reviewer',
  admin: 'admin',
  super_admin: 'admin',
};

export interface Actor {
  id: string;
  role: ActorRole;
}

export function authorityOf(role: ActorRole): Authority {
  return ROLE_AUTHORITY[role];
}

export function isAdmin(role: ActorRole): boolean {
  return authorityOf(role) === 'admin';
}
