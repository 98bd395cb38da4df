import type { Role } from "@event-desk/shared";

export const ROLES = ["USER", "ORGANIZER", "ADMIN"] as const satisfies readonly Role[];

/** Roles given to every self-registered account */
export const DEFAULT_ROLES: readonly Role[] = ["USER"];

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && (ROLES as readonly string[]).includes(value);
}

/** Deduplicate while keeping the first-seen order */
export function normalizeRoles(roles: readonly Role[]): Role[] {
  return Array.from(new Set(roles));
}

/** The immutable identity attached to an authenticated request */
export interface Identity {
  readonly userId: string;
  readonly username: string;
  readonly roles: readonly Role[];
}

export function createIdentity(user: {
  id: string;
  username: string;
  roles: readonly Role[];
}): Identity {
  return Object.freeze({
    userId: user.id,
    username: user.username,
    roles: Object.freeze([...user.roles]),
  });
}

export function hasAnyRole(identity: Identity, required: readonly Role[]): boolean {
  return required.some((role) => identity.roles.includes(role));
}
