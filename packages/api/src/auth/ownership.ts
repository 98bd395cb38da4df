import { ForbiddenError } from "../errors.js";
import { hasAnyRole, type Identity } from "./roles.js";

/**
 * Resource-level check behind the access table: owners may change their own
 * events and projects, admins may change any.
 */
export function assertCanModify(identity: Identity, resource: { ownerId: string }): void {
  if (resource.ownerId === identity.userId) return;
  if (hasAnyRole(identity, ["ADMIN"])) return;
  throw new ForbiddenError("Only the owner or an admin can modify this resource");
}
