/**
 * Access Control Decision Point.
 *
 * Routes are matched against an explicit rule table (see access-rules.ts)
 * instead of per-handler annotations. Matching works on Fastify route
 * patterns (`/api/events/:id`), not on concrete URLs, so `:id` in a rule is
 * compared literally.
 *
 * Pattern syntax:
 *   - `*`            matches every route
 *   - `/prefix/*`    matches `/prefix` and everything below it
 *   - anything else  exact match (trailing slash ignored)
 *
 * Deny by default: a protected route with no matching rule is refused.
 */

import type { Role } from "@event-desk/shared";
import { AuthenticationError, ForbiddenError } from "../errors.js";
import { hasAnyRole, type Identity } from "./roles.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "OPTIONS";

export type RouteAccess =
  | { readonly public: true }
  | { readonly roles: readonly Role[] };

export interface AccessRule {
  method: HttpMethod | "*";
  path: string;
  access: RouteAccess;
}

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; status: 401 | 403; reason: string };

function normalizePath(path: string): string {
  return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

function pathMatches(pattern: string, route: string): boolean {
  if (pattern === "*") return true;
  const target = normalizePath(route);
  if (pattern.endsWith("/*")) {
    const prefix = pattern.slice(0, -2);
    return target === prefix || target.startsWith(`${prefix}/`);
  }
  return normalizePath(pattern) === target;
}

function methodMatches(ruleMethod: AccessRule["method"], method: string): boolean {
  if (ruleMethod === "*") return true;
  // Fastify exposes HEAD for every GET route
  const effective = method.toUpperCase() === "HEAD" ? "GET" : method.toUpperCase();
  return ruleMethod === effective;
}

export class AccessPolicy {
  constructor(private readonly rules: readonly AccessRule[]) {}

  /** First matching rule's access, or undefined when no rule applies */
  resolve(method: string, route: string): RouteAccess | undefined {
    const rule = this.rules.find(
      (r) => methodMatches(r.method, method) && pathMatches(r.path, route),
    );
    return rule?.access;
  }

  isPublic(method: string, route: string): boolean {
    const access = this.resolve(method, route);
    return access !== undefined && "public" in access;
  }

  decide(identity: Identity | null, method: string, route: string): AccessDecision {
    const access = this.resolve(method, route);
    if (access && "public" in access) return { allowed: true };

    if (!identity) {
      return { allowed: false, status: 401, reason: "Authentication required" };
    }
    if (!access) {
      return { allowed: false, status: 403, reason: "No access rule for this route" };
    }
    if (!hasAnyRole(identity, access.roles)) {
      return {
        allowed: false,
        status: 403,
        reason: `This action requires one of these roles: ${access.roles.join(", ")}`,
      };
    }
    return { allowed: true };
  }

  /** Throwing form of `decide`, for use inside request hooks */
  check(identity: Identity | null, method: string, route: string): void {
    const decision = this.decide(identity, method, route);
    if (decision.allowed) return;
    if (decision.status === 401) throw new AuthenticationError(decision.reason);
    throw new ForbiddenError(decision.reason);
  }
}
