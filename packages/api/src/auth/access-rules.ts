import type { Role } from "@event-desk/shared";
import type { AccessRule, RouteAccess } from "./access-policy.js";
import { ROLES } from "./roles.js";

const PUBLIC: RouteAccess = { public: true };
const EVERYONE: RouteAccess = { roles: ROLES };
const ORGANIZERS: RouteAccess = { roles: ["ORGANIZER", "ADMIN"] satisfies Role[] };
const ADMINS: RouteAccess = { roles: ["ADMIN"] satisfies Role[] };

/**
 * Route → required roles. First match wins, so specific rules go above
 * the wildcards that would otherwise cover them.
 */
export const ACCESS_RULES: readonly AccessRule[] = [
  // CORS preflight
  { method: "OPTIONS", path: "*", access: PUBLIC },

  { method: "GET", path: "/health", access: PUBLIC },
  { method: "POST", path: "/api/auth/register", access: PUBLIC },
  { method: "POST", path: "/api/auth/login", access: PUBLIC },
  { method: "POST", path: "/api/auth/refresh", access: PUBLIC },
  // The refresh token in the body is the credential
  { method: "POST", path: "/api/auth/logout", access: PUBLIC },
  { method: "GET", path: "/api/auth/me", access: EVERYONE },

  { method: "*", path: "/api/users/*", access: EVERYONE },

  { method: "POST", path: "/api/events/:id/participants", access: EVERYONE },
  { method: "DELETE", path: "/api/events/:id/participants/me", access: EVERYONE },
  { method: "GET", path: "/api/events/*", access: EVERYONE },
  { method: "POST", path: "/api/events", access: ORGANIZERS },
  { method: "PUT", path: "/api/events/:id", access: ORGANIZERS },
  { method: "DELETE", path: "/api/events/:id", access: ORGANIZERS },

  { method: "GET", path: "/api/projects/*", access: EVERYONE },
  { method: "POST", path: "/api/projects", access: ORGANIZERS },
  { method: "PUT", path: "/api/projects/:id", access: ORGANIZERS },
  { method: "DELETE", path: "/api/projects/:id", access: ORGANIZERS },

  { method: "*", path: "/api/admin/*", access: ADMINS },
];
