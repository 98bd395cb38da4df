import type { FastifyInstance, FastifyRequest, onRequestAsyncHookHandler } from "fastify";
import type { TokenService } from "../auth/token-service.js";
import { createIdentity, type Identity } from "../auth/roles.js";
import { AuthenticationError, ERROR_CODES, MalformedHeaderError } from "../errors.js";
import type { UserStore } from "../stores/types.js";

/**
 * Extract the token from an `Authorization: Bearer <token>` header.
 *
 * The header must be exactly two space-separated parts with a
 * case-sensitive `Bearer` scheme and a non-empty token.
 */
export function extractBearerToken(header: string | undefined): string {
  if (header === undefined || header === "") {
    throw new AuthenticationError("Authentication required. Provide a valid Bearer token.");
  }

  const parts = header.split(" ");
  if (parts.length !== 2) throw new MalformedHeaderError();

  const [scheme, token] = parts;
  if (scheme !== "Bearer" || !token) throw new MalformedHeaderError();

  return token;
}

/**
 * Verify an access token and resolve it to an identity.
 * The user is reloaded so that disabled accounts are rejected and role
 * changes take effect without waiting for the token to expire.
 */
export async function resolveIdentity(
  tokens: TokenService,
  users: UserStore,
  token: string,
): Promise<Identity> {
  const claims = await tokens.verifyAccessToken(token);

  const user = await users.findById(claims.subject);
  if (!user) {
    throw new AuthenticationError("User not found", ERROR_CODES.INVALID_TOKEN);
  }
  if (user.status !== "active") {
    throw new AuthenticationError("Account is disabled", ERROR_CODES.ACCOUNT_DISABLED);
  }

  return createIdentity(user);
}

/**
 * Global onRequest hook: the request pipeline in front of every route.
 *
 *   route lookup → public? done
 *   → extract bearer token → verify → attach identity → access check
 *
 * Any stage throws an AppError which the error handler turns into 401/403,
 * so the route handler is never reached.
 */
export function requireAuth(app: FastifyInstance): onRequestAsyncHookHandler {
  return async (request) => {
    const route = request.routeOptions.url;
    // Unknown URL: let Fastify answer 404
    if (route === undefined) return;

    if (app.accessPolicy.isPublic(request.method, route)) return;

    const token = extractBearerToken(request.headers.authorization);
    request.identity = await resolveIdentity(app.tokens, app.stores.users, token);

    app.accessPolicy.check(request.identity, request.method, route);
  };
}

/**
 * Identity of the current request, for route handlers behind requireAuth.
 */
export function currentIdentity(request: FastifyRequest): Identity {
  if (!request.identity) throw new AuthenticationError();
  return request.identity;
}
