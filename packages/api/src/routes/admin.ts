import type { FastifyPluginAsync } from "fastify";
import type { UserListResponse } from "@event-desk/shared";
import { normalizeRoles } from "../auth/roles.js";
import { currentIdentity } from "../hooks/require-auth.js";
import { ForbiddenError, NotFoundError } from "../errors.js";
import { toUser } from "../views/serializers.js";
import { IdParams, PageQuery, pageOf } from "./common.schemas.js";
import { SetRolesBody, SetStatusBody } from "./admin.schemas.js";

/**
 * User administration. Every route here is ADMIN-only through the access
 * table; the handlers only guard against an admin locking themselves out.
 */
export const adminRoutes: FastifyPluginAsync = async (app) => {
  app.get<{ Querystring: PageQuery }>(
    "/users",
    { schema: { querystring: PageQuery } },
    async (request, reply) => {
      const { items, total } = await app.stores.users.list(pageOf(request.query));
      const body: UserListResponse = { users: items.map(toUser), total };
      return reply.send(body);
    },
  );

  app.get<{ Params: IdParams }>(
    "/users/:id",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const user = await app.stores.users.findById(request.params.id);
      if (!user) throw new NotFoundError("User not found");
      return reply.send({ user: toUser(user) });
    },
  );

  /**
   * PUT /api/admin/users/:id/roles
   *
   * Replaces the role set. Takes effect on the user's next request; their
   * refresh tokens are revoked so new tokens carry the new roles.
   */
  app.put<{ Params: IdParams; Body: SetRolesBody }>(
    "/users/:id/roles",
    { schema: { params: IdParams, body: SetRolesBody } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const roles = normalizeRoles(request.body.roles);

      if (request.params.id === identity.userId && !roles.includes("ADMIN")) {
        throw new ForbiddenError("Admins cannot remove their own ADMIN role");
      }

      const user = await app.stores.users.setRoles(request.params.id, roles);
      if (!user) throw new NotFoundError("User not found");

      const revoked = await app.authService.revokeSessions(user.id);
      request.log.info(
        { userId: user.id, roles: user.roles, by: identity.userId, revoked },
        "User roles changed",
      );

      return reply.send({ user: toUser(user) });
    },
  );

  /**
   * PUT /api/admin/users/:id/status
   *
   * Disabling rejects the user's next request and revokes their refresh tokens.
   */
  app.put<{ Params: IdParams; Body: SetStatusBody }>(
    "/users/:id/status",
    { schema: { params: IdParams, body: SetStatusBody } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const { status } = request.body;

      if (request.params.id === identity.userId && status === "disabled") {
        throw new ForbiddenError("Admins cannot disable their own account");
      }

      const user = await app.stores.users.setStatus(request.params.id, status);
      if (!user) throw new NotFoundError("User not found");

      const revoked = status === "disabled" ? await app.authService.revokeSessions(user.id) : 0;
      request.log.info(
        { userId: user.id, status, by: identity.userId, revoked },
        "User status changed",
      );

      return reply.send({ user: toUser(user) });
    },
  );

  /** POST /api/admin/users/:id/revoke-sessions — force logout everywhere */
  app.post<{ Params: IdParams }>(
    "/users/:id/revoke-sessions",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const user = await app.stores.users.findById(request.params.id);
      if (!user) throw new NotFoundError("User not found");

      const revoked = await app.authService.revokeSessions(user.id);
      request.log.info({ userId: user.id, revoked }, "Sessions revoked");

      return reply.send({ revoked });
    },
  );
};
