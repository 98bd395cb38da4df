import type { FastifyPluginAsync } from "fastify";
import { currentIdentity } from "../hooks/require-auth.js";
import { AuthenticationError, NotFoundError } from "../errors.js";
import { toPublicUser, toUser } from "../views/serializers.js";
import { IdParams } from "./common.schemas.js";
import { ChangePasswordBody, UpdateProfileBody } from "./users.schemas.js";

export const userRoutes: FastifyPluginAsync = async (app) => {
  // -----------------------------------------------------------------------
  // Own profile
  // -----------------------------------------------------------------------

  app.get("/me", async (request, reply) => {
    const identity = currentIdentity(request);
    const user = await app.stores.users.findById(identity.userId);
    if (!user) throw new AuthenticationError("User not found");

    return reply.send({ user: toUser(user) });
  });

  /**
   * PATCH /api/users/me
   *
   * Update email and/or display name. `null` clears a field.
   */
  app.patch<{ Body: UpdateProfileBody }>(
    "/me",
    { schema: { body: UpdateProfileBody } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const user = await app.stores.users.updateProfile(identity.userId, request.body);
      if (!user) throw new AuthenticationError("User not found");

      return reply.send({ user: toUser(user) });
    },
  );

  /**
   * PUT /api/users/me/password
   *
   * Requires the current password. All refresh tokens of the user are
   * revoked afterwards, so other sessions must log in again.
   */
  app.put<{ Body: ChangePasswordBody }>(
    "/me/password",
    { schema: { body: ChangePasswordBody } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const { currentPassword, newPassword } = request.body;

      await app.authService.changePassword(identity.userId, currentPassword, newPassword);
      request.log.info({ userId: identity.userId }, "Password changed");

      return reply.send({ ok: true });
    },
  );

  // -----------------------------------------------------------------------
  // Other users
  // -----------------------------------------------------------------------

  /** GET /api/users/:id — public summary of any user */
  app.get<{ Params: IdParams }>(
    "/:id",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const user = await app.stores.users.findById(request.params.id);
      if (!user) throw new NotFoundError("User not found");

      return reply.send({ user: toPublicUser(user) });
    },
  );
};
