import type { FastifyPluginAsync } from "fastify";
import type { LoginResponse, RefreshResponse } from "@event-desk/shared";
import { currentIdentity } from "../hooks/require-auth.js";
import { AuthenticationError } from "../errors.js";
import { toAccessTokenFields, toUser } from "../views/serializers.js";
import { LoginBody, RefreshBody, RegisterBody } from "./auth.schemas.js";

export const authRoutes: FastifyPluginAsync = async (app) => {
  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  /**
   * POST /api/auth/register
   *
   * Creates an account with the default USER role. Duplicate usernames
   * are rejected with 409 and leave the existing account untouched.
   */
  app.post<{ Body: RegisterBody }>(
    "/register",
    {
      schema: { body: RegisterBody },
      config: {
        rateLimit: {
          max: 10,
          timeWindow: "1 minute",
        },
      },
    },
    async (request, reply) => {
      const user = await app.authService.register(request.body);
      request.log.info({ userId: user.id, username: user.username }, "User registered");
      return reply.status(201).send({ user: toUser(user) });
    },
  );

  // -----------------------------------------------------------------------
  // Token auth
  // -----------------------------------------------------------------------

  /**
   * POST /api/auth/login
   *
   * Accepts { username, password } and returns an access/refresh token pair.
   *
   * Rate limited: 10 attempts per minute per IP.
   */
  app.post<{ Body: LoginBody }>(
    "/login",
    {
      schema: { body: LoginBody },
      config: {
        rateLimit: {
          max: 10,
          timeWindow: "1 minute",
        },
      },
    },
    async (request, reply) => {
      const { username, password } = request.body;

      try {
        const { user, access, refresh } = await app.authService.login(username, password);
        request.log.info({ userId: user.id }, "Login succeeded");

        const body: LoginResponse = {
          ...toAccessTokenFields(access),
          refreshToken: refresh.token,
          refreshExpiresAt: refresh.expiresAt,
          user: toUser(user),
        };
        return reply.send(body);
      } catch (err) {
        if (err instanceof AuthenticationError) {
          request.log.info({ username, code: err.code }, "Login failed");
        }
        throw err;
      }
    },
  );

  /**
   * POST /api/auth/refresh
   *
   * Exchanges a refresh token for a new access token. When rotation is on,
   * a new refresh token is returned and the presented one is revoked.
   */
  app.post<{ Body: RefreshBody }>(
    "/refresh",
    {
      schema: { body: RefreshBody },
      config: {
        rateLimit: {
          max: 30,
          timeWindow: "1 minute",
        },
      },
    },
    async (request, reply) => {
      const { access, refresh } = await app.authService.refresh(request.body.refreshToken);

      const body: RefreshResponse = {
        ...toAccessTokenFields(access),
        ...(refresh
          ? { refreshToken: refresh.token, refreshExpiresAt: refresh.expiresAt }
          : {}),
      };
      return reply.send(body);
    },
  );

  /**
   * POST /api/auth/logout
   *
   * Revokes the given refresh token. Always answers 204, also for tokens
   * that are unknown or already revoked.
   */
  app.post<{ Body: RefreshBody }>(
    "/logout",
    { schema: { body: RefreshBody } },
    async (request, reply) => {
      await app.authService.logout(request.body.refreshToken);
      return reply.status(204).send();
    },
  );

  /**
   * GET /api/auth/me
   *
   * Returns the authenticated user's profile.
   */
  app.get("/me", async (request, reply) => {
    const identity = currentIdentity(request);
    const user = await app.stores.users.findById(identity.userId);
    if (!user) throw new AuthenticationError("User not found");

    return reply.send({ user: toUser(user) });
  });
};
