import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { decodeJwt } from "jose";
import type { FastifyInstance } from "fastify";
import type { Stores } from "../stores/index.js";
import { bearer, buildTestApp, loginAs, seedUser, testConfig } from "../test/helpers.js";

let app: FastifyInstance;
let stores: Stores;

beforeEach(async () => {
  ({ app, stores } = await buildTestApp());
});

afterEach(async () => {
  await app.close();
});

// =========================================================================
// Registration
// =========================================================================

describe("POST /api/auth/register", () => {
  it("creates a USER account and never returns the hash", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/auth/register",
      payload: { username: "alice", password: "password123", email: "alice@example.com" },
    });

    expect(res.statusCode).toBe(201);
    const { user } = res.json();
    expect(user.username).toBe("alice");
    expect(user.email).toBe("alice@example.com");
    expect(user.roles).toEqual(["USER"]);
    expect(user.status).toBe("active");
    expect(user).not.toHaveProperty("passwordHash");
  });

  it("answers 409 for a taken username and leaves the first account as it was", async () => {
    const first = await app.inject({
      method: "POST",
      url: "/api/auth/register",
      payload: { username: "bob", password: "password123", displayName: "Bob One" },
    });
    expect(first.statusCode).toBe(201);

    const second = await app.inject({
      method: "POST",
      url: "/api/auth/register",
      payload: { username: "bob", password: "other-password", displayName: "Bob Two" },
    });

    expect(second.statusCode).toBe(409);
    expect(second.json()).toEqual({ error: 'Username "bob" is already taken', code: "CONFLICT" });

    const stored = await stores.users.findByUsername("bob");
    expect(stored?.id).toBe(first.json().user.id);
    expect(stored?.displayName).toBe("Bob One");
    await expect(loginAs(app, "bob", "password123")).resolves.toHaveProperty("accessToken");
  });

  it("validates the body", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/auth/register",
      payload: { username: "carol", password: "short" },
    });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.code).toBe("VALIDATION_ERROR");
    expect(body.error).toBe("Validation failed");
    expect(body.details[0].field).toBe("/password");
  });
});

// =========================================================================
// Login
// =========================================================================

describe("POST /api/auth/login", () => {
  it("issues a bearer token for the user with expiry = issuedAt + TTL", async () => {
    const alice = await seedUser(stores, "alice");

    const res = await app.inject({
      method: "POST",
      url: "/api/auth/login",
      payload: { username: "alice", password: "password123" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.tokenType).toBe("Bearer");
    expect(body.user.id).toBe(alice.id);

    const claims = decodeJwt(body.accessToken);
    expect(claims.sub).toBe(alice.id);
    expect(claims.roles).toEqual(["USER"]);
    expect((claims.exp ?? 0) - (claims.iat ?? 0)).toBe(15 * 60);
    expect(new Date(body.expiresAt).getTime()).toBe((claims.exp ?? 0) * 1000);
  });

  it("answers 401 for a wrong password", async () => {
    await seedUser(stores, "alice");

    const res = await app.inject({
      method: "POST",
      url: "/api/auth/login",
      payload: { username: "alice", password: "wrong-password" },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "Invalid credentials", code: "INVALID_CREDENTIALS" });
  });

  it("answers 401 for an unknown user", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/auth/login",
      payload: { username: "nobody", password: "password123" },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json().code).toBe("INVALID_CREDENTIALS");
  });
});

// =========================================================================
// Role checks through the request pipeline
// =========================================================================

describe("alice (USER)", () => {
  it("is refused the admin area but may read her profile", async () => {
    await seedUser(stores, "alice");
    const { accessToken } = await loginAs(app, "alice");

    const admin = await app.inject({
      method: "GET",
      url: "/api/admin/users",
      headers: bearer(accessToken),
    });
    expect(admin.statusCode).toBe(403);
    expect(admin.json()).toEqual({
      error: "This action requires one of these roles: ADMIN",
      code: "FORBIDDEN",
    });

    const me = await app.inject({
      method: "GET",
      url: "/api/users/me",
      headers: bearer(accessToken),
    });
    expect(me.statusCode).toBe(200);
    expect(me.json().user.username).toBe("alice");
  });
});

describe("request filter", () => {
  it("answers 401 without a token", async () => {
    const res = await app.inject({ method: "GET", url: "/api/users/me" });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      error: "Authentication required. Provide a valid Bearer token.",
      code: "UNAUTHENTICATED",
    });
  });

  it.each(["Token abc", "bearer abc", "Bearer", "Bearer "])(
    "answers 401 for the malformed header %j",
    async (authorization) => {
      const res = await app.inject({
        method: "GET",
        url: "/api/events",
        headers: { authorization },
      });

      expect(res.statusCode).toBe(401);
      expect(res.json().code).toBe("MALFORMED_HEADER");
    },
  );

  it("gives the same answer to the same bad token every time", async () => {
    const send = () =>
      app.inject({ method: "GET", url: "/api/users/me", headers: bearer("not.a.token") });

    const first = await send();
    const second = await send();

    expect(first.statusCode).toBe(401);
    expect(second.statusCode).toBe(first.statusCode);
    expect(second.json()).toEqual(first.json());
  });

  it("picks up role changes on the next request", async () => {
    const alice = await seedUser(stores, "alice");
    const { accessToken } = await loginAs(app, "alice");
    await stores.users.setRoles(alice.id, ["USER", "ADMIN"]);

    const res = await app.inject({
      method: "GET",
      url: "/api/admin/users",
      headers: bearer(accessToken),
    });
    expect(res.statusCode).toBe(200);
  });

  it("rejects tokens of a disabled user at once", async () => {
    const alice = await seedUser(stores, "alice");
    const { accessToken } = await loginAs(app, "alice");
    await stores.users.setStatus(alice.id, "disabled");

    const res = await app.inject({
      method: "GET",
      url: "/api/users/me",
      headers: bearer(accessToken),
    });
    expect(res.statusCode).toBe(401);
    expect(res.json().code).toBe("ACCOUNT_DISABLED");
  });
});

describe("expired tokens", () => {
  it("answers 401 when the access TTL is zero", async () => {
    const base = testConfig();
    const expiring = await buildTestApp({ jwt: { ...base.jwt, accessTtlMs: 0 } });
    try {
      await seedUser(expiring.stores, "alice");
      const { accessToken } = await loginAs(expiring.app, "alice");

      const res = await expiring.app.inject({
        method: "GET",
        url: "/api/users/me",
        headers: bearer(accessToken),
      });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: "Token expired", code: "TOKEN_EXPIRED" });
    } finally {
      await expiring.app.close();
    }
  });
});

// =========================================================================
// Refresh / logout / me
// =========================================================================

describe("POST /api/auth/refresh", () => {
  it("returns a new access token and a rotated refresh token", async () => {
    await seedUser(stores, "alice");
    const { refreshToken } = await loginAs(app, "alice");

    const res = await app.inject({
      method: "POST",
      url: "/api/auth/refresh",
      payload: { refreshToken },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.tokenType).toBe("Bearer");
    expect(typeof body.accessToken).toBe("string");
    expect(typeof body.refreshToken).toBe("string");
    expect(body.refreshToken).not.toBe(refreshToken);
  });

  it("refuses a refresh token that was already used", async () => {
    await seedUser(stores, "alice");
    const { refreshToken } = await loginAs(app, "alice");
    await app.inject({ method: "POST", url: "/api/auth/refresh", payload: { refreshToken } });

    const res = await app.inject({
      method: "POST",
      url: "/api/auth/refresh",
      payload: { refreshToken },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "Refresh token revoked", code: "INVALID_TOKEN" });
  });
});

describe("POST /api/auth/logout", () => {
  it("revokes the refresh token", async () => {
    await seedUser(stores, "alice");
    const { refreshToken } = await loginAs(app, "alice");

    const logout = await app.inject({
      method: "POST",
      url: "/api/auth/logout",
      payload: { refreshToken },
    });
    expect(logout.statusCode).toBe(204);

    const refresh = await app.inject({
      method: "POST",
      url: "/api/auth/refresh",
      payload: { refreshToken },
    });
    expect(refresh.statusCode).toBe(401);
  });

  it("answers 204 for an unknown token", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/auth/logout",
      payload: { refreshToken: "not-a-token" },
    });
    expect(res.statusCode).toBe(204);
  });
});

describe("GET /api/auth/me", () => {
  it("returns the current user", async () => {
    const alice = await seedUser(stores, "alice", ["USER", "ORGANIZER"]);
    const { accessToken } = await loginAs(app, "alice");

    const res = await app.inject({
      method: "GET",
      url: "/api/auth/me",
      headers: bearer(accessToken),
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().user).toMatchObject({ id: alice.id, roles: ["USER", "ORGANIZER"] });
  });
});

// =========================================================================
// Rate limiting
// =========================================================================

describe("login rate limit", () => {
  it("answers 429 on the 11th attempt within a minute", async () => {
    const limited = await buildTestApp({ rateLimitEnabled: true });
    try {
      await seedUser(limited.stores, "alice");

      for (let i = 0; i < 10; i++) {
        const res = await limited.app.inject({
          method: "POST",
          url: "/api/auth/login",
          payload: { username: "alice", password: "password123" },
        });
        expect(res.statusCode).toBe(200);
      }

      const res = await limited.app.inject({
        method: "POST",
        url: "/api/auth/login",
        payload: { username: "alice", password: "password123" },
      });
      expect(res.statusCode).toBe(429);
      expect(res.json()).toEqual({
        error: "Too many requests. Please try again later.",
        code: "RATE_LIMITED",
      });
    } finally {
      await limited.app.close();
    }
  });
});

// =========================================================================
// Unexpected failures
// =========================================================================

describe("store failures", () => {
  it("answer 500 without leaking the cause", async () => {
    await seedUser(stores, "alice");
    const { accessToken } = await loginAs(app, "alice");
    vi.spyOn(stores.users, "findById").mockRejectedValue(
      new Error("connection to 10.0.0.5:5432 refused"),
    );

    const res = await app.inject({ method: "GET", url: "/api/auth/me", headers: bearer(accessToken) });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Internal server error", code: "INTERNAL" });
  });
});
