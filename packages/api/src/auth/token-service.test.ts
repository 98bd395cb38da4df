import { describe, it, expect, beforeEach } from "vitest";
import { exportPKCS8, exportSPKI, generateKeyPair } from "jose";
import { AuthenticationError } from "../errors.js";
import { MAX_TOKEN_SIZE, TokenService } from "./token-service.js";

const SECRET = new TextEncoder().encode("test-secret-test-secret-test-secret!!");
const START = Date.UTC(2026, 0, 1, 12, 0, 0, 500);

let now = START;
const clock = () => now;

function hmacService(overrides: Partial<ConstructorParameters<typeof TokenService>[0]> = {}) {
  return new TokenService({
    algorithm: "HS256",
    signingKey: SECRET,
    verificationKey: SECRET,
    issuer: "event-desk-test",
    accessTtlMs: 60_000,
    refreshTtlMs: 3_600_000,
    now: clock,
    ...overrides,
  });
}

async function rejection(promise: Promise<unknown>): Promise<AuthenticationError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AuthenticationError) return err;
    throw err;
  }
  throw new Error("expected the promise to reject");
}

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

beforeEach(() => {
  now = START;
});

// =========================================================================
// Issue / verify
// =========================================================================

describe("TokenService — access tokens", () => {
  it("round-trips subject and roles", async () => {
    const tokens = hmacService();
    const issued = await tokens.issueAccessToken({ id: "user-1", roles: ["USER", "ORGANIZER"] });

    const verified = await tokens.verifyAccessToken(issued.token);

    expect(verified.subject).toBe("user-1");
    expect(verified.roles).toEqual(["USER", "ORGANIZER"]);
    expect(verified.jti).toBe(issued.jti);
  });

  it("sets expiry to issue time plus TTL, in whole seconds", async () => {
    const tokens = hmacService();
    const issued = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });

    expect(issued.issuedAt.getTime()).toBe(Date.UTC(2026, 0, 1, 12, 0, 0));
    expect(issued.expiresAt.getTime()).toBe(Date.UTC(2026, 0, 1, 12, 1, 0));

    const verified = await tokens.verifyAccessToken(issued.token);
    expect(verified.expiresAt.getTime()).toBe(issued.expiresAt.getTime());
  });

  it("gives every token a distinct jti", async () => {
    const tokens = hmacService();
    const a = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });
    const b = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });
    expect(a.jti).not.toBe(b.jti);
  });

  it("accepts a token one second before expiry", async () => {
    const tokens = hmacService();
    const issued = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });

    now = Date.UTC(2026, 0, 1, 12, 0, 59);
    await expect(tokens.verifyAccessToken(issued.token)).resolves.toMatchObject({
      subject: "user-1",
    });
  });

  it("rejects a token at its expiry time", async () => {
    const tokens = hmacService();
    const issued = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });

    now = Date.UTC(2026, 0, 1, 12, 1, 0);
    const err = await rejection(tokens.verifyAccessToken(issued.token));
    expect(err.code).toBe("TOKEN_EXPIRED");
    expect(err.message).toBe("Token expired");
  });

  it("refuses lifetimes that are not whole seconds", () => {
    expect(() => hmacService({ accessTtlMs: 1500 })).toThrow(
      "accessTtlMs must be a non-negative whole number of seconds, got 1500ms",
    );
    expect(() => hmacService({ refreshTtlMs: 999 })).toThrow(
      "refreshTtlMs must be a non-negative whole number of seconds, got 999ms",
    );
  });

  it("reports the same expiry on issue and on verify", async () => {
    const tokens = hmacService({ accessTtlMs: 2000 });
    const issued = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });
    const verified = await tokens.verifyAccessToken(issued.token);

    expect(issued.expiresAt.getTime() - issued.issuedAt.getTime()).toBe(2000);
    expect(verified.expiresAt).toEqual(issued.expiresAt);
    expect(verified.issuedAt).toEqual(issued.issuedAt);
  });

  it("treats a zero TTL as already expired", async () => {
    const tokens = hmacService({ accessTtlMs: 0 });
    const issued = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });

    const err = await rejection(tokens.verifyAccessToken(issued.token));
    expect(err.code).toBe("TOKEN_EXPIRED");
  });
});

// =========================================================================
// Rejections
// =========================================================================

describe("TokenService — rejections", () => {
  it("rejects a token whose payload was altered", async () => {
    const tokens = hmacService();
    const issued = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });
    const [header, payload, signature] = issued.token.split(".");
    const claims: Record<string, unknown> = JSON.parse(
      Buffer.from(payload ?? "", "base64url").toString(),
    );
    const forged = [header, encodeSegment({ ...claims, roles: ["ADMIN"] }), signature].join(".");

    const err = await rejection(tokens.verifyAccessToken(forged));
    expect(err.code).toBe("INVALID_TOKEN");
    expect(err.message).toBe("Invalid token");
  });

  it("rejects a token signed with another secret", async () => {
    const other = hmacService({
      signingKey: new TextEncoder().encode("another-test-secret-another-test-secret"),
    });
    const issued = await other.issueAccessToken({ id: "user-1", roles: ["USER"] });

    const err = await rejection(hmacService().verifyAccessToken(issued.token));
    expect(err.code).toBe("INVALID_TOKEN");
  });

  it("rejects an algorithm outside the allow-list", async () => {
    const hs512 = hmacService({ algorithm: "HS512" });
    const issued = await hs512.issueAccessToken({ id: "user-1", roles: ["USER"] });

    const err = await rejection(hmacService().verifyAccessToken(issued.token));
    expect(err.code).toBe("INVALID_TOKEN");
  });

  it("rejects an unsigned token", async () => {
    const unsigned = [
      encodeSegment({ alg: "none", typ: "JWT" }),
      encodeSegment({
        sub: "user-1",
        iss: "event-desk-test",
        jti: "x",
        iat: Math.floor(START / 1000),
        exp: Math.floor(START / 1000) + 60,
        roles: ["ADMIN"],
        token_use: "access",
      }),
      "",
    ].join(".");

    const err = await rejection(hmacService().verifyAccessToken(unsigned));
    expect(err.code).toBe("INVALID_TOKEN");
  });

  it("rejects a token from another issuer", async () => {
    const foreign = hmacService({ issuer: "someone-else" });
    const issued = await foreign.issueAccessToken({ id: "user-1", roles: ["USER"] });

    const err = await rejection(hmacService().verifyAccessToken(issued.token));
    expect(err.code).toBe("INVALID_TOKEN");
  });

  it("rejects garbage", async () => {
    const err = await rejection(hmacService().verifyAccessToken("not-a-jwt"));
    expect(err.code).toBe("INVALID_TOKEN");
  });

  it("rejects oversized tokens before parsing", async () => {
    const err = await rejection(hmacService().verifyAccessToken("a".repeat(MAX_TOKEN_SIZE + 1)));
    expect(err.message).toBe("Token too large");
  });

  it("does not accept a refresh token as an access token", async () => {
    const tokens = hmacService();
    const refresh = await tokens.issueRefreshToken("user-1");

    const err = await rejection(tokens.verifyAccessToken(refresh.token));
    expect(err.message).toBe("Wrong token type");
  });

  it("does not accept an access token as a refresh token", async () => {
    const tokens = hmacService();
    const access = await tokens.issueAccessToken({ id: "user-1", roles: ["USER"] });

    const err = await rejection(tokens.verifyRefreshToken(access.token));
    expect(err.message).toBe("Wrong token type");
  });

  it("gives the same answer for the same bad token every time", async () => {
    const tokens = hmacService();
    const first = await rejection(tokens.verifyAccessToken("not-a-jwt"));
    const second = await rejection(tokens.verifyAccessToken("not-a-jwt"));
    expect([second.statusCode, second.code]).toEqual([first.statusCode, first.code]);
  });
});

// =========================================================================
// Refresh tokens and asymmetric keys
// =========================================================================

describe("TokenService — refresh tokens", () => {
  it("uses the refresh TTL", async () => {
    const tokens = hmacService();
    const issued = await tokens.issueRefreshToken("user-1");

    expect(issued.expiresAt.getTime() - issued.issuedAt.getTime()).toBe(3_600_000);
    await expect(tokens.verifyRefreshToken(issued.token)).resolves.toMatchObject({
      subject: "user-1",
      jti: issued.jti,
    });
  });
});

describe("TokenService — ES256", () => {
  it("signs with the private key and verifies with the public key", async () => {
    const { privateKey, publicKey } = await generateKeyPair("ES256");
    const tokens = new TokenService({
      algorithm: "ES256",
      signingKey: privateKey,
      verificationKey: publicKey,
      issuer: "event-desk-test",
      accessTtlMs: 60_000,
      refreshTtlMs: 3_600_000,
      now: clock,
    });

    const issued = await tokens.issueAccessToken({ id: "user-2", roles: ["ADMIN"] });
    const verified = await tokens.verifyAccessToken(issued.token);
    expect(verified.roles).toEqual(["ADMIN"]);
  });

  it("imports PEM keys from configuration", async () => {
    const { privateKey, publicKey } = await generateKeyPair("ES256", { extractable: true });
    const tokens = await TokenService.fromConfig(
      {
        algorithm: "ES256",
        privateKey: await exportPKCS8(privateKey),
        publicKey: await exportSPKI(publicKey),
        issuer: "event-desk-test",
        accessTtlMs: 60_000,
        refreshTtlMs: 3_600_000,
        rotateRefreshTokens: true,
      },
      clock,
    );

    const issued = await tokens.issueAccessToken({ id: "user-3", roles: ["USER"] });
    await expect(tokens.verifyAccessToken(issued.token)).resolves.toMatchObject({
      subject: "user-3",
    });
  });

  it("refuses to build without both keys", async () => {
    await expect(
      TokenService.fromConfig({
        algorithm: "RS256",
        issuer: "event-desk-test",
        accessTtlMs: 60_000,
        refreshTtlMs: 3_600_000,
        rotateRefreshTokens: true,
      }),
    ).rejects.toThrow("RS256 requires JWT_PRIVATE_KEY and JWT_PUBLIC_KEY");
  });
});
