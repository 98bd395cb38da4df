import { describe, it, expect, beforeEach } from "vitest";
import { TokenService } from "../auth/token-service.js";
import { AuthenticationError, MalformedHeaderError } from "../errors.js";
import { MemoryUserStore } from "../stores/memory.js";
import { extractBearerToken, resolveIdentity } from "./require-auth.js";

const SECRET = new TextEncoder().encode("test-secret-test-secret-test-secret!!");

const tokens = new TokenService({
  algorithm: "HS256",
  signingKey: SECRET,
  verificationKey: SECRET,
  issuer: "event-desk-test",
  accessTtlMs: 60_000,
  refreshTtlMs: 3_600_000,
});

// =========================================================================
// Header parsing
// =========================================================================

describe("extractBearerToken", () => {
  it("returns the token of a well-formed header", () => {
    expect(extractBearerToken("Bearer abc.def.ghi")).toBe("abc.def.ghi");
  });

  it("treats a missing or empty header as unauthenticated", () => {
    expect(() => extractBearerToken(undefined)).toThrow(AuthenticationError);
    expect(() => extractBearerToken("")).toThrow(
      "Authentication required. Provide a valid Bearer token.",
    );
  });

  it.each([
    ["Bearer"],
    ["Bearer "],
    ["bearer abc"],
    ["Basic dXNlcjpwYXNz"],
    ["Bearer abc def"],
    ["Bearer  abc"],
    ["abc"],
  ])("rejects %j as malformed", (header) => {
    expect(() => extractBearerToken(header)).toThrow(MalformedHeaderError);
  });
});

// =========================================================================
// Identity resolution
// =========================================================================

describe("resolveIdentity", () => {
  let users: MemoryUserStore;

  beforeEach(() => {
    users = new MemoryUserStore();
  });

  it("uses the stored roles rather than the token's", async () => {
    const user = await users.create({ username: "alice", passwordHash: "hash", roles: ["USER"] });
    const access = await tokens.issueAccessToken(user);
    await users.setRoles(user.id, ["USER", "ORGANIZER"]);

    const identity = await resolveIdentity(tokens, users, access.token);

    expect(identity).toEqual({ userId: user.id, username: "alice", roles: ["USER", "ORGANIZER"] });
    expect(Object.isFrozen(identity)).toBe(true);
  });

  it("rejects tokens of disabled users", async () => {
    const user = await users.create({ username: "alice", passwordHash: "hash", roles: ["USER"] });
    const access = await tokens.issueAccessToken(user);
    await users.setStatus(user.id, "disabled");

    await expect(resolveIdentity(tokens, users, access.token)).rejects.toMatchObject({
      code: "ACCOUNT_DISABLED",
    });
  });

  it("rejects tokens of unknown users", async () => {
    const access = await tokens.issueAccessToken({ id: "ghost", roles: ["ADMIN"] });

    await expect(resolveIdentity(tokens, users, access.token)).rejects.toMatchObject({
      code: "INVALID_TOKEN",
      message: "User not found",
    });
  });
});
