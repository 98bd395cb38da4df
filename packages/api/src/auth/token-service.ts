/**
 * Token issuing and verification.
 *
 * Access tokens carry the subject and role claims and are never stored.
 * Refresh tokens carry only the subject; their `jti` is recorded in the
 * refresh token store so they can be revoked (see AuthService).
 *
 * Verification checks, in order: size limit, format, algorithm allow-list,
 * signature, issuer, expiry, required claims and the token kind.
 */

import {
  SignJWT,
  errors,
  importPKCS8,
  importSPKI,
  jwtVerify,
  type JWTPayload,
  type KeyLike,
} from "jose";
import { nanoid } from "nanoid";
import type { Role } from "@event-desk/shared";
import { isHmacAlgorithm, type JwtAlgorithm, type JwtConfig } from "../config/env.js";
import { AuthenticationError, ERROR_CODES } from "../errors.js";
import { isRole } from "./roles.js";

/**
 * Maximum token size in bytes (8KB).
 * A typical access token is well under 1KB; anything larger is rejected
 * before it is parsed.
 */
export const MAX_TOKEN_SIZE = 8 * 1024;

export type TokenKind = "access" | "refresh";

type Key = KeyLike | Uint8Array;

export interface TokenServiceOptions {
  algorithm: JwtAlgorithm;
  signingKey: Key;
  verificationKey: Key;
  issuer: string;
  /** Access token lifetime in milliseconds (whole seconds) */
  accessTtlMs: number;
  /** Refresh token lifetime in milliseconds (whole seconds) */
  refreshTtlMs: number;
  /** Clock override (epoch ms) */
  now?: () => number;
}

export interface IssuedToken {
  token: string;
  jti: string;
  subject: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface VerifiedToken {
  subject: string;
  jti: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface VerifiedAccessToken extends VerifiedToken {
  roles: Role[];
}

function assertWholeSeconds(name: string, ms: number): void {
  if (!Number.isInteger(ms) || ms < 0 || ms % 1000 !== 0) {
    throw new Error(`${name} must be a non-negative whole number of seconds, got ${ms}ms`);
  }
}

function invalidToken(message = "Invalid token"): AuthenticationError {
  return new AuthenticationError(message, ERROR_CODES.INVALID_TOKEN);
}

export class TokenService {
  private readonly algorithm: JwtAlgorithm;
  private readonly signingKey: Key;
  private readonly verificationKey: Key;
  private readonly issuer: string;
  private readonly accessTtlMs: number;
  private readonly refreshTtlMs: number;
  private readonly now: () => number;

  constructor(options: TokenServiceOptions) {
    assertWholeSeconds("accessTtlMs", options.accessTtlMs);
    assertWholeSeconds("refreshTtlMs", options.refreshTtlMs);

    this.algorithm = options.algorithm;
    this.signingKey = options.signingKey;
    this.verificationKey = options.verificationKey;
    this.issuer = options.issuer;
    this.accessTtlMs = options.accessTtlMs;
    this.refreshTtlMs = options.refreshTtlMs;
    this.now = options.now ?? Date.now;
  }

  /** Build a service from configuration, importing PEM keys for asymmetric algorithms */
  static async fromConfig(config: JwtConfig, now?: () => number): Promise<TokenService> {
    let signingKey: Key;
    let verificationKey: Key;

    if (isHmacAlgorithm(config.algorithm)) {
      if (!config.secret) throw new Error(`${config.algorithm} requires JWT_SECRET`);
      signingKey = new TextEncoder().encode(config.secret);
      verificationKey = signingKey;
    } else {
      if (!config.privateKey || !config.publicKey) {
        throw new Error(`${config.algorithm} requires JWT_PRIVATE_KEY and JWT_PUBLIC_KEY`);
      }
      signingKey = await importPKCS8(config.privateKey, config.algorithm);
      verificationKey = await importSPKI(config.publicKey, config.algorithm);
    }

    return new TokenService({
      algorithm: config.algorithm,
      signingKey,
      verificationKey,
      issuer: config.issuer,
      accessTtlMs: config.accessTtlMs,
      refreshTtlMs: config.refreshTtlMs,
      now,
    });
  }

  issueAccessToken(user: { id: string; roles: readonly Role[] }): Promise<IssuedToken> {
    return this.sign("access", user.id, this.accessTtlMs, { roles: [...user.roles] });
  }

  issueRefreshToken(userId: string): Promise<IssuedToken> {
    return this.sign("refresh", userId, this.refreshTtlMs, {});
  }

  async verifyAccessToken(token: string): Promise<VerifiedAccessToken> {
    const { payload, verified } = await this.verify(token, "access");
    const roles = payload.roles;
    if (!Array.isArray(roles) || !roles.every(isRole)) {
      throw invalidToken();
    }
    return { ...verified, roles };
  }

  async verifyRefreshToken(token: string): Promise<VerifiedToken> {
    const { verified } = await this.verify(token, "refresh");
    return verified;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async sign(
    kind: TokenKind,
    subject: string,
    ttlMs: number,
    claims: JWTPayload,
  ): Promise<IssuedToken> {
    // NumericDate claims have second precision
    const issuedAtMs = Math.floor(this.now() / 1000) * 1000;
    const expiresAtMs = issuedAtMs + ttlMs;
    const jti = nanoid();

    const token = await new SignJWT({ ...claims, token_use: kind })
      .setProtectedHeader({ alg: this.algorithm, typ: "JWT" })
      .setSubject(subject)
      .setIssuer(this.issuer)
      .setJti(jti)
      .setIssuedAt(issuedAtMs / 1000)
      .setExpirationTime(expiresAtMs / 1000)
      .sign(this.signingKey);

    return {
      token,
      jti,
      subject,
      issuedAt: new Date(issuedAtMs),
      expiresAt: new Date(expiresAtMs),
    };
  }

  private async verify(
    token: string,
    kind: TokenKind,
  ): Promise<{ payload: JWTPayload; verified: VerifiedToken }> {
    if (token.length > MAX_TOKEN_SIZE) {
      throw invalidToken("Token too large");
    }

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.verificationKey, {
        algorithms: [this.algorithm],
        issuer: this.issuer,
        currentDate: new Date(this.now()),
        requiredClaims: ["sub", "jti", "iat", "exp"],
      }));
    } catch (err) {
      if (err instanceof errors.JWTExpired) {
        throw new AuthenticationError("Token expired", ERROR_CODES.TOKEN_EXPIRED);
      }
      // Fail closed without echoing jose's reason to the client
      throw invalidToken();
    }

    const { sub, jti, iat, exp } = payload;
    if (
      typeof sub !== "string" ||
      typeof jti !== "string" ||
      typeof iat !== "number" ||
      typeof exp !== "number"
    ) {
      throw invalidToken();
    }
    if (payload.token_use !== kind) {
      throw invalidToken("Wrong token type");
    }

    return {
      payload,
      verified: {
        subject: sub,
        jti,
        issuedAt: new Date(iat * 1000),
        expiresAt: new Date(exp * 1000),
      },
    };
  }
}
