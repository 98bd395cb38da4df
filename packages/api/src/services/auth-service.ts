/**
 * Authentication flows: registration, login, refresh, logout, password change.
 *
 * Routes stay thin and call into this service; everything here is
 * independent of Fastify so it can be exercised directly.
 */

import { hash, verify } from "argon2";
import type { Role } from "@event-desk/shared";
import type { IssuedToken, TokenService } from "../auth/token-service.js";
import { DEFAULT_ROLES } from "../auth/roles.js";
import { AuthenticationError, ERROR_CODES, ForbiddenError } from "../errors.js";
import type { RefreshTokenStore, UserRecord, UserStore } from "../stores/types.js";

export interface RegisterInput {
  username: string;
  password: string;
  email?: string;
  displayName?: string;
}

export interface LoginResult {
  user: UserRecord;
  access: IssuedToken;
  refresh: IssuedToken;
}

export interface RefreshResult {
  user: UserRecord;
  access: IssuedToken;
  /** Present only when refresh tokens are rotated */
  refresh?: IssuedToken;
}

export interface AuthServiceOptions {
  /** Issue a new refresh token (and revoke the old one) on every refresh */
  rotateRefreshTokens: boolean;
  /** Roles given to self-registered users */
  defaultRoles?: readonly Role[];
  /** Clock override (epoch ms) */
  now?: () => number;
  /** Audit hook for suspicious events, e.g. refresh token reuse */
  onSecurityEvent?: (event: SecurityEvent) => void;
}

export type SecurityEvent =
  | { type: "refresh_token_reuse"; userId: string; revoked: number };

const invalidCredentials = () =>
  new AuthenticationError("Invalid credentials", ERROR_CODES.INVALID_CREDENTIALS);

const invalidRefreshToken = () =>
  new AuthenticationError("Invalid refresh token", ERROR_CODES.INVALID_TOKEN);

export class AuthService {
  private readonly rotate: boolean;
  private readonly defaultRoles: readonly Role[];
  private readonly now: () => number;
  private readonly onSecurityEvent?: (event: SecurityEvent) => void;

  constructor(
    private users: UserStore,
    private refreshTokens: RefreshTokenStore,
    private tokens: TokenService,
    options: AuthServiceOptions,
  ) {
    this.rotate = options.rotateRefreshTokens;
    this.defaultRoles = options.defaultRoles ?? DEFAULT_ROLES;
    this.now = options.now ?? Date.now;
    this.onSecurityEvent = options.onSecurityEvent;
  }

  /** Create an account with the default roles. Duplicate usernames → ConflictError */
  async register(input: RegisterInput): Promise<UserRecord> {
    const passwordHash = await hash(input.password);
    return this.users.create({
      username: input.username,
      email: input.email ?? null,
      displayName: input.displayName ?? null,
      passwordHash,
      roles: [...this.defaultRoles],
    });
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.users.findByUsername(username);
    if (!user) throw invalidCredentials();

    const valid = await verify(user.passwordHash, password);
    if (!valid) throw invalidCredentials();

    if (user.status !== "active") {
      throw new AuthenticationError("Account is disabled", ERROR_CODES.ACCOUNT_DISABLED);
    }

    const access = await this.tokens.issueAccessToken(user);
    const refresh = await this.issueRefreshToken(user.id);
    return { user, access, refresh };
  }

  /**
   * Exchange a refresh token for a new access token.
   *
   * The token must verify, be present in the store and not be revoked.
   * Presenting a revoked token is treated as theft: every refresh token of
   * that user is revoked.
   */
  async refresh(refreshToken: string): Promise<RefreshResult> {
    const claims = await this.tokens.verifyRefreshToken(refreshToken);

    const record = await this.refreshTokens.find(claims.jti);
    if (!record || record.userId !== claims.subject) throw invalidRefreshToken();

    if (record.revokedAt) {
      await this.revokeForReuse(record.userId);
      throw new AuthenticationError("Refresh token revoked", ERROR_CODES.INVALID_TOKEN);
    }

    const user = await this.users.findById(record.userId);
    if (!user) throw invalidRefreshToken();
    if (user.status !== "active") {
      throw new AuthenticationError("Account is disabled", ERROR_CODES.ACCOUNT_DISABLED);
    }

    if (!this.rotate) {
      const access = await this.tokens.issueAccessToken(user);
      return { user, access };
    }

    // Lost the race against a concurrent refresh of the same token
    const won = await this.refreshTokens.revoke(record.jti, new Date(this.now()));
    if (!won) {
      await this.revokeForReuse(record.userId);
      throw new AuthenticationError("Refresh token revoked", ERROR_CODES.INVALID_TOKEN);
    }

    const access = await this.tokens.issueAccessToken(user);
    const refresh = await this.issueRefreshToken(user.id);
    return { user, access, refresh };
  }

  /** Revoke a refresh token. Unknown, expired or already revoked tokens are ignored */
  async logout(refreshToken: string): Promise<void> {
    let jti: string;
    try {
      ({ jti } = await this.tokens.verifyRefreshToken(refreshToken));
    } catch (err) {
      if (err instanceof AuthenticationError) return;
      throw err;
    }
    await this.refreshTokens.revoke(jti, new Date(this.now()));
  }

  /** Change a password after re-checking the current one; ends all other sessions */
  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.users.findById(userId);
    if (!user) throw new AuthenticationError("User not found");

    const valid = await verify(user.passwordHash, currentPassword);
    if (!valid) throw new ForbiddenError("Current password is incorrect");

    await this.users.updatePassword(user.id, await hash(newPassword));
    await this.revokeSessions(user.id);
  }

  /** Revoke every refresh token of a user; returns how many were live */
  revokeSessions(userId: string): Promise<number> {
    return this.refreshTokens.revokeAllForUser(userId, new Date(this.now()));
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async issueRefreshToken(userId: string): Promise<IssuedToken> {
    const refresh = await this.tokens.issueRefreshToken(userId);
    await this.refreshTokens.save({
      jti: refresh.jti,
      userId,
      expiresAt: refresh.expiresAt,
    });
    return refresh;
  }

  private async revokeForReuse(userId: string): Promise<void> {
    const revoked = await this.revokeSessions(userId);
    this.onSecurityEvent?.({ type: "refresh_token_reuse", userId, revoked });
  }
}
