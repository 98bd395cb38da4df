/** Roles a user can hold. Access rules grant a route to one or more of them. */
export type Role = "USER" | "ORGANIZER" | "ADMIN";

export type UserStatus = "active" | "disabled";

/** User account (as returned by the API — never includes the password hash) */
export interface User {
  id: string;
  username: string;
  email: string | null;
  displayName: string | null;
  roles: Role[];
  status: UserStatus;
  createdAt: Date;
  updatedAt: Date;
}

/** Reduced view of another user, safe to show to any authenticated caller */
export interface PublicUser {
  id: string;
  username: string;
  displayName: string | null;
}

/** Login response */
export interface LoginResponse {
  accessToken: string;
  refreshToken: string;
  tokenType: "Bearer";
  /** Access token expiry */
  expiresAt: Date;
  refreshExpiresAt: Date;
  user: User;
}

/**
 * Refresh response. `refreshToken` is only present when the server rotates
 * refresh tokens; the old one is revoked in that case.
 */
export interface RefreshResponse {
  accessToken: string;
  tokenType: "Bearer";
  expiresAt: Date;
  refreshToken?: string;
  refreshExpiresAt?: Date;
}

/** Error body returned for every non-2xx response */
export interface ErrorResponse {
  error: string;
  code: string;
  details?: { field: string; message: string }[];
}

/** GET /api/admin/users */
export interface UserListResponse {
  users: User[];
  total: number;
}
