/**
 * Persistence interfaces.
 *
 * Routes and services depend on these rather than on drizzle directly, so the
 * same code runs against PostgreSQL (drizzle-*.ts) or the in-memory stores
 * (memory.ts) used by the `memory` data store and the tests.
 *
 * Every mutating method is a single atomic operation on one row (or one
 * statement), so concurrent login/refresh/admin updates cannot interleave
 * half-applied changes.
 */

import type { Role, UserStatus } from "@event-desk/shared";

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface PageResult<T> {
  items: T[];
  total: number;
}

// ---------------------------------------------------------------------------
// Users (credential store)
// ---------------------------------------------------------------------------

export interface UserRecord {
  id: string;
  username: string;
  email: string | null;
  displayName: string | null;
  passwordHash: string;
  roles: Role[];
  status: UserStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  username: string;
  email?: string | null;
  displayName?: string | null;
  passwordHash: string;
  roles: Role[];
}

export interface UserProfileChanges {
  email?: string | null;
  displayName?: string | null;
}

export interface UserStore {
  /** Throws ConflictError when the username is taken */
  create(input: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | undefined>;
  findByUsername(username: string): Promise<UserRecord | undefined>;
  list(page: PageRequest): Promise<PageResult<UserRecord>>;
  updateProfile(id: string, changes: UserProfileChanges): Promise<UserRecord | undefined>;
  updatePassword(id: string, passwordHash: string): Promise<boolean>;
  setRoles(id: string, roles: Role[]): Promise<UserRecord | undefined>;
  setStatus(id: string, status: UserStatus): Promise<UserRecord | undefined>;
  /** Whether at least one active ADMIN exists */
  hasAdmin(): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Refresh tokens (revocation set)
// ---------------------------------------------------------------------------

export interface RefreshTokenRecord {
  jti: string;
  userId: string;
  expiresAt: Date;
  revokedAt: Date | null;
  createdAt: Date;
}

export interface RefreshTokenStore {
  save(record: { jti: string; userId: string; expiresAt: Date }): Promise<void>;
  find(jti: string): Promise<RefreshTokenRecord | undefined>;
  /**
   * Mark a token revoked. Returns true only for the call that flipped it,
   * so two concurrent refreshes of the same token cannot both succeed.
   */
  revoke(jti: string, at: Date): Promise<boolean>;
  /** Revoke every live token of a user; returns how many were revoked */
  revokeAllForUser(userId: string, at: Date): Promise<number>;
  /** Delete records that expired before `before`; returns how many */
  deleteExpired(before: Date): Promise<number>;
}

// ---------------------------------------------------------------------------
// Projects
// ---------------------------------------------------------------------------

export interface ProjectRecord {
  id: string;
  name: string;
  description: string | null;
  ownerId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewProject {
  name: string;
  description?: string | null;
  ownerId: string;
}

export interface ProjectChanges {
  name?: string;
  description?: string | null;
}

export interface ProjectStore {
  create(input: NewProject): Promise<ProjectRecord>;
  findById(id: string): Promise<ProjectRecord | undefined>;
  list(page: PageRequest): Promise<PageResult<ProjectRecord>>;
  update(id: string, changes: ProjectChanges): Promise<ProjectRecord | undefined>;
  /** Events of a deleted project are kept with `projectId` cleared */
  delete(id: string): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface EventRecord {
  id: string;
  title: string;
  description: string | null;
  location: string | null;
  startsAt: Date;
  endsAt: Date;
  projectId: string | null;
  ownerId: string;
  participantIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface NewEvent {
  title: string;
  description?: string | null;
  location?: string | null;
  startsAt: Date;
  endsAt: Date;
  projectId?: string | null;
  ownerId: string;
}

export interface EventChanges {
  title?: string;
  description?: string | null;
  location?: string | null;
  startsAt?: Date;
  endsAt?: Date;
  projectId?: string | null;
}

export interface EventQuery extends PageRequest {
  projectId?: string;
}

export interface EventStore {
  create(input: NewEvent): Promise<EventRecord>;
  findById(id: string): Promise<EventRecord | undefined>;
  /** Ordered by start time */
  list(query: EventQuery): Promise<PageResult<EventRecord>>;
  update(id: string, changes: EventChanges): Promise<EventRecord | undefined>;
  delete(id: string): Promise<boolean>;
  /** Returns false when the user already participates */
  addParticipant(eventId: string, userId: string): Promise<boolean>;
  /** Returns false when the user was not a participant */
  removeParticipant(eventId: string, userId: string): Promise<boolean>;
}

export interface Stores {
  users: UserStore;
  refreshTokens: RefreshTokenStore;
  projects: ProjectStore;
  events: EventStore;
}
