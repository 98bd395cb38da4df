/**
 * Response shapes. Records from the stores carry internals (password hashes)
 * that must never leave the API, so every route serializes through here.
 */

import type { EventItem, Project, PublicUser, User } from "@event-desk/shared";
import type { IssuedToken } from "../auth/token-service.js";
import type { EventRecord, ProjectRecord, UserRecord } from "../stores/types.js";

export function toUser(record: UserRecord): User {
  return {
    id: record.id,
    username: record.username,
    email: record.email,
    displayName: record.displayName,
    roles: [...record.roles],
    status: record.status,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

export function toPublicUser(record: UserRecord): PublicUser {
  return {
    id: record.id,
    username: record.username,
    displayName: record.displayName,
  };
}

export function toProject(record: ProjectRecord): Project {
  return { ...record };
}

export function toEvent(record: EventRecord): EventItem {
  return { ...record, participantIds: [...record.participantIds] };
}

export function toAccessTokenFields(access: IssuedToken) {
  return {
    accessToken: access.token,
    tokenType: "Bearer" as const,
    expiresAt: access.expiresAt,
  };
}
