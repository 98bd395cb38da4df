/**
 * In-memory stores.
 *
 * Selected with DATA_STORE=memory for running the API without PostgreSQL,
 * and used by the route tests. Records are copied on the way in and out so
 * callers never hold a reference into the store.
 */

import { randomUUID } from "node:crypto";
import type { Role, UserStatus } from "@event-desk/shared";
import { ConflictError } from "../errors.js";
import type {
  EventChanges,
  EventQuery,
  EventRecord,
  EventStore,
  NewEvent,
  NewProject,
  NewUser,
  PageRequest,
  PageResult,
  ProjectChanges,
  ProjectRecord,
  ProjectStore,
  RefreshTokenRecord,
  RefreshTokenStore,
  Stores,
  UserProfileChanges,
  UserRecord,
  UserStore,
} from "./types.js";

function paginate<T>(items: T[], page: PageRequest): PageResult<T> {
  return {
    items: items.slice(page.offset, page.offset + page.limit),
    total: items.length,
  };
}

function copyUser(u: UserRecord): UserRecord {
  return { ...u, roles: [...u.roles] };
}

export class MemoryUserStore implements UserStore {
  private users = new Map<string, UserRecord>();

  async create(input: NewUser): Promise<UserRecord> {
    for (const existing of this.users.values()) {
      if (existing.username === input.username) {
        throw new ConflictError(`Username "${input.username}" is already taken`);
      }
    }
    const now = new Date();
    const user: UserRecord = {
      id: randomUUID(),
      username: input.username,
      email: input.email ?? null,
      displayName: input.displayName ?? null,
      passwordHash: input.passwordHash,
      roles: [...input.roles],
      status: "active",
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(user.id, user);
    return copyUser(user);
  }

  async findById(id: string): Promise<UserRecord | undefined> {
    const user = this.users.get(id);
    return user ? copyUser(user) : undefined;
  }

  async findByUsername(username: string): Promise<UserRecord | undefined> {
    for (const user of this.users.values()) {
      if (user.username === username) return copyUser(user);
    }
    return undefined;
  }

  async list(page: PageRequest): Promise<PageResult<UserRecord>> {
    const sorted = Array.from(this.users.values()).sort(
      (a, b) => a.createdAt.getTime() - b.createdAt.getTime(),
    );
    const result = paginate(sorted, page);
    return { items: result.items.map(copyUser), total: result.total };
  }

  async updateProfile(id: string, changes: UserProfileChanges): Promise<UserRecord | undefined> {
    return this.patch(id, {
      ...(changes.email !== undefined && { email: changes.email }),
      ...(changes.displayName !== undefined && { displayName: changes.displayName }),
    });
  }

  async updatePassword(id: string, passwordHash: string): Promise<boolean> {
    return (await this.patch(id, { passwordHash })) !== undefined;
  }

  async setRoles(id: string, roles: Role[]): Promise<UserRecord | undefined> {
    return this.patch(id, { roles: [...roles] });
  }

  async setStatus(id: string, status: UserStatus): Promise<UserRecord | undefined> {
    return this.patch(id, { status });
  }

  async hasAdmin(): Promise<boolean> {
    for (const user of this.users.values()) {
      if (user.status === "active" && user.roles.includes("ADMIN")) return true;
    }
    return false;
  }

  private patch(id: string, changes: Partial<UserRecord>): UserRecord | undefined {
    const user = this.users.get(id);
    if (!user) return undefined;
    const updated: UserRecord = { ...user, ...changes, updatedAt: new Date() };
    this.users.set(id, updated);
    return copyUser(updated);
  }
}

export class MemoryRefreshTokenStore implements RefreshTokenStore {
  private tokens = new Map<string, RefreshTokenRecord>();

  async save(record: { jti: string; userId: string; expiresAt: Date }): Promise<void> {
    this.tokens.set(record.jti, { ...record, revokedAt: null, createdAt: new Date() });
  }

  async find(jti: string): Promise<RefreshTokenRecord | undefined> {
    const record = this.tokens.get(jti);
    return record ? { ...record } : undefined;
  }

  async revoke(jti: string, at: Date): Promise<boolean> {
    const record = this.tokens.get(jti);
    if (!record || record.revokedAt) return false;
    this.tokens.set(jti, { ...record, revokedAt: at });
    return true;
  }

  async revokeAllForUser(userId: string, at: Date): Promise<number> {
    let count = 0;
    for (const [jti, record] of this.tokens) {
      if (record.userId === userId && !record.revokedAt) {
        this.tokens.set(jti, { ...record, revokedAt: at });
        count++;
      }
    }
    return count;
  }

  async deleteExpired(before: Date): Promise<number> {
    let count = 0;
    for (const [jti, record] of this.tokens) {
      if (record.expiresAt.getTime() < before.getTime()) {
        this.tokens.delete(jti);
        count++;
      }
    }
    return count;
  }
}

export class MemoryProjectStore implements ProjectStore {
  private projects = new Map<string, ProjectRecord>();

  /** Called on delete so events can drop the project reference */
  constructor(private onDelete?: (projectId: string) => void) {}

  async create(input: NewProject): Promise<ProjectRecord> {
    const now = new Date();
    const project: ProjectRecord = {
      id: randomUUID(),
      name: input.name,
      description: input.description ?? null,
      ownerId: input.ownerId,
      createdAt: now,
      updatedAt: now,
    };
    this.projects.set(project.id, project);
    return { ...project };
  }

  async findById(id: string): Promise<ProjectRecord | undefined> {
    const project = this.projects.get(id);
    return project ? { ...project } : undefined;
  }

  async list(page: PageRequest): Promise<PageResult<ProjectRecord>> {
    const sorted = Array.from(this.projects.values()).sort(
      (a, b) => a.createdAt.getTime() - b.createdAt.getTime(),
    );
    const result = paginate(sorted, page);
    return { items: result.items.map((p) => ({ ...p })), total: result.total };
  }

  async update(id: string, changes: ProjectChanges): Promise<ProjectRecord | undefined> {
    const project = this.projects.get(id);
    if (!project) return undefined;
    const updated: ProjectRecord = {
      ...project,
      ...(changes.name !== undefined && { name: changes.name }),
      ...(changes.description !== undefined && { description: changes.description }),
      updatedAt: new Date(),
    };
    this.projects.set(id, updated);
    return { ...updated };
  }

  async delete(id: string): Promise<boolean> {
    const existed = this.projects.delete(id);
    if (existed) this.onDelete?.(id);
    return existed;
  }
}

function copyEvent(e: EventRecord): EventRecord {
  return { ...e, participantIds: [...e.participantIds] };
}

export class MemoryEventStore implements EventStore {
  private events = new Map<string, EventRecord>();

  async create(input: NewEvent): Promise<EventRecord> {
    const now = new Date();
    const event: EventRecord = {
      id: randomUUID(),
      title: input.title,
      description: input.description ?? null,
      location: input.location ?? null,
      startsAt: input.startsAt,
      endsAt: input.endsAt,
      projectId: input.projectId ?? null,
      ownerId: input.ownerId,
      participantIds: [],
      createdAt: now,
      updatedAt: now,
    };
    this.events.set(event.id, event);
    return copyEvent(event);
  }

  async findById(id: string): Promise<EventRecord | undefined> {
    const event = this.events.get(id);
    return event ? copyEvent(event) : undefined;
  }

  async list(query: EventQuery): Promise<PageResult<EventRecord>> {
    const matching = Array.from(this.events.values())
      .filter((e) => query.projectId === undefined || e.projectId === query.projectId)
      .sort((a, b) => a.startsAt.getTime() - b.startsAt.getTime());
    const result = paginate(matching, query);
    return { items: result.items.map(copyEvent), total: result.total };
  }

  async update(id: string, changes: EventChanges): Promise<EventRecord | undefined> {
    const event = this.events.get(id);
    if (!event) return undefined;
    const updated: EventRecord = {
      ...event,
      title: changes.title ?? event.title,
      description: changes.description !== undefined ? changes.description : event.description,
      location: changes.location !== undefined ? changes.location : event.location,
      startsAt: changes.startsAt ?? event.startsAt,
      endsAt: changes.endsAt ?? event.endsAt,
      projectId: changes.projectId !== undefined ? changes.projectId : event.projectId,
      updatedAt: new Date(),
    };
    this.events.set(id, updated);
    return copyEvent(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.events.delete(id);
  }

  async addParticipant(eventId: string, userId: string): Promise<boolean> {
    const event = this.events.get(eventId);
    if (!event || event.participantIds.includes(userId)) return false;
    this.events.set(eventId, {
      ...event,
      participantIds: [...event.participantIds, userId],
    });
    return true;
  }

  async removeParticipant(eventId: string, userId: string): Promise<boolean> {
    const event = this.events.get(eventId);
    if (!event || !event.participantIds.includes(userId)) return false;
    this.events.set(eventId, {
      ...event,
      participantIds: event.participantIds.filter((id) => id !== userId),
    });
    return true;
  }

  /** Clear the project reference of every event in a deleted project */
  detachProject(projectId: string): void {
    for (const [id, event] of this.events) {
      if (event.projectId === projectId) {
        this.events.set(id, { ...event, projectId: null });
      }
    }
  }
}

export function createMemoryStores(): Stores {
  const events = new MemoryEventStore();
  return {
    users: new MemoryUserStore(),
    refreshTokens: new MemoryRefreshTokenStore(),
    projects: new MemoryProjectStore((projectId) => events.detachProject(projectId)),
    events,
  };
}
