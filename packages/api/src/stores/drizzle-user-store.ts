/**
 * Drizzle-based implementation of UserStore (the credential store).
 */

import { and, arrayContains, count, eq } from "drizzle-orm";
import type { Role, UserStatus } from "@event-desk/shared";
import type { Db } from "../db/index.js";
import { users } from "../db/schema.js";
import { ConflictError } from "../errors.js";
import type {
  NewUser,
  PageRequest,
  PageResult,
  UserProfileChanges,
  UserRecord,
  UserStore,
} from "./types.js";

const UNIQUE_VIOLATION = "23505";

/**
 * SQLSTATE of a postgres error, looking through wrapper errors
 * (drizzle wraps driver errors and keeps the original as `cause`).
 */
export function pgErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return pgErrorCode(err.cause);
  return undefined;
}

function toRecord(row: typeof users.$inferSelect): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    displayName: row.displayName,
    passwordHash: row.passwordHash,
    roles: row.roles,
    status: row.status,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleUserStore implements UserStore {
  constructor(private db: Db) {}

  async create(input: NewUser): Promise<UserRecord> {
    try {
      const [row] = await this.db
        .insert(users)
        .values({
          username: input.username,
          email: input.email ?? null,
          displayName: input.displayName ?? null,
          passwordHash: input.passwordHash,
          roles: input.roles,
        })
        .returning();
      return toRecord(row);
    } catch (err) {
      // The unique index decides races between concurrent registrations
      if (pgErrorCode(err) === UNIQUE_VIOLATION) {
        throw new ConflictError(`Username "${input.username}" is already taken`);
      }
      throw err;
    }
  }

  async findById(id: string): Promise<UserRecord | undefined> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ? toRecord(row) : undefined;
  }

  async findByUsername(username: string): Promise<UserRecord | undefined> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(eq(users.username, username))
      .limit(1);
    return row ? toRecord(row) : undefined;
  }

  async list(page: PageRequest): Promise<PageResult<UserRecord>> {
    const [rows, [totals]] = await Promise.all([
      this.db
        .select()
        .from(users)
        .orderBy(users.createdAt)
        .limit(page.limit)
        .offset(page.offset),
      this.db.select({ total: count() }).from(users),
    ]);
    return { items: rows.map(toRecord), total: totals?.total ?? 0 };
  }

  async updateProfile(id: string, changes: UserProfileChanges): Promise<UserRecord | undefined> {
    const updates: Partial<typeof users.$inferInsert> = { updatedAt: new Date() };
    if (changes.email !== undefined) updates.email = changes.email;
    if (changes.displayName !== undefined) updates.displayName = changes.displayName;
    return this.update(id, updates);
  }

  async updatePassword(id: string, passwordHash: string): Promise<boolean> {
    return (await this.update(id, { passwordHash, updatedAt: new Date() })) !== undefined;
  }

  async setRoles(id: string, roles: Role[]): Promise<UserRecord | undefined> {
    return this.update(id, { roles, updatedAt: new Date() });
  }

  async setStatus(id: string, status: UserStatus): Promise<UserRecord | undefined> {
    return this.update(id, { status, updatedAt: new Date() });
  }

  async hasAdmin(): Promise<boolean> {
    const [row] = await this.db
      .select({ id: users.id })
      .from(users)
      .where(and(eq(users.status, "active"), arrayContains(users.roles, ["ADMIN"])))
      .limit(1);
    return row !== undefined;
  }

  private async update(
    id: string,
    updates: Partial<typeof users.$inferInsert>,
  ): Promise<UserRecord | undefined> {
    const [row] = await this.db
      .update(users)
      .set(updates)
      .where(eq(users.id, id))
      .returning();
    return row ? toRecord(row) : undefined;
  }
}
