/**
 * Drizzle-based implementation of RefreshTokenStore (the revocation set).
 */

import { and, eq, isNull, lt } from "drizzle-orm";
import type { Db } from "../db/index.js";
import { refreshTokens } from "../db/schema.js";
import type { RefreshTokenRecord, RefreshTokenStore } from "./types.js";

export class DrizzleRefreshTokenStore implements RefreshTokenStore {
  constructor(private db: Db) {}

  async save(record: { jti: string; userId: string; expiresAt: Date }): Promise<void> {
    await this.db.insert(refreshTokens).values(record);
  }

  async find(jti: string): Promise<RefreshTokenRecord | undefined> {
    const [row] = await this.db
      .select()
      .from(refreshTokens)
      .where(eq(refreshTokens.jti, jti))
      .limit(1);
    return row;
  }

  async revoke(jti: string, at: Date): Promise<boolean> {
    // Conditional update: only one of several concurrent callers gets a row back
    const rows = await this.db
      .update(refreshTokens)
      .set({ revokedAt: at })
      .where(and(eq(refreshTokens.jti, jti), isNull(refreshTokens.revokedAt)))
      .returning({ jti: refreshTokens.jti });
    return rows.length > 0;
  }

  async revokeAllForUser(userId: string, at: Date): Promise<number> {
    const rows = await this.db
      .update(refreshTokens)
      .set({ revokedAt: at })
      .where(and(eq(refreshTokens.userId, userId), isNull(refreshTokens.revokedAt)))
      .returning({ jti: refreshTokens.jti });
    return rows.length;
  }

  async deleteExpired(before: Date): Promise<number> {
    const rows = await this.db
      .delete(refreshTokens)
      .where(lt(refreshTokens.expiresAt, before))
      .returning({ jti: refreshTokens.jti });
    return rows.length;
  }
}
