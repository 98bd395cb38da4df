import type { Db } from "../db/index.js";
import { DrizzleEventStore } from "./drizzle-event-store.js";
import { DrizzleProjectStore } from "./drizzle-project-store.js";
import { DrizzleRefreshTokenStore } from "./drizzle-refresh-token-store.js";
import { DrizzleUserStore } from "./drizzle-user-store.js";
import type { Stores } from "./types.js";

export { createMemoryStores } from "./memory.js";
export type * from "./types.js";

export function createDrizzleStores(db: Db): Stores {
  return {
    users: new DrizzleUserStore(db),
    refreshTokens: new DrizzleRefreshTokenStore(db),
    projects: new DrizzleProjectStore(db),
    events: new DrizzleEventStore(db),
  };
}
