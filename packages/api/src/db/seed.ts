/**
 * Seed script — creates an initial admin user if none exists.
 *
 * Usage:
 *   npm run db:seed            (from root)
 *   tsx src/db/seed.ts         (from packages/api)
 *
 * Environment:
 *   DATABASE_URL
 *   ADMIN_USERNAME  (default: "admin")
 *   ADMIN_PASSWORD  (generated and logged when unset)
 */

import { pino } from "pino";
import { loadConfig } from "../config/env.js";
import { createDrizzleStores } from "../stores/index.js";
import { createDatabase } from "./index.js";
import { seedAdminUser } from "./seed-admin.js";

const log = pino({
  transport: { target: "pino-pretty", options: { colorize: true } },
});

async function seed(): Promise<void> {
  const config = loadConfig();
  const { db, client } = createDatabase(config.databaseUrl);

  try {
    log.info("Seeding database...");
    await seedAdminUser(createDrizzleStores(db).users, config.admin, log);
    log.info("Seed complete.");
  } finally {
    await client.end();
  }
}

seed().catch((err: unknown) => {
  log.error({ err }, "Seed failed");
  process.exitCode = 1;
});
