/**
 * Programmatic migration runner.
 *
 * Uses drizzle-orm's migrate() to apply SQL migrations from the
 * `drizzle/` folder (generated with `npm run db:generate`). Called on
 * startup so a fresh database initializes its own schema.
 */

import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import type { Db } from "./index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Migrations folder, resolved relative to this file so it works from any cwd */
export const MIGRATIONS_FOLDER = resolve(__dirname, "../../drizzle");

export async function runMigrations(db: Db): Promise<void> {
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
}
