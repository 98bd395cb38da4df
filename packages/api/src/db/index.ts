import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export type Db = PostgresJsDatabase<typeof schema>;

export interface Database {
  db: Db;
  client: postgres.Sql;
}

/**
 * Create the drizzle instance and its underlying postgres client.
 * The client connects lazily on the first query.
 */
export function createDatabase(connectionString: string): Database {
  const client = postgres(connectionString);
  return { db: drizzle(client, { schema }), client };
}
