import { buildApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { createDatabase, type Database } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { seedAdminUser } from "./db/seed-admin.js";

const config = loadConfig();

// PostgreSQL: open the connection here so migrations run before the app uses it
let database: Database | undefined;
if (config.dataStore === "postgres") {
  database = createDatabase(config.databaseUrl);
  await runMigrations(database.db);
}

const app = await buildApp({ config, database });

if (database) {
  const { client } = database;
  app.addHook("onClose", async () => {
    await client.end();
  });
}

await seedAdminUser(app.stores.users, config.admin, app.log);

// Graceful shutdown
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "Error during shutdown");
        process.exit(1);
      },
    );
  });
}

try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info(`event-desk API listening on ${config.host}:${config.port} (${config.profile})`);
} catch (err) {
  app.log.error({ err }, "Failed to start server");
  process.exit(1);
}
