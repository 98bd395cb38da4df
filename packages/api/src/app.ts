import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { randomUUID } from "node:crypto";
import type { ErrorResponse } from "@event-desk/shared";

import { AccessPolicy } from "./auth/access-policy.js";
import { ACCESS_RULES } from "./auth/access-rules.js";
import { RefreshTokenSweeper } from "./auth/refresh-token-sweeper.js";
import { TokenService } from "./auth/token-service.js";
import { isDevProfile, loadConfig, type AppConfig } from "./config/env.js";
import { createDatabase, type Database } from "./db/index.js";
import { AppError, ERROR_CODES, ValidationError } from "./errors.js";
import { requireAuth } from "./hooks/require-auth.js";
import { adminRoutes } from "./routes/admin.js";
import { authRoutes } from "./routes/auth.js";
import { eventRoutes } from "./routes/events.js";
import { healthRoutes } from "./routes/health.js";
import { projectRoutes } from "./routes/projects.js";
import { userRoutes } from "./routes/users.js";
import { AuthService } from "./services/auth-service.js";
import { createDrizzleStores, createMemoryStores, type Stores } from "./stores/index.js";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Override the environment configuration (for testing) */
  config?: AppConfig;
  /** Override the stores (for testing); skips the database entirely */
  stores?: Stores;
  /** Use an existing database connection instead of opening one */
  database?: Database;
  /** Override the token service (for testing, e.g. a fixed clock) */
  tokens?: TokenService;
  /** Override the database health probe */
  pingDb?: () => Promise<boolean>;
}

type ValidationIssue = NonNullable<FastifyError["validation"]>[number];

function errorBody(
  error: string,
  code: string,
  details?: ErrorResponse["details"],
): ErrorResponse {
  return details && details.length > 0 ? { error, code, details } : { error, code };
}

function validationField(issue: ValidationIssue): string {
  if (issue.instancePath) return issue.instancePath;
  const missing = issue.params["missingProperty"];
  return typeof missing === "string" ? missing : "body";
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const {
    config: customConfig,
    stores: customStores,
    database: customDatabase,
    tokens: customTokens,
    pingDb: customPingDb,
    ...fastifyOpts
  } = opts ?? {};

  const config = customConfig ?? loadConfig();
  const isDev = isDevProfile(config.profile);

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: isDev
            ? {
                level: config.logLevel,
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : {
                level: config.logLevel,
                // Production: structured JSON logging with redaction
                redact: ["req.headers.authorization", "req.headers.cookie"],
              },
          // Generate unique request IDs for tracing
          genReqId: (req) => {
            const header = req.headers["x-request-id"];
            return typeof header === "string" && header.length > 0 ? header : randomUUID();
          },
        },
  );

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  let stores: Stores;
  let pingDb: () => Promise<boolean>;
  let ownedDatabase: Database | undefined;

  if (customStores) {
    stores = customStores;
    pingDb = customPingDb ?? (async () => true);
  } else if (config.dataStore === "memory") {
    stores = createMemoryStores();
    pingDb = customPingDb ?? (async () => true);
  } else {
    const database = customDatabase ?? createDatabase(config.databaseUrl);
    if (!customDatabase) ownedDatabase = database;
    stores = createDrizzleStores(database.db);
    pingDb =
      customPingDb ??
      (async () => {
        try {
          await database.client`SELECT 1`;
          return true;
        } catch (err) {
          app.log.warn({ err }, "Database ping failed");
          return false;
        }
      });
  }

  // Token service, access policy and auth flows (decorated so routes can access them)
  const tokens = customTokens ?? (await TokenService.fromConfig(config.jwt));
  const accessPolicy = new AccessPolicy(ACCESS_RULES);
  const authService = new AuthService(stores.users, stores.refreshTokens, tokens, {
    rotateRefreshTokens: config.jwt.rotateRefreshTokens,
    onSecurityEvent: (event) => {
      app.log.warn(
        { userId: event.userId, revoked: event.revoked },
        "Refresh token reuse detected; all sessions of the user revoked",
      );
    },
  });

  app.decorate("config", config);
  app.decorate("stores", stores);
  app.decorate("tokens", tokens);
  app.decorate("accessPolicy", accessPolicy);
  app.decorate("authService", authService);
  app.decorate("pingDb", pingDb);
  app.decorateRequest("identity", null);

  // ---------------------------------------------------------------------------
  // Plugins
  // ---------------------------------------------------------------------------

  // CORS: bearer tokens travel in a header, so no credentials are needed
  await app.register(cors, {
    origin: config.corsOrigin ?? isDev,
  });

  // Rate limiting on auth routes (prevent brute force).
  // Tests turn it off — inject() shares 127.0.0.1 across all tests.
  if (config.rateLimitEnabled) {
    await app.register(rateLimit, {
      global: false, // Don't rate-limit all routes — only auth
    });
  }

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode === 401 || error.statusCode === 403) {
        request.log.info(
          { code: error.code, route: request.routeOptions.url },
          "Access rejected",
        );
      }
      reply
        .status(error.statusCode)
        .send(
          errorBody(
            error.message,
            error.code,
            error instanceof ValidationError ? error.details : undefined,
          ),
        );
      return;
    }

    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: validationField(v),
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send(errorBody("Validation failed", ERROR_CODES.VALIDATION_ERROR, details));
      return;
    }

    // Rate limit errors
    if (error.statusCode === 429) {
      reply
        .status(429)
        .send(errorBody("Too many requests. Please try again later.", ERROR_CODES.RATE_LIMITED));
      return;
    }

    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send(errorBody(error.message, ERROR_CODES.BAD_REQUEST));
      return;
    }

    // Unexpected errors — log full details, return generic message
    request.log.error({ err: error }, "Unhandled error");
    reply.status(500).send(errorBody("Internal server error", ERROR_CODES.INTERNAL));
  });

  app.setNotFoundHandler((request, reply) => {
    reply
      .status(404)
      .send(errorBody(`Route ${request.method} ${request.url} not found`, ERROR_CODES.NOT_FOUND));
  });

  // Every request passes the token validator and the access table first
  app.addHook("onRequest", requireAuth(app));

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, { prefix: "/health" });
  await app.register(authRoutes, { prefix: "/api/auth" });
  await app.register(userRoutes, { prefix: "/api/users" });
  await app.register(eventRoutes, { prefix: "/api/events" });
  await app.register(projectRoutes, { prefix: "/api/projects" });
  await app.register(adminRoutes, { prefix: "/api/admin" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  const sweeper = new RefreshTokenSweeper(stores.refreshTokens, {
    intervalMs: config.refreshTokenSweepIntervalMs,
    onSweep: (deleted) => app.log.info({ deleted }, "Deleted expired refresh tokens"),
    onError: (err) => app.log.error({ err }, "Refresh token sweep failed"),
  });

  // Start sweeping expired refresh tokens when the server is ready
  app.addHook("onReady", async () => {
    if (config.refreshTokenSweepIntervalMs > 0) sweeper.start();
  });

  app.addHook("onClose", async () => {
    sweeper.stop();
    if (ownedDatabase) await ownedDatabase.client.end();
  });

  return app;
}
