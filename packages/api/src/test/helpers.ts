/**
 * Shared fixtures for route tests: an app on in-memory stores with a fixed
 * HMAC secret, plus helpers to create users and log them in.
 */

import { hash } from "argon2";
import type { FastifyInstance } from "fastify";
import type { Role } from "@event-desk/shared";
import { buildApp } from "../app.js";
import type { AppConfig } from "../config/env.js";
import { createMemoryStores, type Stores, type UserRecord } from "../stores/index.js";

export const TEST_SECRET = "test-secret-test-secret-test-secret!!";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const base: AppConfig = {
    profile: "local",
    port: 0,
    host: "127.0.0.1",
    logLevel: "silent",
    dataStore: "memory",
    databaseUrl: "postgres://unused",
    jwt: {
      algorithm: "HS256",
      secret: TEST_SECRET,
      issuer: "event-desk-test",
      accessTtlMs: 15 * 60 * 1000,
      refreshTtlMs: 7 * 24 * 60 * 60 * 1000,
      rotateRefreshTokens: true,
    },
    refreshTokenSweepIntervalMs: 0,
    rateLimitEnabled: false,
    admin: { username: "admin" },
  };
  return { ...base, ...overrides };
}

export interface TestApp {
  app: FastifyInstance;
  stores: Stores;
}

export async function buildTestApp(
  overrides: Partial<AppConfig> = {},
  pingDb?: () => Promise<boolean>,
): Promise<TestApp> {
  const stores = createMemoryStores();
  const app = await buildApp({
    logger: false,
    config: testConfig(overrides),
    stores,
    pingDb,
  });
  await app.ready();
  return { app, stores };
}

/** Insert a user directly into the store */
export async function seedUser(
  stores: Stores,
  username: string,
  roles: Role[] = ["USER"],
  password = "password123",
): Promise<UserRecord> {
  return stores.users.create({
    username,
    passwordHash: await hash(password),
    roles,
  });
}

export interface LoginTokens {
  accessToken: string;
  refreshToken: string;
}

/** Log in through the API and return the token pair */
export async function loginAs(
  app: FastifyInstance,
  username: string,
  password = "password123",
): Promise<LoginTokens> {
  const res = await app.inject({
    method: "POST",
    url: "/api/auth/login",
    payload: { username, password },
  });
  if (res.statusCode !== 200) {
    throw new Error(`login as ${username} failed with ${res.statusCode}: ${res.body}`);
  }
  const body: { accessToken: string; refreshToken: string } = res.json();
  return { accessToken: body.accessToken, refreshToken: body.refreshToken };
}

export function bearer(token: string): { authorization: string } {
  return { authorization: `Bearer ${token}` };
}
