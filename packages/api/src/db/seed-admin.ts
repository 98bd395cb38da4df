import { randomBytes } from "node:crypto";
import { hash } from "argon2";
import type { FastifyBaseLogger } from "fastify";
import type { UserStore } from "../stores/types.js";

export type SeedLogger = Pick<FastifyBaseLogger, "info" | "warn">;

export interface SeedAdminOptions {
  username: string;
  /** Generated (and logged once) when unset */
  password?: string;
}

export type SeedAdminResult =
  | { created: true; userId: string; generatedPassword?: string }
  | { created: false; reason: "admin-exists" | "username-taken" };

/**
 * Seed the initial admin user if no active admin exists.
 */
export async function seedAdminUser(
  users: UserStore,
  options: SeedAdminOptions,
  log: SeedLogger,
): Promise<SeedAdminResult> {
  if (await users.hasAdmin()) {
    log.info("Admin user already exists — skipping seed");
    return { created: false, reason: "admin-exists" };
  }

  const existing = await users.findByUsername(options.username);
  if (existing) {
    log.warn(
      { username: options.username },
      "ADMIN_USERNAME belongs to a non-admin account — not seeding an admin",
    );
    return { created: false, reason: "username-taken" };
  }

  let generatedPassword: string | undefined;
  let password = options.password;
  if (!password) {
    generatedPassword = randomBytes(24).toString("base64url");
    password = generatedPassword;
    log.warn(`No ADMIN_PASSWORD set — generated one: ${generatedPassword}`);
  }

  const user = await users.create({
    username: options.username,
    passwordHash: await hash(password),
    roles: ["ADMIN"],
  });
  log.info({ userId: user.id, username: user.username }, "Created admin user");

  return { created: true, userId: user.id, generatedPassword };
}
