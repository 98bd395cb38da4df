/**
 * Typebox schemas for Auth routes.
 *
 * These produce both runtime JSON Schema validators (used by Fastify)
 * and static TypeScript types via `Static<>`.
 */

import { Type, type Static } from "@sinclair/typebox";

const UsernamePattern = "^[A-Za-z0-9_.-]+$";

// ---------------------------------------------------------------------------
// POST /api/auth/register
// ---------------------------------------------------------------------------

export const RegisterBody = Type.Object({
  username: Type.String({ minLength: 3, maxLength: 64, pattern: UsernamePattern }),
  password: Type.String({ minLength: 8, maxLength: 256 }),
  email: Type.Optional(Type.String({ format: "email", maxLength: 254 })),
  displayName: Type.Optional(Type.String({ minLength: 1, maxLength: 128 })),
});

export type RegisterBody = Static<typeof RegisterBody>;

// ---------------------------------------------------------------------------
// POST /api/auth/login
// ---------------------------------------------------------------------------

export const LoginBody = Type.Object({
  username: Type.String({ minLength: 1, maxLength: 128 }),
  password: Type.String({ minLength: 1, maxLength: 256 }),
});

export type LoginBody = Static<typeof LoginBody>;

// ---------------------------------------------------------------------------
// POST /api/auth/refresh, POST /api/auth/logout
// ---------------------------------------------------------------------------

export const RefreshBody = Type.Object({
  refreshToken: Type.String({ minLength: 1, maxLength: 8192 }),
});

export type RefreshBody = Static<typeof RefreshBody>;
