/**
 * Schemas shared by several route files.
 */

import { Type, type Static } from "@sinclair/typebox";

export const IdParams = Type.Object({
  id: Type.String({ format: "uuid" }),
});

export type IdParams = Static<typeof IdParams>;

export const PageQuery = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100, default: 20 })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
});

export type PageQuery = Static<typeof PageQuery>;

export const RoleSchema = Type.Union([
  Type.Literal("USER"),
  Type.Literal("ORGANIZER"),
  Type.Literal("ADMIN"),
]);

/** Resolve optional paging params to concrete values */
export function pageOf(query: PageQuery): { limit: number; offset: number } {
  return { limit: query.limit ?? 20, offset: query.offset ?? 0 };
}
