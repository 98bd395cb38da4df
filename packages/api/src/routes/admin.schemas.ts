import { Type, type Static } from "@sinclair/typebox";
import { RoleSchema } from "./common.schemas.js";

// ---------------------------------------------------------------------------
// PUT /api/admin/users/:id/roles
// ---------------------------------------------------------------------------

export const SetRolesBody = Type.Object({
  roles: Type.Array(RoleSchema, { minItems: 1, maxItems: 3, uniqueItems: true }),
});

export type SetRolesBody = Static<typeof SetRolesBody>;

// ---------------------------------------------------------------------------
// PUT /api/admin/users/:id/status
// ---------------------------------------------------------------------------

export const SetStatusBody = Type.Object({
  status: Type.Union([Type.Literal("active"), Type.Literal("disabled")]),
});

export type SetStatusBody = Static<typeof SetStatusBody>;
