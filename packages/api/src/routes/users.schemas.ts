import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// PATCH /api/users/me
// ---------------------------------------------------------------------------

export const UpdateProfileBody = Type.Object(
  {
    email: Type.Optional(
      Type.Union([Type.Null(), Type.String({ format: "email", maxLength: 254 })]),
    ),
    displayName: Type.Optional(
      Type.Union([Type.Null(), Type.String({ minLength: 1, maxLength: 128 })]),
    ),
  },
  { additionalProperties: false },
);

export type UpdateProfileBody = Static<typeof UpdateProfileBody>;

// ---------------------------------------------------------------------------
// PUT /api/users/me/password
// ---------------------------------------------------------------------------

export const ChangePasswordBody = Type.Object({
  currentPassword: Type.String({ minLength: 1, maxLength: 256 }),
  newPassword: Type.String({ minLength: 8, maxLength: 256 }),
});

export type ChangePasswordBody = Static<typeof ChangePasswordBody>;
