import { Type, type Static } from "@sinclair/typebox";

export const CreateProjectBody = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 128 }),
  description: Type.Optional(Type.Union([Type.Null(), Type.String({ maxLength: 5000 })])),
});

export type CreateProjectBody = Static<typeof CreateProjectBody>;

export const UpdateProjectBody = Type.Object({
  name: Type.Optional(Type.String({ minLength: 1, maxLength: 128 })),
  description: Type.Optional(Type.Union([Type.Null(), Type.String({ maxLength: 5000 })])),
});

export type UpdateProjectBody = Static<typeof UpdateProjectBody>;
