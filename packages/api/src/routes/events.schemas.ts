/**
 * Typebox schemas for Event routes.
 */

import { Type, type Static } from "@sinclair/typebox";
import { PageQuery } from "./common.schemas.js";

const NullableText = (maxLength: number) =>
  Type.Union([Type.Null(), Type.String({ maxLength })]);

// ---------------------------------------------------------------------------
// POST /api/events — Create Event
// ---------------------------------------------------------------------------

export const CreateEventBody = Type.Object({
  title: Type.String({ minLength: 1, maxLength: 200 }),
  description: Type.Optional(NullableText(5000)),
  location: Type.Optional(NullableText(200)),
  startsAt: Type.String({ format: "date-time" }),
  endsAt: Type.String({ format: "date-time" }),
  projectId: Type.Optional(Type.Union([Type.Null(), Type.String({ format: "uuid" })])),
});

export type CreateEventBody = Static<typeof CreateEventBody>;

// ---------------------------------------------------------------------------
// PUT /api/events/:id — Update Event
// ---------------------------------------------------------------------------

export const UpdateEventBody = Type.Object({
  title: Type.Optional(Type.String({ minLength: 1, maxLength: 200 })),
  description: Type.Optional(NullableText(5000)),
  location: Type.Optional(NullableText(200)),
  startsAt: Type.Optional(Type.String({ format: "date-time" })),
  endsAt: Type.Optional(Type.String({ format: "date-time" })),
  projectId: Type.Optional(Type.Union([Type.Null(), Type.String({ format: "uuid" })])),
});

export type UpdateEventBody = Static<typeof UpdateEventBody>;

// ---------------------------------------------------------------------------
// GET /api/events
// ---------------------------------------------------------------------------

export const ListEventsQuery = Type.Composite([
  PageQuery,
  Type.Object({
    projectId: Type.Optional(Type.String({ format: "uuid" })),
  }),
]);

export type ListEventsQuery = Static<typeof ListEventsQuery>;
