import type { FastifyPluginAsync } from "fastify";
import type { EventListResponse } from "@event-desk/shared";
import { assertCanModify } from "../auth/ownership.js";
import { currentIdentity } from "../hooks/require-auth.js";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import type { EventRecord, ProjectStore } from "../stores/types.js";
import { toEvent } from "../views/serializers.js";
import { IdParams, pageOf } from "./common.schemas.js";
import { CreateEventBody, ListEventsQuery, UpdateEventBody } from "./events.schemas.js";

function assertTimeRange(startsAt: Date, endsAt: Date): void {
  if (endsAt.getTime() < startsAt.getTime()) {
    throw new ValidationError("Validation failed", [
      { field: "/endsAt", message: "must not be before startsAt" },
    ]);
  }
}

async function assertProjectExists(
  projects: ProjectStore,
  projectId: string | null | undefined,
): Promise<void> {
  if (!projectId) return;
  const project = await projects.findById(projectId);
  if (!project) {
    throw new ValidationError("Validation failed", [
      { field: "/projectId", message: "project does not exist" },
    ]);
  }
}

export const eventRoutes: FastifyPluginAsync = async (app) => {
  async function loadEvent(id: string): Promise<EventRecord> {
    const event = await app.stores.events.findById(id);
    if (!event) throw new NotFoundError("Event not found");
    return event;
  }

  // -----------------------------------------------------------------------
  // Read
  // -----------------------------------------------------------------------

  /**
   * GET /api/events
   *
   * Paginated list ordered by start time, optionally filtered by project.
   */
  app.get<{ Querystring: ListEventsQuery }>(
    "/",
    { schema: { querystring: ListEventsQuery } },
    async (request, reply) => {
      const { items, total } = await app.stores.events.list({
        ...pageOf(request.query),
        projectId: request.query.projectId,
      });
      const body: EventListResponse = { events: items.map(toEvent), total };
      return reply.send(body);
    },
  );

  app.get<{ Params: IdParams }>(
    "/:id",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const event = await loadEvent(request.params.id);
      return reply.send({ event: toEvent(event) });
    },
  );

  // -----------------------------------------------------------------------
  // Write (ORGANIZER / ADMIN)
  // -----------------------------------------------------------------------

  app.post<{ Body: CreateEventBody }>(
    "/",
    { schema: { body: CreateEventBody } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const body = request.body;
      const startsAt = new Date(body.startsAt);
      const endsAt = new Date(body.endsAt);

      assertTimeRange(startsAt, endsAt);
      await assertProjectExists(app.stores.projects, body.projectId);

      const event = await app.stores.events.create({
        title: body.title,
        description: body.description,
        location: body.location,
        startsAt,
        endsAt,
        projectId: body.projectId,
        ownerId: identity.userId,
      });

      return reply.status(201).send({ event: toEvent(event) });
    },
  );

  /**
   * PUT /api/events/:id
   *
   * Partial update; only the owner or an admin may change an event.
   */
  app.put<{ Params: IdParams; Body: UpdateEventBody }>(
    "/:id",
    { schema: { params: IdParams, body: UpdateEventBody } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const existing = await loadEvent(request.params.id);
      assertCanModify(identity, existing);

      const body = request.body;
      const startsAt = body.startsAt !== undefined ? new Date(body.startsAt) : undefined;
      const endsAt = body.endsAt !== undefined ? new Date(body.endsAt) : undefined;

      assertTimeRange(startsAt ?? existing.startsAt, endsAt ?? existing.endsAt);
      await assertProjectExists(app.stores.projects, body.projectId);

      const event = await app.stores.events.update(existing.id, {
        title: body.title,
        description: body.description,
        location: body.location,
        startsAt,
        endsAt,
        projectId: body.projectId,
      });
      if (!event) throw new NotFoundError("Event not found");

      return reply.send({ event: toEvent(event) });
    },
  );

  app.delete<{ Params: IdParams }>(
    "/:id",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const existing = await loadEvent(request.params.id);
      assertCanModify(identity, existing);

      await app.stores.events.delete(existing.id);
      return reply.status(204).send();
    },
  );

  // -----------------------------------------------------------------------
  // Participation (any role)
  // -----------------------------------------------------------------------

  /** POST /api/events/:id/participants — join as the current user */
  app.post<{ Params: IdParams }>(
    "/:id/participants",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const event = await loadEvent(request.params.id);

      const added = await app.stores.events.addParticipant(event.id, identity.userId);
      if (!added) throw new ConflictError("Already participating in this event");

      return reply.status(201).send({ event: toEvent(await loadEvent(event.id)) });
    },
  );

  /** DELETE /api/events/:id/participants/me — leave */
  app.delete<{ Params: IdParams }>(
    "/:id/participants/me",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const event = await loadEvent(request.params.id);

      const removed = await app.stores.events.removeParticipant(event.id, identity.userId);
      if (!removed) throw new NotFoundError("Not a participant of this event");

      return reply.status(204).send();
    },
  );
};
