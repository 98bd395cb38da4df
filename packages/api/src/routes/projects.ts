import type { FastifyPluginAsync } from "fastify";
import type { EventListResponse, ProjectListResponse } from "@event-desk/shared";
import { assertCanModify } from "../auth/ownership.js";
import { currentIdentity } from "../hooks/require-auth.js";
import { NotFoundError } from "../errors.js";
import type { ProjectRecord } from "../stores/types.js";
import { toEvent, toProject } from "../views/serializers.js";
import { IdParams, PageQuery, pageOf } from "./common.schemas.js";
import { CreateProjectBody, UpdateProjectBody } from "./projects.schemas.js";

export const projectRoutes: FastifyPluginAsync = async (app) => {
  async function loadProject(id: string): Promise<ProjectRecord> {
    const project = await app.stores.projects.findById(id);
    if (!project) throw new NotFoundError("Project not found");
    return project;
  }

  // -----------------------------------------------------------------------
  // Read
  // -----------------------------------------------------------------------

  app.get<{ Querystring: PageQuery }>(
    "/",
    { schema: { querystring: PageQuery } },
    async (request, reply) => {
      const { items, total } = await app.stores.projects.list(pageOf(request.query));
      const body: ProjectListResponse = { projects: items.map(toProject), total };
      return reply.send(body);
    },
  );

  app.get<{ Params: IdParams }>(
    "/:id",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const project = await loadProject(request.params.id);
      return reply.send({ project: toProject(project) });
    },
  );

  /** GET /api/projects/:id/events — events of one project, by start time */
  app.get<{ Params: IdParams; Querystring: PageQuery }>(
    "/:id/events",
    { schema: { params: IdParams, querystring: PageQuery } },
    async (request, reply) => {
      const project = await loadProject(request.params.id);
      const { items, total } = await app.stores.events.list({
        ...pageOf(request.query),
        projectId: project.id,
      });
      const body: EventListResponse = { events: items.map(toEvent), total };
      return reply.send(body);
    },
  );

  // -----------------------------------------------------------------------
  // Write (ORGANIZER / ADMIN, owner or admin for changes)
  // -----------------------------------------------------------------------

  app.post<{ Body: CreateProjectBody }>(
    "/",
    { schema: { body: CreateProjectBody } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const project = await app.stores.projects.create({
        name: request.body.name,
        description: request.body.description,
        ownerId: identity.userId,
      });
      return reply.status(201).send({ project: toProject(project) });
    },
  );

  app.put<{ Params: IdParams; Body: UpdateProjectBody }>(
    "/:id",
    { schema: { params: IdParams, body: UpdateProjectBody } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const existing = await loadProject(request.params.id);
      assertCanModify(identity, existing);

      const project = await app.stores.projects.update(existing.id, request.body);
      if (!project) throw new NotFoundError("Project not found");

      return reply.send({ project: toProject(project) });
    },
  );

  /**
   * DELETE /api/projects/:id
   *
   * Events of the project are kept and detached from it.
   */
  app.delete<{ Params: IdParams }>(
    "/:id",
    { schema: { params: IdParams } },
    async (request, reply) => {
      const identity = currentIdentity(request);
      const existing = await loadProject(request.params.id);
      assertCanModify(identity, existing);

      await app.stores.projects.delete(existing.id);
      return reply.status(204).send();
    },
  );
};
