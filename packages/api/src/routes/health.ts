import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const dbOk = await app.pingDb();

    const payload = {
      status: dbOk ? "ok" : "degraded",
      db: dbOk,
      timestamp: new Date().toISOString(),
    };

    return reply.status(dbOk ? 200 : 503).send(payload);
  });
};
