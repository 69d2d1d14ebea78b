import type { FastifyInstance } from "fastify";
import type { ModelsResponse } from "@agent-console/shared";
import { sendError } from "../errors.js";

export default async function modelsRoutes(fastify: FastifyInstance) {
  const models = fastify.modelStore;

  // GET /api/models — trained archives, newest first
  fastify.get("/api/models", async () => {
    return { models: await models.list() } satisfies ModelsResponse;
  });

  // DELETE /api/models/:name
  fastify.delete<{ Params: { name: string } }>(
    "/api/models/:name",
    async (request, reply) => {
      try {
        await models.remove(request.params.name);
        request.log.info({ model: request.params.name }, "Model deleted");
        return reply.send({ ok: true });
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );
}
