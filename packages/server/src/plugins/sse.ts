import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { StreamGateway } from "../services/stream-gateway.js";

declare module "fastify" {
  interface FastifyInstance {
    streamGateway: StreamGateway;
  }
}

export default fp(async function ssePlugin(fastify: FastifyInstance) {
  const gateway = new StreamGateway(fastify.serverConfig.heartbeatMs, fastify.log);

  fastify.decorate("streamGateway", gateway);

  // Open streams would otherwise hold the HTTP server open
  fastify.addHook("preClose", async () => gateway.closeAll());
});
