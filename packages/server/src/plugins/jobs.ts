import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { JobRegistry } from "../services/job-registry.js";
import { ModelStore } from "../services/model-store.js";

declare module "fastify" {
  interface FastifyInstance {
    jobs: JobRegistry;
    modelStore: ModelStore;
  }
}

export default fp(async function jobsPlugin(fastify: FastifyInstance) {
  const config = fastify.serverConfig;

  const models = new ModelStore(config.modelsDir);
  const jobs = JobRegistry.fromConfig(config, models, fastify.log);

  fastify.decorate("modelStore", models);
  fastify.decorate("jobs", jobs);

  fastify.addHook("onClose", async () => {
    fastify.log.info("Stopping running jobs");
    await jobs.shutdown();
  });
});
