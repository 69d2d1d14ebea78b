import Fastify from "fastify";
import { existsSync } from "node:fs";
import fastifyStatic from "@fastify/static";
import { loadConfig, validateConfig, type ServerConfig } from "./config.js";
import corsPlugin from "./plugins/cors.js";
import jobsPlugin from "./plugins/jobs.js";
import ssePlugin from "./plugins/sse.js";
import jobRoutes from "./routes/jobs.js";
import filesRoutes from "./routes/files.js";
import modelsRoutes from "./routes/models.js";
import chatRoutes from "./routes/chat.js";

declare module "fastify" {
  interface FastifyInstance {
    serverConfig: ServerConfig;
  }
}

async function main() {
  const config = loadConfig();

  // Validate config before constructing the server
  const issues = validateConfig(config);
  for (const issue of issues) {
    if (issue.level === "error") {
      console.error(`Config error: ${issue.message}`);
    } else {
      console.warn(`Config warning: ${issue.message}`);
    }
  }
  if (issues.some((i) => i.level === "error")) {
    process.exit(1);
  }

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { translateTime: "HH:MM:ss Z", ignore: "pid,hostname" },
      },
    },
  });

  fastify.decorate("serverConfig", config);

  // Plugins (order matters: jobs and sse read serverConfig, all before routes)
  await fastify.register(corsPlugin);
  await fastify.register(jobsPlugin);
  await fastify.register(ssePlugin);

  // API routes
  await fastify.register(jobRoutes);
  await fastify.register(filesRoutes);
  await fastify.register(modelsRoutes);
  await fastify.register(chatRoutes);

  // Serve the UI bundle when one is present
  if (existsSync(config.publicDir)) {
    await fastify.register(fastifyStatic, {
      root: config.publicDir,
      wildcard: false,
    });
  } else {
    fastify.log.warn(`UI directory ${config.publicDir} not found — serving the API only`);
  }

  // SPA fallback: serve index.html for non-API routes
  fastify.setNotFoundHandler(async (request, reply) => {
    if (request.url.startsWith("/api/") || !existsSync(config.publicDir)) {
      return reply.status(404).send({ error: "Not found" });
    }
    return reply.sendFile("index.html");
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      fastify.log.info(`Received ${signal}, shutting down`);
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  // Start
  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(
    `Agent console listening on http://${config.host}:${config.port} (project: ${config.projectDir})`,
  );
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
