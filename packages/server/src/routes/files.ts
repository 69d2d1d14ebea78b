import type { FastifyInstance } from "fastify";
import type {
  FileContentResponse,
  FileListResponse,
  FileWriteResponse,
} from "@agent-console/shared";
import { sendError } from "../errors.js";
import { fileWriteSchema, parseBody } from "../schemas.js";
import { ProjectFiles } from "../services/project-files.js";

export default async function filesRoutes(fastify: FastifyInstance) {
  const files = new ProjectFiles(fastify.serverConfig.projectDir);

  /** GET /api/files — list the project's YAML files. */
  fastify.get("/api/files", async () => {
    return { files: await files.list() } satisfies FileListResponse;
  });

  /** GET /api/files/* — read one project file. */
  fastify.get<{ Params: { "*": string } }>("/api/files/*", async (request, reply) => {
    const relPath = request.params["*"];
    try {
      const content = await files.read(relPath);
      return reply.send({ path: relPath, content } satisfies FileContentResponse);
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  /** PUT /api/files/* — overwrite a project file; YAML must parse. */
  fastify.put<{ Params: { "*": string } }>("/api/files/*", async (request, reply) => {
    const relPath = request.params["*"];
    try {
      const { content } = parseBody(fileWriteSchema, request.body);
      await files.write(relPath, content);
      request.log.info({ path: relPath }, "Project file saved");
      return reply.send({ ok: true, path: relPath } satisfies FileWriteResponse);
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });
}
