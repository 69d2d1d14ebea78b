import type { FastifyInstance } from "fastify";
import type { z } from "zod";
import type {
  JobsListResponse,
  JobStatusResponse,
  StartJobResponse,
  StopJobResponse,
} from "@agent-console/shared";
import { InvalidRequestError, NotFoundError, sendError } from "../errors.js";
import type { JobController, ManagedJob } from "../services/job-controller.js";
import type { AttachFrom } from "../services/log-channel.js";
import {
  parseBody,
  startImageBuildSchema,
  startServerSchema,
  startTrainingSchema,
} from "../schemas.js";

/**
 * Stream start position: `Last-Event-ID` resumes right after that line,
 * otherwise `?from=history` (default) or `?from=tail`.
 */
export function streamStart(from: string | undefined, lastEventId: string | undefined): AttachFrom {
  if (lastEventId !== undefined && /^\d+$/.test(lastEventId)) {
    return { offset: Number(lastEventId) + 1 };
  }
  if (from === undefined || from === "history" || from === "tail") {
    return from ?? "history";
  }
  throw new InvalidRequestError(`Invalid stream start: ${from} (expected "history" or "tail")`);
}

export default async function jobRoutes(fastify: FastifyInstance) {
  const jobs = fastify.jobs;
  const gateway = fastify.streamGateway;

  function findJob(category: string): ManagedJob {
    const job = jobs.get(category);
    if (!job) throw new NotFoundError(`Unknown job category: ${category}`);
    return job;
  }

  function registerStart<S extends z.ZodTypeAny>(
    path: string,
    controller: JobController<z.infer<S>>,
    schema: S,
  ) {
    fastify.post(path, async (request, reply) => {
      try {
        const params = parseBody(schema, request.body);
        const { jobId, snapshot } = await controller.start(params);
        return reply.status(202).send({ jobId, job: snapshot } satisfies StartJobResponse);
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    });
  }

  // GET /api/jobs — current snapshot of every category
  fastify.get("/api/jobs", async () => {
    return { jobs: jobs.snapshots() } satisfies JobsListResponse;
  });

  // POST /api/jobs/:category/start — one route per category, each with its own body
  registerStart("/api/jobs/training/start", jobs.training, startTrainingSchema);
  registerStart("/api/jobs/server/start", jobs.server, startServerSchema);
  registerStart("/api/jobs/image-build/start", jobs.imageBuild, startImageBuildSchema);

  fastify.post<{ Params: { category: string } }>(
    "/api/jobs/:category/start",
    async (request, reply) => {
      return sendError(reply, new NotFoundError(`Unknown job category: ${request.params.category}`));
    },
  );

  // POST /api/jobs/:category/stop — request termination of the running job
  fastify.post<{ Params: { category: string } }>(
    "/api/jobs/:category/stop",
    async (request, reply) => {
      try {
        const job = await findJob(request.params.category).stop();
        return reply.send({ ok: true, job } satisfies StopJobResponse);
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );

  // GET /api/jobs/:category/status
  fastify.get<{ Params: { category: string } }>(
    "/api/jobs/:category/status",
    async (request, reply) => {
      try {
        const job = findJob(request.params.category).status();
        return reply.send({ job } satisfies JobStatusResponse);
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );

  // GET /api/jobs/:category/stream — SSE log lines, closed by a `done` event
  fastify.get<{
    Params: { category: string };
    Querystring: { from?: string };
  }>("/api/jobs/:category/stream", async (request, reply) => {
    let job: ManagedJob;
    let from: AttachFrom;
    try {
      job = findJob(request.params.category);
      const lastEventId = request.headers["last-event-id"];
      from = streamStart(
        request.query.from,
        typeof lastEventId === "string" ? lastEventId : undefined,
      );
    } catch (err: unknown) {
      return sendError(reply, err);
    }

    // Take the raw response over from Fastify, keeping headers set by hooks (CORS)
    reply.hijack();
    reply.raw.writeHead(200, {
      ...reply.getHeaders(),
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });

    await gateway.open(job, reply.raw, from);
  });
}
