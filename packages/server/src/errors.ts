import type { FastifyReply } from "fastify";
import type { JobCategory, ErrorResponse } from "@agent-console/shared";

export abstract class ConsoleError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
}

/** The external program could not be launched. */
export class SpawnError extends ConsoleError {
  readonly code = "SPAWN_FAILED";
  readonly statusCode = 500;

  constructor(
    readonly category: JobCategory,
    readonly command: string,
    reason: string,
  ) {
    super(`Failed to start ${category} (${command}): ${reason}`);
    this.name = "SpawnError";
  }
}

export class AlreadyRunningError extends ConsoleError {
  readonly code = "ALREADY_RUNNING";
  readonly statusCode = 409;

  constructor(readonly category: JobCategory, readonly jobId: string) {
    super(`A ${category} job is already running (${jobId})`);
    this.name = "AlreadyRunningError";
  }
}

export class NotRunningError extends ConsoleError {
  readonly code = "NOT_RUNNING";
  readonly statusCode = 409;

  constructor(readonly category: JobCategory) {
    super(`No ${category} job is running`);
    this.name = "NotRunningError";
  }
}

/** The project is not in a state that allows the request, e.g. no trained model. */
export class PreconditionError extends ConsoleError {
  readonly code = "PRECONDITION_FAILED";
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export class InvalidRequestError extends ConsoleError {
  readonly code = "INVALID_REQUEST";
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class NotFoundError extends ConsoleError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class UpstreamUnavailableError extends ConsoleError {
  readonly code = "UPSTREAM_UNAVAILABLE";
  readonly statusCode = 503;

  constructor(message: string) {
    super(message);
    this.name = "UpstreamUnavailableError";
  }
}

/**
 * Translate a domain error into its HTTP response. Anything that is not a
 * ConsoleError is rethrown for Fastify's default 500 handling.
 */
export function sendError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ConsoleError) {
    return reply
      .status(err.statusCode)
      .send({ error: err.message, code: err.code } satisfies ErrorResponse);
  }
  throw err;
}
