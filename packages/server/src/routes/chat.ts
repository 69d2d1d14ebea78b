import type { FastifyInstance } from "fastify";
import type { ChatResponse } from "@agent-console/shared";
import { sendError } from "../errors.js";
import { chatSchema, parseBody } from "../schemas.js";
import { ChatRelay } from "../services/chat-relay.js";

export interface ChatRoutesOptions {
  relay?: ChatRelay;
}

export default async function chatRoutes(fastify: FastifyInstance, opts: ChatRoutesOptions) {
  const config = fastify.serverConfig;
  const relay =
    opts.relay ??
    new ChatRelay(`http://127.0.0.1:${config.runtimePort}`, config.chatTimeoutMs);

  // POST /api/chat — relay a message to the running agent runtime
  fastify.post("/api/chat", async (request, reply) => {
    try {
      const { message, sender } = parseBody(chatSchema, request.body);
      const responses = await relay.send(sender, message);
      return reply.send({ responses } satisfies ChatResponse);
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });
}
