import { z } from "zod";
import { InvalidRequestError } from "./errors.js";

const MODEL_NAME_RE = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,99}$/;
const IMAGE_NAME_RE = /^[a-z0-9][a-z0-9._-]{0,127}$/;
const IMAGE_TAG_RE = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

export const startTrainingSchema = z.object({
  modelName: z.string().regex(MODEL_NAME_RE, "must be a plain file name").optional(),
});

export const startServerSchema = z.object({
  model: z.string().regex(MODEL_NAME_RE, "must be a plain file name").optional(),
});

export const startImageBuildSchema = z.object({
  imageName: z.string().regex(IMAGE_NAME_RE, "must be a lowercase image name"),
  tag: z.string().regex(IMAGE_TAG_RE, "must be a valid image tag").default("latest"),
  registryUser: z.string().regex(IMAGE_NAME_RE, "must be a lowercase registry user"),
  registryToken: z.string().min(1),
  push: z.boolean().default(true),
});

export const fileWriteSchema = z.object({
  content: z.string(),
});

export const chatSchema = z.object({
  message: z.string().min(1),
  sender: z.string().min(1).default("user"),
});

/** Parse a request body, turning validation failures into a 400. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    throw new InvalidRequestError(`Invalid request body — ${detail}`);
  }
  return result.data;
}
