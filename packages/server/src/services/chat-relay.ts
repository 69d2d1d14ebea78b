import { z } from "zod";
import type { ChatReply } from "@agent-console/shared";
import { UpstreamUnavailableError } from "../errors.js";

const chatRepliesSchema = z.array(
  z.object({
    recipient_id: z.string().optional(),
    text: z.string().optional(),
    image: z.string().optional(),
    buttons: z.array(z.object({ title: z.string(), payload: z.string() })).optional(),
    custom: z.unknown().optional(),
  }),
);

export type FetchFn = typeof fetch;

/**
 * Forwards chat messages to the agent runtime's REST webhook. The runtime is
 * the server job's process; when it is not up the relay answers 503.
 */
export class ChatRelay {
  constructor(
    private runtimeUrl: string,
    private timeoutMs: number,
    private fetchFn: FetchFn = fetch,
  ) {}

  get webhookUrl(): string {
    return `${this.runtimeUrl}/webhooks/rest/webhook`;
  }

  async send(sender: string, message: string): Promise<ChatReply[]> {
    let res: Response;
    try {
      res = await this.fetchFn(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ sender, message }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamUnavailableError(
        `Agent runtime not available: ${err instanceof Error ? err.message : String(err)}. Start the server job first.`,
      );
    }

    if (!res.ok) {
      throw new UpstreamUnavailableError(`Agent runtime returned ${res.status}`);
    }

    const parsed = chatRepliesSchema.safeParse(await res.json().catch(() => null));
    if (!parsed.success) {
      throw new UpstreamUnavailableError("Agent runtime returned an unexpected reply");
    }
    return parsed.data;
  }
}
