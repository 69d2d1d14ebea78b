import type { JobSnapshot } from "./jobs.js";

/** SSE event types sent by GET /api/jobs/:category/stream */
export type StreamEvent =
  | { type: "log"; data: { offset: number; line: string } }
  | { type: "truncated"; data: { skipped: number; resumeAt: number } }
  | { type: "heartbeat"; data: { timestamp: number } }
  | { type: "done"; data: JobSnapshot };

export type StreamEventType = StreamEvent["type"];

/** Where a new stream subscriber starts reading. */
export type StreamStart = "history" | "tail";
