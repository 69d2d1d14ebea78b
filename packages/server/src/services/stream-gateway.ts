import type { Writable } from "node:stream";
import type { FastifyBaseLogger } from "fastify";
import type { StreamEvent } from "@agent-console/shared";
import type { ManagedJob } from "./job-controller.js";
import type { AttachFrom } from "./log-channel.js";

interface ActiveStream {
  sink: Writable;
  abort: AbortController;
}

/** Serialise one event as an SSE frame. `log` frames carry their offset as the event id. */
export function formatEvent(event: StreamEvent): string {
  const id = event.type === "log" ? `id: ${event.data.offset}\n` : "";
  return `${id}event: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`;
}

/** Resolves on `drain`, on `close` or when the signal aborts, whichever comes first. */
function drained(sink: Writable, signal: AbortSignal): Promise<void> {
  if (signal.aborted || sink.destroyed) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      sink.off("drain", done);
      sink.off("close", done);
      signal.removeEventListener("abort", done);
      resolve();
    };
    sink.once("drain", done);
    sink.once("close", done);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Pushes a job's log to HTTP clients as Server-Sent Events. Each open stream
 * owns a LogReader on the run that was current when it opened; a client
 * going away only detaches that reader.
 */
export class StreamGateway {
  private streams = new Set<ActiveStream>();

  constructor(
    private heartbeatMs: number,
    private log: FastifyBaseLogger,
  ) {}

  get activeStreams(): number {
    return this.streams.size;
  }

  /**
   * Stream `job`'s current log into `sink` and end it with a `done` event
   * carrying the final snapshot. Resolves when the stream is over, whether
   * the run finished or the client disconnected.
   */
  async open(job: ManagedJob, sink: Writable, from: AttachFrom = "history"): Promise<void> {
    const handle = job.current();
    if (!handle) {
      sink.end(formatEvent({ type: "done", data: job.status() }));
      return;
    }

    const abort = new AbortController();
    const stream: ActiveStream = { sink, abort };
    this.streams.add(stream);

    const onClose = () => abort.abort();
    sink.once("close", onClose);

    const heartbeat = setInterval(() => {
      this.send(sink, { type: "heartbeat", data: { timestamp: Date.now() } });
    }, this.heartbeatMs);

    const reader = handle.channel.attach(from);
    this.log.debug(
      { category: job.category, jobId: handle.jobId, from: reader.position },
      "Log stream opened",
    );

    try {
      for await (const chunk of reader.chunks(abort.signal)) {
        if (chunk.kind === "truncated") {
          await this.write(sink, {
            type: "truncated",
            data: { skipped: chunk.skipped, resumeAt: chunk.resumeAt },
          }, abort.signal);
          continue;
        }
        for (const entry of chunk.lines) {
          await this.write(sink, { type: "log", data: entry }, abort.signal);
        }
      }

      if (!abort.signal.aborted) {
        // The channel freezes right before the handle settles
        const final = await handle.finished;
        sink.end(formatEvent({ type: "done", data: final }));
      }
    } finally {
      clearInterval(heartbeat);
      reader.detach();
      sink.off("close", onClose);
      this.streams.delete(stream);
      this.log.debug({ category: job.category, jobId: handle.jobId }, "Log stream closed");
    }
  }

  /** End every open stream; used when the server shuts down. */
  closeAll(): void {
    for (const stream of this.streams) {
      stream.abort.abort();
      stream.sink.end();
    }
    this.streams.clear();
  }

  private async write(sink: Writable, event: StreamEvent, signal: AbortSignal): Promise<void> {
    if (!this.send(sink, event)) {
      await drained(sink, signal);
    }
  }

  /** Returns false when the sink is buffering and the caller should wait for drain. */
  private send(sink: Writable, event: StreamEvent): boolean {
    if (sink.destroyed || sink.writableEnded) return true;
    return sink.write(formatEvent(event));
  }
}
