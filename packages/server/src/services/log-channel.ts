import type { StreamStart } from "@agent-console/shared";

export interface LogEntry {
  offset: number;
  line: string;
}

export interface ReadResult {
  lines: LogEntry[];
  /** Offset to pass to the next read. */
  nextOffset: number;
  /** Lines between the requested offset and the oldest retained one, lost to the retention cap. */
  skipped: number;
}

export type LogChunk =
  | { kind: "lines"; lines: LogEntry[] }
  | { kind: "truncated"; skipped: number; resumeAt: number };

export type AttachFrom = StreamStart | { offset: number };

/**
 * Append-only line buffer for one process run. Lines get strictly increasing
 * offsets that are never reused; once more than `capacity` lines have been
 * appended the oldest are overwritten. Readers hold their own offsets, the
 * channel only tracks who is waiting for the next append.
 */
export class LogChannel {
  private buffer: string[] = [];
  private next = 0;
  private isFrozen = false;
  private waiters = new Set<() => void>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Log retention must be a positive integer, got ${capacity}`);
    }
  }

  get nextOffset(): number {
    return this.next;
  }

  get firstOffset(): number {
    return Math.max(0, this.next - this.capacity);
  }

  /** Number of lines currently retained. */
  get size(): number {
    return this.next - this.firstOffset;
  }

  get frozen(): boolean {
    return this.isFrozen;
  }

  append(line: string): void {
    if (this.isFrozen) return;
    const slot = this.next % this.capacity;
    if (slot === this.buffer.length) {
      this.buffer.push(line);
    } else {
      this.buffer[slot] = line;
    }
    this.next++;
    this.wake();
  }

  freeze(): void {
    if (this.isFrozen) return;
    this.isFrozen = true;
    this.wake();
  }

  readFrom(offset: number): ReadResult {
    const first = this.firstOffset;
    const start = Math.min(Math.max(offset, first), this.next);
    const skipped = offset < first ? first - offset : 0;

    const lines: LogEntry[] = [];
    for (let i = start; i < this.next; i++) {
      lines.push({ offset: i, line: this.buffer[i % this.capacity] });
    }
    return { lines, nextOffset: this.next, skipped };
  }

  /**
   * Resolves once a line at or beyond `offset` exists, the channel is frozen,
   * or `signal` aborts. Never rejects.
   */
  waitForChange(offset: number, signal?: AbortSignal): Promise<void> {
    if (this.next > offset || this.isFrozen || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const done = () => {
        this.waiters.delete(done);
        signal?.removeEventListener("abort", done);
        resolve();
      };
      this.waiters.add(done);
      signal?.addEventListener("abort", done, { once: true });
    });
  }

  attach(from: AttachFrom = "history"): LogReader {
    let offset: number;
    if (from === "history") {
      offset = 0;
    } else if (from === "tail") {
      offset = this.next;
    } else {
      offset = Math.max(0, from.offset);
    }
    return new LogReader(this, offset);
  }

  /** Number of pending waiters; exposed for leak checks. */
  get waiterCount(): number {
    return this.waiters.size;
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }
}

export class LogReader {
  private controller = new AbortController();

  constructor(
    private channel: LogChannel,
    private offset: number,
  ) {}

  get position(): number {
    return this.offset;
  }

  get detached(): boolean {
    return this.controller.signal.aborted;
  }

  /** Non-blocking read of everything since this reader's offset. */
  read(): ReadResult {
    const result = this.channel.readFrom(this.offset);
    this.offset = result.nextOffset;
    return result;
  }

  /**
   * Yields chunks in append order until the channel is frozen and fully read,
   * or the reader is detached. A `truncated` chunk precedes lines that follow
   * a gap left by the retention cap.
   */
  async *chunks(signal?: AbortSignal): AsyncGenerator<LogChunk> {
    const onAbort = () => this.detach();
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) this.detach();

    try {
      while (!this.detached) {
        const result = this.read();
        if (result.skipped > 0) {
          yield {
            kind: "truncated",
            skipped: result.skipped,
            resumeAt: result.lines[0]?.offset ?? result.nextOffset,
          };
        }
        if (result.lines.length > 0) {
          yield { kind: "lines", lines: result.lines };
          continue;
        }
        if (this.channel.frozen) return;
        await this.channel.waitForChange(this.offset, this.controller.signal);
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  detach(): void {
    this.controller.abort();
  }
}
