import type { FastifyBaseLogger } from "fastify";
import { idleSnapshot, type JobCategory, type JobSnapshot } from "@agent-console/shared";
import { AlreadyRunningError, NotRunningError } from "../errors.js";
import type { LogChannel } from "./log-channel.js";
import { ProcessHandle, type HandleOptions, type LaunchPlan } from "./process-handle.js";

/** How a category turns start parameters into a program to run. */
export interface JobDefinition<P> {
  readonly category: JobCategory;
  prepare(params: P): Promise<LaunchPlan>;
}

export interface StartResult {
  jobId: string;
  snapshot: JobSnapshot;
}

/** The parameter-independent face of a controller, used by routes and the stream gateway. */
export interface ManagedJob {
  readonly category: JobCategory;
  status(): JobSnapshot;
  stop(): Promise<JobSnapshot>;
  current(): ProcessHandle | null;
  currentLog(): LogChannel | null;
  shutdown(): Promise<void>;
}

/**
 * Single-flight runner for one job category. Holds the current ProcessHandle;
 * a terminal handle stays current (for status and log replay) until the next
 * start replaces it.
 */
export class JobController<P> implements ManagedJob {
  readonly category: JobCategory;
  private handle: ProcessHandle | null = null;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private definition: JobDefinition<P>,
    private options: HandleOptions,
    private log: FastifyBaseLogger,
  ) {
    this.category = definition.category;
  }

  /**
   * Launch a new run. Resolves as soon as the program has been spawned;
   * progress is observed through status() and the log.
   */
  start(params: P): Promise<StartResult> {
    return this.exclusive(async () => {
      const current = this.handle;
      if (current?.running) {
        throw new AlreadyRunningError(this.category, current.jobId);
      }

      const plan = await this.definition.prepare(params);
      const handle = await ProcessHandle.spawn(this.category, plan, this.options, this.log);
      this.handle = handle;

      this.log.info({ category: this.category, jobId: handle.jobId }, "Job started");
      return { jobId: handle.jobId, snapshot: handle.snapshot() };
    });
  }

  /**
   * Request termination of the running job and return without waiting for
   * the process to exit; the snapshot reports `stopping` until it does.
   */
  stop(): Promise<JobSnapshot> {
    return this.exclusive(async () => {
      const handle = this.handle;
      if (!handle?.running) {
        throw new NotRunningError(this.category);
      }

      handle.stop().catch((err: unknown) => {
        this.log.error({ category: this.category, jobId: handle.jobId, err }, "Stop failed");
      });
      this.log.info({ category: this.category, jobId: handle.jobId }, "Job stop requested");
      return handle.snapshot();
    });
  }

  status(): JobSnapshot {
    return this.handle?.snapshot() ?? idleSnapshot(this.category);
  }

  current(): ProcessHandle | null {
    return this.handle;
  }

  /** The live channel of the current run, not a copy. */
  currentLog(): LogChannel | null {
    return this.handle?.channel ?? null;
  }

  /** Stop a running job and wait for it to exit. Used when the server closes. */
  async shutdown(): Promise<void> {
    const handle = this.handle;
    if (handle?.running) {
      await handle.stop();
    }
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
