import { spawn, type ChildProcess } from "node:child_process";
import { constants as fsConstants } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { StringDecoder } from "node:string_decoder";
import type { Readable } from "node:stream";
import { nanoid } from "nanoid";
import type { FastifyBaseLogger } from "fastify";
import type {
  JobCategory,
  JobMeta,
  JobSnapshot,
  JobState,
  TerminalJobState,
} from "@agent-console/shared";
import { SpawnError } from "../errors.js";
import { LogChannel } from "./log-channel.js";

export interface ExitResult {
  state: TerminalJobState;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/** Everything needed to launch one external program for a job. */
export interface LaunchPlan {
  command: string;
  args: string[];
  cwd: string;
  /** Merged over the server's own environment. */
  env?: Record<string, string>;
  /** Written to stdin, which is then closed. */
  input?: string;
  meta?: JobMeta;
  /** Lines logged before any process output. */
  prologue?: string[];
  /** Runs after the output is drained and before the log freezes; returned lines are appended. */
  epilogue?: (result: ExitResult) => Promise<string[]> | string[];
}

export interface HandleOptions {
  retentionLines: number;
  stopGraceMs: number;
  /** POSIX shell that merges the program's stderr into stdout before exec. */
  shellBin: string;
  /** How long to wait for stdio to close after the process exits. */
  drainTimeoutMs?: number;
}

const DRAIN_TIMEOUT_MS = 1000;

// One pipe for both streams: the kernel keeps stdout and stderr writes in the
// order the program made them. `exec` keeps the program's pid as the group leader.
const MERGE_OUTPUT_SCRIPT = `exec 2>&1; exec "$0" "$@"`;

async function isExecutable(file: string): Promise<boolean> {
  try {
    await fsp.access(file, fsConstants.X_OK);
    return (await fsp.stat(file)).isFile();
  } catch {
    return false;
  }
}

/** Absolute path of `command`, looked up on PATH unless it contains a slash. */
async function resolveCommand(
  command: string,
  cwd: string,
  searchPath: string | undefined,
): Promise<string | null> {
  const candidates = command.includes("/")
    ? [path.resolve(cwd, command)]
    : (searchPath ?? "")
        .split(path.delimiter)
        .filter((dir) => dir !== "")
        .map((dir) => path.join(dir, command));
  for (const candidate of candidates) {
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  return signal ? `Terminated by ${signal}` : `Exited with code ${code}`;
}

/**
 * One run of an external program. Owns the child process (in its own
 * process group), drains its merged stdout and stderr line by line into a
 * LogChannel and resolves `finished` with the terminal snapshot once the
 * child has exited and its output is drained.
 */
export class ProcessHandle {
  readonly jobId = nanoid(12);
  readonly channel: LogChannel;
  readonly startedAt = Date.now();
  readonly finished: Promise<JobSnapshot>;

  private state: JobState = "running";
  private exited = false;
  private finalizing = false;
  private exitCode: number | null = null;
  private exitSignal: NodeJS.Signals | null = null;
  private finishedAt: number | null = null;
  private stopRequested = false;
  private errorMessage: string | undefined;
  private killTimer: ReturnType<typeof setTimeout> | null = null;
  private escalation: Promise<void> = Promise.resolve();
  private drainTimer: ReturnType<typeof setTimeout> | null = null;
  private resolveFinished: (snapshot: JobSnapshot) => void = () => {};
  private log: FastifyBaseLogger;

  /**
   * Launch `plan` and resolve once the OS has started the program. Rejects
   * with SpawnError when the working directory or the program is missing.
   */
  static async spawn(
    category: JobCategory,
    plan: LaunchPlan,
    options: HandleOptions,
    log: FastifyBaseLogger,
  ): Promise<ProcessHandle> {
    const stat = await fsp.stat(plan.cwd).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new SpawnError(category, plan.command, `working directory not found: ${plan.cwd}`);
    }

    const env = { ...process.env, ...plan.env };
    const program = await resolveCommand(plan.command, plan.cwd, env.PATH);
    if (!program) {
      throw new SpawnError(category, plan.command, "command not found or not executable");
    }

    const child = spawn(options.shellBin, ["-c", MERGE_OUTPUT_SCRIPT, program, ...plan.args], {
      cwd: plan.cwd,
      env,
      stdio: [plan.input === undefined ? "ignore" : "pipe", "pipe", "ignore"],
      // Own process group so stop() reaches the program and everything it forks
      detached: true,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          child.off("error", onError);
          resolve();
        };
        const onError = (err: Error) => {
          child.off("spawn", onSpawn);
          reject(err);
        };
        child.once("spawn", onSpawn);
        child.once("error", onError);
      });
    } catch (err) {
      throw new SpawnError(
        category,
        plan.command,
        err instanceof Error ? err.message : String(err),
      );
    }

    return new ProcessHandle(category, child, plan, options, log);
  }

  private constructor(
    readonly category: JobCategory,
    private child: ChildProcess,
    private plan: LaunchPlan,
    private options: HandleOptions,
    log: FastifyBaseLogger,
  ) {
    this.channel = new LogChannel(options.retentionLines);
    this.log = log.child({ category, jobId: this.jobId });
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve;
    });

    for (const line of plan.prologue ?? []) {
      this.channel.append(line);
    }

    this.drain(child.stdout);

    if (plan.input !== undefined && child.stdin) {
      child.stdin.on("error", (err) => {
        this.log.debug({ err }, "stdin closed before input was written");
      });
      child.stdin.end(plan.input);
    }

    child.once("exit", (code, signal) => {
      this.exited = true;
      this.exitCode = code;
      this.exitSignal = signal;
      this.log.info({ code, signal }, "Process exited");

      // A grandchild can keep the pipes open after the program itself is gone
      this.drainTimer = setTimeout(() => {
        this.log.warn("Output did not close after exit, detaching pipes");
        child.stdout?.destroy();
      }, options.drainTimeoutMs ?? DRAIN_TIMEOUT_MS);
    });

    child.once("close", (code, signal) => {
      if (!this.exited) {
        this.exited = true;
        this.exitCode = code;
        this.exitSignal = signal;
      }
      this.finalize().catch((err: unknown) => {
        this.log.error({ err }, "Failed to finalize process handle");
      });
    });

    child.on("error", (err) => {
      this.log.error({ err }, "Process error");
    });

    this.log.info({ pid: child.pid, command: plan.command }, "Process started");
  }

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  get running(): boolean {
    return this.state === "running";
  }

  snapshot(): JobSnapshot {
    return {
      category: this.category,
      jobId: this.jobId,
      state: this.state,
      pid: this.pid,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      exitCode: this.exitCode,
      signal: this.exitSignal,
      stopping: this.state === "running" && this.stopRequested,
      lineCount: this.channel.nextOffset,
      ...(this.errorMessage ? { error: this.errorMessage } : {}),
      meta: { ...this.plan.meta },
    };
  }

  /**
   * Ask the program to terminate: SIGTERM to its process group, SIGKILL once
   * the grace period has passed. Resolves with the terminal snapshot. Calling
   * it on a handle that is not running returns the current snapshot.
   */
  stop(): Promise<JobSnapshot> {
    if (this.state !== "running") {
      return Promise.resolve(this.snapshot());
    }
    if (this.stopRequested || this.exited) {
      return this.finished;
    }

    this.stopRequested = true;
    this.log.info({ pid: this.pid }, "Sending SIGTERM to process group");
    this.signalGroup("SIGTERM");

    // Escalate even if the leader is gone: other group members may ignore SIGTERM
    this.escalation = new Promise((resolve) => {
      this.killTimer = setTimeout(() => {
        this.killTimer = null;
        if (this.groupAlive()) {
          this.log.warn({ graceMs: this.options.stopGraceMs }, "Process group did not exit, sending SIGKILL");
          this.signalGroup("SIGKILL");
        }
        resolve();
      }, this.options.stopGraceMs);
    });

    return this.finished;
  }

  /** True while any process in the job's group is still alive. */
  private groupAlive(): boolean {
    const pid = this.child.pid;
    if (pid === undefined) return false;
    try {
      process.kill(-pid, 0);
      return true;
    } catch {
      return false;
    }
  }

  private signalGroup(signal: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (pid === undefined) return;
    try {
      // Negative PID targets the whole process group
      process.kill(-pid, signal);
    } catch (err) {
      this.log.debug({ err, signal }, "Process group already gone");
    }
  }

  private drain(stream: Readable | null): void {
    if (!stream) return;
    const decoder = new StringDecoder("utf8");
    let pending = "";

    const emit = (line: string) => {
      this.channel.append(line.endsWith("\r") ? line.slice(0, -1) : line);
    };

    stream.on("data", (chunk: Buffer) => {
      pending += decoder.write(chunk);
      const parts = pending.split("\n");
      pending = parts.pop() ?? "";
      for (const part of parts) emit(part);
    });

    stream.on("end", () => {
      pending += decoder.end();
      if (pending !== "") emit(pending);
      pending = "";
    });

    stream.on("error", (err) => {
      this.log.debug({ err }, "Output stream error");
    });
  }

  private async finalize(): Promise<void> {
    if (this.finalizing) return;
    this.finalizing = true;
    if (this.killTimer && this.groupAlive()) {
      await this.escalation;
    }
    this.clearKillTimer();
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }

    const result: ExitResult = {
      state: this.stopRequested ? "stopped" : this.exitCode === 0 ? "succeeded" : "failed",
      exitCode: this.exitCode,
      signal: this.exitSignal,
    };

    if (this.plan.epilogue) {
      try {
        for (const line of await this.plan.epilogue(result)) {
          this.channel.append(line);
        }
      } catch (err) {
        this.log.warn({ err }, "Epilogue failed");
        this.channel.append(`Epilogue failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    this.state = result.state;
    this.finishedAt = Date.now();
    if (result.state === "failed") {
      this.errorMessage = describeExit(result.exitCode, result.signal);
    }
    this.channel.freeze();

    this.log.info({ state: this.state, lines: this.channel.nextOffset }, "Job finished");
    this.resolveFinished(this.snapshot());
  }

  private clearKillTimer(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
  }
}
