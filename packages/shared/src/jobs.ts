// ── Categories & states ──────────────────────────────────────────────

export const JOB_CATEGORIES = ["training", "server", "image-build"] as const;

export type JobCategory = (typeof JOB_CATEGORIES)[number];

export type JobState = "idle" | "running" | "succeeded" | "failed" | "stopped";

export type TerminalJobState = Exclude<JobState, "idle" | "running">;

export function isJobCategory(value: string): value is JobCategory {
  return JOB_CATEGORIES.some((category) => category === value);
}

export type JobMeta = Record<string, string | number | boolean>;

// ── Job snapshot ─────────────────────────────────────────────────────

/**
 * Point-in-time view of a category's current run. The status endpoint and
 * the stream's closing `done` event both carry this shape.
 */
export interface JobSnapshot {
  category: JobCategory;
  jobId: string | null;
  state: JobState;
  pid: number | null;
  startedAt: number | null;
  finishedAt: number | null;
  exitCode: number | null;
  signal: string | null;
  /** A stop was requested and the process has not exited yet. */
  stopping: boolean;
  /** Lines ever appended to the run's log, evicted ones included. */
  lineCount: number;
  error?: string;
  meta: JobMeta;
}

export function idleSnapshot(category: JobCategory): JobSnapshot {
  return {
    category,
    jobId: null,
    state: "idle",
    pid: null,
    startedAt: null,
    finishedAt: null,
    exitCode: null,
    signal: null,
    stopping: false,
    lineCount: 0,
    meta: {},
  };
}

// ── API request/response types ───────────────────────────────────────

export interface StartTrainingRequest {
  modelName?: string;
}

export interface StartServerRequest {
  model?: string;
}

export interface StartImageBuildRequest {
  imageName: string;
  tag?: string;
  registryUser: string;
  registryToken: string;
  push?: boolean;
}

export interface StartJobResponse {
  jobId: string;
  job: JobSnapshot;
}

export interface StopJobResponse {
  ok: boolean;
  job: JobSnapshot;
}

export interface JobStatusResponse {
  job: JobSnapshot;
}

export interface JobsListResponse {
  jobs: JobSnapshot[];
}

export interface ErrorResponse {
  error: string;
  code?: string;
}
