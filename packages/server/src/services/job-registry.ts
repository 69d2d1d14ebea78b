import type { FastifyBaseLogger } from "fastify";
import {
  isJobCategory,
  type JobCategory,
  type JobSnapshot,
  type StartImageBuildRequest,
  type StartServerRequest,
  type StartTrainingRequest,
} from "@agent-console/shared";
import type { ServerConfig } from "../config.js";
import { JobController, type ManagedJob } from "./job-controller.js";
import type { ModelStore } from "./model-store.js";
import { ImageBuildJobDefinition } from "./jobs/image-build.js";
import { ServerRuntimeJobDefinition } from "./jobs/server-runtime.js";
import { TrainingJobDefinition } from "./jobs/training.js";

export interface JobControllers {
  training: JobController<StartTrainingRequest>;
  server: JobController<StartServerRequest>;
  imageBuild: JobController<StartImageBuildRequest>;
}

/** One controller per category, created once for the server's lifetime. */
export class JobRegistry {
  readonly training: JobController<StartTrainingRequest>;
  readonly server: JobController<StartServerRequest>;
  readonly imageBuild: JobController<StartImageBuildRequest>;
  private byCategory: Map<JobCategory, ManagedJob>;

  constructor(controllers: JobControllers) {
    this.training = controllers.training;
    this.server = controllers.server;
    this.imageBuild = controllers.imageBuild;
    this.byCategory = new Map<JobCategory, ManagedJob>([
      ["training", this.training],
      ["server", this.server],
      ["image-build", this.imageBuild],
    ]);
  }

  static fromConfig(
    config: ServerConfig,
    models: ModelStore,
    log: FastifyBaseLogger,
  ): JobRegistry {
    const options = {
      retentionLines: config.logRetentionLines,
      stopGraceMs: config.stopGraceMs,
      shellBin: config.shellBin,
    };
    return new JobRegistry({
      training: new JobController(new TrainingJobDefinition(config, models), options, log),
      server: new JobController(new ServerRuntimeJobDefinition(config, models), options, log),
      imageBuild: new JobController(new ImageBuildJobDefinition(config, models), options, log),
    });
  }

  get(category: string): ManagedJob | undefined {
    return isJobCategory(category) ? this.byCategory.get(category) : undefined;
  }

  snapshots(): JobSnapshot[] {
    return [...this.byCategory.values()].map((job) => job.status());
  }

  /** Stop every running job and wait for all of them to exit. */
  async shutdown(): Promise<void> {
    await Promise.all([...this.byCategory.values()].map((job) => job.shutdown()));
  }
}
