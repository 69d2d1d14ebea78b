import path from "node:path";
import type { StartTrainingRequest } from "@agent-console/shared";
import type { ServerConfig } from "../../config.js";
import type { JobDefinition } from "../job-controller.js";
import type { ModelStore } from "../model-store.js";
import type { ExitResult, LaunchPlan } from "../process-handle.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `model_YYYYMMDD_HHMMSS` in local time. */
export function defaultModelName(at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `model_${date}_${time}`;
}

export class TrainingJobDefinition implements JobDefinition<StartTrainingRequest> {
  readonly category = "training" as const;

  constructor(
    private config: Pick<ServerConfig, "projectDir" | "modelsDir" | "agentBin">,
    private models: ModelStore,
    private now: () => Date = () => new Date(),
  ) {}

  async prepare(params: StartTrainingRequest): Promise<LaunchPlan> {
    const { projectDir, modelsDir, agentBin } = this.config;
    const modelName = params.modelName ?? defaultModelName(this.now());

    return {
      command: agentBin,
      args: [
        "train",
        "--domain", path.join(projectDir, "domain.yml"),
        "--data", path.join(projectDir, "data"),
        "--config", path.join(projectDir, "config.yml"),
        "--out", modelsDir,
        "--fixed-model-name", modelName,
      ],
      cwd: projectDir,
      meta: { modelName },
      epilogue: (result) => this.summarize(result),
    };
  }

  private async summarize(result: ExitResult): Promise<string[]> {
    if (result.state !== "succeeded") return [];
    const latest = await this.models.latest();
    return latest
      ? [`Model saved: ${latest.name}`]
      : ["No model archive found after training"];
  }
}
