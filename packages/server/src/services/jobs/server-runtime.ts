import path from "node:path";
import type { StartServerRequest } from "@agent-console/shared";
import type { ServerConfig } from "../../config.js";
import { PreconditionError } from "../../errors.js";
import type { JobDefinition } from "../job-controller.js";
import type { ModelStore } from "../model-store.js";
import type { LaunchPlan } from "../process-handle.js";

/**
 * The agent runtime with its REST API enabled, serving one trained model on
 * the configured port. Whether the port actually answers is the chat relay's
 * concern.
 */
export class ServerRuntimeJobDefinition implements JobDefinition<StartServerRequest> {
  readonly category = "server" as const;

  constructor(
    private config: Pick<ServerConfig, "projectDir" | "agentBin" | "runtimePort">,
    private models: ModelStore,
  ) {}

  async prepare(params: StartServerRequest): Promise<LaunchPlan> {
    const { projectDir, agentBin, runtimePort } = this.config;

    const model = params.model
      ? await this.models.find(params.model)
      : await this.models.latest();
    if (!model) {
      throw new PreconditionError(
        params.model
          ? `Model not found: ${params.model}`
          : "No trained model available. Train a model first.",
      );
    }

    return {
      command: agentBin,
      args: [
        "run",
        "--model", model.path,
        "--enable-api",
        "--cors", "*",
        "--port", String(runtimePort),
        "--endpoints", path.join(projectDir, "endpoints.yml"),
      ],
      cwd: projectDir,
      meta: { model: model.name, port: runtimePort },
      prologue: [`Serving ${model.name} on port ${runtimePort}`],
    };
  }
}
