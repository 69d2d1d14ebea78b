import fsp from "node:fs/promises";
import path from "node:path";
import type { StartImageBuildRequest } from "@agent-console/shared";
import type { ServerConfig } from "../../config.js";
import { PreconditionError } from "../../errors.js";
import type { JobDefinition } from "../job-controller.js";
import type { ModelStore } from "../model-store.js";
import type { ExitResult, LaunchPlan } from "../process-handle.js";

export const DOCKERFILE_NAME = "Dockerfile.agent";

type ImageBuildConfig = Pick<
  ServerConfig,
  "projectDir" | "modelsDir" | "agentBin" | "containerBin" | "shellBin" | "runtimePort" | "baseImage"
>;

// Image reference, binary and Dockerfile arrive through the environment so
// user input is never spliced into the script text. The registry token is
// read from stdin into an unexported shell variable.
const BUILD_SCRIPT = `set -e
echo "Building image $IMAGE"
"$CONTAINER_BIN" build -t "$IMAGE" -f "$DOCKERFILE" .
echo "Build complete"`;

const PUSH_SCRIPT = `
IFS= read -r registry_token
echo "Logging in to the registry as $REGISTRY_USER"
printf '%s' "$registry_token" | "$CONTAINER_BIN" login -u "$REGISTRY_USER" --password-stdin
echo "Pushing $IMAGE"
"$CONTAINER_BIN" push "$IMAGE"`;

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

export function renderDockerfile(opts: {
  baseImage: string;
  projectPath: string;
  modelsPath: string;
  modelName: string;
  agentCommand: string;
  port: number;
}): string {
  const { baseImage, projectPath, modelsPath, modelName, agentCommand, port } = opts;
  const entrypoint = [
    agentCommand, "run",
    "--model", `/app/models/${modelName}`,
    "--enable-api",
    "--cors", "*",
    "--port", String(port),
  ];

  return `FROM ${baseImage}

WORKDIR /app

USER root

COPY ${modelsPath}/${modelName} /app/models/${modelName}

COPY ${projectPath}/domain.yml /app/domain.yml
COPY ${projectPath}/config.yml /app/config.yml
COPY ${projectPath}/endpoints.yml /app/endpoints.yml
COPY ${projectPath}/data /app/data

USER 1001

EXPOSE ${port}

ENTRYPOINT ${JSON.stringify(entrypoint)}
`;
}

/**
 * Packages the newest trained model with the project files into a container
 * image and optionally publishes it. Runs as one shell process so a stop
 * reaches whichever step is in progress.
 */
export class ImageBuildJobDefinition implements JobDefinition<StartImageBuildRequest> {
  readonly category = "image-build" as const;

  constructor(
    private config: ImageBuildConfig,
    private models: ModelStore,
  ) {}

  /** The directory the build runs in: the parent of the agent project. */
  get buildContext(): string {
    return path.dirname(this.config.projectDir);
  }

  async prepare(params: StartImageBuildRequest): Promise<LaunchPlan> {
    const model = await this.models.latest();
    if (!model) {
      throw new PreconditionError("No trained model available. Train a model first.");
    }

    const tag = params.tag ?? "latest";
    const push = params.push ?? true;
    const image = `${params.registryUser}/${params.imageName}:${tag}`;
    const context = this.buildContext;

    const dockerfile = renderDockerfile({
      baseImage: this.config.baseImage,
      projectPath: toPosix(path.relative(context, this.config.projectDir)),
      modelsPath: toPosix(path.relative(context, this.config.modelsDir)),
      modelName: model.name,
      agentCommand: path.basename(this.config.agentBin),
      port: this.config.runtimePort,
    });
    await fsp.writeFile(path.join(context, DOCKERFILE_NAME), dockerfile, "utf-8");

    return {
      command: this.config.shellBin,
      args: ["-c", push ? BUILD_SCRIPT + PUSH_SCRIPT : BUILD_SCRIPT],
      cwd: context,
      env: {
        IMAGE: image,
        DOCKERFILE: DOCKERFILE_NAME,
        CONTAINER_BIN: this.config.containerBin,
        REGISTRY_USER: params.registryUser,
      },
      ...(push ? { input: `${params.registryToken}\n` } : {}),
      meta: { image, push, model: model.name },
      epilogue: (result) => this.summarize(result, image, push),
    };
  }

  private summarize(result: ExitResult, image: string, push: boolean): string[] {
    switch (result.state) {
      case "succeeded":
        return push
          ? [`Image published: ${image}`, `Pull it with: ${path.basename(this.config.containerBin)} pull ${image}`]
          : [`Image built: ${image}`];
      case "failed":
        return [`Image build failed for ${image}`];
      case "stopped":
        return [`Image build stopped for ${image}`];
    }
  }
}
