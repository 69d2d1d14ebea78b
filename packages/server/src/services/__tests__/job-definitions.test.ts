import { after, describe, it } from "node:test";
import assert from "node:assert/strict";
import fsp from "node:fs/promises";
import path from "node:path";
import type { ServerConfig } from "../../config.js";
import { PreconditionError } from "../../errors.js";
import { JobController } from "../job-controller.js";
import { ModelStore } from "../model-store.js";
import type { ExitResult } from "../process-handle.js";
import { DOCKERFILE_NAME, ImageBuildJobDefinition } from "../jobs/image-build.js";
import { ServerRuntimeJobDefinition } from "../jobs/server-runtime.js";
import { TrainingJobDefinition, defaultModelName } from "../jobs/training.js";
import {
  HANDLE_OPTIONS,
  makeProject,
  removeTmpDirs,
  silentLog,
  waitForLine,
} from "../../__tests__/fixtures.js";

const SUCCEEDED: ExitResult = { state: "succeeded", exitCode: 0, signal: null };
const FAILED: ExitResult = { state: "failed", exitCode: 1, signal: null };
const STOPPED: ExitResult = { state: "stopped", exitCode: null, signal: "SIGTERM" };

async function addModel(config: ServerConfig, name: string, mtimeSec: number): Promise<string> {
  await fsp.mkdir(config.modelsDir, { recursive: true });
  const file = path.join(config.modelsDir, name);
  await fsp.writeFile(file, "model");
  await fsp.utimes(file, mtimeSec, mtimeSec);
  return file;
}

function runEpilogue(
  epilogue: ((result: ExitResult) => Promise<string[]> | string[]) | undefined,
  result: ExitResult,
): Promise<string[]> {
  assert.ok(epilogue, "plan has no epilogue");
  return Promise.resolve(epilogue(result));
}

const controllers: { shutdown(): Promise<void> }[] = [];

after(async () => {
  await Promise.all(controllers.map((c) => c.shutdown()));
  await removeTmpDirs();
});

// ---------------------------------------------------------------------------
// Training
// ---------------------------------------------------------------------------

describe("defaultModelName", () => {
  it("formats the local date and time", () => {
    assert.equal(defaultModelName(new Date(2024, 0, 2, 3, 4, 5)), "model_20240102_030405");
  });
});

describe("TrainingJobDefinition", () => {
  it("runs the agent's train command against the project files", async () => {
    const { config } = await makeProject();
    const training = new TrainingJobDefinition(config, new ModelStore(config.modelsDir));
    const plan = await training.prepare({ modelName: "greeter" });

    assert.equal(plan.command, config.agentBin);
    assert.equal(plan.cwd, config.projectDir);
    assert.deepEqual(plan.args, [
      "train",
      "--domain", path.join(config.projectDir, "domain.yml"),
      "--data", path.join(config.projectDir, "data"),
      "--config", path.join(config.projectDir, "config.yml"),
      "--out", config.modelsDir,
      "--fixed-model-name", "greeter",
    ]);
    assert.deepEqual(plan.meta, { modelName: "greeter" });
  });

  it("names the model after the current time when no name is given", async () => {
    const { config } = await makeProject();
    const training = new TrainingJobDefinition(
      config,
      new ModelStore(config.modelsDir),
      () => new Date(2025, 10, 30, 23, 59, 1),
    );
    const plan = await training.prepare({});
    assert.deepEqual(plan.meta, { modelName: "model_20251130_235901" });
    assert.equal(plan.args.at(-1), "model_20251130_235901");
  });

  it("reports the saved archive only after a successful run", async () => {
    const { config } = await makeProject();
    const plan = await new TrainingJobDefinition(config, new ModelStore(config.modelsDir)).prepare({});

    assert.deepEqual(await runEpilogue(plan.epilogue, SUCCEEDED), [
      "No model archive found after training",
    ]);
    await addModel(config, "greeter.tar.gz", 1_700_000_000);
    assert.deepEqual(await runEpilogue(plan.epilogue, SUCCEEDED), ["Model saved: greeter.tar.gz"]);
    assert.deepEqual(await runEpilogue(plan.epilogue, FAILED), []);
  });

  it("trains end to end with the agent program", async () => {
    const { config } = await makeProject();
    const models = new ModelStore(config.modelsDir);
    const jobs = new JobController(new TrainingJobDefinition(config, models), HANDLE_OPTIONS, silentLog);
    controllers.push(jobs);

    await jobs.start({ modelName: "greeter" });
    const final = await jobs.current()?.finished;

    assert.equal(final?.state, "succeeded");
    assert.deepEqual(
      jobs.currentLog()?.readFrom(0).lines.map((l) => l.line),
      ["stub train", "Epoch 1", "Epoch 2", "Model saved: greeter.tar.gz"],
    );
    assert.deepEqual((await models.list()).map((m) => m.name), ["greeter.tar.gz"]);
  });
});

// ---------------------------------------------------------------------------
// Agent runtime
// ---------------------------------------------------------------------------

describe("ServerRuntimeJobDefinition", () => {
  it("refuses to start without a trained model", async () => {
    const { config } = await makeProject();
    const runtime = new ServerRuntimeJobDefinition(config, new ModelStore(config.modelsDir));

    await assert.rejects(runtime.prepare({}), (err: unknown) => {
      assert.ok(err instanceof PreconditionError);
      assert.equal(err.message, "No trained model available. Train a model first.");
      return true;
    });
  });

  it("refuses an unknown model name", async () => {
    const { config } = await makeProject();
    await addModel(config, "greeter.tar.gz", 1_700_000_000);
    const runtime = new ServerRuntimeJobDefinition(config, new ModelStore(config.modelsDir));

    await assert.rejects(runtime.prepare({ model: "other.tar.gz" }), {
      name: "PreconditionError",
      message: "Model not found: other.tar.gz",
    });
  });

  it("serves the newest model by default", async () => {
    const { config } = await makeProject();
    await addModel(config, "older.tar.gz", 1_700_000_000);
    const newest = await addModel(config, "newer.tar.gz", 1_700_000_100);
    const runtime = new ServerRuntimeJobDefinition(config, new ModelStore(config.modelsDir));

    const plan = await runtime.prepare({});
    assert.deepEqual(plan.args, [
      "run",
      "--model", newest,
      "--enable-api",
      "--cors", "*",
      "--port", "5005",
      "--endpoints", path.join(config.projectDir, "endpoints.yml"),
    ]);
    assert.deepEqual(plan.meta, { model: "newer.tar.gz", port: 5005 });
    assert.deepEqual(plan.prologue, ["Serving newer.tar.gz on port 5005"]);
  });

  it("serves a named model", async () => {
    const { config } = await makeProject();
    const older = await addModel(config, "older.tar.gz", 1_700_000_000);
    await addModel(config, "newer.tar.gz", 1_700_000_100);
    const runtime = new ServerRuntimeJobDefinition(config, new ModelStore(config.modelsDir));

    const plan = await runtime.prepare({ model: "older.tar.gz" });
    assert.equal(plan.args[2], older);
  });

  it("keeps running until stopped", async () => {
    const { config } = await makeProject();
    await addModel(config, "greeter.tar.gz", 1_700_000_000);
    const models = new ModelStore(config.modelsDir);
    const jobs = new JobController(new ServerRuntimeJobDefinition(config, models), HANDLE_OPTIONS, silentLog);
    controllers.push(jobs);

    await jobs.start({});
    const handle = jobs.current();
    assert.ok(handle);
    await waitForLine(handle.channel, "runtime on 5005");
    assert.equal(jobs.status().state, "running");

    await jobs.stop();
    const final = await handle.finished;
    assert.equal(final.state, "stopped");
    assert.deepEqual(
      handle.channel.readFrom(0).lines.map((l) => l.line),
      ["Serving greeter.tar.gz on port 5005", "stub run", "runtime on 5005"],
    );
  });
});

// ---------------------------------------------------------------------------
// Image build
// ---------------------------------------------------------------------------

const BUILD_REQUEST = {
  imageName: "agent",
  registryUser: "testuser",
  registryToken: "test-secret",
};

describe("ImageBuildJobDefinition", () => {
  it("refuses to build without a trained model", async () => {
    const { config } = await makeProject();
    const build = new ImageBuildJobDefinition(config, new ModelStore(config.modelsDir));
    await assert.rejects(build.prepare(BUILD_REQUEST), PreconditionError);
  });

  it("writes a Dockerfile for the newest model beside the project", async () => {
    const { root, config } = await makeProject();
    await addModel(config, "greeter.tar.gz", 1_700_000_000);
    const build = new ImageBuildJobDefinition(config, new ModelStore(config.modelsDir));

    const plan = await build.prepare(BUILD_REQUEST);
    assert.equal(plan.cwd, root);

    const dockerfile = await fsp.readFile(path.join(root, DOCKERFILE_NAME), "utf-8");
    assert.equal(
      dockerfile,
      [
        "FROM example/agent-base:1.0",
        "",
        "WORKDIR /app",
        "",
        "USER root",
        "",
        "COPY agent_project/models/greeter.tar.gz /app/models/greeter.tar.gz",
        "",
        "COPY agent_project/domain.yml /app/domain.yml",
        "COPY agent_project/config.yml /app/config.yml",
        "COPY agent_project/endpoints.yml /app/endpoints.yml",
        "COPY agent_project/data /app/data",
        "",
        "USER 1001",
        "",
        "EXPOSE 5005",
        "",
        'ENTRYPOINT ["agent","run","--model","/app/models/greeter.tar.gz","--enable-api","--cors","*","--port","5005"]',
        "",
      ].join("\n"),
    );
  });

  it("passes the registry token on stdin only", async () => {
    const { config } = await makeProject();
    await addModel(config, "greeter.tar.gz", 1_700_000_000);
    const build = new ImageBuildJobDefinition(config, new ModelStore(config.modelsDir));

    const plan = await build.prepare(BUILD_REQUEST);
    assert.equal(plan.command, "/bin/sh");
    assert.equal(plan.input, "test-secret\n");
    assert.deepEqual(plan.env, {
      IMAGE: "testuser/agent:latest",
      DOCKERFILE: DOCKERFILE_NAME,
      CONTAINER_BIN: config.containerBin,
      REGISTRY_USER: "testuser",
    });
    assert.deepEqual(plan.meta, { image: "testuser/agent:latest", push: true, model: "greeter.tar.gz" });
    for (const part of [plan.args, plan.env, plan.meta]) {
      assert.equal(JSON.stringify(part).includes("test-secret"), false);
    }
  });

  it("skips the login and push steps when not publishing", async () => {
    const { config } = await makeProject();
    await addModel(config, "greeter.tar.gz", 1_700_000_000);
    const build = new ImageBuildJobDefinition(config, new ModelStore(config.modelsDir));

    const plan = await build.prepare({ ...BUILD_REQUEST, tag: "v2", push: false });
    assert.equal(plan.input, undefined);
    assert.equal(plan.args[1].includes("login"), false);
    assert.deepEqual(plan.meta, { image: "testuser/agent:v2", push: false, model: "greeter.tar.gz" });
    assert.deepEqual(await runEpilogue(plan.epilogue, SUCCEEDED), ["Image built: testuser/agent:v2"]);
  });

  it("summarises each outcome", async () => {
    const { config } = await makeProject();
    await addModel(config, "greeter.tar.gz", 1_700_000_000);
    const plan = await new ImageBuildJobDefinition(config, new ModelStore(config.modelsDir)).prepare(
      BUILD_REQUEST,
    );

    assert.deepEqual(await runEpilogue(plan.epilogue, SUCCEEDED), [
      "Image published: testuser/agent:latest",
      "Pull it with: container pull testuser/agent:latest",
    ]);
    assert.deepEqual(await runEpilogue(plan.epilogue, FAILED), [
      "Image build failed for testuser/agent:latest",
    ]);
    assert.deepEqual(await runEpilogue(plan.epilogue, STOPPED), [
      "Image build stopped for testuser/agent:latest",
    ]);
  });

  it("builds, logs in and pushes without the token reaching the log", async () => {
    const { config } = await makeProject();
    await addModel(config, "greeter.tar.gz", 1_700_000_000);
    const models = new ModelStore(config.modelsDir);
    const jobs = new JobController(new ImageBuildJobDefinition(config, models), HANDLE_OPTIONS, silentLog);
    controllers.push(jobs);

    await jobs.start(BUILD_REQUEST);
    const final = await jobs.current()?.finished;
    assert.equal(final?.state, "succeeded");

    const lines = jobs.currentLog()?.readFrom(0).lines.map((l) => l.line) ?? [];
    assert.deepEqual(lines, [
      "Building image testuser/agent:latest",
      "stub build",
      "built testuser/agent:latest",
      "Build complete",
      "Logging in to the registry as testuser",
      "stub login",
      "Login Succeeded",
      "Pushing testuser/agent:latest",
      "stub push",
      "pushed testuser/agent:latest",
      "Image published: testuser/agent:latest",
      "Pull it with: container pull testuser/agent:latest",
    ]);
    assert.equal(lines.some((l) => l.includes("test-secret")), false);
  });
});
