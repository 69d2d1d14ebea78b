import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { pino } from "pino";
import type { FastifyBaseLogger } from "fastify";
import type { JobCategory } from "@agent-console/shared";
import type { ServerConfig } from "../config.js";
import type { JobDefinition } from "../services/job-controller.js";
import type { LogChannel } from "../services/log-channel.js";
import type { HandleOptions, LaunchPlan } from "../services/process-handle.js";

export const silentLog: FastifyBaseLogger = pino({ level: "silent" });

export const HANDLE_OPTIONS: HandleOptions = {
  retentionLines: 1000,
  stopGraceMs: 300,
  shellBin: "/bin/sh",
};

/** Node one-liners standing in for the external programs. */
export const SCRIPTS = {
  epochs: `console.log("Epoch 1"); console.log("Epoch 2");`,
  delayedEpochs: `setTimeout(() => { console.log("Epoch 1"); console.log("Epoch 2"); }, 200);`,
  longRunning: `console.log("ready"); setInterval(() => {}, 1000);`,
  ignoresSigterm: `process.on("SIGTERM", () => {}); console.log("ready"); setInterval(() => {}, 1000);`,
  fails: `console.error("boom"); process.exit(3);`,
} as const;

export interface ScriptParams {
  script?: string;
  command?: string;
  cwd?: string;
}

/** Runs `node -e <script>`; params can swap the script, the program or the directory. */
export class ScriptJob implements JobDefinition<ScriptParams> {
  constructor(
    readonly category: JobCategory,
    private defaults: Partial<LaunchPlan> = {},
  ) {}

  async prepare(params: ScriptParams): Promise<LaunchPlan> {
    return {
      command: params.command ?? process.execPath,
      args: ["-e", params.script ?? SCRIPTS.epochs],
      cwd: params.cwd ?? os.tmpdir(),
      ...this.defaults,
    };
  }
}

/** Resolve once `text` has been appended to the channel. */
export async function waitForLine(
  channel: LogChannel,
  text: string,
  timeoutMs = 5000,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  let offset = 0;
  for (;;) {
    const { lines, nextOffset } = channel.readFrom(offset);
    if (lines.some((l) => l.line === text)) return;
    offset = nextOffset;
    if (channel.frozen) throw new Error(`Channel froze without "${text}"`);
    const remaining = deadline - Date.now();
    if (remaining <= 0) throw new Error(`Timed out waiting for "${text}"`);
    await Promise.race([
      channel.waitForChange(offset),
      new Promise((resolve) => setTimeout(resolve, remaining)),
    ]);
  }
}

export interface ParsedEvent {
  id?: string;
  event: string;
  data: unknown;
}

/** Split an SSE body into its events. */
export function parseEvents(body: string): ParsedEvent[] {
  return body
    .split("\n\n")
    .filter((frame) => frame.trim() !== "")
    .map((frame) => {
      const parsed: ParsedEvent = { event: "", data: null };
      for (const line of frame.split("\n")) {
        const sep = line.indexOf(": ");
        const field = line.slice(0, sep);
        const value = line.slice(sep + 2);
        if (field === "id") parsed.id = value;
        if (field === "event") parsed.event = value;
        if (field === "data") parsed.data = JSON.parse(value);
      }
      return parsed;
    });
}

/** Writable that keeps everything written to it, standing in for an HTTP response. */
export class MemorySink extends Writable {
  chunks: string[] = [];

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join("");
  }

  events(): ParsedEvent[] {
    return parseEvents(this.text);
  }
}

const cleanups: string[] = [];

export async function freshTmpDir(prefix: string): Promise<string> {
  const dir = await fsp.mkdtemp(path.join(os.tmpdir(), prefix));
  cleanups.push(dir);
  return dir;
}

export async function removeTmpDirs(): Promise<void> {
  for (const dir of cleanups.splice(0)) {
    await fsp.rm(dir, { recursive: true, force: true });
  }
}

// Stub for both the agent binary and the container engine. It echoes its
// arguments, writes a model archive for `train`, stays up for `run` and reads
// the registry token from stdin for `login`.
const STUB_SOURCE = `
const fs = require("node:fs");
const path = require("node:path");
const args = process.argv.slice(2);
const opt = (name) => args[args.indexOf(name) + 1];
console.log("stub " + args[0]);
if (args[0] === "train") {
  fs.mkdirSync(opt("--out"), { recursive: true });
  fs.writeFileSync(path.join(opt("--out"), opt("--fixed-model-name") + ".tar.gz"), "model");
  console.log("Epoch 1");
  console.log("Epoch 2");
} else if (args[0] === "run") {
  console.log("runtime on " + opt("--port"));
  setInterval(() => {}, 1000);
} else if (args[0] === "login") {
  let input = "";
  process.stdin.on("data", (d) => { input += d; });
  process.stdin.on("end", () => { console.log(input.length > 0 ? "Login Succeeded" : "no token"); });
} else if (args[0] === "build") {
  console.log("built " + opt("-t"));
} else if (args[0] === "push") {
  console.log("pushed " + args[1]);
}
`;

/** Write an executable stub program and return its path. */
export async function writeStubBinary(dir: string, name: string): Promise<string> {
  const file = path.join(dir, name);
  await fsp.writeFile(file, `#!${process.execPath}\n${STUB_SOURCE}`, { mode: 0o755 });
  return file;
}

/**
 * A temp agent project (domain.yml, config.yml, endpoints.yml, data/) with a
 * stub agent and container binary beside it.
 */
export async function makeProject(): Promise<{ root: string; config: ServerConfig }> {
  const root = await freshTmpDir("agent-console-test-");
  const projectDir = path.join(root, "agent_project");
  await fsp.mkdir(path.join(projectDir, "data"), { recursive: true });
  await fsp.writeFile(path.join(projectDir, "domain.yml"), "version: \"3.1\"\nintents:\n  - greet\n");
  await fsp.writeFile(path.join(projectDir, "config.yml"), "language: en\n");
  await fsp.writeFile(path.join(projectDir, "endpoints.yml"), "action_endpoint: null\n");
  await fsp.writeFile(path.join(projectDir, "data", "nlu.yml"), "nlu:\n  - intent: greet\n");

  const binDir = path.join(root, "bin");
  await fsp.mkdir(binDir);

  const config: ServerConfig = {
    port: 8000,
    host: "127.0.0.1",
    logLevel: "silent",
    projectDir,
    modelsDir: path.join(projectDir, "models"),
    agentBin: await writeStubBinary(binDir, "agent"),
    containerBin: await writeStubBinary(binDir, "container"),
    shellBin: "/bin/sh",
    runtimePort: 5005,
    baseImage: "example/agent-base:1.0",
    logRetentionLines: 1000,
    stopGraceMs: 300,
    heartbeatMs: 60_000,
    chatTimeoutMs: 1000,
    publicDir: path.join(root, "frontend"),
  };
  return { root, config };
}
