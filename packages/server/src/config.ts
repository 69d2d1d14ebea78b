import { existsSync } from "node:fs";
import path from "node:path";

export interface ConfigWarning {
  level: "warn" | "error";
  message: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  /** Agent project holding domain.yml, config.yml, endpoints.yml and data/ */
  projectDir: string;
  modelsDir: string;
  agentBin: string;
  containerBin: string;
  shellBin: string;
  /** Port the agent runtime listens on for the chat relay */
  runtimePort: number;
  baseImage: string;
  logRetentionLines: number;
  stopGraceMs: number;
  heartbeatMs: number;
  chatTimeoutMs: number;
  publicDir: string;
}

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function checkPort(name: string, value: number, issues: ConfigWarning[]) {
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    issues.push({ level: "error", message: `${name} must be a port between 1 and 65535` });
  }
}

/**
 * Validate server config at startup. Returns a list of warnings/errors.
 * Callers should log warnings and refuse to start on errors.
 */
export function validateConfig(config: ServerConfig): ConfigWarning[] {
  const issues: ConfigWarning[] = [];

  checkPort("PORT", config.port, issues);
  checkPort("RUNTIME_PORT", config.runtimePort, issues);

  if (config.port === config.runtimePort) {
    issues.push({
      level: "error",
      message: "PORT and RUNTIME_PORT must differ — the agent runtime needs its own port",
    });
  }

  const positives: [string, number][] = [
    ["LOG_RETENTION_LINES", config.logRetentionLines],
    ["STOP_GRACE_MS", config.stopGraceMs],
    ["STREAM_HEARTBEAT_MS", config.heartbeatMs],
    ["CHAT_TIMEOUT_MS", config.chatTimeoutMs],
  ];
  for (const [name, value] of positives) {
    if (!isPositiveInt(value)) {
      issues.push({ level: "error", message: `${name} must be a positive integer` });
    }
  }

  if (!existsSync(config.projectDir)) {
    issues.push({
      level: "warn",
      message: `AGENT_PROJECT_DIR ${config.projectDir} does not exist — jobs will fail to start`,
    });
  }

  return issues;
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  return raw === undefined || raw === "" ? fallback : Number(raw);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const cwd = process.cwd();
  const projectDir = path.resolve(env.AGENT_PROJECT_DIR ?? path.join(cwd, "agent_project"));

  return {
    port: intFromEnv(env, "PORT", 8000),
    host: env.HOST ?? "127.0.0.1",
    logLevel: env.LOG_LEVEL ?? "info",
    projectDir,
    modelsDir: path.join(projectDir, "models"),
    agentBin: env.AGENT_BIN ?? "rasa",
    containerBin: env.CONTAINER_BIN ?? "docker",
    shellBin: env.SHELL_BIN ?? "/bin/sh",
    runtimePort: intFromEnv(env, "RUNTIME_PORT", 5005),
    baseImage: env.BASE_IMAGE ?? "rasa/rasa:3.6.20-full",
    logRetentionLines: intFromEnv(env, "LOG_RETENTION_LINES", 5000),
    stopGraceMs: intFromEnv(env, "STOP_GRACE_MS", 5000),
    heartbeatMs: intFromEnv(env, "STREAM_HEARTBEAT_MS", 15_000),
    chatTimeoutMs: intFromEnv(env, "CHAT_TIMEOUT_MS", 10_000),
    publicDir: path.resolve(env.PUBLIC_DIR ?? path.join(cwd, "frontend")),
  };
}
