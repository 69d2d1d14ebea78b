import fsp from "node:fs/promises";
import path from "node:path";
import type { ModelInfo } from "@agent-console/shared";
import { InvalidRequestError, NotFoundError } from "../errors.js";

const MODEL_ARCHIVE_SUFFIX = ".tar.gz";

export interface ModelFile {
  name: string;
  path: string;
  sizeBytes: number;
  mtimeMs: number;
}

function isPlainName(name: string): boolean {
  return name !== "" && name === path.basename(name) && name !== "." && name !== "..";
}

/**
 * Trained model archives in the project's models directory. A missing
 * directory simply means no models yet.
 */
export class ModelStore {
  constructor(readonly modelsDir: string) {}

  /** All archives, newest first. */
  async files(): Promise<ModelFile[]> {
    let entries: string[];
    try {
      entries = await fsp.readdir(this.modelsDir);
    } catch {
      return [];
    }

    const files: ModelFile[] = [];
    for (const name of entries) {
      if (!name.endsWith(MODEL_ARCHIVE_SUFFIX)) continue;
      const filePath = path.join(this.modelsDir, name);
      const stat = await fsp.stat(filePath).catch(() => null);
      if (!stat?.isFile()) continue;
      files.push({ name, path: filePath, sizeBytes: stat.size, mtimeMs: stat.mtimeMs });
    }

    return files.sort((a, b) => b.mtimeMs - a.mtimeMs || a.name.localeCompare(b.name));
  }

  async list(): Promise<ModelInfo[]> {
    const files = await this.files();
    return files.map((f) => ({
      name: f.name,
      sizeMb: Math.round((f.sizeBytes / 1024 / 1024) * 100) / 100,
      createdAt: new Date(f.mtimeMs).toISOString(),
    }));
  }

  async latest(): Promise<ModelFile | null> {
    const files = await this.files();
    return files[0] ?? null;
  }

  async find(name: string): Promise<ModelFile | null> {
    if (!isPlainName(name)) return null;
    const files = await this.files();
    return files.find((f) => f.name === name) ?? null;
  }

  async remove(name: string): Promise<void> {
    if (!isPlainName(name)) {
      throw new InvalidRequestError(`Invalid model name: ${name}`);
    }
    const model = await this.find(name);
    if (!model) {
      throw new NotFoundError(`Model not found: ${name}`);
    }
    await fsp.unlink(model.path);
  }
}
