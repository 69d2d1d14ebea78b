import type { Dirent } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { parseDocument } from "yaml";
import { InvalidRequestError, NotFoundError } from "../errors.js";

const YAML_FILE = /\.(yml|yaml)$/;
const SKIPPED_DIRS = new Set(["models", ".rasa", "node_modules", ".git"]);

/**
 * Read/write access to the agent project's files, confined to the project
 * directory.
 */
export class ProjectFiles {
  constructor(readonly root: string) {}

  /** Absolute path for a project-relative one; rejects anything outside the root. */
  resolve(relPath: string): string {
    const cleaned = relPath.replace(/^\/+/, "");
    if (cleaned === "" || cleaned.includes("\0")) {
      throw new InvalidRequestError("Invalid file path");
    }
    const root = path.resolve(this.root);
    const resolved = path.resolve(root, cleaned);
    if (!resolved.startsWith(root + path.sep)) {
      throw new InvalidRequestError("Invalid file path");
    }
    return resolved;
  }

  /** YAML files in the project, relative with forward slashes, sorted. */
  async list(): Promise<string[]> {
    const found: string[] = [];
    await this.walk(path.resolve(this.root), found);
    return found
      .map((abs) => path.relative(this.root, abs).split(path.sep).join("/"))
      .sort();
  }

  async read(relPath: string): Promise<string> {
    const filePath = this.resolve(relPath);
    try {
      return await fsp.readFile(filePath, "utf-8");
    } catch {
      throw new NotFoundError(`File not found: ${relPath}`);
    }
  }

  async write(relPath: string, content: string): Promise<void> {
    const filePath = this.resolve(relPath);
    if (content.trim() === "") {
      throw new InvalidRequestError("File content cannot be empty");
    }
    if (YAML_FILE.test(filePath)) {
      const doc = parseDocument(content);
      const [first] = doc.errors;
      if (first) {
        throw new InvalidRequestError(`Invalid YAML: ${first.message}`);
      }
    }
    await fsp.mkdir(path.dirname(filePath), { recursive: true });
    await fsp.writeFile(filePath, content, "utf-8");
  }

  private async walk(dir: string, found: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fsp.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) await this.walk(full, found);
      } else if (entry.isFile() && YAML_FILE.test(entry.name)) {
        found.push(full);
      }
    }
  }
}
