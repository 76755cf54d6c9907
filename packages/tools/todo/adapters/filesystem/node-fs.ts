/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Maps Node error codes to TodoError("io_error").
 *
 * Dependencies: Node built-ins.
 */

import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TodoError } from "../../domain/entities/errors.ts";

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        throw new TodoError("io_error", `File not found: ${path}`);
      }
      throw new TodoError("io_error", `Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, "utf8");
    } catch {
      throw new TodoError("io_error", `Failed to write file: ${path}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        return false;
      }
      throw new TodoError("io_error", `Failed to access: ${path}`);
    }
  }

  async ensureDir(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true });
    } catch {
      throw new TodoError("io_error", `Failed to create directory: ${path}`);
    }
  }
}
