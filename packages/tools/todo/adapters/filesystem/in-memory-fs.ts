/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * Files live in a Map<string, string>, directories in a Set<string>.
 * Paths can be marked read-only to simulate write failures.
 *
 * Dependencies: domain ports only.
 */

import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TodoError } from "../../domain/entities/errors.ts";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private dirs = new Set<string>();
  private readOnly = new Set<string>();

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(
        new TodoError("io_error", `File not found: ${path}`),
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    if (this.readOnly.has(path)) {
      return Promise.reject(
        new TodoError("io_error", `Failed to write file: ${path}`),
      );
    }
    this.files.set(path, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path) || this.dirs.has(path));
  }

  ensureDir(path: string): Promise<void> {
    this.dirs.add(path);
    // Also add all parent directories
    const parts = path.split("/");
    for (let i = 1; i < parts.length; i++) {
      this.dirs.add(parts.slice(0, i).join("/"));
    }
    return Promise.resolve();
  }

  // --- Test helpers ---

  /** Set a file directly (convenience for test setup). */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Get a file's content, or undefined if absent. */
  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Make writes to `path` fail with io_error. */
  markReadOnly(path: string): void {
    this.readOnly.add(path);
  }

  hasDir(path: string): boolean {
    return this.dirs.has(path);
  }

  /** Get the number of stored files. */
  get size(): number {
    return this.files.size;
  }
}
