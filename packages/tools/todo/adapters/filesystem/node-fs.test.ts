import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { NodeFileSystem } from "./node-fs.ts";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "todo-fs-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

test("NodeFileSystem - writes, reads and detects files", async () => {
  const fs = new NodeFileSystem();
  const path = join(tempDir, "todo.json");

  expect(await fs.exists(path)).toBe(false);
  await fs.writeFile(path, "[]\n");
  expect(await fs.exists(path)).toBe(true);
  expect(await fs.readFile(path)).toBe("[]\n");
});

test("NodeFileSystem - missing file is io_error", async () => {
  const path = join(tempDir, "missing.json");

  await expect(new NodeFileSystem().readFile(path)).rejects.toMatchObject({
    code: "io_error",
    message: `File not found: ${path}`,
  });
});

test("NodeFileSystem - write into a missing directory is io_error", async () => {
  const path = join(tempDir, "nope", "todo.json");

  await expect(new NodeFileSystem().writeFile(path, "")).rejects
    .toMatchObject({
      code: "io_error",
      message: `Failed to write file: ${path}`,
    });
});

test("NodeFileSystem - ensureDir creates nested directories", async () => {
  const fs = new NodeFileSystem();
  const dir = join(tempDir, "a", "b");

  await fs.ensureDir(dir);
  await fs.ensureDir(dir);

  expect(await fs.exists(dir)).toBe(true);
});
