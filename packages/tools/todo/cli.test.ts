import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { main } from "./cli.ts";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "todo-cli-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  delete process.env.TODO_FILE;
  await rm(tempDir, { recursive: true, force: true });
});

/** Run the CLI and collect what it printed. */
async function run(
  args: string[],
): Promise<{ stdout: string[]; stderr: string[] }> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = vi.spyOn(console, "log").mockImplementation((msg: unknown) => {
    stdout.push(String(msg));
  });
  const error = vi.spyOn(console, "error").mockImplementation(
    (msg: unknown) => {
      stderr.push(String(msg));
    },
  );
  try {
    await main(args);
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
  return { stdout, stderr };
}

test("todo - shows help when no arguments provided", async () => {
  const { stdout } = await run([]);
  expect(stdout).toHaveLength(1);
  expect(stdout[0]).toContain("Usage: todo [options] [command]");
  expect(stdout[0]).toContain("todo update 0                # Toggle item 0 done");
});

test("todo show - empty store prints nothing", async () => {
  const file = join(tempDir, "todo.json");
  const { stdout, stderr } = await run(["show", "--file", file]);
  expect(stdout).toEqual([]);
  expect(stderr).toEqual([]);
  expect(process.exitCode).toBeUndefined();
});

test("todo add - appends items and show lists them", async () => {
  const file = join(tempDir, "todo.json");

  expect((await run(["add", "--file", file, "buy", "milk"])).stdout).toEqual([
    "Added 0: buy milk",
  ]);
  expect((await run(["add", "--file", file, "call bank"])).stdout).toEqual([
    "Added 1: call bank",
  ]);
  expect((await run(["show", "--file", file])).stdout).toEqual([
    "0: [ ] buy milk\n1: [ ] call bank",
  ]);

  expect(JSON.parse(await readFile(file, "utf8"))).toEqual({
    version: 2,
    items: [
      { index: 0, text: "buy milk", done: false },
      { index: 1, text: "call bank", done: false },
    ],
  });
});

test("todo remove - by text renumbers the rest", async () => {
  const file = join(tempDir, "todo.json");
  await run(["add", "--file", file, "buy milk"]);
  await run(["add", "--file", file, "call bank"]);

  const { stdout } = await run(["remove", "--file", file, "BUY", "MILK"]);

  expect(stdout).toEqual(["Removed 0: buy milk"]);
  expect((await run(["show", "--file", file])).stdout).toEqual([
    "0: [ ] call bank",
  ]);
});

test("todo remove - unknown selector reports not_found and keeps the file", async () => {
  const file = join(tempDir, "todo.json");
  await run(["add", "--file", file, "buy milk"]);
  const before = await readFile(file, "utf8");

  const { stdout, stderr } = await run(["remove", "--file", file, "4"]);

  expect(stdout).toEqual([]);
  expect(stderr).toEqual(["error: not_found\nNo item found with index 4"]);
  expect(process.exitCode).toBe(1);
  expect(await readFile(file, "utf8")).toBe(before);
});

test("todo update - replaces text then toggles done", async () => {
  const file = join(tempDir, "todo.json");
  await run(["add", "--file", file, "buy milk"]);

  expect(
    (await run(["update", "--file", file, "0", "buy", "oat", "milk"])).stdout,
  ).toEqual(["Updated 0: buy milk -> buy oat milk"]);
  expect((await run(["update", "--file", file, "buy oat milk"])).stdout)
    .toEqual(["Marked 0 as done: buy oat milk"]);
  expect((await run(["show", "--file", file])).stdout).toEqual([
    "0: [x] buy oat milk",
  ]);
});

test("todo - csv file extension writes CSV", async () => {
  const file = join(tempDir, "todo.csv");
  await run(["add", "--file", file, "buy milk, eggs"]);
  await run(["update", "--file", file, "0"]);

  expect(await readFile(file, "utf8")).toBe(
    'Index,Text,Done\n0,"buy milk, eggs",true\n',
  );
});

test("todo - TODO_FILE selects the backing file", async () => {
  const file = join(tempDir, "from-env.json");
  process.env.TODO_FILE = file;

  await run(["add", "water plants"]);

  expect(JSON.parse(await readFile(file, "utf8")).items).toEqual([
    { index: 0, text: "water plants", done: false },
  ]);
});

test("todo --json - prints output objects and errors as JSON", async () => {
  const file = join(tempDir, "todo.json");

  const added = await run(["add", "--json", "--file", file, "a"]);
  expect(added.stdout).toEqual([
    JSON.stringify({ item: { index: 0, text: "a", done: false } }),
  ]);

  const failed = await run(["remove", "--json", "--file", file, "zzz"]);
  expect(failed.stderr).toEqual([
    JSON.stringify({
      error: "not_found",
      code: "not_found",
      message: 'No item found with text "zzz"',
    }),
  ]);
  expect(process.exitCode).toBe(1);
});

test("todo - corrupt file reports invalid_file", async () => {
  const file = join(tempDir, "todo.json");
  await writeFile(file, "{nope", "utf8");

  const { stderr } = await run(["show", "--file", file]);

  expect(stderr).toEqual([`error: invalid_file\nInvalid JSON in ${file}`]);
  expect(process.exitCode).toBe(1);
});

test("todo - bad --format reports invalid_args", async () => {
  const file = join(tempDir, "todo.json");

  const { stderr } = await run(["show", "--format", "xml", "--file", file]);

  expect(stderr).toEqual([
    "error: invalid_args\nUnknown format 'xml' (expected json or csv)",
  ]);
  expect(process.exitCode).toBe(1);
});
