import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { copyFile, mkdtemp, readFile, rm } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { runCli, USAGE, type CliIo } from "./cli.js";

const FIXTURES = join(import.meta.dirname, "..", "test", "fixtures");

describe("runCli", () => {
  let dir: string;
  let out: string[];
  let err: string[];
  let io: CliIo;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "notebook-outline-cli-"));
    await copyFile(join(FIXTURES, "course.ipynb"), join(dir, "course.ipynb"));
    await copyFile(join(FIXTURES, "exercises.ipynb"), join(dir, "exercises.ipynb"));
    out = [];
    err = [];
    io = {
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
      cwd: dir,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("updates a notebook and reports it", async () => {
    const code = await runCli(["course.ipynb"], io);

    expect(code).toBe(0);
    expect(out).toEqual([`updated ${join(dir, "course.ipynb")} (5 headings, contents inserted)\n`]);
    expect(err).toEqual([]);
  });

  it("reports an already outlined notebook as unchanged", async () => {
    await runCli(["course.ipynb"], io);
    out = [];

    expect(await runCli(["course.ipynb"], io)).toBe(0);
    expect(out).toEqual([`unchanged ${join(dir, "course.ipynb")}\n`]);
  });

  it("writes nothing on a dry run", async () => {
    const before = await readFile(join(dir, "course.ipynb"), "utf-8");

    expect(await runCli(["--dry-run", "course.ipynb"], io)).toBe(0);
    expect(out).toEqual([`would update ${join(dir, "course.ipynb")} (5 headings, contents inserted)\n`]);
    expect(await readFile(join(dir, "course.ipynb"), "utf-8")).toBe(before);
  });

  it("numbers markers with --tasks", async () => {
    expect(await runCli(["--tasks", "exercises.ipynb"], io)).toBe(0);
    expect(out).toEqual([
      `updated ${join(dir, "exercises.ipynb")} (0 headings, contents inserted, 1 tasks, 1 questions)\n`,
    ]);
  });

  it("exits 1 when a notebook fails, after processing the rest", async () => {
    const code = await runCli(["missing.ipynb", "course.ipynb"], io);

    expect(code).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`error: io_error\n${join(dir, "missing.ipynb")}: `)).toBe(true);
    expect(out).toEqual([`updated ${join(dir, "course.ipynb")} (5 headings, contents inserted)\n`]);
  });

  it("exits 2 with usage on a bad argument", async () => {
    expect(await runCli(["--bogus", "course.ipynb"], io)).toBe(2);
    expect(err).toEqual([`error: invalid_argument\nUnknown argument: --bogus\n\n${USAGE}`]);
    expect(out).toEqual([]);
  });

  it("prints help and version", async () => {
    expect(await runCli(["--help"], io)).toBe(0);
    expect(await runCli(["-v"], io)).toBe(0);
    expect(out).toEqual([USAGE, "notebook-outline 0.1.0\n"]);
  });
});
