import { chmod, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveBinary } from "./resolve-binary.js";

const posix = process.platform === "win32" ? it.skip : it;

describe("resolveBinary", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "termbridge-bin-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function script(name: string, mode = 0o755): Promise<string> {
    const file = join(dir, name);
    await writeFile(file, "#!/bin/sh\necho hi\n");
    await chmod(file, mode);
    return file;
  }

  posix("finds an executable on the search path", async () => {
    const file = await script("pros");

    await expect(resolveBinary("pros", { path: `/nonexistent:${dir}` })).resolves.toBe(file);
  });

  posix("skips files without the execute bit", async () => {
    await script("pros", 0o644);

    await expect(resolveBinary("pros", { path: dir })).resolves.toBeNull();
  });

  posix("skips directories with the command's name", async () => {
    await mkdir(join(dir, "pros"));

    await expect(resolveBinary("pros", { path: dir })).resolves.toBeNull();
  });

  it("returns null when nothing matches", async () => {
    await expect(resolveBinary("definitely-not-a-real-binary", { path: dir })).resolves.toBeNull();
  });

  posix("resolves commands with a path separator against cwd", async () => {
    const file = await script("tool");

    await expect(resolveBinary("./tool", { cwd: dir, path: "" })).resolves.toBe(file);
  });

  it("accepts an absolute path to the running node binary", async () => {
    await expect(resolveBinary(process.execPath)).resolves.toBe(process.execPath);
  });

  it("tries PATHEXT extensions on Windows", async () => {
    const file = join(dir, "pros.CMD");
    await writeFile(file, "@echo off\n");

    await expect(
      resolveBinary("pros", { path: dir, platform: "win32", pathExt: ".EXE;.CMD" }),
    ).resolves.toBe(file);
  });
});
