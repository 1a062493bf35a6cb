import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { resolvePackageVersion } from "./resolve-package-version.js";

describe("resolvePackageVersion", () => {
  let root: string;
  let moduleUrl: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "termbridge-version-"));
    await mkdir(join(root, "dist", "bin"), { recursive: true });
    moduleUrl = pathToFileURL(join(root, "dist", "bin", "cli.js")).href;
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("returns the version from the first candidate that resolves", async () => {
    await writeFile(join(root, "package.json"), JSON.stringify({ version: "1.2.3" }));

    expect(resolvePackageVersion(moduleUrl, ["../../package.json"])).toBe("1.2.3");
  });

  it("falls through missing candidates", async () => {
    await writeFile(join(root, "package.json"), JSON.stringify({ version: "2.0.0" }));

    expect(resolvePackageVersion(moduleUrl, ["../package.json", "../../package.json"])).toBe(
      "2.0.0",
    );
  });

  it("skips candidates without a usable version", async () => {
    await writeFile(join(root, "dist", "package.json"), JSON.stringify({ version: "" }));
    await writeFile(join(root, "package.json"), JSON.stringify({ version: "3.1.0" }));

    expect(resolvePackageVersion(moduleUrl, ["../package.json", "../../package.json"])).toBe(
      "3.1.0",
    );
  });

  it('returns "unknown" when nothing resolves', () => {
    expect(resolvePackageVersion(moduleUrl, ["../../package.json"])).toBe("unknown");
  });
});
