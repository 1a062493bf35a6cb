import { join, resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { contentTypeFor, resolveInside } from "./static-files.js";

const root = resolve("/srv/bridge/assets");

describe("resolveInside", () => {
  it("resolves plain relative paths", () => {
    expect(resolveInside(root, "img/field.png")).toBe(join(root, "img", "field.png"));
  });

  it("decodes percent-encoded names", () => {
    expect(resolveInside(root, "robot%20image.png")).toBe(join(root, "robot image.png"));
  });

  it("keeps leading slashes inside the root", () => {
    expect(resolveInside(root, "/etc/passwd")).toBe(join(root, "etc", "passwd"));
  });

  it.each([
    ["../secret.txt"],
    ["..%2Fsecret.txt"],
    ["img/../../secret.txt"],
    [".."],
    [""],
    ["%00"],
    ["%E0%A4%A"],
  ])("rejects %j", (relative) => {
    expect(resolveInside(root, relative)).toBeNull();
  });
});

describe("contentTypeFor", () => {
  it("maps known extensions case-insensitively", () => {
    expect(contentTypeFor("Viewer.HTML")).toBe("text/html; charset=utf-8");
    expect(contentTypeFor("robot_image.png")).toBe("image/png");
  });

  it("falls back to octet-stream", () => {
    expect(contentTypeFor("field.bin")).toBe("application/octet-stream");
  });
});
