import { realpathSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { BinaryNotFoundError, SpawnError } from "../errors.js";
import type { OutputChannel } from "../interfaces/output-channel.js";
import { PipeChannelFactory } from "./pipe-channel.js";

const cwd = realpathSync(tmpdir());
const posix = process.platform === "win32" ? it.skip : it;

function script(source: string) {
  return { command: process.execPath, args: ["-e", source], cwd };
}

async function readAll(channel: OutputChannel): Promise<string> {
  const chunks: Uint8Array[] = [];
  await channel.read((chunk) => chunks.push(chunk));
  return Buffer.concat(chunks).toString("utf-8");
}

describe("PipeChannelFactory", () => {
  const factory = new PipeChannelFactory();
  const open: OutputChannel[] = [];

  afterEach(() => {
    for (const channel of open.splice(0)) {
      channel.kill("SIGKILL");
      channel.close();
    }
  });

  async function spawnScript(source: string): Promise<OutputChannel> {
    const channel = await factory.open(script(source));
    open.push(channel);
    return channel;
  }

  it("reports the pipes mode and a numeric pid", async () => {
    const channel = await spawnScript("process.exit(0)");

    expect(channel.mode).toBe("pipes");
    expect(typeof channel.pid).toBe("number");
    await channel.exited;
  });

  it("merges stdout and stderr into one stream", async () => {
    const channel = await spawnScript(
      "process.stdout.write('out\\n'); process.stderr.write('err\\n')",
    );

    const text = await readAll(channel);

    expect(text.split("\n").filter(Boolean).sort()).toEqual(["err", "out"]);
  });

  it("resolves exited with the exit code", async () => {
    const channel = await spawnScript("process.exit(3)");

    await expect(channel.exited).resolves.toBe(3);
  });

  it("resolves exited with null when killed by a signal", async () => {
    const channel = await spawnScript("setInterval(() => {}, 1000)");

    channel.kill("SIGKILL");

    await expect(channel.exited).resolves.toBeNull();
  });

  it("runs the child in the requested directory", async () => {
    const channel = await spawnScript("console.log(process.cwd())");

    const text = await readAll(channel);

    expect(realpathSync(text.trim())).toBe(cwd);
  });

  it("rejects with BinaryNotFoundError when the program does not exist", async () => {
    const error = await factory
      .open({ command: "termbridge-missing-binary", args: [], cwd })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BinaryNotFoundError);
    expect(error).toMatchObject({
      binary: "termbridge-missing-binary",
      message: "termbridge-missing-binary not found on PATH",
    });
  });

  it("reports a missing working directory as a SpawnError naming it", async () => {
    const missing = join(cwd, "termbridge-missing-dir");

    const error = await factory
      .open({ command: process.execPath, args: ["-e", ""], cwd: missing })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SpawnError);
    expect(error).not.toBeInstanceOf(BinaryNotFoundError);
    expect(error).toMatchObject({ message: `Working directory not found: ${missing}` });
  });

  it("rejects a working directory that is a file", async () => {
    const error = await factory
      .open({ command: process.execPath, args: ["-e", ""], cwd: process.execPath })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({
      name: "SpawnError",
      message: `Working directory is not a directory: ${process.execPath}`,
    });
  });

  it("cancelRead ends an active read loop", async () => {
    const channel = await spawnScript("setInterval(() => console.log('tick'), 10)");
    let firstChunk: () => void = () => {};
    const gotChunk = new Promise<void>((resolve) => {
      firstChunk = resolve;
    });
    let chunks = 0;

    const reading = channel.read(() => {
      chunks++;
      firstChunk();
    });
    await gotChunk;
    await channel.cancelRead();
    const seen = chunks;

    await expect(reading).resolves.toBeUndefined();
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(chunks).toBe(seen);
  });

  it("cancelRead before read makes read a no-op", async () => {
    const channel = await spawnScript("console.log('ignored')");

    await channel.cancelRead();
    let called = false;
    await channel.read(() => {
      called = true;
    });

    expect(called).toBe(false);
  });

  it("close is idempotent", async () => {
    const channel = await spawnScript("setInterval(() => {}, 1000)");

    channel.close();
    channel.close();
    channel.kill("SIGKILL");

    await expect(channel.exited).resolves.toBeNull();
  });

  posix("detaches the child into its own process group", async () => {
    const channel = await spawnScript("setInterval(() => {}, 1000)");

    expect(channel.processGroup).toBe(true);
    process.kill(-channel.pid, "SIGTERM");

    await expect(channel.exited).resolves.toBeNull();
  });

  it("does not detach on Windows", async () => {
    const windows = new PipeChannelFactory({ platform: "win32" });
    const channel = await windows.open(script("process.exit(0)"));
    open.push(channel);

    expect(channel.processGroup).toBe(false);
    await channel.exited;
  });
});
