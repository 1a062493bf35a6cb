import { realpathSync } from "node:fs";
import { tmpdir } from "node:os";
import { afterEach, describe, expect, it } from "vitest";
import { WebSocket } from "ws";
import type { BridgeConfig } from "../types/config.js";
import { BridgeDaemon } from "./bridge-daemon.js";

// Real child processes over the pipe transport.
const posixDescribe = process.platform === "win32" ? describe.skip : describe;

const TICKER = "let i = 0; setInterval(() => console.log('line ' + i++), 20)";
const STUBBORN =
  "process.on('SIGTERM', () => {}); console.log('ready'); setInterval(() => {}, 1000)";
const ONE_SHOT = "console.log('hello'); console.error('oops'); process.exit(0)";

interface StatusBody {
  running: boolean;
  pid: number | null;
  mode: string | null;
  subscriber_count: number;
}

function isStatusBody(value: unknown): value is StatusBody {
  return typeof value === "object" && value !== null && "running" in value && "pid" in value;
}

posixDescribe("BridgeDaemon with real processes", () => {
  let daemon: BridgeDaemon | null = null;
  let url = "";
  const sockets: WebSocket[] = [];

  async function boot(script: string, overrides: BridgeConfig = {}): Promise<void> {
    daemon = new BridgeDaemon({
      config: {
        port: 0,
        resourceRoot: realpathSync(tmpdir()),
        command: process.execPath,
        args: ["-e", script],
        preferPty: false,
        gracefulStopTimeoutMs: 300,
        killTimeoutMs: 300,
        forceKillTimeoutMs: 1000,
        ...overrides,
      },
      version: "0.0.0-test",
    });
    url = (await daemon.start()).url;
  }

  async function subscribe(): Promise<string[]> {
    const ws = new WebSocket(`${url.replace("http", "ws")}/ws`);
    sockets.push(ws);
    const lines: string[] = [];
    ws.on("message", (data) => lines.push(data.toString()));
    await new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", reject);
    });
    return lines;
  }

  async function post(action: string): Promise<unknown> {
    return (await fetch(`${url}/api/${action}`, { method: "POST" })).json();
  }

  async function status(): Promise<StatusBody> {
    const body: unknown = await (await fetch(`${url}/api/status`)).json();
    if (!isStatusBody(body)) throw new Error("unexpected status body");
    return body;
  }

  async function waitFor(predicate: () => boolean, timeoutMs = 5000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!predicate() && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    if (!predicate()) throw new Error("condition not met");
  }

  afterEach(async () => {
    for (const ws of sockets.splice(0)) ws.close();
    await daemon?.stop();
    daemon = null;
  });

  it("streams output and restarts with a fresh pid", async () => {
    await boot(TICKER);
    const lines = await subscribe();

    const first = await post("start");
    expect(first).toMatchObject({ ok: true, status: "started", mode: "pipes" });
    await waitFor(() => lines.length >= 2);
    expect(lines[0]).toBe("line 0");
    const firstPid = (await status()).pid;

    expect(await post("stop")).toEqual({ ok: true, status: "stopped" });
    expect(await status()).toMatchObject({ running: false, pid: null });

    await post("start");
    const secondPid = (await status()).pid;
    expect(secondPid).not.toBeNull();
    expect(secondPid).not.toBe(firstPid);
  });

  it("force-kills a child that ignores SIGTERM", async () => {
    await boot(STUBBORN);
    const lines = await subscribe();
    await post("start");
    await waitFor(() => lines.includes("ready"));
    const pid = (await status()).pid;
    if (pid === null) throw new Error("no pid");

    const startedAt = Date.now();
    const result = await post("stop");
    const elapsed = Date.now() - startedAt;

    expect(result).toEqual({ ok: true, status: "stopped" });
    expect(elapsed).toBeGreaterThanOrEqual(250);
    expect(elapsed).toBeLessThan(3000);
    expect(() => process.kill(pid, 0)).toThrow();
    expect(await status()).toMatchObject({ running: false });
  });

  it("kill terminates without waiting for the grace window", async () => {
    await boot(STUBBORN, { gracefulStopTimeoutMs: 5000 });
    const lines = await subscribe();
    await post("start");
    await waitFor(() => lines.includes("ready"));

    const startedAt = Date.now();
    expect(await post("kill")).toEqual({ ok: true, status: "killed" });

    expect(Date.now() - startedAt).toBeLessThan(2000);
  });

  it("delivers stdout and stderr, then goes idle when the child exits", async () => {
    await boot(ONE_SHOT);
    const lines = await subscribe();

    await post("start");
    await waitFor(() => lines.length === 2);
    await waitFor(() => daemon?.supervisor.status().state === "idle");

    expect([...lines].sort()).toEqual(["hello", "oops"]);
    expect(await status()).toMatchObject({ running: false, pid: null });
    expect(daemon?.supervisor.status().exitCode).toBe(0);
  });

  it("reports a missing program by name", async () => {
    daemon = new BridgeDaemon({
      config: { port: 0, command: "termbridge-missing-binary", args: [], preferPty: false },
      version: "0.0.0-test",
    });
    url = (await daemon.start()).url;

    expect(await post("start")).toEqual({
      ok: false,
      status: "termbridge-missing-binary not found on PATH",
    });
  });
});
