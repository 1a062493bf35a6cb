import { type ChildProcess, spawn } from "node:child_process";
import { once } from "node:events";
import { PassThrough, Readable } from "node:stream";
import type { ReadableStream, ReadableStreamDefaultReader } from "node:stream/web";
import { BinaryNotFoundError, isErrnoException, SpawnError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  ChannelSpawnOptions,
  OutputChannel,
  OutputChannelFactory,
  TerminationSignal,
} from "../interfaces/output-channel.js";
import { ensureWorkingDirectory } from "../utils/ensure-working-directory.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface PipeChannelOptions {
  logger?: Logger;
  platform?: NodeJS.Platform;
}

/**
 * Spawns the program with stdin ignored and stdout/stderr merged into a single
 * web ReadableStream. On POSIX the child is detached so it leads its own
 * process group.
 */
export class PipeChannelFactory implements OutputChannelFactory {
  readonly mode = "pipes" as const;
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;

  constructor(options: PipeChannelOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.platform = options.platform ?? process.platform;
  }

  async open(options: ChannelSpawnOptions): Promise<OutputChannel> {
    // spawn reports a missing cwd as ENOENT, indistinguishable from a missing binary
    await ensureWorkingDirectory(options.cwd);

    const detached = this.platform !== "win32";
    let child: ChildProcess;
    try {
      child = spawn(options.command, options.args, {
        cwd: options.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        detached,
      });
    } catch (err) {
      throw toSpawnFailure(options.command, err);
    }

    try {
      // Rejects with the spawn error (e.g. ENOENT) if "error" fires first
      await once(child, "spawn");
    } catch (err) {
      throw toSpawnFailure(options.command, err);
    }

    const pid = child.pid;
    if (typeof pid !== "number") {
      throw new SpawnError(`Failed to spawn process: ${options.command}`);
    }
    return new PipeChannel(child, pid, detached, this.logger);
  }
}

function toSpawnFailure(command: string, err: unknown): Error {
  if (isErrnoException(err) && err.code === "ENOENT") {
    return new BinaryNotFoundError(command);
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new SpawnError(`Failed to spawn ${command}: ${detail}`, { cause: err });
}

class PipeChannel implements OutputChannel {
  readonly mode = "pipes" as const;
  readonly exited: Promise<number | null>;

  private readonly merged = new PassThrough();
  private readonly stream: ReadableStream;
  private reader: ReadableStreamDefaultReader | null = null;
  private readLoop: Promise<void> | null = null;
  private cancelled = false;
  private closed = false;

  constructor(
    private readonly child: ChildProcess,
    readonly pid: number,
    readonly processGroup: boolean,
    private readonly logger: Logger,
  ) {
    this.exited = new Promise<number | null>((resolve) => {
      child.once("exit", (code, signal) => {
        // null code when killed by signal
        resolve(signal ? null : code);
      });
    });
    child.on("error", (err) => {
      this.logger.warn("Child process error", { pid, error: err });
    });

    this.merged.on("error", (err) => {
      this.logger.debug?.("Merged output stream error", { pid, error: err });
    });
    let open = 0;
    for (const source of [child.stdout, child.stderr]) {
      if (!source) continue;
      open++;
      source.pipe(this.merged, { end: false });
      source.once("close", () => {
        open--;
        if (open === 0 && !this.merged.destroyed) this.merged.end();
      });
    }
    if (open === 0) this.merged.end();

    this.stream = Readable.toWeb(this.merged);
  }

  read(onData: (chunk: Uint8Array) => void): Promise<void> {
    if (this.readLoop) return this.readLoop;
    if (this.cancelled) return Promise.resolve();
    const reader = this.stream.getReader();
    this.reader = reader;
    this.readLoop = (async () => {
      try {
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          if (value instanceof Uint8Array) onData(value);
        }
      } finally {
        reader.releaseLock();
      }
    })();
    return this.readLoop;
  }

  async cancelRead(): Promise<void> {
    this.cancelled = true;
    if (!this.reader || !this.readLoop) return;
    await this.reader.cancel();
    await this.readLoop;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.child.stdout?.destroy();
    this.child.stderr?.destroy();
    this.merged.destroy();
  }

  kill(signal: TerminationSignal): void {
    this.child.kill(signal);
  }
}
