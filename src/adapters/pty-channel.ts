import { BinaryNotFoundError, BridgeError, SpawnError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  ChannelSpawnOptions,
  OutputChannel,
  OutputChannelFactory,
  TerminationSignal,
} from "../interfaces/output-channel.js";
import { ensureWorkingDirectory } from "../utils/ensure-working-directory.js";
import { noopLogger } from "../utils/noop-logger.js";
import { type ResolveBinaryOptions, resolveBinary } from "../utils/resolve-binary.js";

interface Disposable {
  dispose: () => void;
}

/** The subset of node-pty's IPty used here. With `encoding: null` data arrives as Buffers. */
export interface PtyProcess {
  readonly pid: number;
  onData: (callback: (data: string | Uint8Array) => void) => Disposable;
  onExit: (callback: (e: { exitCode: number; signal?: number }) => void) => Disposable;
  kill: (signal?: string) => void;
  destroy?: () => void;
}

export interface PtySpawnOptions {
  name: string;
  cols: number;
  rows: number;
  cwd: string;
  encoding: null;
}

export interface NodePtyModule {
  spawn: (file: string, args: string[], options: PtySpawnOptions) => PtyProcess;
}

async function loadNodePty(): Promise<NodePtyModule> {
  // Dynamic import: node-pty is an optional dependency with a native build
  return await (Function('return import("node-pty")')() as Promise<NodePtyModule>);
}

export interface PtyChannelOptions {
  cols?: number;
  rows?: number;
  logger?: Logger;
  platform?: NodeJS.Platform;
  /** Override module loading (tests, alternative builds). */
  loadPty?: () => Promise<NodePtyModule>;
  /** Override PATH lookup. */
  resolveBinary?: (command: string, options: ResolveBinaryOptions) => Promise<string | null>;
}

/**
 * Spawns the program on a pseudo-terminal. node-pty forks successfully even when
 * the program does not exist, so the binary is located on PATH first.
 */
export class PtyChannelFactory implements OutputChannelFactory {
  readonly mode = "pty" as const;
  private readonly cols: number;
  private readonly rows: number;
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;
  private readonly loadPty: () => Promise<NodePtyModule>;
  private readonly resolve: (command: string, options: ResolveBinaryOptions) => Promise<string | null>;
  private nodePty: NodePtyModule | null = null;

  constructor(options: PtyChannelOptions = {}) {
    this.cols = options.cols ?? 120;
    this.rows = options.rows ?? 40;
    this.logger = options.logger ?? noopLogger;
    this.platform = options.platform ?? process.platform;
    this.loadPty = options.loadPty ?? loadNodePty;
    this.resolve = options.resolveBinary ?? resolveBinary;
  }

  private async module(): Promise<NodePtyModule> {
    if (this.nodePty) return this.nodePty;
    try {
      this.nodePty = await this.loadPty();
      return this.nodePty;
    } catch (err) {
      throw new SpawnError("node-pty is not available", { cause: err });
    }
  }

  async open(options: ChannelSpawnOptions): Promise<OutputChannel> {
    await ensureWorkingDirectory(options.cwd);
    const file = await this.resolve(options.command, {
      cwd: options.cwd,
      platform: this.platform,
    });
    if (!file) throw new BinaryNotFoundError(options.command);

    const pty = await this.module();
    let proc: PtyProcess;
    try {
      proc = pty.spawn(file, options.args, {
        name: "xterm-256color",
        cols: this.cols,
        rows: this.rows,
        cwd: options.cwd,
        encoding: null,
      });
    } catch (err) {
      if (err instanceof BridgeError) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new SpawnError(`Failed to spawn ${options.command} on a pty: ${detail}`, {
        cause: err,
      });
    }

    this.logger.debug?.("Pty spawned", { pid: proc.pid, file });
    // node-pty runs the child under setsid() on POSIX
    return new PtyChannel(proc, this.platform !== "win32");
  }
}

class PtyChannel implements OutputChannel {
  readonly mode = "pty" as const;
  readonly exited: Promise<number | null>;
  readonly pid: number;

  private dataSubscription: Disposable | null = null;
  private finishRead: (() => void) | null = null;
  private readDone: Promise<void> | null = null;
  private reading = true;
  private closed = false;

  constructor(
    private readonly proc: PtyProcess,
    readonly processGroup: boolean,
  ) {
    this.pid = proc.pid;
    let resolveExit: (code: number | null) => void = () => {};
    this.exited = new Promise((resolve) => {
      resolveExit = resolve;
    });
    proc.onExit(({ exitCode, signal }) => {
      resolveExit(signal ? null : exitCode);
      // The pty reports exit after its output has been flushed
      this.stopReading();
    });
  }

  read(onData: (chunk: Uint8Array) => void): Promise<void> {
    if (this.readDone) return this.readDone;
    if (!this.reading) return Promise.resolve();
    this.readDone = new Promise<void>((resolve) => {
      this.finishRead = resolve;
    });
    this.dataSubscription = this.proc.onData((data) => {
      onData(typeof data === "string" ? Buffer.from(data, "utf-8") : data);
    });
    return this.readDone;
  }

  async cancelRead(): Promise<void> {
    this.stopReading();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stopReading();
    this.proc.destroy?.();
  }

  kill(signal: TerminationSignal): void {
    this.proc.kill(signal);
  }

  private stopReading(): void {
    this.reading = false;
    this.dataSubscription?.dispose();
    this.dataSubscription = null;
    this.finishRead?.();
    this.finishRead = null;
  }
}
