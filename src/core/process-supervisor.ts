import { BridgeError, errorMessage, SpawnError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  OutputChannel,
  OutputChannelFactory,
  TerminationSignal,
  TransportMode,
} from "../interfaces/output-channel.js";
import type { LineSink } from "../interfaces/subscriber.js";
import { noopLogger } from "../utils/noop-logger.js";
import { settlesWithin } from "../utils/settles-within.js";
import { LineFramer } from "./line-framer.js";

export type SupervisorState = "idle" | "starting" | "running" | "stopping" | "killing";

/** Named teardown steps. A failing step is logged and recorded, never thrown. */
export type TeardownStep = "cancel-read" | "close-channel" | "signal" | "force-kill";

export interface TeardownFailure {
  step: TeardownStep;
  error: string;
}

export interface StartResult {
  ok: true;
  status: "started" | "already running";
  pid: number;
  mode: TransportMode;
}

export interface StopResult {
  ok: true;
  status: "stopped" | "killed" | "not running";
}

export interface SupervisorStatus {
  state: SupervisorState;
  running: boolean;
  pid: number | null;
  mode: TransportMode | null;
  /** Exit code of the last process that exited; null while unset or when killed by a signal. */
  exitCode: number | null;
}

export interface ProcessSupervisorOptions {
  /** Transports to try, most preferred first (normally pty, then pipes). */
  channels: OutputChannelFactory[];
  /** Receives every framed line. */
  sink: LineSink;
  command: string;
  args: string[];
  /** Working directory of the child (the bridge's resource root). */
  cwd: string;
  logger?: Logger;
  /** Wait after SIGTERM before escalating (stop). */
  gracefulStopTimeoutMs?: number;
  /** Wait after the first SIGKILL before escalating again (kill). */
  killTimeoutMs?: number;
  /** Wait after the escalated SIGKILL before giving up on the child. */
  forceKillTimeoutMs?: number;
  /** How long output may keep draining after the child exits on its own. */
  exitDrainTimeoutMs?: number;
  /** See LineFramerOptions.maxBufferBytes. */
  maxLineBufferBytes?: number;
  /** Signals a whole process group. Defaults to `process.kill(-pid, signal)`. */
  signalGroup?: (pid: number, signal: TerminationSignal) => void;
  platform?: NodeJS.Platform;
}

interface ActiveProcess {
  readonly channel: OutputChannel;
  readonly framer: LineFramer;
  readonly startedAt: number;
  reading: Promise<void>;
  exitWatch: Promise<void>;
  exited: boolean;
}

function signalProcessGroup(pid: number, signal: TerminationSignal): void {
  process.kill(-pid, signal);
}

/**
 * Owns the single supervised process.
 *
 * States: idle → starting → running → stopping/killing → idle. At most one child
 * exists at a time; `start()` while running is a no-op, concurrent starts share
 * one spawn, and a start issued during teardown waits for the teardown to finish.
 *
 * Termination is best-effort and always completes: stop reading, close the
 * channel, signal the group (falling back to the child), wait, escalate to
 * SIGKILL, wait again. Handles are released even if the child never exits.
 */
export class ProcessSupervisor {
  private readonly channels: OutputChannelFactory[];
  private readonly sink: LineSink;
  private readonly command: string;
  private readonly args: string[];
  private readonly cwd: string;
  private readonly logger: Logger;
  private readonly gracefulStopTimeoutMs: number;
  private readonly killTimeoutMs: number;
  private readonly forceKillTimeoutMs: number;
  private readonly exitDrainTimeoutMs: number;
  private readonly maxLineBufferBytes: number;
  private readonly signalGroup: (pid: number, signal: TerminationSignal) => void;
  private readonly platform: NodeJS.Platform;

  private state: SupervisorState = "idle";
  private active: ActiveProcess | null = null;
  private pendingStart: Promise<StartResult> | null = null;
  private teardown: Promise<void> | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private lastExitCode: number | null = null;
  private failures: TeardownFailure[] = [];

  constructor(options: ProcessSupervisorOptions) {
    this.channels = options.channels;
    this.sink = options.sink;
    this.command = options.command;
    this.args = [...options.args];
    this.cwd = options.cwd;
    this.logger = options.logger ?? noopLogger;
    this.gracefulStopTimeoutMs = options.gracefulStopTimeoutMs ?? 2000;
    this.killTimeoutMs = options.killTimeoutMs ?? 500;
    this.forceKillTimeoutMs = options.forceKillTimeoutMs ?? 1000;
    this.exitDrainTimeoutMs = options.exitDrainTimeoutMs ?? 250;
    this.maxLineBufferBytes = options.maxLineBufferBytes ?? 0;
    this.signalGroup = options.signalGroup ?? signalProcessGroup;
    this.platform = options.platform ?? process.platform;
  }

  /** Side-effect-free snapshot. */
  status(): SupervisorStatus {
    const active = this.active;
    return {
      state: this.state,
      running: active !== null && this.state === "running" && !active.exited,
      pid: active ? active.channel.pid : null,
      mode: active ? active.channel.mode : null,
      exitCode: this.lastExitCode,
    };
  }

  /** Failures recorded by the most recent teardown. */
  get lastTeardownFailures(): readonly TeardownFailure[] {
    return this.failures;
  }

  /** Resolves once every line framed so far has settled at the sink. */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  /**
   * Spawn the program unless it is already running.
   * Rejects with BinaryNotFoundError or SpawnError; the supervisor stays idle.
   */
  async start(): Promise<StartResult> {
    if (this.pendingStart) return this.pendingStart;
    const pending = this.spawn();
    this.pendingStart = pending;
    try {
      return await pending;
    } finally {
      this.pendingStart = null;
    }
  }

  /** SIGTERM, wait, then SIGKILL. */
  stop(): Promise<StopResult> {
    return this.terminate(true);
  }

  /** SIGKILL straight away with a shorter first wait. */
  kill(): Promise<StopResult> {
    return this.terminate(false);
  }

  /** Stop the child. Lines already handed to the sink are left to it. */
  async dispose(): Promise<void> {
    await this.stop();
  }

  // ---------------------------------------------------------------------------
  // Spawn
  // ---------------------------------------------------------------------------

  private async spawn(): Promise<StartResult> {
    if (this.teardown) await this.teardown;

    const current = this.active;
    if (current && this.state === "running" && !current.exited) {
      return {
        ok: true,
        status: "already running",
        pid: current.channel.pid,
        mode: current.channel.mode,
      };
    }

    this.state = "starting";
    let channel: OutputChannel;
    try {
      channel = await this.openChannel();
    } catch (err) {
      this.state = "idle";
      throw err;
    }

    const active: ActiveProcess = {
      channel,
      framer: new LineFramer({ maxBufferBytes: this.maxLineBufferBytes }),
      startedAt: Date.now(),
      reading: Promise.resolve(),
      exitWatch: Promise.resolve(),
      exited: false,
    };
    this.active = active;
    this.state = "running";
    this.lastExitCode = null;

    active.reading = channel
      .read((chunk) => this.onData(active, chunk))
      .catch((err: unknown) => {
        this.logger.warn("Output reader failed", { pid: channel.pid, error: errorMessage(err) });
      });
    active.exitWatch = channel.exited.then((code) => this.onExit(active, code));

    this.logger.info("Supervised process started", { pid: channel.pid, mode: channel.mode });
    return { ok: true, status: "started", pid: channel.pid, mode: channel.mode };
  }

  private async openChannel(): Promise<OutputChannel> {
    this.logger.info("Spawning supervised process", {
      command: this.command,
      args: this.args.join(" "),
      cwd: this.cwd,
    });

    let lastError: unknown = new SpawnError("No output transports configured");
    for (const factory of this.channels) {
      try {
        return await factory.open({ command: this.command, args: [...this.args], cwd: this.cwd });
      } catch (err) {
        lastError = err;
        this.logger.warn("Transport failed to start", {
          mode: factory.mode,
          error: errorMessage(err),
        });
      }
    }
    if (lastError instanceof BridgeError) throw lastError;
    throw new SpawnError(errorMessage(lastError), { cause: lastError });
  }

  // ---------------------------------------------------------------------------
  // Output + exit
  // ---------------------------------------------------------------------------

  private onData(active: ActiveProcess, chunk: Uint8Array): void {
    if (this.active !== active) return;
    for (const line of active.framer.push(chunk)) {
      this.deliver(line);
    }
  }

  /** Handed over in order; the sink keeps per-subscriber order. */
  private deliver(line: string): void {
    const pending = this.sink.publish(line).catch((err: unknown) => {
      this.logger.warn("Line delivery failed", { error: errorMessage(err) });
    });
    this.inFlight.add(pending);
    void pending.finally(() => this.inFlight.delete(pending));
  }

  private async onExit(active: ActiveProcess, exitCode: number | null): Promise<void> {
    active.exited = true;
    this.lastExitCode = exitCode;

    // stop()/kill() already own this process
    if (this.active !== active || this.state !== "running") return;

    this.logger.info("Supervised process exited", {
      pid: active.channel.pid,
      exitCode,
      uptimeMs: Date.now() - active.startedAt,
    });
    this.state = "stopping";
    await this.runTeardown(async () => {
      if (this.exitDrainTimeoutMs > 0) {
        await settlesWithin(active.reading, this.exitDrainTimeoutMs);
      }
      await this.releaseChannel(active);
    });
  }

  // ---------------------------------------------------------------------------
  // Termination
  // ---------------------------------------------------------------------------

  private async terminate(graceful: boolean): Promise<StopResult> {
    if (this.pendingStart) {
      // A failed start is reported to its own caller
      await this.pendingStart.then(
        () => undefined,
        () => undefined,
      );
    }

    const active = this.active;
    if (!active || this.state !== "running" || active.exited) {
      return { ok: true, status: "not running" };
    }

    this.state = graceful ? "stopping" : "killing";
    await this.runTeardown(() => this.shutdown(active, graceful));
    return { ok: true, status: graceful ? "stopped" : "killed" };
  }

  private async shutdown(active: ActiveProcess, graceful: boolean): Promise<void> {
    const { channel } = active;
    const pid = channel.pid;
    this.logger.info(graceful ? "Stopping supervised process" : "Killing supervised process", {
      pid,
      mode: channel.mode,
    });

    await this.releaseChannel(active);

    await this.attempt("signal", () => this.terminateProcess(channel, graceful));
    const firstWindow = graceful ? this.gracefulStopTimeoutMs : this.killTimeoutMs;
    if (await this.exitedWithin(active, firstWindow)) return;

    this.logger.warn("Process did not exit in time, force-killing", { pid, waitedMs: firstWindow });
    await this.attempt("force-kill", () => this.terminateProcess(channel, false));
    if (!(await this.exitedWithin(active, this.forceKillTimeoutMs))) {
      this.logger.warn("Process still alive after SIGKILL, releasing it", { pid });
    }
  }

  /** Stop reading before closing so no read races a closed descriptor. */
  private async releaseChannel(active: ActiveProcess): Promise<void> {
    await this.attempt("cancel-read", () => active.channel.cancelRead());
    await this.attempt("close-channel", () => active.channel.close());
    active.framer.reset();
    if (this.active === active) this.active = null;
  }

  /**
   * Graceful or forced termination of the child. On POSIX, when the child leads
   * its own group, the whole group is signaled so grandchildren go too.
   */
  private terminateProcess(channel: OutputChannel, graceful: boolean): void {
    const signal: TerminationSignal = graceful ? "SIGTERM" : "SIGKILL";
    if (this.platform !== "win32" && channel.processGroup) {
      try {
        this.signalGroup(channel.pid, signal);
        return;
      } catch (err) {
        this.logger.debug?.("Group signal failed, signaling the process", {
          pid: channel.pid,
          signal,
          error: errorMessage(err),
        });
      }
    }
    channel.kill(signal);
  }

  private async exitedWithin(active: ActiveProcess, ms: number): Promise<boolean> {
    if (active.exited) return true;
    return settlesWithin(active.channel.exited, ms);
  }

  private async attempt(step: TeardownStep, fn: () => void | Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      const failure = { step, error: errorMessage(err) };
      this.failures.push(failure);
      this.logger.warn("Teardown step failed", failure);
    }
  }

  private async runTeardown(fn: () => Promise<void>): Promise<void> {
    this.failures = [];
    const teardown = fn().finally(() => {
      this.state = "idle";
      if (this.teardown === teardown) this.teardown = null;
    });
    this.teardown = teardown;
    await teardown;
  }
}
