import type {
  ChannelSpawnOptions,
  OutputChannel,
  OutputChannelFactory,
  TerminationSignal,
  TransportMode,
} from "../interfaces/output-channel.js";

/**
 * In-memory OutputChannel for exercising the supervisor without real processes.
 *
 * - `emit()` feeds output bytes to the active reader
 * - `exit()` simulates the process exiting on its own
 * - Signals are recorded; by default any signal makes the process exit, which
 *   `ignore` can turn off per signal to model a stubborn child
 */
export class FakeOutputChannel implements OutputChannel {
  readonly exited: Promise<number | null>;
  readonly signals: TerminationSignal[] = [];
  readonly ignore = new Set<TerminationSignal>();
  closeCount = 0;
  cancelCount = 0;
  hasExited = false;

  private onData: ((chunk: Uint8Array) => void) | null = null;
  private resolveExit: (code: number | null) => void = () => {};
  private finishRead: () => void = () => {};

  constructor(
    readonly pid: number,
    readonly mode: TransportMode = "pipes",
    readonly processGroup = false,
  ) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  get reading(): boolean {
    return this.onData !== null;
  }

  read(onData: (chunk: Uint8Array) => void): Promise<void> {
    this.onData = onData;
    return new Promise((resolve) => {
      this.finishRead = resolve;
    });
  }

  async cancelRead(): Promise<void> {
    this.cancelCount++;
    this.endRead();
  }

  close(): void {
    this.closeCount++;
  }

  kill(signal: TerminationSignal): void {
    this.signals.push(signal);
    if (!this.ignore.has(signal)) this.exit(null);
  }

  /** Feed text (UTF-8) or raw bytes to the reader. Ignored once reading stopped. */
  emit(data: string | Uint8Array): void {
    this.onData?.(typeof data === "string" ? Buffer.from(data, "utf-8") : data);
  }

  /** End-of-stream, as when the write side of a pipe closes. */
  endRead(): void {
    this.onData = null;
    this.finishRead();
  }

  exit(code: number | null): void {
    if (this.hasExited) return;
    this.hasExited = true;
    this.resolveExit(code);
  }
}

/** Factory handing out FakeOutputChannels with increasing pids, or failing on demand. */
export class FakeChannelFactory implements OutputChannelFactory {
  readonly opened: FakeOutputChannel[] = [];
  readonly spawnCalls: ChannelSpawnOptions[] = [];
  private readonly processGroup: boolean;
  private failure: Error | null = null;
  private nextPid: number;

  constructor(
    readonly mode: TransportMode = "pipes",
    options: { firstPid?: number; processGroup?: boolean } = {},
  ) {
    this.nextPid = options.firstPid ?? 20000;
    this.processGroup = options.processGroup ?? false;
  }

  /** Make every open() reject with `error` until cleared with `failWith(null)`. */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  /** Most recently opened channel; throws if none was opened yet. */
  latest(): FakeOutputChannel {
    const channel = this.opened[this.opened.length - 1];
    if (!channel) throw new Error("No channel opened yet");
    return channel;
  }

  async open(options: ChannelSpawnOptions): Promise<OutputChannel> {
    this.spawnCalls.push(options);
    if (this.failure) throw this.failure;
    const channel = new FakeOutputChannel(this.nextPid++, this.mode, this.processGroup);
    this.opened.push(channel);
    return channel;
  }
}
