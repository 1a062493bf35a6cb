/**
 * Transport abstraction between the supervisor and the supervised program.
 * Two implementations exist: a pseudo-terminal (node-pty) and merged child pipes.
 * @module
 */

export type TransportMode = "pty" | "pipes";

export type TerminationSignal = "SIGTERM" | "SIGKILL";

export interface ChannelSpawnOptions {
  command: string;
  args: string[];
  cwd: string;
}

/** A running child process together with the descriptors its output arrives on. */
export interface OutputChannel {
  readonly mode: TransportMode;
  readonly pid: number;
  /** True when the child leads its own process group, so `-pid` can be signaled. */
  readonly processGroup: boolean;
  /** Resolves when the process exits. Null exit code means killed by signal. */
  readonly exited: Promise<number | null>;
  /**
   * Start delivering output bytes to `onData`. The returned promise settles once
   * reading has ended, either at end-of-stream or after `cancelRead()`.
   */
  read(onData: (chunk: Uint8Array) => void): Promise<void>;
  /** Stop reading. Resolves only after no further `onData` call can happen. */
  cancelRead(): Promise<void>;
  /** Release the channel's descriptors. Safe to call more than once. */
  close(): void;
  /** Signal the child process itself (not its group). */
  kill(signal: TerminationSignal): void;
}

export interface OutputChannelFactory {
  readonly mode: TransportMode;
  /**
   * Spawn the program attached to a fresh channel.
   * Rejects with BinaryNotFoundError or SpawnError.
   */
  open(options: ChannelSpawnOptions): Promise<OutputChannel>;
}
