/** Something that can receive a published line. Throwing or rejecting marks it dead. */
export interface Subscriber {
  send(line: string): void | Promise<void>;
  /** Bytes queued but not yet written, for transports that report it. */
  readonly bufferedAmount?: number;
}

/**
 * Where framed lines go. Implemented by BroadcastHub.
 * Called once per line in output order, without waiting on earlier calls.
 */
export interface LineSink {
  publish(line: string): Promise<void>;
}
