import type { Subscriber } from "./subscriber.js";

/** A connected streaming client. Usable directly as a hub subscriber. */
export interface SubscriberSocket extends Subscriber {
  /** Resolves once the frame is flushed; rejects if the socket is not open or the write fails. */
  send(line: string): Promise<void>;
  close(code?: number, reason?: string): void;
  readonly bufferedAmount: number;
  /** Called once, on close or on the first socket error. */
  onDisconnect(handler: () => void): void;
}

/** Callback invoked when a streaming client connects. */
export type OnSubscriberConnection = (socket: SubscriberSocket) => void;

/** Runtime-agnostic WebSocket server abstraction. */
export interface WebSocketServerLike {
  /** Start accepting connections, handing each to `onConnection`. */
  listen(onConnection: OnSubscriberConnection): Promise<void>;
  /** Stop the server and close all connections. */
  close(): Promise<void>;
}
