/**
 * BroadcastHub: fans each framed line out to every live subscriber.
 *
 * The subscriber set is only read or mutated synchronously, so a publish call
 * works on a snapshot taken before its first await. A subscriber added while a
 * line is in flight misses that line; one removed mid-flight may still get it.
 *
 * Each subscriber has its own send queue. Lines reach a subscriber in publish
 * order, one send at a time, and a send that never settles only holds up that
 * subscriber's queue. A subscriber whose queue or socket buffer grows past the
 * configured limits is dropped.
 */

import type { Logger } from "../interfaces/logger.js";
import type { LineSink, Subscriber } from "../interfaces/subscriber.js";
import { errorMessage } from "../errors.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface BroadcastHubOptions {
  logger?: Logger;
  /** Lines a subscriber may have waiting behind its in-flight send. */
  maxPendingLines?: number;
  /** Limit on a subscriber's reported `bufferedAmount`. */
  maxBufferedBytes?: number;
}

export const DEFAULT_MAX_PENDING_LINES = 1000;
export const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

interface Delivery {
  line: string;
  settle: () => void;
}

interface SendQueue {
  pending: Delivery[];
  inFlight: Delivery | null;
}

export class BroadcastHub implements LineSink {
  private readonly subscribers = new Map<Subscriber, SendQueue>();
  private readonly logger: Logger;
  private readonly maxPendingLines: number;
  private readonly maxBufferedBytes: number;

  constructor(options: BroadcastHubOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.maxPendingLines = options.maxPendingLines ?? DEFAULT_MAX_PENDING_LINES;
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
  }

  get size(): number {
    return this.subscribers.size;
  }

  has(subscriber: Subscriber): boolean {
    return this.subscribers.has(subscriber);
  }

  subscribe(subscriber: Subscriber): void {
    if (this.subscribers.has(subscriber)) return;
    this.subscribers.set(subscriber, { pending: [], inFlight: null });
  }

  /** Unknown subscribers are ignored. */
  unsubscribe(subscriber: Subscriber): void {
    this.remove(subscriber);
  }

  clear(): void {
    for (const subscriber of [...this.subscribers.keys()]) this.remove(subscriber);
  }

  /**
   * Queue `line` for every subscriber registered when the call began.
   * Resolves once each of them has taken the line or been dropped. Never rejects.
   */
  publish(line: string): Promise<void> {
    const snapshot = [...this.subscribers];
    if (snapshot.length === 0) return Promise.resolve();

    const handoffs = snapshot.map(([subscriber, queue]) => this.enqueue(subscriber, queue, line));
    return Promise.all(handoffs).then(() => undefined);
  }

  private enqueue(subscriber: Subscriber, queue: SendQueue, line: string): Promise<void> {
    const pending = queue.pending.length;
    const buffered = subscriber.bufferedAmount ?? 0;
    if (pending >= this.maxPendingLines || buffered > this.maxBufferedBytes) {
      this.remove(subscriber);
      this.logger.warn("Dropping subscriber that fell behind", { pending, bufferedAmount: buffered });
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      queue.pending.push({ line, settle: resolve });
      if (queue.inFlight === null) this.sendNext(subscriber, queue);
    });
  }

  private sendNext(subscriber: Subscriber, queue: SendQueue): void {
    const delivery = queue.pending.shift();
    if (delivery === undefined) return;
    queue.inFlight = delivery;

    let sent: void | Promise<void>;
    try {
      sent = subscriber.send(delivery.line);
    } catch (err) {
      this.fail(subscriber, queue, err);
      return;
    }

    void Promise.resolve(sent).then(
      () => {
        if (queue.inFlight !== delivery) return;
        queue.inFlight = null;
        delivery.settle();
        this.sendNext(subscriber, queue);
      },
      (err: unknown) => {
        if (queue.inFlight !== delivery) return;
        this.fail(subscriber, queue, err);
      },
    );
  }

  private fail(subscriber: Subscriber, queue: SendQueue, err: unknown): void {
    if (this.subscribers.get(subscriber) === queue) this.remove(subscriber);
    else release(queue);
    this.logger.warn("Dropping subscriber after failed send", { error: errorMessage(err) });
    this.logger.debug?.("Pruned subscriber", { remaining: this.subscribers.size });
  }

  private remove(subscriber: Subscriber): void {
    const queue = this.subscribers.get(subscriber);
    if (queue === undefined) return;
    this.subscribers.delete(subscriber);
    release(queue);
  }
}

/** Settle every line still owed to a queue that will not send again. */
function release(queue: SendQueue): void {
  const owed = queue.inFlight === null ? queue.pending : [queue.inFlight, ...queue.pending];
  queue.inFlight = null;
  queue.pending = [];
  for (const delivery of owed) delivery.settle();
}
