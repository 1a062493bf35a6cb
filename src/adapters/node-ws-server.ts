import type { IncomingMessage, Server } from "node:http";
import { WebSocket, WebSocketServer as WSServer } from "ws";
import type { Logger } from "../interfaces/logger.js";
import type {
  OnSubscriberConnection,
  SubscriberSocket,
  WebSocketServerLike,
} from "../interfaces/ws-server.js";
import { noopLogger } from "../utils/noop-logger.js";
import { settlesWithin } from "../utils/settles-within.js";

/** Adapts a `ws` socket into a subscriber whose sends settle with the write. */
export function wrapSocket(ws: WebSocket, logger: Logger = noopLogger): SubscriberSocket {
  const disconnectHandlers: (() => void)[] = [];
  let disconnected = false;
  const disconnect = () => {
    if (disconnected) return;
    disconnected = true;
    for (const handler of disconnectHandlers.splice(0)) handler();
  };
  ws.on("close", disconnect);
  ws.on("error", (err) => {
    logger.debug?.("WebSocket error", { error: err });
    disconnect();
  });

  return {
    send: (line: string) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error("WebSocket is not open"));
          return;
        }
        ws.send(line, (err) => (err ? reject(err) : resolve()));
      }),
    close: (code?: number, reason?: string) => ws.close(code, reason),
    get bufferedAmount() {
      return ws.bufferedAmount;
    },
    onDisconnect: (handler: () => void) => {
      if (disconnected) {
        handler();
        return;
      }
      disconnectHandlers.push(handler);
    },
  };
}

export interface NodeWebSocketServerOptions {
  /** Port to listen on. Use 0 for a random free port. Ignored when `server` is provided. */
  port?: number;
  /** Hostname to bind to. Defaults to "127.0.0.1". Ignored when `server` is provided. */
  host?: string;
  /** Request path that accepts subscribers. Defaults to "/ws". */
  path?: string;
  /** Maximum inbound payload size in bytes (default: 64KB). */
  maxPayload?: number;
  /** External HTTP server to attach to instead of listening separately. */
  server?: Server;
  logger?: Logger;
}

/**
 * WebSocket server adapter using the `ws` package.
 * Every connection on the configured path becomes a subscriber.
 */
export class NodeWebSocketServer implements WebSocketServerLike {
  private wss: WSServer | null = null;
  private readonly options: NodeWebSocketServerOptions;
  private readonly logger: Logger;

  constructor(options: NodeWebSocketServerOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
  }

  /** Actual port after listen (useful when constructed with port: 0). */
  get port(): number | undefined {
    const addr = this.wss?.address();
    if (addr && typeof addr === "object") return addr.port;
    if (this.options.server) {
      const httpAddr = this.options.server.address();
      if (httpAddr && typeof httpAddr === "object") return httpAddr.port;
    }
    return undefined;
  }

  /** Number of currently open client connections. */
  get clientCount(): number {
    return this.wss?.clients.size ?? 0;
  }

  async listen(onConnection: OnSubscriberConnection): Promise<void> {
    const maxPayload = this.options.maxPayload ?? 65_536;

    if (this.options.server) {
      // Piggyback on the HTTP server's upgrade handling
      this.wss = new WSServer({ server: this.options.server, maxPayload });
      this.wireConnectionHandler(this.wss, onConnection);
      return;
    }

    const wss = new WSServer({
      port: this.options.port ?? 0,
      host: this.options.host ?? "127.0.0.1",
      maxPayload,
    });
    this.wss = wss;
    this.wireConnectionHandler(wss, onConnection);
    return new Promise((resolve, reject) => {
      wss.once("listening", () => resolve());
      wss.once("error", (err) => reject(err));
    });
  }

  private wireConnectionHandler(wss: WSServer, onConnection: OnSubscriberConnection): void {
    const expected = this.options.path ?? "/ws";
    wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
      // Strip query string for path matching
      const pathOnly = (req.url ?? "").split("?")[0];
      if (pathOnly !== expected) {
        ws.close(4000, "Invalid path");
        return;
      }
      this.logger.debug?.("Subscriber connected", { remoteAddress: req.socket.remoteAddress });
      onConnection(wrapSocket(ws, this.logger));
    });
  }

  async close(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    const closing: Promise<boolean>[] = [];
    for (const client of wss.clients) {
      closing.push(
        settlesWithin(new Promise<void>((resolve) => client.once("close", () => resolve())), 1000),
      );
      client.close(1001, "Server shutting down");
    }
    await Promise.all(closing);
    // When attached to an external server, the caller closes the HTTP server
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
    this.wss = null;
  }
}
