import type { Server } from "node:http";
import { resolve } from "node:path";
import { NodeWebSocketServer } from "../adapters/node-ws-server.js";
import { PipeChannelFactory } from "../adapters/pipe-channel.js";
import { PtyChannelFactory } from "../adapters/pty-channel.js";
import { BroadcastHub } from "../core/broadcast-hub.js";
import { ProcessSupervisor } from "../core/process-supervisor.js";
import { errorMessage } from "../errors.js";
import { createBridgeServer } from "../http/server.js";
import type { Logger } from "../interfaces/logger.js";
import type { OutputChannelFactory } from "../interfaces/output-channel.js";
import type { SubscriberSocket } from "../interfaces/ws-server.js";
import { type BridgeConfig, type ResolvedConfig, resolveConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { resolvePackageVersion } from "../utils/resolve-package-version.js";

export interface BridgeDaemonOptions {
  config?: BridgeConfig;
  logger?: Logger;
  /** Reported by `/health`. Defaults to the package version. */
  version?: string;
  /** Transports in preference order. Defaults to pty (when preferred) then pipes. */
  channels?: OutputChannelFactory[];
}

export interface BridgeAddress {
  host: string;
  port: number;
  url: string;
}

/**
 * Wires one supervisor, one hub, the HTTP control surface and the `/ws`
 * streaming endpoint together, and starts or stops them as a unit.
 */
export class BridgeDaemon {
  readonly config: ResolvedConfig;
  readonly hub: BroadcastHub;
  readonly supervisor: ProcessSupervisor;

  private readonly logger: Logger;
  private readonly version: string;
  private server: Server | null = null;
  private wsServer: NodeWebSocketServer | null = null;
  private address: BridgeAddress | null = null;

  constructor(options: BridgeDaemonOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? noopLogger;
    this.version =
      options.version ?? resolvePackageVersion(import.meta.url, ["../../package.json"]);

    const { config, logger } = this;
    const pipes = new PipeChannelFactory({ logger });
    const channels =
      options.channels ??
      (config.preferPty
        ? [new PtyChannelFactory({ cols: config.ptyCols, rows: config.ptyRows, logger }), pipes]
        : [pipes]);

    this.hub = new BroadcastHub({ logger, maxPendingLines: config.maxSubscriberBacklog });
    this.supervisor = new ProcessSupervisor({
      channels,
      sink: this.hub,
      command: config.command,
      args: config.args,
      cwd: resolve(config.resourceRoot),
      logger,
      gracefulStopTimeoutMs: config.gracefulStopTimeoutMs,
      killTimeoutMs: config.killTimeoutMs,
      forceKillTimeoutMs: config.forceKillTimeoutMs,
      exitDrainTimeoutMs: config.exitDrainTimeoutMs,
      maxLineBufferBytes: config.maxLineBufferBytes,
    });
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /** Bound address once started. */
  get url(): string | null {
    return this.address?.url ?? null;
  }

  async start(): Promise<BridgeAddress> {
    if (this.address) return this.address;
    const { config } = this;

    const server = createBridgeServer({
      control: {
        supervisor: this.supervisor,
        subscriberCount: () => this.hub.size,
      },
      resourceRoot: resolve(config.resourceRoot),
      viewerFile: config.viewerFile,
      assetsDir: config.assetsDir,
      rootFiles: config.rootFiles,
      healthContext: { version: this.version },
      logger: this.logger,
    });

    await new Promise<void>((resolveListen, reject) => {
      server.once("error", reject);
      server.listen(config.port, config.host, () => {
        server.off("error", reject);
        resolveListen();
      });
    });
    this.server = server;

    const wsServer = new NodeWebSocketServer({ server, logger: this.logger });
    await wsServer.listen((socket) => this.attachSubscriber(socket));
    this.wsServer = wsServer;

    const addr = server.address();
    const port = addr && typeof addr === "object" ? addr.port : config.port;
    this.address = { host: config.host, port, url: `http://${config.host}:${port}` };
    this.logger.info("Bridge listening", { url: this.address.url, version: this.version });
    return this.address;
  }

  /** Stop the child, drop subscribers and close the servers. Safe to call twice. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    this.address = null;

    try {
      await this.supervisor.dispose();
    } catch (err) {
      this.logger.warn("Supervisor shutdown failed", { error: errorMessage(err) });
    }

    this.hub.clear();
    if (this.wsServer) {
      await this.wsServer.close();
      this.wsServer = null;
    }

    server.closeAllConnections();
    await new Promise<void>((resolveClose) => {
      server.close(() => resolveClose());
    });
    this.logger.info("Bridge stopped");
  }

  private attachSubscriber(socket: SubscriberSocket): void {
    this.hub.subscribe(socket);
    this.logger.debug?.("Subscriber attached", { subscribers: this.hub.size });
    socket.onDisconnect(() => {
      this.hub.unsubscribe(socket);
      this.logger.debug?.("Subscriber detached", { subscribers: this.hub.size });
    });
  }
}
