import { bridgeConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Bridge configuration; every field has a default. */
export interface BridgeConfig {
  // Network
  host?: string; // default: "127.0.0.1"
  port?: number; // default: 8000

  // Supervised program
  resourceRoot?: string; // default: process.cwd()
  command?: string; // default: "pros"
  args?: string[]; // default: ["terminal"]

  // Transport
  preferPty?: boolean; // default: true (ignored on Windows without node-pty)
  ptyCols?: number; // default: 120
  ptyRows?: number; // default: 40

  // Termination windows
  gracefulStopTimeoutMs?: number; // default: 2000 (SIGTERM -> exit)
  killTimeoutMs?: number; // default: 500 (SIGKILL -> exit, kill())
  forceKillTimeoutMs?: number; // default: 1000 (escalated SIGKILL -> exit)
  exitDrainTimeoutMs?: number; // default: 250 (reader drain after a natural exit)

  // Framing
  maxLineBufferBytes?: number; // default: 0 (unbounded)

  // Fan-out
  maxSubscriberBacklog?: number; // default: 1000 lines queued behind a slow subscriber

  // Static viewer, relative to resourceRoot
  viewerFile?: string; // default: "Viewer.html"
  assetsDir?: string; // default: "assets"
  rootFiles?: string[]; // default: ["robot_image.png"], each served at /<name>
}

export type ResolvedConfig = Required<BridgeConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  host: "127.0.0.1",
  port: 8000,
  resourceRoot: process.cwd(),
  command: "pros",
  args: ["terminal"],
  preferPty: true,
  ptyCols: 120,
  ptyRows: 40,
  gracefulStopTimeoutMs: 2000,
  killTimeoutMs: 500,
  forceKillTimeoutMs: 1000,
  exitDrainTimeoutMs: 250,
  maxLineBufferBytes: 0,
  maxSubscriberBacklog: 1000,
  viewerFile: "Viewer.html",
  assetsDir: "assets",
  rootFiles: ["robot_image.png"],
};

/** Validate user config and merge it over DEFAULT_CONFIG. Undefined fields keep their default. */
export function resolveConfig(config: BridgeConfig = {}): ResolvedConfig {
  const validation = bridgeConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }

  const resolved: ResolvedConfig = {
    ...DEFAULT_CONFIG,
    args: [...DEFAULT_CONFIG.args],
    rootFiles: [...DEFAULT_CONFIG.rootFiles],
  };
  const user = validation.data;
  if (user.host !== undefined) resolved.host = user.host;
  if (user.port !== undefined) resolved.port = user.port;
  if (user.resourceRoot !== undefined) resolved.resourceRoot = user.resourceRoot;
  if (user.command !== undefined) resolved.command = user.command;
  if (user.args !== undefined) resolved.args = [...user.args];
  if (user.preferPty !== undefined) resolved.preferPty = user.preferPty;
  if (user.ptyCols !== undefined) resolved.ptyCols = user.ptyCols;
  if (user.ptyRows !== undefined) resolved.ptyRows = user.ptyRows;
  if (user.gracefulStopTimeoutMs !== undefined) {
    resolved.gracefulStopTimeoutMs = user.gracefulStopTimeoutMs;
  }
  if (user.killTimeoutMs !== undefined) resolved.killTimeoutMs = user.killTimeoutMs;
  if (user.forceKillTimeoutMs !== undefined) resolved.forceKillTimeoutMs = user.forceKillTimeoutMs;
  if (user.exitDrainTimeoutMs !== undefined) resolved.exitDrainTimeoutMs = user.exitDrainTimeoutMs;
  if (user.maxLineBufferBytes !== undefined) resolved.maxLineBufferBytes = user.maxLineBufferBytes;
  if (user.maxSubscriberBacklog !== undefined) {
    resolved.maxSubscriberBacklog = user.maxSubscriberBacklog;
  }
  if (user.viewerFile !== undefined) resolved.viewerFile = user.viewerFile;
  if (user.assetsDir !== undefined) resolved.assetsDir = user.assetsDir;
  if (user.rootFiles !== undefined) resolved.rootFiles = [...user.rootFiles];
  return resolved;
}
