/**
 * termbridge public API barrel.
 *
 * Re-exports the supervisor, hub, transports and servers that make up the
 * public surface area of the `termbridge` package.
 * @module
 */

// Adapters
export type { NodeWebSocketServerOptions } from "./adapters/node-ws-server.js";
export { NodeWebSocketServer, wrapSocket } from "./adapters/node-ws-server.js";
export type { PipeChannelOptions } from "./adapters/pipe-channel.js";
export { PipeChannelFactory } from "./adapters/pipe-channel.js";
export type {
  NodePtyModule,
  PtyChannelOptions,
  PtyProcess,
  PtySpawnOptions,
} from "./adapters/pty-channel.js";
export { PtyChannelFactory } from "./adapters/pty-channel.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { bridgeConfigSchema } from "./config/config-schema.js";
// Core
export { BroadcastHub, type BroadcastHubOptions } from "./core/broadcast-hub.js";
export type { LineFramerOptions } from "./core/line-framer.js";
export { LineFramer } from "./core/line-framer.js";
export type {
  ProcessSupervisorOptions,
  StartResult,
  StopResult,
  SupervisorState,
  SupervisorStatus,
  TeardownFailure,
  TeardownStep,
} from "./core/process-supervisor.js";
export { ProcessSupervisor } from "./core/process-supervisor.js";
// Daemon
export type { BridgeAddress, BridgeDaemonOptions } from "./daemon/bridge-daemon.js";
export { BridgeDaemon } from "./daemon/bridge-daemon.js";
export type { SignalHandlerOptions, SignalSource } from "./daemon/signal-handler.js";
export { registerSignalHandlers } from "./daemon/signal-handler.js";
// Errors
export {
  BinaryNotFoundError,
  BridgeError,
  ConfigError,
  errorMessage,
  SpawnError,
  toBridgeError,
} from "./errors.js";
// HTTP
export type { ControlContext, StatusBody, SupervisorControl } from "./http/api-control.js";
export type { HttpServerOptions } from "./http/server.js";
export { createBridgeServer } from "./http/server.js";
// Interfaces
export type { LogContext, Logger } from "./interfaces/logger.js";
export type {
  ChannelSpawnOptions,
  OutputChannel,
  OutputChannelFactory,
  TerminationSignal,
  TransportMode,
} from "./interfaces/output-channel.js";
export type { LineSink, Subscriber } from "./interfaces/subscriber.js";
export type {
  OnSubscriberConnection,
  SubscriberSocket,
  WebSocketServerLike,
} from "./interfaces/ws-server.js";
// Types
export type { BridgeConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
// Utils
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
export type { ResolveBinaryOptions } from "./utils/resolve-binary.js";
export { resolveBinary } from "./utils/resolve-binary.js";
