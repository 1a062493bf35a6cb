/**
 * Logger contract shared by the supervisor, hub and servers.
 * StructuredLogger implements it for the CLI; library classes default to noopLogger.
 * @module
 */

export type LogContext = Record<string, unknown>;

/** Structured logger; `debug` is optional so thin adapters can skip it. */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
