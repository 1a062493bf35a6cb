import type { Logger } from "../interfaces/logger.js";

/** Discards everything. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/** Default for classes constructed without a logger. */
export const noopLogger: Logger = new NoopLogger();
