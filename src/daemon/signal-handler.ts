import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;

type SignalListener = (signal: NodeJS.Signals) => void;

/** Where signals come from; `process` unless a test supplies its own emitter. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface SignalHandlerOptions {
  logger?: Logger;
  timeoutMs?: number;
  source?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Register SIGTERM and SIGINT handlers that run a cleanup function before exiting.
 * Force-exits with code 1 after `timeoutMs` if cleanup stalls.
 * Returns a function that removes the handlers.
 */
export function registerSignalHandlers(
  cleanup: () => Promise<void>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const source: SignalSource = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit", { timeoutMs });
      exit(1);
    }, timeoutMs);
    forceTimer.unref();

    cleanup()
      .catch((err: unknown) => {
        logger.error("Shutdown cleanup failed", { error: err });
      })
      .finally(() => {
        clearTimeout(forceTimer);
        exit(0);
      });
  };

  source.on("SIGTERM", handler);
  source.on("SIGINT", handler);
  return () => {
    source.off("SIGTERM", handler);
    source.off("SIGINT", handler);
  };
}
