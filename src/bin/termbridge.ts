#!/usr/bin/env node
import { StructuredLogger } from "../adapters/structured-logger.js";
import { BridgeDaemon } from "../daemon/bridge-daemon.js";
import { registerSignalHandlers } from "../daemon/signal-handler.js";
import { ConfigError, errorMessage, isErrnoException } from "../errors.js";
import { HELP_TEXT, parseArgs } from "./cli-args.js";

async function main(): Promise<void> {
  let command: ReturnType<typeof parseArgs>;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}\nRun with --help for usage.`);
    process.exit(1);
  }
  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }

  const logger = new StructuredLogger({ component: "termbridge", level: command.logLevel });
  const daemon = new BridgeDaemon({ config: command.config, logger });

  try {
    await daemon.start();
  } catch (err) {
    if (isErrnoException(err) && err.code === "EADDRINUSE") {
      console.error(`Error: ${daemon.config.host}:${daemon.config.port} is already in use.`);
      console.error(`Try a different port: termbridge --port ${daemon.config.port + 1}`);
      process.exit(1);
    }
    throw err;
  }

  registerSignalHandlers(() => daemon.stop(), { logger });

  const { config } = daemon;
  console.log(`
  termbridge ready

  Control:  ${daemon.url}/api/{start,stop,kill,status}
  Stream:   ${daemon.url?.replace("http", "ws")}/ws
  Program:  ${[config.command, ...config.args].join(" ")}
  Root:     ${config.resourceRoot}

  Press Ctrl+C to stop
`);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
