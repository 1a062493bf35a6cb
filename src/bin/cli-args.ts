import { LogLevel, parseLogLevel } from "../adapters/structured-logger.js";
import { ConfigError } from "../errors.js";
import type { BridgeConfig } from "../types/config.js";

export type CliCommand = { kind: "help" } | { kind: "run"; config: BridgeConfig; logLevel: LogLevel };

export const HELP_TEXT = `
  termbridge: stream a terminal program's output to WebSocket subscribers

  Usage: termbridge [options]

  Options:
    --host <addr>          Address to bind (default: 127.0.0.1)
    --port <n>             HTTP/WebSocket port (default: 8000)
    --root <path>          Resource root: program cwd and viewer files (default: cwd)
    --command <name>       Program to supervise (default: "pros")
    --arg <value>          Program argument, repeatable (default: "terminal")
    --no-pty               Use pipes instead of a pseudo-terminal
    --max-line-bytes <n>   Flush partial lines longer than this (default: 0, unbounded)
    --log-level <level>    debug, info, warn or error (default: info)
    --verbose, -v          Shorthand for --log-level debug
    --help, -h             Show this help
`;

function nonNegativeInt(flag: string, value: string | undefined): number {
  const n = value === undefined ? Number.NaN : Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${flag} requires a non-negative integer`);
  }
  return n;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}

/** Parse `process.argv.slice(2)`. Throws ConfigError on bad input. */
export function parseArgs(argv: string[]): CliCommand {
  const config: BridgeConfig = {};
  let logLevel = LogLevel.INFO;
  let args: string[] | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--host":
        config.host = requireValue(arg, argv[++i]);
        break;
      case "--port":
        config.port = nonNegativeInt(arg, argv[++i]);
        break;
      case "--root":
        config.resourceRoot = requireValue(arg, argv[++i]);
        break;
      case "--command":
        config.command = requireValue(arg, argv[++i]);
        break;
      case "--arg": {
        // Values may look like flags ("--verbose" for the child), so take it as-is
        const value = argv[++i];
        if (value === undefined) throw new ConfigError("--arg requires a value");
        args = [...(args ?? []), value];
        break;
      }
      case "--no-pty":
        config.preferPty = false;
        break;
      case "--max-line-bytes":
        config.maxLineBufferBytes = nonNegativeInt(arg, argv[++i]);
        break;
      case "--log-level": {
        const name = requireValue(arg, argv[++i]);
        const level = parseLogLevel(name);
        if (level === undefined) throw new ConfigError(`Unknown log level: ${name}`);
        logLevel = level;
        break;
      }
      case "--verbose":
      case "-v":
        logLevel = LogLevel.DEBUG;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  if (args) config.args = args;
  return { kind: "run", config, logLevel };
}
