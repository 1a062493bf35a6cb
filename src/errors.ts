export class BridgeError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BridgeError";
    this.code = code;
  }
}

// ── Domain errors ──

/** The supervised program could not be resolved on PATH. */
export class BinaryNotFoundError extends BridgeError {
  readonly binary: string;

  constructor(binary: string, options?: ErrorOptions) {
    super(`${binary} not found on PATH`, "BINARY_NOT_FOUND", options);
    this.name = "BinaryNotFoundError";
    this.binary = binary;
  }
}

/** Any other failure to create the output channel or the child process. */
export class SpawnError extends BridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SPAWN", options);
    this.name = "SpawnError";
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to BridgeError (preserves cause chain). */
export function toBridgeError(value: unknown): BridgeError {
  if (value instanceof BridgeError) return value;
  if (value instanceof Error) return new BridgeError(value.message, "UNKNOWN", { cause: value });
  return new BridgeError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Narrow an unknown error to a Node system error carrying `code`. */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value && typeof value.code === "string";
}
