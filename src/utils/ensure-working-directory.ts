import { stat } from "node:fs/promises";
import { isErrnoException, SpawnError } from "../errors.js";

/** Reject with SpawnError naming `cwd` unless it is an existing directory. */
export async function ensureWorkingDirectory(cwd: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(cwd)).isDirectory();
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new SpawnError(`Working directory not found: ${cwd}`, { cause: err });
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new SpawnError(`Working directory not accessible: ${cwd}: ${detail}`, { cause: err });
  }
  if (!isDirectory) throw new SpawnError(`Working directory is not a directory: ${cwd}`);
}
