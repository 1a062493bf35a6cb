import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { delimiter, isAbsolute, join, resolve } from "node:path";

export interface ResolveBinaryOptions {
  /** Search path; defaults to process.env.PATH. */
  path?: string;
  /** Base for relative command paths such as `./bin/tool`. */
  cwd?: string;
  platform?: NodeJS.Platform;
  /** Windows executable extensions; defaults to process.env.PATHEXT. */
  pathExt?: string;
}

async function isExecutableFile(file: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const info = await stat(file);
    if (!info.isFile()) return false;
    if (platform !== "win32") await access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate `command` the way a shell would, returning its absolute path or null.
 * Commands containing a path separator are resolved against `cwd` instead of PATH.
 */
export async function resolveBinary(
  command: string,
  options: ResolveBinaryOptions = {},
): Promise<string | null> {
  const platform = options.platform ?? process.platform;
  const extensions =
    platform === "win32"
      ? ["", ...(options.pathExt ?? process.env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";")]
      : [""];

  const hasSeparator = command.includes("/") || (platform === "win32" && command.includes("\\"));
  if (isAbsolute(command) || hasSeparator) {
    const base = resolve(options.cwd ?? process.cwd(), command);
    for (const ext of extensions) {
      if (await isExecutableFile(base + ext, platform)) return base + ext;
    }
    return null;
  }

  const searchPath = options.path ?? process.env.PATH ?? "";
  const separator = platform === "win32" ? ";" : delimiter;
  for (const dir of searchPath.split(separator)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (await isExecutableFile(candidate, platform)) return candidate;
    }
  }
  return null;
}
