import { readFile, stat } from "node:fs/promises";
import type { IncomingMessage, ServerResponse } from "node:http";
import { extname, resolve, sep } from "node:path";
import { methodNotAllowed, notFound } from "./json.js";

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".mjs": "text/javascript; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".json": "application/json",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".ico": "image/x-icon",
  ".woff2": "font/woff2",
  ".txt": "text/plain; charset=utf-8",
};

export function contentTypeFor(file: string): string {
  return CONTENT_TYPES[extname(file).toLowerCase()] ?? "application/octet-stream";
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve `relative` inside `root`, or null when it escapes the root
 * (`..` segments, absolute paths, encoded separators).
 */
export function resolveInside(root: string, relative: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(relative);
  } catch {
    return null;
  }
  if (decoded.includes("\0")) return null;
  const base = resolve(root);
  const target = resolve(base, `.${sep}${decoded}`);
  if (target === base || !target.startsWith(base + sep)) return null;
  return target;
}

/** Serve one file from disk, 404 when it is missing. GET and HEAD only. */
export async function serveFile(
  req: IncomingMessage,
  res: ServerResponse,
  file: string | null,
): Promise<void> {
  const method = req.method ?? "GET";
  if (method !== "GET" && method !== "HEAD") {
    methodNotAllowed(res, "GET, HEAD");
    return;
  }
  if (!file || !(await isFile(file))) {
    notFound(res);
    return;
  }
  const body = await readFile(file);
  res.writeHead(200, {
    "Content-Type": contentTypeFor(file),
    "Content-Length": body.length,
    "X-Content-Type-Options": "nosniff",
  });
  res.end(method === "HEAD" ? undefined : body);
}
