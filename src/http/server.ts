import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { join } from "node:path";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import { type ControlContext, handleApiControl } from "./api-control.js";
import { type HealthContext, handleHealth } from "./health.js";
import { json, notFound } from "./json.js";
import { resolveInside, serveFile } from "./static-files.js";

export interface HttpServerOptions {
  control: ControlContext;
  /** Directory the viewer page and its assets are served from. */
  resourceRoot: string;
  /** Viewer page, relative to `resourceRoot`. */
  viewerFile: string;
  /** Asset directory, relative to `resourceRoot`, served under `/assets/`. */
  assetsDir: string;
  /** Bare file names under `resourceRoot`, each served at `/<name>`. */
  rootFiles?: readonly string[];
  healthContext?: HealthContext;
  logger?: Logger;
}

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "*",
};

export function createBridgeServer(options: HttpServerOptions): Server {
  const logger = options.logger ?? noopLogger;
  const viewerPath = resolveInside(options.resourceRoot, options.viewerFile);
  const assetsRoot = join(options.resourceRoot, options.assetsDir);
  const rootFiles = new Map(
    (options.rootFiles ?? []).map((name) => [`/${name}`, resolveInside(options.resourceRoot, name)]),
  );

  const route = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    for (const [name, value] of Object.entries(CORS_HEADERS)) res.setHeader(name, value);
    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    // Route dispatch
    if (url.pathname === "/health") {
      handleHealth(req, res, options.healthContext);
      return;
    }

    if (url.pathname === "/api" || url.pathname.startsWith("/api/")) {
      handleApiControl(req, res, url, { ...options.control, logger: options.control.logger ?? logger });
      return;
    }

    if (url.pathname === "/" || url.pathname === "/index.html") {
      await serveFile(req, res, viewerPath);
      return;
    }

    if (url.pathname.startsWith("/assets/")) {
      const relative = url.pathname.slice("/assets/".length);
      await serveFile(req, res, resolveInside(assetsRoot, relative));
      return;
    }

    const rootFile = rootFiles.get(url.pathname);
    if (rootFile !== undefined) {
      await serveFile(req, res, rootFile);
      return;
    }

    notFound(res);
  };

  return createHttpServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      logger.error("Request handler failed", { url: req.url, error: err });
      if (!res.headersSent) json(res, 500, { error: "Internal error" });
      else res.end();
    });
  });
}
