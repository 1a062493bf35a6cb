import type { IncomingMessage, ServerResponse } from "node:http";
import { json } from "./json.js";

export interface HealthContext {
  version: string;
}

export function handleHealth(
  _req: IncomingMessage,
  res: ServerResponse,
  ctx?: HealthContext,
): void {
  const body: Record<string, unknown> = { status: "ok" };
  if (ctx) {
    body.version = ctx.version;
    body.uptime_seconds = Math.floor(process.uptime());
  }
  json(res, 200, body);
}
