import type { IncomingMessage, ServerResponse } from "node:http";
import type {
  StartResult,
  StopResult,
  SupervisorStatus,
} from "../core/process-supervisor.js";
import { BinaryNotFoundError, errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import { json, methodNotAllowed, notFound } from "./json.js";

/** The supervisor operations exposed over HTTP. */
export interface SupervisorControl {
  start(): Promise<StartResult>;
  stop(): Promise<StopResult>;
  kill(): Promise<StopResult>;
  status(): SupervisorStatus;
}

export interface ControlContext {
  supervisor: SupervisorControl;
  subscriberCount(): number;
  logger?: Logger;
}

export interface FailureResult {
  ok: false;
  status: string;
}

export interface StatusBody {
  running: boolean;
  pid: number | null;
  mode: string | null;
  subscriber_count: number;
}

type Action = "start" | "stop" | "kill";

async function runAction(
  action: Action,
  supervisor: SupervisorControl,
): Promise<StartResult | StopResult | FailureResult> {
  const run = {
    start: () => supervisor.start(),
    stop: () => supervisor.stop(),
    kill: () => supervisor.kill(),
  }[action];
  try {
    return await run();
  } catch (err) {
    if (err instanceof BinaryNotFoundError) return { ok: false, status: err.message };
    return { ok: false, status: `${action} failed: ${errorMessage(err)}` };
  }
}

function isAction(value: string | undefined): value is Action {
  return value === "start" || value === "stop" || value === "kill";
}

/**
 * Routes `/api/*`. Lifecycle actions answer 200 with `{ ok, status, ... }`
 * even when they fail; the failure is in the body.
 */
export function handleApiControl(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  ctx: ControlContext,
): void {
  const segments = url.pathname.split("/").filter(Boolean); // ["api", action]
  const method = req.method ?? "GET";
  const logger = ctx.logger ?? noopLogger;
  const name = segments[1];

  if (segments.length !== 2) {
    notFound(res);
    return;
  }

  // GET /api/status
  if (name === "status") {
    if (method !== "GET") {
      methodNotAllowed(res, "GET");
      return;
    }
    const status = ctx.supervisor.status();
    const body: StatusBody = {
      running: status.running,
      pid: status.pid,
      mode: status.mode,
      subscriber_count: ctx.subscriberCount(),
    };
    json(res, 200, body);
    return;
  }

  // POST /api/start | /api/stop | /api/kill
  if (isAction(name)) {
    if (method !== "POST") {
      methodNotAllowed(res, "POST");
      return;
    }
    runAction(name, ctx.supervisor)
      .then((result) => {
        if (!result.ok) logger.warn(`Control action failed: ${name}`, { status: result.status });
        json(res, 200, result);
      })
      .catch((err: unknown) => {
        logger.error("Failed to write control response", { error: err });
      });
    return;
  }

  notFound(res);
}
