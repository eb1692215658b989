import http, { type IncomingMessage, type ServerResponse } from "node:http";
import { URL } from "node:url";
import { v4 as uuidv4 } from "uuid";
import { createLogger, type Logger } from "../../src/lib/logger";
import type { NotificationHub } from "../../src/server/notifications/hub";
import type { Authenticator } from "./auth";
import { errorResponse, readBody, send } from "./http";
import { dispatch, type Route } from "./routes";
import { SSE_HEADERS, pumpUserEvents } from "./sse";

export interface GatewayOptions {
  routes: readonly Route[];
  authenticate: Authenticator;
  hub: NotificationHub;
  corsOrigin?: string;
  heartbeatMs?: number;
  logger?: Logger;
}

export const STREAM_PATH = "/notifications/stream";

export function createGateway(opts: GatewayOptions): http.Server {
  const log = opts.logger ?? createLogger("course-api");
  const startedAt = new Date().toISOString();

  const streamEvents = async (req: IncomingMessage, res: ServerResponse, userId: string): Promise<void> => {
    const controller = new AbortController();
    const abort = () => controller.abort();
    req.once("close", abort);
    res.once("close", abort);

    const subscription = opts.hub.subscribeUserEvents(userId);
    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders();
    log.debug("stream opened", { userId, subscribers: opts.hub.subscriberCount(userId) });

    try {
      const end = await pumpUserEvents({
        subscription,
        signal: controller.signal,
        heartbeatMs: opts.heartbeatMs,
        write: (frame) => {
          res.write(frame);
        },
      });
      log.debug("stream ended", { userId, end, dropped: subscription.dropped });
    } finally {
      req.off("close", abort);
      res.off("close", abort);
      if (!res.writableEnded) res.end();
    }
  };

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    res.setHeader("Access-Control-Allow-Origin", opts.corsOrigin ?? "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, X-Agent-Token, X-Tenant-Id, X-User-Id");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url || "/", "http://localhost");
    const method = req.method || "GET";
    if (method === "GET" && url.pathname === "/health") {
      return send(res, 200, { ok: true, data: { status: "ok", startedAt } });
    }

    const requestId = uuidv4();
    try {
      const ctx = await opts.authenticate(req);
      if (method === "GET" && url.pathname === STREAM_PATH) {
        await streamEvents(req, res, ctx.userId);
        return;
      }
      const body = method === "GET" || method === "DELETE" ? {} : await readBody(req);
      const result = await dispatch(opts.routes, { method, pathname: url.pathname, ctx, query: url.searchParams, body });
      return send(res, result.status, { ok: true, data: result.data });
    } catch (error) {
      const { status, body } = errorResponse(error);
      if (status >= 500) log.error("request failed", error, { requestId, method, path: url.pathname });
      else log.debug("request rejected", { requestId, method, path: url.pathname, status });
      if (res.headersSent) {
        res.end();
        return;
      }
      return send(res, status, body);
    }
  };

  return http.createServer((req, res) => {
    void handle(req, res).catch((error: unknown) => {
      log.error("unhandled request error", error);
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });
}
