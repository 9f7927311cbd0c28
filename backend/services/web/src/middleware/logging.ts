// backend/services/web/src/middleware/logging.ts
/**
 * Access telemetry via pino-http.
 *
 * - One line per request on finish: request id, method, path, status,
 *   duration, client ip, user agent.
 * - 2xx/3xx info, 4xx warn, 5xx error.
 * - Paths are logged without the query and truncated to 100 chars.
 * - Health checks are not logged.
 */

import pinoHttp from "pino-http";
import type { RequestHandler } from "express";
import type { Logger } from "@fretwire/shared/utils/logger";
import { clientIpOf, requestIdOf } from "@fretwire/shared/http/requestScope";
import { mintRequestId } from "./requestId";

export const MAX_LOGGED_PATH = 100;

export function truncatePath(url: string | undefined): string {
  const p = (url ?? "").split("?")[0];
  return p.length > MAX_LOGGED_PATH ? `${p.slice(0, MAX_LOGGED_PATH)}...` : p;
}

const QUIET_PATHS = new Set(["/healthz", "/favicon.ico"]);

interface SerializedReq {
  method?: string;
  url?: string;
}

interface SerializedRes {
  statusCode?: number;
}

export function loggingMiddleware(log: Logger): RequestHandler {
  return pinoHttp({
    logger: log.child({ component: "http" }),

    genReqId: (req) => requestIdOf(req) || mintRequestId(),

    customLogLevel(_req, res, err) {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customSuccessMessage: () => "request",
    customErrorMessage: () => "request failed",

    customAttributeKeys: { responseTime: "durationMs" },

    customProps(req) {
      return {
        requestId: requestIdOf(req),
        ip: clientIpOf(req),
        userAgent: req.headers["user-agent"] ?? "",
      };
    },

    autoLogging: {
      ignore: (req) => QUIET_PATHS.has(truncatePath(req.url)),
    },

    serializers: {
      req(req: SerializedReq) {
        return { method: req.method, path: truncatePath(req.url) };
      },
      res(res: SerializedRes) {
        return { status: res.statusCode };
      },
    },
  });
}
