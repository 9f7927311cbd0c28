// backend/services/web/src/middleware/recoverer.ts
/**
 * Final error funnel.
 *
 * - `HttpError`s are expected client failures: plain-text body with their
 *   status, logged at debug.
 * - Anything else is a programmer error: one error line with method, path,
 *   remote address, user agent and stack, then a generic 500. The process
 *   keeps serving.
 * - Never writes a second response: if headers already went out the
 *   connection is ended as-is.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "@fretwire/shared/utils/logger";
import { isHttpError, writePlainError } from "@fretwire/shared/http/httpError";
import { clientIpOf, requestIdOf } from "@fretwire/shared/http/requestScope";

export function recoverer(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (isHttpError(err) && err.status < 500) {
      log.debug(
        { requestId: requestIdOf(req), status: err.status, path: req.path },
        "client error"
      );
      if (!res.headersSent) writePlainError(res, err.status, err.message);
      else res.end();
      return;
    }

    log.error(
      {
        err,
        requestId: requestIdOf(req) || undefined,
        method: req.method,
        path: req.path,
        remoteAddr: clientIpOf(req),
        userAgent: req.get("User-Agent") ?? "",
      },
      "recovered from unhandled error"
    );

    if (res.headersSent) {
      res.end();
      return;
    }
    writePlainError(res, 500);
  };
}

/** Tail of the route table: nothing matched. */
export function notFoundHandler(): RequestHandler {
  return (_req, res) => {
    writePlainError(res, 404);
  };
}
