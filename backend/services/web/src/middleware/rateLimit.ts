// backend/services/web/src/middleware/rateLimit.ts

/**
 * Rate limit guardrail (sliding window, keyed by resolved client IP).
 *
 * - Mount after real-IP resolution so the key is the client, not the proxy.
 * - On deny: one SECURITY warn line, `Retry-After`, plain-text 429. The
 *   request goes no further.
 */

import type { RequestHandler } from "express";
import type { Logger } from "@fretwire/shared/utils/logger";
import { writePlainError } from "@fretwire/shared/http/httpError";
import { clientIpOf } from "@fretwire/shared/http/requestScope";
import { logSecurity } from "@fretwire/shared/utils/securityLog";
import type { SlidingWindowLimiter } from "../limiter/SlidingWindowLimiter";

export type RateLimitMiddlewareOptions = {
  log: Logger;
  /** Clock override for tests. */
  now?: () => number;
};

export function rateLimitMiddleware(
  limiter: SlidingWindowLimiter,
  opts: RateLimitMiddlewareOptions
): RequestHandler {
  const now = opts.now ?? Date.now;
  const log = opts.log.child({ component: "rateLimit" });

  return (req, res, next) => {
    const key = clientIpOf(req);
    const at = now();
    if (limiter.allow(key, at)) return next();

    logSecurity(log, req, {
      kind: "rate_limit",
      reason: "sliding_window_exceeded",
      decision: "blocked",
      status: 429,
      route: req.path,
      method: req.method,
      details: { limit: limiter.limit, windowMs: limiter.windowMs },
    });

    res.setHeader("Retry-After", String(limiter.retryAfterSeconds(key, at)));
    writePlainError(res, 429);
  };
}
