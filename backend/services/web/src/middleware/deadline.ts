// backend/services/web/src/middleware/deadline.ts

/**
 * Deadline guard (request-scoped 408)
 * -----------------------------------------------------------------------------
 * The guarded chain runs against a CapturedResponse view, never the real
 * response. A single timer races the chain's completion:
 *
 *   running ──(chain ends first)──▶ completed  → captured response committed once
 *      └─────(timer fires first)──▶ timedOut   → 408 on the real response;
 *                                                 signal aborted, capture discarded
 *
 * The client therefore sees either a coherent 408 or the chain's full
 * response, never a mix. The chain may keep running after a timeout; it
 * should watch the request-scope `signal` and stop early.
 *
 * Errors passed out of the chain (`next(err)`) are forwarded to the outer
 * error funnel only while the guard is still running.
 *
 * Order:
 * - Mount after logging (so the access line sees the final status) and before
 *   the security headers and routes it protects.
 */

import type { Request, RequestHandler, Response, NextFunction } from "express";
import type { Logger } from "@fretwire/shared/utils/logger";
import { writePlainError } from "@fretwire/shared/http/httpError";
import { setScopeValue } from "@fretwire/shared/http/requestScope";
import { logSecurity } from "@fretwire/shared/utils/securityLog";
import { CapturedResponse } from "../http/CapturedResponse";

export type DeadlineState = "running" | "completed" | "timedOut";

export class DeadlineExceededError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeadlineExceededError";
  }
}

type DeadlineSpec =
  | { timeoutMs: number; deadline?: never }
  | { deadline: Date; timeoutMs?: never };

export type DeadlineGuardOptions = DeadlineSpec & {
  log: Logger;
  /** Message carried by the abort reason and the log line. */
  cause?: string;
  /** Observe transitions (tests, metrics). */
  onSettle?: (state: Exclude<DeadlineState, "running">, req: Request) => void;
};

function remainingMs(opts: DeadlineSpec): number {
  if (opts.deadline !== undefined) return opts.deadline.getTime() - Date.now();
  return opts.timeoutMs;
}

function causeFor(opts: DeadlineSpec): string {
  if (opts.deadline !== undefined) {
    return `request deadline ${opts.deadline.toISOString()} exceeded`;
  }
  return `request timeout after ${opts.timeoutMs}ms`;
}

export function deadlineGuard(
  opts: DeadlineGuardOptions,
  inner: RequestHandler
): RequestHandler {
  if (opts.deadline === undefined) {
    if (!Number.isFinite(opts.timeoutMs) || opts.timeoutMs <= 0) {
      throw new Error("[deadline] timeoutMs must be a number > 0");
    }
  }
  const log = opts.log.child({ component: "deadline" });
  const cause = opts.cause ?? causeFor(opts);

  return function deadline(req: Request, res: Response, next: NextFunction) {
    const controller = new AbortController();
    setScopeValue(req, "signal", controller.signal);

    const timeOut = () => {
      controller.abort(new DeadlineExceededError(cause));
      logSecurity(log, req, {
        kind: "deadline",
        reason: "deadline_exceeded",
        decision: "blocked",
        status: 408,
        method: req.method,
        route: req.path,
        details: { cause },
      });
      if (!res.headersSent) writePlainError(res, 408);
      opts.onSettle?.("timedOut", req);
    };

    const ms = remainingMs(opts);
    if (ms <= 0) {
      timeOut();
      return;
    }

    let state: DeadlineState = "running";
    const captured = new CapturedResponse();
    const view = captured.attach(res);

    const settle = (to: Exclude<DeadlineState, "running">): boolean => {
      if (state !== "running") return false;
      state = to;
      clearTimeout(timer);
      return true;
    };

    const timer = setTimeout(() => {
      if (!settle("timedOut")) return;
      captured.discard();
      timeOut();
    }, ms);

    // Client went away: nothing left to write, but let the chain know.
    res.once("close", () => {
      if (state !== "running") return;
      settle("timedOut");
      captured.discard();
      controller.abort(new DeadlineExceededError("client closed connection"));
    });

    captured.onEnd(() => {
      if (!settle("completed")) return;
      captured.commit(res);
      opts.onSettle?.("completed", req);
    });

    inner(req, view, (err?: unknown) => {
      if (!settle("completed")) {
        if (err != null) {
          log.warn(
            { err, method: req.method, path: req.path, state },
            state === "timedOut"
              ? "error after deadline; dropped"
              : "error after response completed; dropped"
          );
        }
        return;
      }
      opts.onSettle?.("completed", req);
      if (err != null && err !== "router" && err !== "route") {
        captured.discard();
        next(err);
        return;
      }
      // Nothing in the guarded chain answered: keep its headers, move on.
      captured.applyHeaders(res);
      captured.discard();
      next();
    });
  };
}
