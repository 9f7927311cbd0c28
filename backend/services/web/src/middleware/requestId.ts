// backend/services/web/src/middleware/requestId.ts
/**
 * Every request carries a stable `X-Request-ID`.
 * - An inbound id is echoed when it looks like an id (bounded, header-safe).
 * - Otherwise 8 random bytes are minted as 16 hex chars.
 * - The id lands in the request scope and on the response.
 *
 * Outermost layer: everything after it (logs, security lines, errors) can
 * correlate on the id.
 */

import type { RequestHandler } from "express";
import { randomBytes } from "node:crypto";
import { setScopeValue } from "@fretwire/shared/http/requestScope";

export const REQUEST_ID_HEADER = "X-Request-ID";

const ACCEPTABLE_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function mintRequestId(): string {
  return randomBytes(8).toString("hex");
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const inbound = req.get(REQUEST_ID_HEADER)?.trim();
    const id = inbound && ACCEPTABLE_ID.test(inbound) ? inbound : mintRequestId();

    setScopeValue(req, "requestId", id);
    res.setHeader(REQUEST_ID_HEADER, id);
    next();
  };
}
