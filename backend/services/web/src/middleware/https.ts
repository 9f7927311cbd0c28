// backend/services/web/src/middleware/https.ts
/**
 * HTTPS enforcement for deployments that terminate TLS at a proxy.
 *
 * A request counts as secure when its own socket is TLS, or when a trusted
 * proxy says so via `X-Forwarded-Proto: https`.
 * - hsts: adds Strict-Transport-Security on secure requests only.
 * - httpsRedirect: 301 to the https URL for anything else.
 * Both are mounted only when enabled in config.
 */

import type { Request, RequestHandler } from "express";
import { TLSSocket } from "node:tls";
import { TrustedProxies } from "@fretwire/shared/utils/clientIp";
import { writePlainError } from "@fretwire/shared/http/httpError";

export const HSTS_VALUE = "max-age=31536000; includeSubDomains; preload";

const HOST_SHAPE = /^[A-Za-z0-9.-]+(?::\d{1,5})?$|^\[[0-9A-Fa-f:.]+\](?::\d{1,5})?$/;

export function isSecureRequest(req: Request, trusted: TrustedProxies): boolean {
  if (req.socket instanceof TLSSocket && req.socket.encrypted) return true;
  if (!trusted.has(req.socket.remoteAddress)) return false;
  const proto = req.get("X-Forwarded-Proto")?.split(",")[0].trim().toLowerCase();
  return proto === "https";
}

export function hstsMiddleware(trustedProxies: readonly string[]): RequestHandler {
  const trusted = new TrustedProxies(trustedProxies);
  return (req, res, next) => {
    if (isSecureRequest(req, trusted)) {
      res.setHeader("Strict-Transport-Security", HSTS_VALUE);
    }
    next();
  };
}

export function httpsRedirectMiddleware(
  trustedProxies: readonly string[]
): RequestHandler {
  const trusted = new TrustedProxies(trustedProxies);
  return (req, res, next) => {
    if (isSecureRequest(req, trusted)) return next();

    const host = req.get("Host") ?? "";
    if (!HOST_SHAPE.test(host)) {
      writePlainError(res, 400);
      return;
    }
    res.redirect(301, `https://${host}${req.originalUrl}`);
  };
}
