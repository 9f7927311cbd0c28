// backend/services/web/src/middleware/securityHeaders.ts
/**
 * Defence-in-depth response headers plus a per-request CSP nonce.
 * The nonce (16 random bytes, base64) goes into the request scope so views
 * can stamp it on their inline scripts.
 */

import type { RequestHandler } from "express";
import { randomBytes } from "node:crypto";
import { setScopeValue } from "@fretwire/shared/http/requestScope";

export function mintNonce(): string {
  return randomBytes(16).toString("base64");
}

export function contentSecurityPolicy(nonce: string): string {
  return [
    "default-src 'self'",
    `script-src 'self' 'nonce-${nonce}'`,
    "style-src 'self'",
    "img-src 'self' data:",
    "font-src 'self'",
    "object-src 'none'",
    "base-uri 'self'",
    "frame-ancestors 'none'",
  ].join("; ");
}

export const STATIC_SECURITY_HEADERS: Readonly<Record<string, string>> = {
  "X-Frame-Options": "DENY",
  "X-Content-Type-Options": "nosniff",
  "X-XSS-Protection": "1; mode=block",
  "Referrer-Policy": "strict-origin-when-cross-origin",
  "Permissions-Policy": "geolocation=(), microphone=(), camera=()",
};

export function securityHeadersMiddleware(): RequestHandler {
  return (req, res, next) => {
    for (const [name, value] of Object.entries(STATIC_SECURITY_HEADERS)) {
      res.setHeader(name, value);
    }
    const nonce = mintNonce();
    setScopeValue(req, "cspNonce", nonce);
    res.setHeader("Content-Security-Policy", contentSecurityPolicy(nonce));
    next();
  };
}
