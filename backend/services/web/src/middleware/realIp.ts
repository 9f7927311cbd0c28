// backend/services/web/src/middleware/realIp.ts
/**
 * Resolve the real client IP.
 *
 * Proxy headers are honoured only when the direct peer is a trusted proxy,
 * checked in order: X-Forwarded-For (first entry), X-Real-IP, X-Client-IP,
 * CF-Connecting-IP. The first one holding a valid IP wins; otherwise the
 * peer address stands.
 */

import type { Request, RequestHandler } from "express";
import { setScopeValue } from "@fretwire/shared/http/requestScope";
import {
  TrustedProxies,
  normalizeIp,
} from "@fretwire/shared/utils/clientIp";

const SINGLE_IP_HEADERS = ["X-Real-IP", "X-Client-IP", "CF-Connecting-IP"];

export function resolveClientIp(req: Request, trusted: TrustedProxies): string {
  const peerRaw = req.socket.remoteAddress ?? "";
  const peer = normalizeIp(peerRaw) || peerRaw || "unknown";
  if (!trusted.has(peerRaw)) return peer;

  const xff = req.get("X-Forwarded-For");
  if (xff) {
    const first = normalizeIp(xff.split(",")[0]);
    if (first) return first;
  }

  for (const name of SINGLE_IP_HEADERS) {
    const ip = normalizeIp(req.get(name));
    if (ip) return ip;
  }
  return peer;
}

export function realIpMiddleware(trustedProxies: readonly string[]): RequestHandler {
  const trusted = new TrustedProxies(trustedProxies);
  return (req, _res, next) => {
    setScopeValue(req, "clientIp", resolveClientIp(req, trusted));
    next();
  };
}
