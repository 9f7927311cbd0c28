// backend/services/shared/src/http/requestScope.ts
/**
 * Purpose:
 * - Request-scoped values (request id, resolved client IP, CSP nonce, deadline
 *   signal) attached to the inbound request object.
 *
 * Invariants:
 * - Each value is write-once. A second write is a programmer error and throws.
 * - Keyed by the raw IncomingMessage so pino-http callbacks (which only see
 *   node types) and Express handlers read the same scope.
 */

import type { IncomingMessage } from "node:http";

export type RequestScope = {
  requestId: string;
  clientIp: string;
  cspNonce: string;
  signal: AbortSignal;
};

export type RequestScopeKey = keyof RequestScope;

const scopes = new WeakMap<IncomingMessage, Partial<RequestScope>>();

export class RequestScopeError extends Error {
  constructor(readonly key: RequestScopeKey) {
    super(`request scope value "${key}" is already set`);
    this.name = "RequestScopeError";
  }
}

export function setScopeValue<K extends RequestScopeKey>(
  req: IncomingMessage,
  key: K,
  value: RequestScope[K]
): void {
  const scope = scopes.get(req) ?? {};
  if (scope[key] !== undefined) throw new RequestScopeError(key);
  scope[key] = value;
  scopes.set(req, scope);
}

export function getScopeValue<K extends RequestScopeKey>(
  req: IncomingMessage,
  key: K
): RequestScope[K] | undefined {
  return scopes.get(req)?.[key];
}

/** Empty string until the request-id layer has run. */
export function requestIdOf(req: IncomingMessage): string {
  return getScopeValue(req, "requestId") ?? "";
}

/** Resolved client IP, falling back to the socket peer. */
export function clientIpOf(req: IncomingMessage): string {
  return (
    getScopeValue(req, "clientIp") ?? req.socket?.remoteAddress ?? "unknown"
  );
}
