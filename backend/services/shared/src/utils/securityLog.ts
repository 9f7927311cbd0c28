// backend/services/shared/src/utils/securityLog.ts
/**
 * Guardrail decisions (rate limit, deadline) are security telemetry: one
 * compact warn line per denial on the "SECURITY" channel, never the request body.
 */

import type { IncomingMessage } from "node:http";
import type { Logger } from "./logger";
import { clientIpOf, requestIdOf } from "../http/requestScope";

export type SecurityLogDetails = {
  kind: "rate_limit" | "deadline";
  reason: string;
  decision: "blocked" | "allow";
  status: number;
  method: string;
  route: string;
  details?: Record<string, unknown>;
};

export function logSecurity(
  log: Logger,
  req: IncomingMessage,
  entry: SecurityLogDetails
): void {
  log.warn(
    {
      ch: "SECURITY",
      requestId: requestIdOf(req) || undefined,
      ip: clientIpOf(req),
      ...entry,
    },
    "security guardrail decision"
  );
}
