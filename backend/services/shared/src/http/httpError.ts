// backend/services/shared/src/http/httpError.ts
/**
 * Purpose:
 * - Client-facing failures are short plain-text bodies carrying the standard
 *   reason phrase and nothing from the server's internals.
 * - `HttpError` lets handlers signal such a failure through `next(err)`.
 */

import { STATUS_CODES, type ServerResponse } from "node:http";

export function reasonPhrase(status: number): string {
  return STATUS_CODES[status] ?? "Unknown Status";
}

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string = reasonPhrase(status)) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof HttpError;
}

/**
 * Write `status` with a `text/plain` reason phrase and end the response.
 * Headers already set by outer layers (request id, security headers) stay.
 */
export function writePlainError(
  res: ServerResponse,
  status: number,
  message: string = reasonPhrase(status)
): void {
  const body = `${message}\n`;
  res.statusCode = status;
  res.setHeader("Content-Type", "text/plain; charset=utf-8");
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("Content-Length", Buffer.byteLength(body));
  res.removeHeader("Content-Encoding");
  res.removeHeader("ETag");
  res.end(body);
}
