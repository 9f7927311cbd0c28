// backend/services/web/src/middleware/etag.ts
/**
 * Strong ETags for GET responses.
 *
 * The body is buffered until the handler ends the response, then
 * `ETag: "<first 16 hex of sha256(body)>"` is set (an empty body hashes the
 * URL path instead). A 200 whose tag matches `If-None-Match` becomes a
 * bodiless 304.
 *
 * Mount inside compression so the tag describes the uncompressed bytes.
 */

import type { OutgoingHttpHeaders } from "node:http";
import type { RequestHandler } from "express";
import { deferredCallback, toBuffer } from "@fretwire/shared/http/chunks";
import { etagOf } from "../assets/contentHasher";

/** `If-None-Match` may list several tags, weak or strong, or `*`. */
export function matchesIfNoneMatch(header: string | undefined, etag: string): boolean {
  if (!header) return false;
  const bare = etag.replace(/^W\//, "");
  return header
    .split(",")
    .map((t) => t.trim())
    .some((t) => t === "*" || t.replace(/^W\//, "") === bare);
}

export function etagMiddleware(): RequestHandler {
  return (req, res, next) => {
    if (req.method !== "GET") return next();

    const end = res.end.bind(res);
    const chunks: Buffer[] = [];
    let finished = false;

    // Status and headers set before `end` are recorded on the response and
    // sent by the real writeHead once the body is known.
    const writeHead = res.writeHead.bind(res);
    res.writeHead = (status: number, reasonOrHeaders?: unknown, maybeHeaders?: unknown) => {
      res.statusCode = status;
      if (typeof reasonOrHeaders === "string") res.statusMessage = reasonOrHeaders;
      const headers = typeof reasonOrHeaders === "string" ? maybeHeaders : reasonOrHeaders;
      if (headers && typeof headers === "object" && !Array.isArray(headers)) {
        const h: OutgoingHttpHeaders = { ...headers };
        for (const [k, v] of Object.entries(h)) {
          if (v !== undefined) res.setHeader(k, v);
        }
      }
      return finished ? writeHead(res.statusCode) : res;
    };

    res.write = (chunk: unknown, encoding?: unknown, callback?: unknown): boolean => {
      if (finished) return false;
      const buf = toBuffer(chunk, encoding);
      if (buf) chunks.push(buf);
      deferredCallback(encoding, callback)?.();
      return true;
    };

    res.end = (chunk?: unknown, encoding?: unknown, callback?: unknown) => {
      if (finished) return res;
      finished = true;
      const last = toBuffer(chunk, encoding);
      if (last) chunks.push(last);
      const body = Buffer.concat(chunks);
      const done = deferredCallback(chunk, encoding, callback);

      if (!res.hasHeader("ETag")) {
        res.setHeader("ETag", etagOf(body.length > 0 ? body : Buffer.from(req.path)));
      }
      const tag = String(res.getHeader("ETag"));

      if (res.statusCode === 200 && matchesIfNoneMatch(req.get("If-None-Match"), tag)) {
        res.statusCode = 304;
        for (const h of ["Content-Type", "Content-Length", "Transfer-Encoding"]) {
          res.removeHeader(h);
        }
        end(done);
        return res;
      }

      if (!res.hasHeader("Transfer-Encoding")) {
        res.setHeader("Content-Length", body.length);
      }
      end(body, done);
      return res;
    };

    next();
  };
}
