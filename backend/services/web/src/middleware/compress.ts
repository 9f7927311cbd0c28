// backend/services/web/src/middleware/compress.ts
/**
 * Streaming gzip for eligible responses.
 *
 * Decision happens at the first write (or end), once the handler has set its
 * Content-Type:
 * - request method is not HEAD and the client accepts gzip;
 * - status is not 204/304 and no Content-Encoding is set yet;
 * - Content-Type equals or starts with an allowed type.
 * An invalid level disables compression for the whole middleware (logged
 * once at construction); a zlib failure mid-stream ends the response.
 *
 * `Vary: Accept-Encoding` is added whenever the content type is eligible,
 * so caches keep gzip and identity variants apart.
 */

import zlib from "node:zlib";
import type { RequestHandler } from "express";
import type { Logger } from "@fretwire/shared/utils/logger";
import { deferredCallback, toBuffer } from "@fretwire/shared/http/chunks";

export const DEFAULT_COMPRESSIBLE_TYPES: readonly string[] = [
  "text/html",
  "text/css",
  "text/plain",
  "text/javascript",
  "text/xml",
  "application/javascript",
  "application/json",
  "application/xml",
  "image/svg+xml",
];

export type CompressOptions = {
  level: number;
  contentTypes?: readonly string[];
  log: Logger;
};

export function isCompressibleType(
  contentType: string,
  allowed: readonly string[]
): boolean {
  const ct = contentType.trim().toLowerCase();
  if (!ct) return false;
  return allowed.some((a) => ct === a || ct.startsWith(a));
}

export function isValidGzipLevel(level: number): boolean {
  return (
    Number.isInteger(level) &&
    level >= zlib.constants.Z_DEFAULT_COMPRESSION &&
    level <= zlib.constants.Z_BEST_COMPRESSION
  );
}

export function compressMiddleware(opts: CompressOptions): RequestHandler {
  const allowed = (opts.contentTypes ?? DEFAULT_COMPRESSIBLE_TYPES).map((t) =>
    t.toLowerCase()
  );
  const log = opts.log.child({ component: "compress" });
  const enabled = isValidGzipLevel(opts.level);
  if (!enabled) {
    log.warn({ gzipLevel: opts.level }, "invalid gzip level; compression disabled");
  }

  return (req, res, next) => {
    if (!enabled || req.method === "HEAD") return next();

    const write = res.write.bind(res);
    const end = res.end.bind(res);
    let gzip: zlib.Gzip | null | undefined;

    const decide = (): zlib.Gzip | null => {
      if (gzip !== undefined) return gzip;
      gzip = null;

      if (res.statusCode === 204 || res.statusCode === 304) return gzip;
      if (res.hasHeader("Content-Encoding")) return gzip;
      const ct = String(res.getHeader("Content-Type") ?? "");
      if (!isCompressibleType(ct, allowed)) return gzip;

      res.vary("Accept-Encoding");
      if (req.acceptsEncodings("gzip") !== "gzip") return gzip;

      const stream = zlib.createGzip({ level: opts.level });
      res.setHeader("Content-Encoding", "gzip");
      res.removeHeader("Content-Length");

      stream.on("data", (chunk: Buffer) => {
        write(chunk);
      });
      stream.on("end", () => {
        end();
      });
      stream.on("error", (err) => {
        log.error({ err, path: req.path }, "gzip stream failed");
        end();
      });
      gzip = stream;
      return gzip;
    };

    res.write = (chunk: unknown, encoding?: unknown, callback?: unknown): boolean => {
      const buf = toBuffer(chunk, encoding);
      const z = decide();
      if (!z) return buf ? write(buf, deferredCallback(encoding, callback)) : true;
      if (buf) z.write(buf);
      deferredCallback(encoding, callback)?.();
      return true;
    };

    res.end = (chunk?: unknown, encoding?: unknown, callback?: unknown) => {
      const buf = toBuffer(chunk, encoding);
      const done = deferredCallback(chunk, encoding, callback);
      const z = decide();
      if (!z) {
        if (buf) end(buf, done);
        else end(done);
        return res;
      }
      if (done) z.once("end", done);
      if (buf) z.end(buf);
      else z.end();
      return res;
    };

    next();
  };
}
