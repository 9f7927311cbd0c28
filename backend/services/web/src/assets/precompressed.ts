// backend/services/web/src/assets/precompressed.ts
/**
 * Static asset server that prefers precompressed siblings.
 *
 * GET/HEAD:
 * - A fingerprinted URL ("/js/app.1a2b3c4d.js") maps back to its logical file
 *   through the manifest; anything else is served as named.
 * - `.br` when the client accepts br and the sibling exists, then `.gz` for
 *   gzip, then the original bytes. Sibling existence comes from the TTL cache.
 * - Content-Type always follows the original file's extension.
 * - `Vary: Accept-Encoding` on every answer.
 * - The chosen file is streamed by `res.sendFile`, which also answers
 *   conditional (304) and range (206) requests.
 *
 * Other methods go to `express.static`, which answers 405 with `Allow`.
 */

import path from "node:path";
import express, {
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import type { Logger } from "@fretwire/shared/utils/logger";
import { asyncHandler } from "@fretwire/shared/http/asyncHandler";
import { writePlainError } from "@fretwire/shared/http/httpError";
import type { AssetManifest } from "./AssetManifest";
import { contentTypeOf } from "./contentTypes";
import { isRegularFile, type ExistenceCache } from "./existenceCache";

export const IMMUTABLE_CACHE_CONTROL = "public, max-age=31536000, immutable";
export const DEFAULT_CACHE_CONTROL = "public, max-age=3600";

export type PrecompressedAssetsOptions = {
  /** Absolute or cwd-relative static root. */
  root: string;
  manifest: AssetManifest;
  cache: ExistenceCache;
  log: Logger;
};

type Variant = { file: string; encoding?: "br" | "gzip" };

type ResolvedAsset = { logicalPath: string; fingerprinted: boolean };

/** Decoded, slash-led URL path with no empty, dot or dot-dot segments. */
export function safeUrlPath(rawPath: string): string | undefined {
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    return undefined;
  }
  if (decoded.includes("\0") || decoded.includes("\\")) return undefined;
  const segments = decoded.split("/").filter((s) => s.length > 0);
  if (segments.length === 0) return undefined;
  if (segments.some((s) => s.startsWith("."))) return undefined;
  return `/${segments.join("/")}`;
}

/** Absolute file path for `logicalPath`, or undefined if it escapes `rootAbs`. */
export function resolveUnderRoot(rootAbs: string, logicalPath: string): string | undefined {
  const abs = path.resolve(rootAbs, `.${logicalPath}`);
  return abs.startsWith(rootAbs + path.sep) ? abs : undefined;
}

function resolveAsset(manifest: AssetManifest, urlPath: string): ResolvedAsset {
  const rec = manifest.lookupVersioned(urlPath);
  if (rec) return { logicalPath: rec.logicalPath, fingerprinted: true };
  return { logicalPath: urlPath, fingerprinted: false };
}

function statusOf(err: Error): number | undefined {
  return "status" in err && typeof err.status === "number" ? err.status : undefined;
}

/** Root-relative, URL-encoded path as `send` expects it. */
function sendPath(rootAbs: string, file: string): string {
  return path.relative(rootAbs, file).split(path.sep).map(encodeURIComponent).join("/");
}

export function precompressedAssets(opts: PrecompressedAssetsOptions): RequestHandler {
  const rootAbs = path.resolve(opts.root);
  const log = opts.log.child({ component: "static" });
  const fallback = express.static(rootAbs, {
    fallthrough: false,
    index: false,
    dotfiles: "ignore",
  });

  const pickVariant = async (req: Request, abs: string): Promise<Variant> => {
    if (req.acceptsEncodings("br") === "br" && (await opts.cache.exists(`${abs}.br`))) {
      return { file: `${abs}.br`, encoding: "br" };
    }
    if (req.acceptsEncodings("gzip") === "gzip" && (await opts.cache.exists(`${abs}.gz`))) {
      return { file: `${abs}.gz`, encoding: "gzip" };
    }
    return { file: abs };
  };

  const serve = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    res.vary("Accept-Encoding");
    const urlPath = safeUrlPath(req.path);
    if (!urlPath) {
      writePlainError(res, 404);
      return;
    }
    const asset = resolveAsset(opts.manifest, urlPath);
    const abs = resolveUnderRoot(rootAbs, asset.logicalPath);
    if (!abs || !(await isRegularFile(abs))) {
      log.debug({ path: urlPath }, "asset not found");
      writePlainError(res, 404);
      return;
    }

    const variant = await pickVariant(req, abs);

    res.setHeader("Content-Type", contentTypeOf(asset.logicalPath));
    if (variant.encoding) res.setHeader("Content-Encoding", variant.encoding);
    res.setHeader(
      "Cache-Control",
      variant.encoding || asset.fingerprinted ? IMMUTABLE_CACHE_CONTROL : DEFAULT_CACHE_CONTROL
    );

    res.sendFile(sendPath(rootAbs, variant.file), { root: rootAbs }, (err?: Error) => {
      if (!err) return;
      if (res.headersSent) {
        log.debug({ err, path: urlPath }, "asset transfer aborted");
        return;
      }
      const status = statusOf(err);
      if (status !== undefined && status < 500) {
        res.removeHeader("Cache-Control");
        writePlainError(res, status);
        return;
      }
      next(err);
    });
  };

  const handler = asyncHandler(serve);

  return (req, res, next) => {
    if (req.method !== "GET" && req.method !== "HEAD") {
      fallback(req, res, next);
      return;
    }
    handler(req, res, next);
  };
}
