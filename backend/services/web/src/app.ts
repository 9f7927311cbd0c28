// backend/services/web/src/app.ts
/**
 * Purpose:
 * - Assemble the web edge: one Express app, layers in a fixed order.
 *
 * Order (outermost first):
 *   requestId → realIp → [hsts | httpsRedirect] → [rateLimit] → logging →
 *   deadlineGuard( securityHeaders → health, robots, static assets,
 *                  pages (compress → etag → handler) → 404 )
 *   → recoverer (error tail)
 *
 * Notes:
 * - The request id is set before anything can log or reject.
 * - Rate limiting keys on the resolved client IP, so it follows realIp.
 * - Everything inside the deadline guard writes to a captured response; the
 *   client sees either that response whole or a 408.
 * - Compression wraps ETag so the tag is taken over uncompressed bytes.
 */

import express, { type Express } from "express";
import type { Logger } from "@fretwire/shared/utils/logger";
import type { WebConfig } from "./config";
import type { AssetManifest } from "./assets/AssetManifest";
import { ExistenceCache } from "./assets/existenceCache";
import { precompressedAssets } from "./assets/precompressed";
import type { GuitarCatalog } from "./catalog/catalog";
import { SlidingWindowLimiter } from "./limiter/SlidingWindowLimiter";
import { compressMiddleware } from "./middleware/compress";
import { deadlineGuard } from "./middleware/deadline";
import { etagMiddleware } from "./middleware/etag";
import { hstsMiddleware, httpsRedirectMiddleware } from "./middleware/https";
import { loggingMiddleware } from "./middleware/logging";
import { rateLimitMiddleware } from "./middleware/rateLimit";
import { realIpMiddleware } from "./middleware/realIp";
import { notFoundHandler, recoverer } from "./middleware/recoverer";
import { requestIdMiddleware } from "./middleware/requestId";
import { securityHeadersMiddleware } from "./middleware/securityHeaders";
import { BufferPool } from "./render/BufferPool";
import { Renderer } from "./render/Renderer";
import { healthRouter } from "./routes/health";
import { catalogPages, mountPageRoutes, type PageRoute } from "./routes/pages";
import { robotsRouter } from "./routes/robots";
import { webViews, type WebViews } from "./views";

export interface WebAppDeps {
  config: WebConfig;
  log: Logger;
  manifest: AssetManifest;
  catalog: GuitarCatalog;
  /** Shared with the entrypoint so shutdown can stop its sweeper. */
  limiter?: SlidingWindowLimiter;
  existence?: ExistenceCache;
  pool?: BufferPool;
  /** Replaces the catalog pages (tests mount their own handlers). */
  pages?: (renderer: Renderer<WebViews>) => PageRoute[];
}

export interface WebApp {
  app: Express;
  limiter: SlidingWindowLimiter | undefined;
  renderer: Renderer<WebViews>;
}

export function buildApp(deps: WebAppDeps): WebApp {
  const { config, log, manifest } = deps;

  const app = express();
  app.disable("x-powered-by");
  app.disable("etag");

  // ── Identity & transport ────────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(realIpMiddleware(config.trustedProxies));
  if (config.https.hsts) app.use(hstsMiddleware(config.trustedProxies));
  if (config.https.force) app.use(httpsRedirectMiddleware(config.trustedProxies));

  // ── Edge guardrails ────────────────────────────────────────────────────────
  let limiter: SlidingWindowLimiter | undefined;
  if (config.rateLimit.enabled) {
    limiter =
      deps.limiter ??
      new SlidingWindowLimiter({
        limit: config.rateLimit.points,
        windowMs: config.rateLimit.windowMs,
        sweepMs: config.rateLimit.sweepMs,
      });
    app.use(rateLimitMiddleware(limiter, { log }));
  }

  app.use(loggingMiddleware(log));

  // ── Guarded chain ──────────────────────────────────────────────────────────
  const renderer = new Renderer<WebViews>(webViews, {
    pool: deps.pool ?? new BufferPool(),
    assets: manifest,
    log,
  });

  const inner = express.Router();
  inner.use(securityHeadersMiddleware());
  inner.use(healthRouter());
  inner.use(robotsRouter());
  inner.use(
    config.assets.prefix,
    precompressedAssets({
      root: config.assets.dir,
      manifest,
      cache:
        deps.existence ?? new ExistenceCache({ ttlMs: config.assets.existenceTtlMs }),
      log,
    })
  );

  mountPageRoutes(
    inner,
    deps.pages ? deps.pages(renderer) : catalogPages({ catalog: deps.catalog, renderer }),
    [compressMiddleware({ level: config.compressLevel, log }), etagMiddleware()]
  );
  inner.use(notFoundHandler());

  app.use(deadlineGuard({ timeoutMs: config.requestTimeoutMs, log }, inner));

  // ── Tail ───────────────────────────────────────────────────────────────────
  app.use(notFoundHandler());
  app.use(recoverer(log));

  return { app, limiter, renderer };
}
