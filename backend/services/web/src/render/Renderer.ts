// backend/services/web/src/render/Renderer.ts
/**
 * Purpose:
 * - Turn a named view plus its data into one complete HTML response.
 *
 * Invariants:
 * - The page is rendered fully into a pooled buffer before anything is
 *   written; a throwing view yields a plain 500 and none of its output.
 * - Status, headers and body go out in a single `res.end`.
 * - A name with no registered view answers 404.
 */

import type { Request, Response } from "express";
import type { Logger } from "@fretwire/shared/utils/logger";
import { writePlainError } from "@fretwire/shared/http/httpError";
import { getScopeValue, requestIdOf } from "@fretwire/shared/http/requestScope";
import type { BufferPool, GrowableBuffer } from "./BufferPool";

export interface AssetHelpers {
  assetUrl(logicalPath: string): string;
  assetSri(logicalPath: string): string;
}

export type RenderContext = {
  /** CSP nonce for inline scripts; "" when the security-header layer did not run. */
  nonce: string;
  requestId: string;
  assetUrl: (logicalPath: string) => string;
  assetSri: (logicalPath: string) => string;
};

export type View<D> = (out: GrowableBuffer, data: D, ctx: RenderContext) => void;

/** Maps each view name to the data type it renders. */
export type ViewTable<V> = { [K in keyof V]?: View<V[K]> };

export type RendererOptions = {
  pool: BufferPool;
  assets: AssetHelpers;
  log: Logger;
};

export class Renderer<V extends object> {
  private readonly log: Logger;

  constructor(
    private readonly views: ViewTable<V>,
    private readonly opts: RendererOptions
  ) {
    this.log = opts.log.child({ component: "render" });
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.views, name);
  }

  html<K extends keyof V & string>(
    req: Request,
    res: Response,
    name: K,
    data: V[K],
    status = 200
  ): void {
    const view = this.has(name) ? this.views[name] : undefined;
    if (!view) {
      this.log.warn({ view: name, requestId: requestIdOf(req) }, "unknown view");
      writePlainError(res, 404);
      return;
    }

    const ctx: RenderContext = {
      nonce: getScopeValue(req, "cspNonce") ?? "",
      requestId: requestIdOf(req),
      assetUrl: (p) => this.opts.assets.assetUrl(p),
      assetSri: (p) => this.opts.assets.assetSri(p),
    };

    let body: Buffer;
    try {
      body = this.opts.pool.withBuffer((out) => {
        view(out, data, ctx);
        return out.bytes();
      });
    } catch (err) {
      this.log.error({ err, view: name, requestId: ctx.requestId }, "render failed");
      writePlainError(res, 500);
      return;
    }

    res.statusCode = status;
    res.setHeader("Content-Type", "text/html; charset=utf-8");
    res.setHeader("Content-Length", body.length);
    res.end(body);
  }
}
