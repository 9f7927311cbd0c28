// backend/services/web/src/routes/pages.ts
/**
 * Page routes are data: the catalog side hands the app a list of
 * `{ method, path, handler }` and the app mounts them behind compression and
 * ETags. Handlers render through the pooled renderer and may be async; a
 * rejection reaches the error funnel like a thrown error.
 */

import type { RequestHandler, Router } from "express";
import { asyncHandler, type MaybeAsyncHandler } from "@fretwire/shared/http/asyncHandler";
import { HttpError } from "@fretwire/shared/http/httpError";
import type { GuitarCatalog } from "../catalog/catalog";
import type { Renderer } from "../render/Renderer";
import type { WebViews } from "../views";

export type PageMethod = "get" | "post" | "put" | "patch" | "delete";

export interface PageRoute {
  method: PageMethod;
  /** Express path pattern, e.g. "/guitars/:slug". */
  path: string;
  handler: MaybeAsyncHandler;
}

/** `wrap` runs in front of every page handler (compression, ETags). */
export function mountPageRoutes(
  router: Router,
  routes: readonly PageRoute[],
  wrap: readonly RequestHandler[] = []
): void {
  for (const route of routes) {
    router[route.method](route.path, ...wrap, asyncHandler(route.handler));
  }
}

export function catalogPages(deps: {
  catalog: GuitarCatalog;
  renderer: Renderer<WebViews>;
}): PageRoute[] {
  const { catalog, renderer } = deps;
  return [
    {
      method: "get",
      path: "/",
      handler: (req, res) => {
        renderer.html(req, res, "home", { featured: catalog.featured() });
      },
    },
    {
      method: "get",
      path: "/guitars/:slug",
      handler: (req, res, next) => {
        const guitar = catalog.bySlug(req.params.slug);
        if (!guitar) {
          next(new HttpError(404));
          return;
        }
        renderer.html(req, res, "guitar", { guitar });
      },
    },
  ];
}
