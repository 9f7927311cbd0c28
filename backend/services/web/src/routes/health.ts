// backend/services/web/src/routes/health.ts
import { Router } from "express";

/** Liveness only; the process being able to answer is the whole check. */
export function healthRouter(): Router {
  const r = Router();
  r.get("/healthz", (_req, res) => {
    res.setHeader("Cache-Control", "no-store");
    res.type("text/plain").send("ok");
  });
  return r;
}
