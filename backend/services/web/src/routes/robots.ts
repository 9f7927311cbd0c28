// backend/services/web/src/routes/robots.ts
import { Router } from "express";

export const ROBOTS_TXT = [
  "User-agent: *",
  "Allow: /",
  "Disallow: /healthz",
  "",
].join("\n");

export function robotsRouter(): Router {
  const r = Router();
  r.get("/robots.txt", (_req, res) => {
    res.setHeader("Cache-Control", "public, max-age=86400");
    res.type("text/plain").send(ROBOTS_TXT);
  });
  return r;
}
