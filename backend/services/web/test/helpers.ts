// backend/services/web/test/helpers.ts
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadWebConfig, type WebConfig } from "../src/config";
import { InMemoryCatalog, type Guitar } from "../src/catalog/catalog";

/** Temp directory populated with `files` (relative path → contents). */
export async function tempTree(files: Record<string, string | Buffer>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "fretwire-web-"));
  for (const [rel, body] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, body);
  }
  return root;
}

/** Config as the service would load it, with rate limiting off unless asked. */
export function testConfig(env: Record<string, string> = {}, serviceRoot = os.tmpdir()): WebConfig {
  return loadWebConfig(
    { NODE_ENV: "test", LOG_LEVEL: "silent", RATE_LIMIT_ENABLED: "false", ...env },
    serviceRoot
  );
}

export const GUITARS: Guitar[] = [
  {
    slug: "aurora-s6",
    name: "Aurora S6",
    maker: "Northfield Workshop",
    body: "solid",
    priceCents: 129900,
    featured: true,
    summary: "Alder body.",
  },
  {
    slug: "delta-hb",
    name: "Delta HB",
    maker: "Northfield Workshop",
    body: "semi-hollow",
    priceCents: 179000,
    featured: false,
    summary: "Twin humbuckers & a center block.",
  },
];

export const testCatalog = () => new InMemoryCatalog(GUITARS);

export const tick = () => new Promise<void>((r) => setImmediate(r));

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));
