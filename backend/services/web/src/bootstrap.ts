// backend/services/web/src/bootstrap.ts
/**
 * Boot sequence for the web edge:
 *   env cascade → config → logger → asset manifest → catalog → app → listen.
 *
 * Startup-fatal conditions (bad config, unreadable or empty manifest) reject
 * before the server binds; the entrypoint logs them at fatal and exits 1.
 */

import path from "node:path";
import { loadEnvCascadeForService } from "@fretwire/shared/env";
import { createLogger, type Logger } from "@fretwire/shared/utils/logger";
import {
  startHttpService,
  type StartedService,
} from "@fretwire/shared/bootstrap/startHttpService";
import { buildApp } from "./app";
import type { AssetManifest } from "./assets/AssetManifest";
import { buildManifest } from "./assets/buildManifest";
import { loadManifestFile, ManifestError } from "./assets/manifestFile";
import { loadCatalogFile } from "./catalog/catalog";
import { loadWebConfig, SERVICE_NAME, type WebConfig } from "./config";

/** Manifest from the configured file when set, else hashed from the tree. */
export async function loadAssets(config: WebConfig, log: Logger): Promise<AssetManifest> {
  const { dir, prefix, manifestFile, maxBytes } = config.assets;
  const manifest = manifestFile
    ? await loadManifestFile(manifestFile, { urlPrefix: prefix, log })
    : await buildManifest(dir, {
        urlPrefix: prefix,
        maxBytes,
        log,
        manifestName: "manifest.json",
      });
  if (manifest.size === 0) {
    throw new ManifestError(`no assets found under ${dir}`);
  }
  return manifest;
}

export type BootOptions = {
  /** Directory holding `.env*`, `data/` and the default static root. */
  serviceRoot: string;
};

export async function boot(
  opts: BootOptions
): Promise<StartedService & { config: WebConfig; log: Logger }> {
  const env = loadEnvCascadeForService(opts.serviceRoot);
  const config = loadWebConfig(process.env, opts.serviceRoot);
  const log = createLogger({ service: SERVICE_NAME, level: config.logLevel });
  log.info({ mode: env.mode, envFiles: env.loaded }, "environment loaded");

  const manifest = await loadAssets(config, log);
  const catalog = await loadCatalogFile(path.join(opts.serviceRoot, "data", "catalog.json"));

  const { app, limiter } = buildApp({ config, log, manifest, catalog });
  const started = await startHttpService({
    app,
    host: config.host,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger: log,
    onStop: () => limiter?.stop(),
  });
  return { ...started, config, log };
}
