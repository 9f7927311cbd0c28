// backend/services/web/src/assets/buildManifest.ts
/**
 * Walk the static tree once and fingerprint every eligible file.
 *
 * Skipped: dot-files and dot-dirs, precompressed siblings (.br/.gz),
 * temporaries (.tmp), the manifest file itself, and anything above the size
 * ceiling (served unversioned; logged at debug).
 *
 * Rejects when the root cannot be read.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "@fretwire/shared/utils/logger";
import { AssetManifest, type AssetRecord } from "./AssetManifest";
import { fingerprintOf, integrityOf, versionedPathOf } from "./contentHasher";
import { contentTypeOf } from "./contentTypes";

export const DEFAULT_ASSET_MAX_BYTES = 10 * 1024 * 1024;
export const DEFAULT_MANIFEST_NAME = "manifest.json";

const NEVER_FINGERPRINT = new Set([".br", ".gz", ".tmp"]);

export type BuildManifestOptions = {
  log: Logger;
  urlPrefix: string;
  maxBytes?: number;
  /** File name (in any directory) that is never fingerprinted. */
  manifestName?: string;
};

export function isFingerprintable(relPath: string, manifestName: string): boolean {
  const segments = relPath.split("/").filter(Boolean);
  if (segments.some((s) => s.startsWith("."))) return false;
  const base = segments[segments.length - 1] ?? "";
  if (base === manifestName) return false;
  return !NEVER_FINGERPRINT.has(path.extname(base).toLowerCase());
}

/** Every regular file below `root`, as "/a/b.ext" paths in sorted order. */
export async function listFiles(root: string): Promise<string[]> {
  const out: string[] = [];
  const walk = async (dirAbs: string, rel: string): Promise<void> => {
    const entries = await fs.readdir(dirAbs, { withFileTypes: true });
    for (const entry of entries) {
      const childRel = `${rel}/${entry.name}`;
      if (entry.isDirectory()) {
        await walk(path.join(dirAbs, entry.name), childRel);
      } else if (entry.isFile()) {
        out.push(childRel);
      }
    }
  };
  await walk(path.resolve(root), "");
  return out.sort();
}

export async function hashAsset(
  root: string,
  logicalPath: string
): Promise<AssetRecord> {
  const data = await fs.readFile(path.join(root, logicalPath));
  const fingerprint = fingerprintOf(data);
  return {
    logicalPath,
    versionedPath: versionedPathOf(logicalPath, fingerprint),
    fingerprint,
    integrity: integrityOf(data),
    sizeBytes: data.length,
    contentType: contentTypeOf(logicalPath),
  };
}

export async function buildManifest(
  root: string,
  opts: BuildManifestOptions
): Promise<AssetManifest> {
  const maxBytes = opts.maxBytes ?? DEFAULT_ASSET_MAX_BYTES;
  const manifestName = opts.manifestName ?? DEFAULT_MANIFEST_NAME;
  const log = opts.log.child({ component: "manifest" });

  const records: AssetRecord[] = [];
  let skipped = 0;
  for (const rel of await listFiles(root)) {
    if (!isFingerprintable(rel, manifestName)) continue;
    const stat = await fs.stat(path.join(root, rel));
    if (stat.size > maxBytes) {
      skipped++;
      log.debug({ path: rel, size: stat.size, maxBytes }, "asset too large to fingerprint");
      continue;
    }
    records.push(await hashAsset(root, rel));
  }

  log.info({ root, assets: records.length, skipped }, "asset manifest built");
  return new AssetManifest(records, { urlPrefix: opts.urlPrefix, log: opts.log });
}
