// backend/services/web/src/assets/manifestFile.ts
/**
 * On-disk manifest, written by the genstatic tool and optionally loaded at
 * boot instead of hashing the tree:
 *
 *   { "files": { "<logical>": { "path", "filename", "sri", "size", "content_type" } } }
 *
 * A file that is missing, unparseable, off-schema or empty is a startup error.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Logger } from "@fretwire/shared/utils/logger";
import { AssetManifest, type AssetRecord } from "./AssetManifest";
import { fingerprintFromPath } from "./contentHasher";

const entrySchema = z.object({
  path: z.string().min(1),
  filename: z.string().min(1),
  sri: z.string().regex(/^sha384-[A-Za-z0-9+/]+=*$/, "must be a sha384 SRI value"),
  size: z.number().int().nonnegative(),
  content_type: z.string().min(1),
});

export const manifestFileSchema = z.object({
  files: z.record(z.string().min(1), entrySchema),
});

export type ManifestFile = z.infer<typeof manifestFileSchema>;

export class ManifestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ManifestError";
  }
}

export function toManifestFile(manifest: AssetManifest): ManifestFile {
  const files: ManifestFile["files"] = {};
  for (const r of manifest.records()) {
    files[r.logicalPath] = {
      path: r.versionedPath,
      filename: path.posix.basename(r.versionedPath),
      sri: r.integrity,
      size: r.sizeBytes,
      content_type: r.contentType,
    };
  }
  return { files };
}

/** Write via a temp file + rename so readers never see a partial manifest. */
export async function writeManifestFile(
  file: string,
  manifest: AssetManifest
): Promise<void> {
  const tmp = `${file}.tmp`;
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(tmp, `${JSON.stringify(toManifestFile(manifest), null, 2)}\n`);
  await fs.rename(tmp, file);
}

export function parseManifestFile(
  raw: string,
  opts: { urlPrefix: string; log: Logger; source?: string }
): AssetManifest {
  const source = opts.source ?? "manifest";
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ManifestError(`${source}: not valid JSON`, { cause: err });
  }

  const parsed = manifestFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ManifestError(`${source}: ${issues}`);
  }

  const entries = Object.entries(parsed.data.files);
  if (entries.length === 0) throw new ManifestError(`${source}: manifest is empty`);

  const records: AssetRecord[] = entries.map(([logical, e]) => {
    const logicalPath = logical.startsWith("/") ? logical : `/${logical}`;
    const versionedPath = e.path.startsWith("/") ? e.path : `/${e.path}`;
    return {
      logicalPath,
      versionedPath,
      fingerprint: fingerprintFromPath(versionedPath) ?? "",
      integrity: e.sri,
      sizeBytes: e.size,
      contentType: e.content_type,
    };
  });
  return new AssetManifest(records, { urlPrefix: opts.urlPrefix, log: opts.log });
}

export async function loadManifestFile(
  file: string,
  opts: { urlPrefix: string; log: Logger }
): Promise<AssetManifest> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    throw new ManifestError(`${file}: cannot read manifest`, { cause: err });
  }
  const manifest = parseManifestFile(raw, { ...opts, source: file });
  opts.log.info({ file, assets: manifest.size }, "asset manifest loaded");
  return manifest;
}
