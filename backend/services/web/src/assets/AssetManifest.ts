// backend/services/web/src/assets/AssetManifest.ts
/**
 * Purpose:
 * - Immutable map from logical asset paths ("/css/app.css") to their
 *   fingerprinted form ("/css/app.1a2b3c4d.css") and SRI digest.
 * - Template helpers (`assetUrl`, `assetSri`, `has`) and the reverse lookup
 *   the asset server uses to find the physical file behind a versioned URL.
 *
 * Invariants:
 * - Built (or loaded) once before the server listens; frozen afterwards, so
 *   concurrent readers need no coordination.
 * - Lookups try the path as given and with its leading slash toggled; case
 *   is otherwise exact.
 * - A missing asset falls back to its unversioned URL (SRI "") and is
 *   warned about once per path.
 */

import type { Logger } from "@fretwire/shared/utils/logger";

export interface AssetRecord {
  /** Path relative to the static root, with a leading slash. */
  readonly logicalPath: string;
  readonly versionedPath: string;
  readonly fingerprint: string;
  /** `sha384-<base64>` */
  readonly integrity: string;
  readonly sizeBytes: number;
  readonly contentType: string;
}

export type AssetManifestOptions = {
  /** URL prefix the static root is mounted at, e.g. "/static". */
  urlPrefix: string;
  log: Logger;
};

function withLeadingSlash(p: string): string {
  return p.startsWith("/") ? p : `/${p}`;
}

function toggleLeadingSlash(p: string): string {
  return p.startsWith("/") ? p.slice(1) : `/${p}`;
}

export class AssetManifest {
  private readonly byLogical: ReadonlyMap<string, AssetRecord>;
  private readonly byVersioned: ReadonlyMap<string, AssetRecord>;
  private readonly urlPrefix: string;
  private readonly log: Logger;
  private readonly warned = new Set<string>();

  constructor(records: Iterable<AssetRecord>, opts: AssetManifestOptions) {
    const logical = new Map<string, AssetRecord>();
    const versioned = new Map<string, AssetRecord>();
    for (const r of records) {
      const rec: AssetRecord = Object.freeze({ ...r });
      logical.set(rec.logicalPath, rec);
      versioned.set(rec.versionedPath, rec);
    }
    this.byLogical = logical;
    this.byVersioned = versioned;
    this.urlPrefix = opts.urlPrefix.replace(/\/+$/, "");
    this.log = opts.log.child({ component: "assets" });
  }

  get size(): number {
    return this.byLogical.size;
  }

  /** Records sorted by logical path. */
  records(): AssetRecord[] {
    return [...this.byLogical.values()].sort((a, b) =>
      a.logicalPath < b.logicalPath ? -1 : a.logicalPath > b.logicalPath ? 1 : 0
    );
  }

  lookup(logicalPath: string): AssetRecord | undefined {
    return (
      this.byLogical.get(logicalPath) ??
      this.byLogical.get(toggleLeadingSlash(logicalPath))
    );
  }

  /** Reverse lookup by fingerprinted path (relative to the static root). */
  lookupVersioned(versionedPath: string): AssetRecord | undefined {
    return (
      this.byVersioned.get(versionedPath) ??
      this.byVersioned.get(toggleLeadingSlash(versionedPath))
    );
  }

  has(logicalPath: string): boolean {
    return this.lookup(logicalPath) !== undefined;
  }

  assetUrl(logicalPath: string): string {
    const rec = this.lookup(logicalPath);
    if (rec) return `${this.urlPrefix}${rec.versionedPath}`;
    this.warnMissing(logicalPath);
    return `${this.urlPrefix}${withLeadingSlash(logicalPath)}`;
  }

  assetSri(logicalPath: string): string {
    const rec = this.lookup(logicalPath);
    if (rec) return rec.integrity;
    this.warnMissing(logicalPath);
    return "";
  }

  private warnMissing(logicalPath: string): void {
    const key = withLeadingSlash(logicalPath);
    if (this.warned.has(key)) return;
    this.warned.add(key);
    this.log.warn({ path: logicalPath }, "asset not found in manifest");
  }
}
