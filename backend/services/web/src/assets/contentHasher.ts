// backend/services/web/src/assets/contentHasher.ts
/**
 * Pure digest helpers shared by the manifest builder, the ETag layer and the
 * precompression tool. Same bytes in, same strings out.
 */

import { createHash } from "node:crypto";
import path from "node:path";

export const FINGERPRINT_LENGTH = 8;

export function sha256Hex(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/** First 8 hex chars of the SHA-256 digest. */
export function fingerprintOf(data: Buffer): string {
  return sha256Hex(data).slice(0, FINGERPRINT_LENGTH);
}

/** Subresource Integrity value: `sha384-<base64 digest>`. */
export function integrityOf(data: Buffer): string {
  return `sha384-${createHash("sha384").update(data).digest("base64")}`;
}

/** Quoted strong ETag from the first 8 digest bytes (16 hex chars). */
export function etagOf(data: Buffer): string {
  return `"${sha256Hex(data).slice(0, 16)}"`;
}

/**
 * `css/app.min.css` + `a1b2c3d4` → `css/app.min.a1b2c3d4.css`.
 * Only the last extension moves; extension-less names get a bare suffix.
 */
export function versionedPathOf(logicalPath: string, fingerprint: string): string {
  const dir = path.posix.dirname(logicalPath);
  const ext = path.posix.extname(logicalPath);
  const base = path.posix.basename(logicalPath, ext);
  const name = `${base}.${fingerprint}${ext}`;
  return dir === "." ? name : path.posix.join(dir, name);
}

const VERSIONED_NAME = /\.([0-9a-f]{8})(\.[^./]+)?$/;

/** Fingerprint embedded in a versioned path, or undefined. */
export function fingerprintFromPath(versionedPath: string): string | undefined {
  return VERSIONED_NAME.exec(path.posix.basename(versionedPath))?.[1];
}
