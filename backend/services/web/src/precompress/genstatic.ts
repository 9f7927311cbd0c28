// backend/services/web/src/precompress/genstatic.ts
/**
 * Purpose:
 * - Build step that writes `.br` / `.gz` siblings next to text-like static
 *   assets so the asset server can hand them out without compressing per
 *   request. Optionally writes the asset manifest file as well.
 *
 * Invariants:
 * - A sibling is rewritten only when missing or older than its source
 *   (1s tolerance for coarse filesystem clocks).
 * - Output goes to `<dst>.tmp` first and is renamed into place; a failed
 *   write leaves no partial sibling behind.
 */

import fs from "node:fs/promises";
import { createReadStream, createWriteStream } from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import zlib from "node:zlib";
import type { Logger } from "@fretwire/shared/utils/logger";
import { buildManifest, listFiles } from "../assets/buildManifest";
import { writeManifestFile } from "../assets/manifestFile";

export const PRECOMPRESS_EXTENSIONS: readonly string[] = [
  ".js",
  ".mjs",
  ".css",
  ".svg",
  ".json",
  ".wasm",
  ".txt",
  ".xml",
];

export const MTIME_TOLERANCE_MS = 1000;

export type SiblingEncoding = "br" | "gzip";

export interface GenstaticOptions {
  src: string;
  brotli: boolean;
  gzip: boolean;
  /** Brotli quality 0–11. */
  brQuality: number;
  /** Gzip level 1–9. */
  gzLevel: number;
  /** Write the asset manifest here after compressing. */
  manifest?: string;
}

export interface GenstaticResult {
  scanned: number;
  br: number;
  gz: number;
  upToDate: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function shouldPrecompress(file: string): boolean {
  return PRECOMPRESS_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

function parseIntFlag(raw: string, name: string, min: number, max: number): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new UsageError(`--${name} must be an integer in ${min}..${max}, got "${raw}"`);
  }
  return n;
}

/**
 * `--src <dir> --brotli --gzip --brq <n> --gzq <n> --manifest <file>`.
 * Boolean flags may be given as `--gzip` or `--gzip=false`.
 */
export function parseGenstaticArgs(args: readonly string[]): GenstaticOptions {
  const opts: GenstaticOptions = {
    src: "static",
    brotli: false,
    gzip: false,
    brQuality: 11,
    gzLevel: 9,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) throw new UsageError(`unexpected argument "${arg}"`);
    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = args[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`--${name} needs a value`);
      }
      i++;
      return next;
    };
    const bool = (): boolean => {
      if (inline === undefined) return true;
      if (inline === "true") return true;
      if (inline === "false") return false;
      throw new UsageError(`--${name} takes true or false, got "${inline}"`);
    };

    switch (name) {
      case "src":
        opts.src = value();
        break;
      case "brotli":
        opts.brotli = bool();
        break;
      case "gzip":
        opts.gzip = bool();
        break;
      case "brq":
        opts.brQuality = parseIntFlag(value(), name, 0, 11);
        break;
      case "gzq":
        opts.gzLevel = parseIntFlag(value(), name, 1, 9);
        break;
      case "manifest":
        opts.manifest = value();
        break;
      default:
        throw new UsageError(`unknown flag --${name}`);
    }
  }

  if (!opts.brotli && !opts.gzip && !opts.manifest) {
    throw new UsageError("nothing to do: enable --brotli, --gzip and/or --manifest");
  }
  return opts;
}

export async function isUpToDate(src: string, dst: string): Promise<boolean> {
  try {
    const [s, d] = await Promise.all([fs.stat(src), fs.stat(dst)]);
    return d.mtimeMs >= s.mtimeMs - MTIME_TOLERANCE_MS;
  } catch {
    return false;
  }
}

function encoderFor(encoding: SiblingEncoding, level: number): zlib.BrotliCompress | zlib.Gzip {
  if (encoding === "br") {
    return zlib.createBrotliCompress({
      params: { [zlib.constants.BROTLI_PARAM_QUALITY]: level },
    });
  }
  return zlib.createGzip({ level });
}

/** Writes `<src>.br` or `<src>.gz`; false when the sibling was already fresh. */
export async function precompressFile(
  src: string,
  encoding: SiblingEncoding,
  level: number
): Promise<boolean> {
  const dst = `${src}${encoding === "br" ? ".br" : ".gz"}`;
  if (await isUpToDate(src, dst)) return false;

  const tmp = `${dst}.tmp`;
  try {
    await pipeline(createReadStream(src), encoderFor(encoding, level), createWriteStream(tmp));
    await fs.rename(tmp, dst);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
  return true;
}

export async function runGenstatic(
  opts: GenstaticOptions,
  log: Logger
): Promise<GenstaticResult> {
  const root = path.resolve(opts.src);
  const manifestAbs = opts.manifest ? path.resolve(opts.manifest) : undefined;
  const result: GenstaticResult = { scanned: 0, br: 0, gz: 0, upToDate: 0 };

  if (opts.brotli || opts.gzip) {
    for (const rel of await listFiles(root)) {
      const file = path.join(root, rel);
      if (!shouldPrecompress(file) || file === manifestAbs) continue;
      result.scanned++;

      if (opts.brotli) {
        if (await precompressFile(file, "br", opts.brQuality)) result.br++;
        else result.upToDate++;
      }
      if (opts.gzip) {
        if (await precompressFile(file, "gzip", opts.gzLevel)) result.gz++;
        else result.upToDate++;
      }
    }
  }

  if (manifestAbs) {
    const manifest = await buildManifest(root, {
      urlPrefix: "",
      log,
      manifestName: path.basename(manifestAbs),
    });
    await writeManifestFile(manifestAbs, manifest);
    log.info({ file: manifestAbs, assets: manifest.size }, "manifest written");
  }

  log.info(result, "genstatic done");
  return result;
}
