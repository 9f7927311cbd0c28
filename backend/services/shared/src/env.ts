// backend/services/shared/src/env.ts

/**
 * Purpose:
 * - Deterministic environment loading for a service with strict precedence:
 *   repo root → service family → service root. Later wins.
 * - Per NODE_ENV, try these at each layer:
 *   dev:        .env.dev → .env
 *   test:       .env.test → .env
 *   production: .env (optional; prefer injected env)
 *
 * Notes:
 * - Only the file cascade lives here. Validation belongs to each service's
 *   config schema, which reads the merged `process.env` once at boot.
 * - dotenv-expand resolves `${VAR}` references across files.
 */

import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { expand } from "dotenv-expand";

/** Walk up until a directory holds `package.json` or `.git`; last hit wins. */
export function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  let lastHit: string | null = null;
  for (;;) {
    const hasGit = fs.existsSync(path.join(dir, ".git"));
    const hasPkg = fs.existsSync(path.join(dir, "package.json"));
    if (hasGit || hasPkg) lastHit = dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return lastHit ?? path.resolve(start, "..", "..");
}

export function modeFilesFor(mode: string): string[] {
  if (mode === "dev") return [".env.dev", ".env"];
  if (mode === "test") return [".env.test", ".env"];
  return [".env"];
}

export interface EnvCascadeResult {
  mode: string;
  loaded: string[];
  candidates: string[];
}

/**
 * Cascading loader for a service rooted at `serviceRootAbs`.
 * Variables already present in the process environment win over every file;
 * between files, later layers override earlier ones.
 */
export function loadEnvCascadeForService(
  serviceRootAbs: string,
  opts: { mode?: string; allowMissing?: boolean } = {}
): EnvCascadeResult {
  const mode = (opts.mode ?? process.env.NODE_ENV ?? "dev").trim() || "dev";

  const serviceRoot = path.resolve(serviceRootAbs);
  const familyDir = path.dirname(serviceRoot);
  const repoRoot = findRepoRoot(serviceRoot);

  const layers = [...new Set([repoRoot, familyDir, serviceRoot])];
  const candidates: string[] = [];
  for (const dir of layers)
    for (const name of modeFilesFor(mode)) candidates.push(path.join(dir, name));

  // Snapshot injected keys so file layers never clobber them.
  const injected = new Set(Object.keys(process.env));
  const merged: Record<string, string> = {};
  const loaded: string[] = [];

  for (const file of candidates) {
    if (!fs.existsSync(file)) continue;
    const parsed = loadDotenv({ path: file, processEnv: {} });
    if (parsed.error) {
      throw new Error(
        `Failed to load env file: ${file}: ${String(parsed.error)}`
      );
    }
    Object.assign(merged, parsed.parsed ?? {});
    loaded.push(file);
  }

  const applicable: Record<string, string> = {};
  for (const [k, v] of Object.entries(merged)) {
    if (!injected.has(k)) applicable[k] = v;
  }
  expand({ parsed: applicable });

  const allowMissing = opts.allowMissing ?? mode === "production";
  if (loaded.length === 0 && !allowMissing) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }

  return { mode, loaded, candidates };
}
