// backend/services/web/src/config.ts
/**
 * Purpose:
 * - Validate and coerce the merged environment into a typed `WebConfig` once
 *   at boot. Downstream wiring never re-reads process.env.
 *
 * Invariants:
 * - Invalid configuration throws `ConfigError` listing every bad key.
 * - Relative directories resolve against the service root, not the cwd.
 */

import path from "node:path";
import { z } from "zod";
import type { LevelWithSilent } from "@fretwire/shared/utils/logger";

export const SERVICE_NAME = "web";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const int = (min: number) => z.coerce.number().int().min(min);

const csv = z
  .string()
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean)
  );

const levels: [LevelWithSilent, ...LevelWithSilent[]] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export const envSchema = z.object({
  NODE_ENV: z.enum(["dev", "test", "production"]).default("dev"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: int(0).max(65_535).default(8080),
  LOG_LEVEL: z.enum(levels).default("info"),

  STATIC_DIR: z.string().min(1).default("static"),
  STATIC_PREFIX: z
    .string()
    .regex(/^\/[^?#]*[^/?#]$/, "must start with / and not end with /")
    .default("/static"),
  MANIFEST_FILE: z.string().min(1).optional(),
  ASSET_MAX_BYTES: int(1).default(10 * 1024 * 1024),
  PRECOMPRESS_CACHE_TTL_MS: int(0).default(5 * 60 * 1000),

  TRUSTED_PROXIES: csv.default("127.0.0.1,::1"),
  REQUEST_TIMEOUT_MS: int(1).default(30_000),

  RATE_LIMIT_ENABLED: flag.default("true"),
  RATE_LIMIT_POINTS: int(0).default(100),
  RATE_LIMIT_WINDOW_MS: int(1).default(60_000),
  RATE_LIMIT_SWEEP_MS: int(0).default(60_000),

  COMPRESS_LEVEL: z.coerce.number().int().default(5),

  FORCE_HTTPS: flag.default("false"),
  HSTS_ENABLED: flag.default("false"),
});

export interface WebConfig {
  env: "dev" | "test" | "production";
  host: string;
  port: number;
  logLevel: LevelWithSilent;
  assets: {
    dir: string;
    prefix: string;
    manifestFile?: string;
    maxBytes: number;
    existenceTtlMs: number;
  };
  trustedProxies: string[];
  requestTimeoutMs: number;
  rateLimit: {
    enabled: boolean;
    points: number;
    windowMs: number;
    sweepMs: number;
  };
  compressLevel: number;
  https: {
    force: boolean;
    hsts: boolean;
  };
}

/**
 * @param serviceRoot directory that relative STATIC_DIR / MANIFEST_FILE are
 *   resolved against
 */
export function loadWebConfig(
  env: NodeJS.ProcessEnv,
  serviceRoot: string
): WebConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (i) => `${i.path.join(".") || "(root)"}: ${i.message}`
      )
    );
  }
  const e = parsed.data;
  const dir = path.resolve(serviceRoot, e.STATIC_DIR);

  return {
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    assets: {
      dir,
      prefix: e.STATIC_PREFIX,
      manifestFile: e.MANIFEST_FILE
        ? path.resolve(serviceRoot, e.MANIFEST_FILE)
        : undefined,
      maxBytes: e.ASSET_MAX_BYTES,
      existenceTtlMs: e.PRECOMPRESS_CACHE_TTL_MS,
    },
    trustedProxies: e.TRUSTED_PROXIES,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    rateLimit: {
      enabled: e.RATE_LIMIT_ENABLED,
      points: e.RATE_LIMIT_POINTS,
      windowMs: e.RATE_LIMIT_WINDOW_MS,
      sweepMs: e.RATE_LIMIT_SWEEP_MS,
    },
    compressLevel: e.COMPRESS_LEVEL,
    https: {
      force: e.FORCE_HTTPS,
      hsts: e.HSTS_ENABLED,
    },
  };
}
