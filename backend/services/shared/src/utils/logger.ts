// backend/services/shared/src/utils/logger.ts
/**
 * Shared pino logger factory.
 *
 * Each service builds ONE root logger at bootstrap via `createLogger()` and
 * hands `logger.child({ component })` to the pieces it wires. Nothing here
 * reads process.env; the service config decides the level.
 */

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
  stdTimeFunctions,
} from "pino";

export type { Logger, LevelWithSilent } from "pino";

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(v: string): v is LevelWithSilent {
  return LOG_LEVELS.some((l) => l === v);
}

export interface CreateLoggerOptions {
  service: string;
  level: LevelWithSilent;
  /** Tests pass an in-memory stream; production writes to stdout. */
  destination?: DestinationStream;
}

export function createLogger(opts: CreateLoggerOptions): Logger {
  const service = opts.service.trim();
  if (!service) throw new Error("createLogger requires a service name");

  const options: LoggerOptions = {
    level: opts.level,
    base: { service },
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: [
        "req.headers.authorization",
        "req.headers.cookie",
        'res.headers["set-cookie"]',
      ],
    },
  };

  return opts.destination ? pino(options, opts.destination) : pino(options);
}
