// backend/services/shared/src/testing/memoryLog.ts
/**
 * In-memory pino sink for tests: every emitted line is parsed and kept so
 * assertions can look at levels, messages and bound fields.
 */

import {
  createLogger,
  type Logger,
  type LevelWithSilent,
} from "../utils/logger";

export type LogEntry = Record<string, unknown> & {
  level: number;
  msg?: string;
};

export interface MemoryLog {
  logger: Logger;
  entries: LogEntry[];
  /** Entries whose `msg` equals the given text. */
  withMsg(msg: string): LogEntry[];
}

function isEntry(v: unknown): v is LogEntry {
  return (
    typeof v === "object" &&
    v !== null &&
    "level" in v &&
    typeof v.level === "number"
  );
}

export function memoryLog(level: LevelWithSilent = "debug"): MemoryLog {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    service: "test",
    level,
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (isEntry(parsed)) entries.push(parsed);
      },
    },
  });
  return {
    logger,
    entries,
    withMsg: (msg) => entries.filter((e) => e.msg === msg),
  };
}
