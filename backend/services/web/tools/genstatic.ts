#!/usr/bin/env node
// backend/services/web/tools/genstatic.ts
/**
 * Precompress static assets ahead of deploy.
 *
 *   genstatic --src static --brotli --gzip [--brq 11] [--gzq 9] [--manifest static/manifest.json]
 *
 * Exit codes: 0 ok, 1 failure, 2 bad usage / nothing to do.
 */

import { createLogger } from "@fretwire/shared/utils/logger";
import {
  parseGenstaticArgs,
  runGenstatic,
  UsageError,
} from "../src/precompress/genstatic";

const EXIT = {
  Failed: 1,
  Usage: 2,
} as const;

async function main(argv: string[]): Promise<number> {
  const log = createLogger({ service: "genstatic", level: "info" });
  try {
    await runGenstatic(parseGenstaticArgs(argv.slice(2)), log);
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      log.error({ reason: err.message }, "usage error");
      return EXIT.Usage;
    }
    log.error({ err }, "genstatic failed");
    return EXIT.Failed;
  }
}

main(process.argv).then((code) => {
  process.exitCode = code;
});
