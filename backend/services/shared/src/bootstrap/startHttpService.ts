// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Purpose:
 * - Starting/stopping an HTTP server is a single concern: bind, harden socket
 *   timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so repeated calls don't stack handlers.
 * - `stop()` resolves once the server has closed; tests call it directly.
 * - headersTimeout stays above keepAliveTimeout.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "../utils/logger";

export interface StartHttpServiceOptions {
  app: Express;
  host: string;
  /** 0 picks an ephemeral port. */
  port: number;
  serviceName: string;
  logger: Logger;
  /** Extra cleanup run before the server closes (timers, sweepers). */
  onStop?: () => void;
  installSignalHandlers?: boolean;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, host, port, serviceName, logger } = opts;

  return new Promise<StartedService>((resolve, reject) => {
    const server = app.listen(port, host);

    server.keepAliveTimeout = 7_000;
    server.headersTimeout = 9_000;

    let stopping: Promise<void> | null = null;
    const stop = (): Promise<void> => {
      stopping ??= new Promise<void>((done, fail) => {
        opts.onStop?.();
        server.close((err) => (err ? fail(err) : done()));
        server.closeIdleConnections();
      });
      return stopping;
    };

    server.once("error", (err) => {
      logger.error({ err, service: serviceName }, "http server error");
      reject(err);
    });

    server.once("listening", () => {
      const addr = server.address();
      const boundPort =
        addr !== null && typeof addr === "object" ? addr.port : port;
      logger.info(
        { service: serviceName, host, port: boundPort },
        "service listening"
      );

      if (opts.installSignalHandlers ?? true) {
        const shutdown = (signal: string) => {
          logger.info({ signal, service: serviceName }, "shutting down service");
          stop().then(
            () => process.exit(0),
            (err: unknown) => {
              logger.error({ err, service: serviceName }, "shutdown failed");
              process.exit(1);
            }
          );
          // Fail-safe in case close hangs
          setTimeout(() => process.exit(1), 10_000).unref();
        };
        process.once("SIGTERM", () => shutdown("SIGTERM"));
        process.once("SIGINT", () => shutdown("SIGINT"));
      }

      resolve({ server, boundPort, stop });
    });
  });
}
