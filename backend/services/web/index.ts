// backend/services/web/index.ts
/**
 * Web edge entry: boots the catalog site (pages + static assets).
 */

import path from "node:path";
import { createLogger } from "@fretwire/shared/utils/logger";
import { boot } from "./src/bootstrap";

// Failures before the configured logger exists land here.
const fallbackLog = createLogger({ service: "web", level: "info" });

boot({ serviceRoot: path.resolve(__dirname) }).catch((err: unknown) => {
  fallbackLog.fatal({ err }, "fatal during bootstrap");
  process.exit(1);
});
