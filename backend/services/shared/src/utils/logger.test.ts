// backend/services/shared/src/utils/logger.test.ts
import { describe, it, expect } from "vitest";
import { memoryLog } from "../testing/memoryLog";
import { createLogger, isLogLevel } from "./logger";

describe("createLogger", () => {
  it("binds the service name and drops credential headers", () => {
    const { logger, entries } = memoryLog();
    logger.info(
      { req: { headers: { authorization: "Bearer test-secret", accept: "text/html" } } },
      "hello"
    );

    expect(entries).toHaveLength(1);
    const [line] = entries;
    expect(line.msg).toBe("hello");
    expect(line.service).toBe("test");
    expect(line.level).toBe(30);
    expect(line.req).toEqual({ headers: { accept: "text/html" } });
  });

  it("honours the level", () => {
    const { logger, entries } = memoryLog("warn");
    logger.info("quiet");
    logger.warn("loud");
    expect(entries.map((e) => e.msg)).toEqual(["loud"]);
  });

  it("requires a service name", () => {
    expect(() => createLogger({ service: "  ", level: "info" })).toThrow(
      "createLogger requires a service name"
    );
  });

  it("recognizes pino level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
