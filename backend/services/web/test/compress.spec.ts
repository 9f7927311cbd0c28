// backend/services/web/test/compress.spec.ts
import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { memoryLog } from "@fretwire/shared/testing/memoryLog";
import {
  compressMiddleware,
  DEFAULT_COMPRESSIBLE_TYPES,
  isCompressibleType,
  isValidGzipLevel,
} from "../src/middleware/compress";

const TEXT = "fretwire ".repeat(200);

function appWith(level: number) {
  const mem = memoryLog();
  const app = express();
  app.disable("etag");
  app.use(compressMiddleware({ level, log: mem.logger }));
  app.get("/text", (_req, res) => {
    res.type("text/plain").send(TEXT);
  });
  app.head("/text", (_req, res) => {
    res.type("text/plain").send(TEXT);
  });
  app.get("/png", (_req, res) => {
    res.type("png").send(Buffer.alloc(64, 1));
  });
  app.get("/encoded", (_req, res) => {
    res.setHeader("Content-Encoding", "identity");
    res.type("text/plain").send(TEXT);
  });
  app.get("/nocontent", (_req, res) => {
    res.status(204).end();
  });
  return { app, mem };
}

describe("compressMiddleware", () => {
  const { app } = appWith(5);

  it("gzips eligible responses for clients that accept it", async () => {
    const res = await request(app).get("/text").set("Accept-Encoding", "gzip");
    expect(res.headers["content-encoding"]).toBe("gzip");
    expect(res.headers["vary"]).toBe("Accept-Encoding");
    expect(res.headers["content-length"]).toBeUndefined();
    expect(res.text).toBe(TEXT);
  });

  it("sends identity bytes otherwise, still varying on Accept-Encoding", async () => {
    const res = await request(app).get("/text").set("Accept-Encoding", "identity");
    expect(res.headers["content-encoding"]).toBeUndefined();
    expect(res.headers["vary"]).toBe("Accept-Encoding");
    expect(res.headers["content-length"]).toBe(String(TEXT.length));
    expect(res.text).toBe(TEXT);
  });

  it("skips types outside the allow-list", async () => {
    const res = await request(app).get("/png").set("Accept-Encoding", "gzip");
    expect(res.headers["content-encoding"]).toBeUndefined();
    expect(res.headers["vary"]).toBeUndefined();
  });

  it("skips HEAD, 204 and already-encoded responses", async () => {
    const head = await request(app).head("/text").set("Accept-Encoding", "gzip");
    expect(head.headers["content-encoding"]).toBeUndefined();

    const empty = await request(app).get("/nocontent").set("Accept-Encoding", "gzip");
    expect(empty.status).toBe(204);
    expect(empty.headers["content-encoding"]).toBeUndefined();

    const encoded = await request(app).get("/encoded").set("Accept-Encoding", "gzip");
    expect(encoded.headers["content-encoding"]).toBe("identity");
  });

  it("disables itself on an invalid level and says so once", async () => {
    const bad = appWith(12);
    const res = await request(bad.app).get("/text").set("Accept-Encoding", "gzip");
    await request(bad.app).get("/text").set("Accept-Encoding", "gzip");

    expect(res.headers["content-encoding"]).toBeUndefined();
    expect(res.text).toBe(TEXT);
    const warned = bad.mem.withMsg("invalid gzip level; compression disabled");
    expect(warned).toHaveLength(1);
    expect(warned[0]).toMatchObject({ level: 40, gzipLevel: 12, component: "compress" });
  });
});

describe("compress helpers", () => {
  it("matches content types exactly or by prefix", () => {
    expect(isCompressibleType("text/html; charset=utf-8", DEFAULT_COMPRESSIBLE_TYPES)).toBe(true);
    expect(isCompressibleType("application/json", DEFAULT_COMPRESSIBLE_TYPES)).toBe(true);
    expect(isCompressibleType("image/png", DEFAULT_COMPRESSIBLE_TYPES)).toBe(false);
    expect(isCompressibleType("", DEFAULT_COMPRESSIBLE_TYPES)).toBe(false);
  });

  it("accepts zlib's level range only", () => {
    expect([-1, 0, 9].map(isValidGzipLevel)).toEqual([true, true, true]);
    expect([-2, 10, 1.5].map(isValidGzipLevel)).toEqual([false, false, false]);
  });
});
