// backend/services/shared/src/http/httpError.test.ts
import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { HttpError, isHttpError, reasonPhrase, writePlainError } from "./httpError";

describe("reasonPhrase", () => {
  it("uses the standard phrase", () => {
    expect(reasonPhrase(408)).toBe("Request Timeout");
    expect(reasonPhrase(429)).toBe("Too Many Requests");
  });

  it("has a fallback for unknown codes", () => {
    expect(reasonPhrase(799)).toBe("Unknown Status");
  });
});

describe("HttpError", () => {
  it("defaults its message to the reason phrase", () => {
    const err = new HttpError(404);
    expect(err.status).toBe(404);
    expect(err.message).toBe("Not Found");
    expect(isHttpError(err)).toBe(true);
    expect(isHttpError(new Error("x"))).toBe(false);
  });
});

describe("writePlainError", () => {
  const app = express();
  app.disable("etag");
  app.get("/limited", (_req, res) => {
    res.setHeader("ETag", '"stale"');
    res.setHeader("Content-Encoding", "gzip");
    res.setHeader("X-Request-ID", "keep-me");
    writePlainError(res, 429);
  });
  app.get("/custom", (_req, res) => {
    writePlainError(res, 400, "bad slug");
  });

  it("writes a plain-text reason phrase", async () => {
    const res = await request(app).get("/limited");

    expect(res.status).toBe(429);
    expect(res.text).toBe("Too Many Requests\n");
    expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(res.headers["content-length"]).toBe("18");
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
    expect(res.headers["etag"]).toBeUndefined();
    expect(res.headers["content-encoding"]).toBeUndefined();
    expect(res.headers["x-request-id"]).toBe("keep-me");
  });

  it("accepts a custom public message", async () => {
    const res = await request(app).get("/custom");
    expect(res.status).toBe(400);
    expect(res.text).toBe("bad slug\n");
  });
});
