// backend/services/web/test/etag.spec.ts
import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { etagOf } from "../src/assets/contentHasher";
import { etagMiddleware, matchesIfNoneMatch } from "../src/middleware/etag";

const PAGE = "<p>hello</p>";
const TAG = etagOf(Buffer.from(PAGE));

const app = express();
app.disable("etag");
app.use(etagMiddleware());
app.get("/page", (_req, res) => {
  res.type("html").send(PAGE);
});
app.get("/chunks", (_req, res) => {
  res.type("html");
  res.write("<p>hel");
  res.end("lo</p>");
});
app.get("/empty", (_req, res) => {
  res.status(200).end();
});
app.get("/missing", (_req, res) => {
  res.status(404).type("html").send(PAGE);
});
app.get("/explicit", (_req, res) => {
  res.writeHead(201, { "Content-Type": "text/plain" });
  res.end("made");
});
app.post("/page", (_req, res) => {
  res.type("html").send(PAGE);
});

describe("etagMiddleware", () => {
  it("tags GET responses with a hash of the body", async () => {
    const res = await request(app).get("/page");
    expect(res.status).toBe(200);
    expect(res.headers["etag"]).toBe(TAG);
    expect(res.headers["etag"]).toMatch(/^"[0-9a-f]{16}"$/);
    expect(res.text).toBe(PAGE);
  });

  it("hashes the whole body across writes", async () => {
    const res = await request(app).get("/chunks");
    expect(res.headers["etag"]).toBe(TAG);
    expect(res.headers["content-length"]).toBe(String(PAGE.length));
  });

  it("hashes the path for an empty body", async () => {
    const res = await request(app).get("/empty");
    expect(res.headers["etag"]).toBe(etagOf(Buffer.from("/empty")));
  });

  it("answers 304 when If-None-Match matches", async () => {
    const res = await request(app).get("/page").set("If-None-Match", TAG);
    expect(res.status).toBe(304);
    expect(res.headers["etag"]).toBe(TAG);
    expect(res.headers["content-type"]).toBeUndefined();
  });

  it("serves the body when the tag differs", async () => {
    const res = await request(app).get("/page").set("If-None-Match", '"0000000000000000"');
    expect(res.status).toBe(200);
    expect(res.text).toBe(PAGE);
  });

  it("does not turn errors into 304", async () => {
    const res = await request(app).get("/missing").set("If-None-Match", TAG);
    expect(res.status).toBe(404);
  });

  it("sends status and headers given to writeHead", async () => {
    const res = await request(app).get("/explicit");
    expect(res.status).toBe(201);
    expect(res.headers["content-type"]).toBe("text/plain");
    expect(res.headers["etag"]).toBe(etagOf(Buffer.from("made")));
    expect(res.headers["content-length"]).toBe("4");
    expect(res.text).toBe("made");
  });

  it("leaves non-GET requests untouched", async () => {
    const res = await request(app).post("/page");
    expect(res.headers["etag"]).toBeUndefined();
  });
});

describe("matchesIfNoneMatch", () => {
  it("handles lists, weak tags and the wildcard", () => {
    expect(matchesIfNoneMatch(`"x", ${TAG}`, TAG)).toBe(true);
    expect(matchesIfNoneMatch(`W/${TAG}`, TAG)).toBe(true);
    expect(matchesIfNoneMatch("*", TAG)).toBe(true);
    expect(matchesIfNoneMatch(undefined, TAG)).toBe(false);
    expect(matchesIfNoneMatch('"other"', TAG)).toBe(false);
  });
});
