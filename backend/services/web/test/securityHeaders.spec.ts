// backend/services/web/test/securityHeaders.spec.ts
import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { getScopeValue } from "@fretwire/shared/http/requestScope";
import {
  contentSecurityPolicy,
  securityHeadersMiddleware,
} from "../src/middleware/securityHeaders";

const app = express();
app.use(securityHeadersMiddleware());
app.get("/", (req, res) => {
  res.send(getScopeValue(req, "cspNonce") ?? "");
});

describe("securityHeadersMiddleware", () => {
  it("sets the fixed headers", async () => {
    const res = await request(app).get("/");
    expect(res.headers["x-frame-options"]).toBe("DENY");
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
    expect(res.headers["x-xss-protection"]).toBe("1; mode=block");
    expect(res.headers["referrer-policy"]).toBe("strict-origin-when-cross-origin");
    expect(res.headers["permissions-policy"]).toBe(
      "geolocation=(), microphone=(), camera=()"
    );
  });

  it("puts the request's nonce into the CSP", async () => {
    const res = await request(app).get("/");
    const nonce = res.text;
    expect(nonce).toMatch(/^[A-Za-z0-9+/]{22}==$/);
    expect(res.headers["content-security-policy"]).toBe(contentSecurityPolicy(nonce));
  });

  it("mints a fresh nonce per request", async () => {
    const a = await request(app).get("/");
    const b = await request(app).get("/");
    expect(a.text).not.toBe(b.text);
  });
});

describe("contentSecurityPolicy", () => {
  it("renders the full policy", () => {
    expect(contentSecurityPolicy("abc")).toBe(
      "default-src 'self'; script-src 'self' 'nonce-abc'; style-src 'self'; " +
        "img-src 'self' data:; font-src 'self'; object-src 'none'; " +
        "base-uri 'self'; frame-ancestors 'none'"
    );
  });
});
