// backend/services/web/test/assetManifest.spec.ts
import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { memoryLog } from "@fretwire/shared/testing/memoryLog";
import { buildManifest, isFingerprintable } from "../src/assets/buildManifest";
import {
  etagOf,
  fingerprintFromPath,
  fingerprintOf,
  integrityOf,
  versionedPathOf,
} from "../src/assets/contentHasher";
import { contentTypeOf, FALLBACK_CONTENT_TYPE } from "../src/assets/contentTypes";
import { tempTree } from "./helpers";

const APP_JS = Buffer.from("alert(1)");
const sha256 = (b: Buffer) => createHash("sha256").update(b).digest("hex");

describe("contentHasher", () => {
  it("fingerprints with the first 8 hex chars of SHA-256", () => {
    expect(fingerprintOf(APP_JS)).toBe(sha256(APP_JS).slice(0, 8));
    expect(fingerprintOf(APP_JS)).toMatch(/^[0-9a-f]{8}$/);
  });

  it("changes when a single byte changes", () => {
    expect(fingerprintOf(Buffer.from("alert(2)"))).not.toBe(fingerprintOf(APP_JS));
  });

  it("produces sha384 SRI values", () => {
    const expected = createHash("sha384").update(APP_JS).digest("base64");
    expect(integrityOf(APP_JS)).toBe(`sha384-${expected}`);
  });

  it("quotes a 16-hex ETag", () => {
    expect(etagOf(APP_JS)).toBe(`"${sha256(APP_JS).slice(0, 16)}"`);
  });

  it("moves only the last extension behind the fingerprint", () => {
    expect(versionedPathOf("/js/app.js", "a1b2c3d4")).toBe("/js/app.a1b2c3d4.js");
    expect(versionedPathOf("/css/app.min.css", "a1b2c3d4")).toBe("/css/app.min.a1b2c3d4.css");
    expect(versionedPathOf("/LICENSE", "a1b2c3d4")).toBe("/LICENSE.a1b2c3d4");
    expect(versionedPathOf("robots.txt", "a1b2c3d4")).toBe("robots.a1b2c3d4.txt");
  });

  it("reads the fingerprint back out of a versioned path", () => {
    expect(fingerprintFromPath("/js/app.1a2b3c4d.js")).toBe("1a2b3c4d");
    expect(fingerprintFromPath("/LICENSE.1a2b3c4d")).toBe("1a2b3c4d");
    expect(fingerprintFromPath("/js/app.js")).toBeUndefined();
  });
});

describe("contentTypeOf", () => {
  it("maps by extension, case-insensitively", () => {
    expect(contentTypeOf("/js/app.js")).toBe("application/javascript; charset=utf-8");
    expect(contentTypeOf("/css/APP.CSS")).toBe("text/css; charset=utf-8");
    expect(contentTypeOf("/img/logo.svg")).toBe("image/svg+xml");
    expect(contentTypeOf("/blob.unknownext")).toBe(FALLBACK_CONTENT_TYPE);
  });
});

describe("isFingerprintable", () => {
  it("skips dot-files, siblings, temporaries and the manifest", () => {
    expect(isFingerprintable("/js/app.js", "manifest.json")).toBe(true);
    expect(isFingerprintable("/js/app.js.br", "manifest.json")).toBe(false);
    expect(isFingerprintable("/js/app.js.gz", "manifest.json")).toBe(false);
    expect(isFingerprintable("/js/app.js.br.tmp", "manifest.json")).toBe(false);
    expect(isFingerprintable("/.cache/x.js", "manifest.json")).toBe(false);
    expect(isFingerprintable("/manifest.json", "manifest.json")).toBe(false);
  });
});

describe("buildManifest / AssetManifest", () => {
  const files = {
    "js/app.js": APP_JS,
    "js/app.js.br": Buffer.from("not-really-brotli"),
    "css/app.css": "body{}",
    ".hidden/secret.js": "x",
    "manifest.json": "{}",
    "big.bin": Buffer.alloc(64),
  };

  async function build(root: string) {
    const mem = memoryLog();
    const manifest = await buildManifest(root, {
      urlPrefix: "/static/",
      maxBytes: 32,
      log: mem.logger,
    });
    return { manifest, mem };
  }

  it("records every eligible file with its digests", async () => {
    const root = await tempTree(files);
    const { manifest, mem } = await build(root);

    expect(manifest.records().map((r) => r.logicalPath)).toEqual(["/css/app.css", "/js/app.js"]);
    const fp = fingerprintOf(APP_JS);
    expect(manifest.lookup("/js/app.js")).toEqual({
      logicalPath: "/js/app.js",
      versionedPath: `/js/app.${fp}.js`,
      fingerprint: fp,
      integrity: integrityOf(APP_JS),
      sizeBytes: 8,
      contentType: "application/javascript; charset=utf-8",
    });
    expect(mem.withMsg("asset too large to fingerprint")[0]).toMatchObject({
      path: "/big.bin",
      size: 64,
      maxBytes: 32,
    });
  });

  it("is deterministic and reacts to a one-byte change", async () => {
    const root = await tempTree(files);
    const first = (await build(root)).manifest.records();
    const again = (await build(root)).manifest.records();
    expect(again).toEqual(first);

    await fs.writeFile(path.join(root, "js/app.js"), "alert(2)");
    const changed = (await build(root)).manifest;
    expect(changed.lookup("/js/app.js")?.fingerprint).not.toBe(fingerprintOf(APP_JS));
    expect(changed.lookup("/css/app.css")).toEqual(first[0]);
  });

  it("serves template helpers with slash-tolerant lookups", async () => {
    const root = await tempTree(files);
    const { manifest } = await build(root);
    const fp = fingerprintOf(APP_JS);

    expect(manifest.assetUrl("/js/app.js")).toBe(`/static/js/app.${fp}.js`);
    expect(manifest.assetUrl("js/app.js")).toBe(`/static/js/app.${fp}.js`);
    expect(manifest.assetSri("js/app.js")).toBe(integrityOf(APP_JS));
    expect(manifest.has("/css/app.css")).toBe(true);
    expect(manifest.lookupVersioned(`js/app.${fp}.js`)?.logicalPath).toBe("/js/app.js");
  });

  it("falls back to the plain URL for unknown assets and warns once", async () => {
    const root = await tempTree(files);
    const { manifest, mem } = await build(root);

    expect(manifest.assetUrl("/js/missing.js")).toBe("/static/js/missing.js");
    expect(manifest.assetUrl("js/missing.js")).toBe("/static/js/missing.js");
    expect(manifest.assetSri("/js/missing.js")).toBe("");
    expect(manifest.has("/js/missing.js")).toBe(false);
    expect(mem.withMsg("asset not found in manifest")).toHaveLength(1);
  });

  it("returns frozen records", async () => {
    const root = await tempTree(files);
    const { manifest } = await build(root);
    expect(Object.isFrozen(manifest.lookup("/js/app.js"))).toBe(true);
  });

  it("rejects when the root cannot be read", async () => {
    await expect(build(path.join(await tempTree({}), "absent"))).rejects.toThrow(/ENOENT/);
  });
});
