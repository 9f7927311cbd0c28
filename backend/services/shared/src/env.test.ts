// backend/services/shared/src/env.test.ts
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { loadEnvCascadeForService, modeFilesFor } from "./env";

const KEYS = ["FW_CASCADE_A", "FW_CASCADE_B", "FW_CASCADE_C"];

async function tree(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "fretwire-env-"));
  await fs.writeFile(path.join(root, "package.json"), "{}\n");
  for (const [rel, body] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, body);
  }
  return root;
}

afterEach(() => {
  for (const k of KEYS) delete process.env[k];
});

describe("modeFilesFor", () => {
  it("prefers the mode file, then .env", () => {
    expect(modeFilesFor("dev")).toEqual([".env.dev", ".env"]);
    expect(modeFilesFor("test")).toEqual([".env.test", ".env"]);
    expect(modeFilesFor("production")).toEqual([".env"]);
  });
});

describe("loadEnvCascadeForService", () => {
  it("layers repo root under the service and expands references", async () => {
    const root = await tree({
      ".env.test": "FW_CASCADE_A=root\nFW_CASCADE_B=root\n",
      "services/web/.env.test": "FW_CASCADE_B=svc\nFW_CASCADE_C=${FW_CASCADE_B}-x\n",
    });
    const serviceRoot = path.join(root, "services", "web");

    const result = loadEnvCascadeForService(serviceRoot, { mode: "test" });

    expect(result.mode).toBe("test");
    expect(result.loaded).toEqual([
      path.join(root, ".env.test"),
      path.join(serviceRoot, ".env.test"),
    ]);
    expect(process.env.FW_CASCADE_A).toBe("root");
    expect(process.env.FW_CASCADE_B).toBe("svc");
    expect(process.env.FW_CASCADE_C).toBe("svc-x");
  });

  it("never overrides variables already in the environment", async () => {
    const root = await tree({ "services/web/.env.test": "FW_CASCADE_A=file\n" });
    process.env.FW_CASCADE_A = "injected";

    loadEnvCascadeForService(path.join(root, "services", "web"), { mode: "test" });

    expect(process.env.FW_CASCADE_A).toBe("injected");
  });

  it("throws when no file exists outside production", async () => {
    const root = await tree({});
    const serviceRoot = path.join(root, "services", "web");
    await fs.mkdir(serviceRoot, { recursive: true });

    expect(() => loadEnvCascadeForService(serviceRoot, { mode: "dev" })).toThrow(
      'No env files found for mode="dev"'
    );
    expect(loadEnvCascadeForService(serviceRoot, { mode: "production" }).loaded).toEqual([]);
  });
});
