import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/config.js";
import { ValidationError } from "../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ MODEL_REGISTRY_ROOT: "/srv/registry" });
    expect(config).toEqual({
      root: path.resolve("/srv/registry"),
      backend: "local",
      strictVerify: true,
      lock: { timeoutMs: 10_000, staleMs: 60_000 },
      log: { level: "info", json: false },
      server: { host: "127.0.0.1", port: 8080 },
    });
  });

  it("reads every setting", () => {
    const config = loadConfig({
      MODEL_REGISTRY_ROOT: "~/models",
      MODEL_REGISTRY_BACKEND: "Shared",
      MODEL_REGISTRY_STRICT_VERIFY: "0",
      MODEL_REGISTRY_LOCK_TIMEOUT_MS: "250",
      MODEL_REGISTRY_LOCK_STALE_MS: "5000",
      MODEL_REGISTRY_LOG_LEVEL: "DEBUG",
      MODEL_REGISTRY_LOG_JSON: "1",
      MODEL_REGISTRY_HOST: "0.0.0.0",
      MODEL_REGISTRY_PORT: "9090",
    });
    expect(config.root).toBe(path.join(os.homedir(), "models"));
    expect(config.backend).toBe("shared");
    expect(config.strictVerify).toBe(false);
    expect(config.lock).toEqual({ timeoutMs: 250, staleMs: 5000 });
    expect(config.log).toEqual({ level: "debug", json: true });
    expect(config.server).toEqual({ host: "0.0.0.0", port: 9090 });
  });

  it("lets an explicit root win over the environment", () => {
    expect(loadConfig({ MODEL_REGISTRY_ROOT: "/a" }, { root: "/b" }).root).toBe(path.resolve("/b"));
  });

  it("requires a root", () => {
    try {
      loadConfig({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: "REGISTRY_NOT_CONFIGURED", context: { field: "MODEL_REGISTRY_ROOT" } });
    }
  });

  it.each([
    ["MODEL_REGISTRY_BACKEND", "s3"],
    ["MODEL_REGISTRY_PORT", "70000"],
    ["MODEL_REGISTRY_LOCK_TIMEOUT_MS", "soon"],
    ["MODEL_REGISTRY_LOG_LEVEL", "trace"],
  ])("rejects %s=%s", (key, value) => {
    try {
      loadConfig({ MODEL_REGISTRY_ROOT: "/srv/registry", [key]: value });
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: "INVALID_CONFIG", context: { field: key } });
    }
  });
});
