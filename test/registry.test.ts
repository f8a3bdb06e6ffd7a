import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { MemoryObjectStore } from "../src/backend/memory-object-store.js";
import { ObjectStoreBackend } from "../src/backend/object-store.js";
import { loadConfig } from "../src/config.js";
import { NotFoundError, ValidationError } from "../src/errors.js";
import { computeManifest } from "../src/integrity.js";
import { ModelRegistry } from "../src/registry.js";
import {
  CREATOR,
  createLocalRegistry,
  createMemoryRegistry,
  createTempRoot,
  file,
  sampleArtifacts,
  writeArtifactDir,
} from "./helpers.js";

describe("ModelRegistry", () => {
  it("round-trips an artifact set through register and resolve", async () => {
    const { registry } = await createLocalRegistry();
    const artifacts = sampleArtifacts();

    const registered = await registry.register({ task: "ct", model: "pbmc", version: "v1", artifacts, metadata: CREATOR });
    const resolved = await registry.resolve("ct", "pbmc@v1");

    expect(resolved.path).toBe(registered.path);
    for (const artifact of artifacts) {
      expect(Buffer.compare(await readFile(path.join(resolved.path, artifact.name)), Buffer.from(artifact.content))).toBe(0);
    }
    expect(registered.manifest).toMatchObject(computeManifest(artifacts));
    expect(registered.promotion).toBeNull();
  });

  it("registers from a directory and sets an alias through the promotion path", async () => {
    const { registry } = await createLocalRegistry();
    const dir = await writeArtifactDir([file("model.pt", "w"), file("labels.csv", "a,b\n")]);

    const registered = await registry.register({
      task: "ct",
      model: "pbmc",
      version: "2024.05.01-1",
      artifacts: { dir },
      metadata: { creator: "trainer" },
      alias: "staging",
    });

    expect(Object.keys(registered.manifest)).toEqual(["labels.csv", "metadata.json", "model.pt"]);
    expect(registered.promotion).toMatchObject({ alias: "staging", previous: null, new: "2024.05.01-1" });
    expect(await registry.audit("ct", "pbmc")).toMatchObject([
      { actor: "trainer", action: "create", alias: "staging", to: "2024.05.01-1", reason: "register" },
    ]);
  });

  it("rejects a missing or nested artifact directory", async () => {
    const { registry } = await createLocalRegistry();
    const base = { task: "ct", model: "pbmc", version: "v1", metadata: CREATOR };
    const missing = path.join(await createTempRoot("nothing"), "absent");
    await expect(registry.register({ ...base, artifacts: { dir: missing } })).rejects.toMatchObject({
      kind: "ValidationError",
      context: { field: "artifactDir" },
    });

    const nested = await writeArtifactDir([file("model.bin", "x")]);
    await mkdir(path.join(nested, "sub"));
    await expect(registry.register({ ...base, artifacts: { dir: nested } })).rejects.toBeInstanceOf(ValidationError);
  });

  it("checks the alias before committing anything", async () => {
    const { registry } = createMemoryRegistry();
    const base = { task: "ct", model: "pbmc", version: "v1", artifacts: sampleArtifacts(), metadata: CREATOR };

    await expect(registry.register({ ...base, alias: "prod/uction" })).rejects.toMatchObject({
      kind: "ValidationError",
      context: { field: "alias" },
    });
    await expect(registry.register({ ...base, alias: "" })).rejects.toMatchObject({
      kind: "ValidationError",
      context: { field: "alias" },
    });
    await expect(registry.register({ ...base, alias: "production", actor: " " })).rejects.toMatchObject({
      kind: "ValidationError",
      context: { field: "actor" },
    });
    expect(await registry.listVersions("ct", "pbmc")).toEqual([]);

    const registered = await registry.register({ ...base, alias: "production" });
    expect(registered.promotion).toMatchObject({ alias: "production", new: "v1" });
  });

  it("shows metadata, manifest and the aliases pointing at a version", async () => {
    const { registry } = createMemoryRegistry();
    for (const version of ["v1", "v2"]) {
      await registry.register({ task: "ct", model: "pbmc", version, artifacts: [file("model.bin", version)], metadata: CREATOR });
    }
    await registry.promote({ task: "ct", model: "pbmc", alias: "staging", version: "v2", actor: "alice" });
    await registry.promote({ task: "ct", model: "pbmc", alias: "latest", version: "v2", actor: "alice" });
    await registry.promote({ task: "ct", model: "pbmc", alias: "production", version: "v1", actor: "alice" });

    const shown = await registry.show("ct", "pbmc@staging", { verify: true });
    expect(shown).toMatchObject({ version: "v2", alias: "staging", manifestStatus: "verified", aliases: ["latest", "staging"] });
    expect(shown.metadata.creator).toBe("test-user");
    expect(Object.keys(shown.manifest)).toEqual(["metadata.json", "model.bin"]);
  });

  it("reports integrity without throwing", async () => {
    const { registry, root } = await createLocalRegistry();
    await registry.register({ task: "ct", model: "pbmc", version: "v1", artifacts: sampleArtifacts(), metadata: CREATOR });
    expect(await registry.verify("ct", "pbmc@v1")).toMatchObject({ ok: true, version: "v1", mismatches: [] });

    await writeFile(path.join(root, "tasks", "ct", "models", "pbmc", "versions", "v1", "model.bin"), "altered");

    const report = await registry.verify("ct", "pbmc@v1");
    expect(report.ok).toBe(false);
    expect(report.mismatches).toMatchObject([{ file: "model.bin", kind: "digest" }]);
    await expect(registry.verify("ct", "pbmc@v9")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists tasks, models and versions", async () => {
    const { registry } = createMemoryRegistry();
    await registry.register({ task: "ct", model: "pbmc", version: "v1", artifacts: [file("a", "1")], metadata: CREATOR });
    await registry.register({ task: "ct", model: "lung", version: "v1", artifacts: [file("a", "1")], metadata: CREATOR });
    await registry.register({ task: "qc", model: "doublets", version: "v3", artifacts: [file("a", "1")], metadata: CREATOR });

    expect(await registry.listTasks()).toEqual(["ct", "qc"]);
    expect(await registry.listModels("ct")).toEqual(["lung", "pbmc"]);
    expect(await registry.listVersions("qc", "doublets")).toEqual(["v3"]);
    expect(await registry.listVersions("qc", "unknown")).toEqual([]);
  });

  it("reports health", async () => {
    const { registry, root } = await createLocalRegistry();
    expect(await registry.health()).toEqual({ ok: true, backend: "local", root });

    const store = new MemoryObjectStore("offline");
    store.listKeys = () => Promise.reject(new Error("connection refused"));
    const offline = new ModelRegistry({ backend: new ObjectStoreBackend(store) });
    expect(await offline.health()).toEqual({
      ok: false,
      backend: "object",
      root: "memory://offline/",
      error: "Storage operation failed: connection refused",
    });
  });

  it("builds its backend from configuration", async () => {
    const root = await createTempRoot("config");
    const registry = ModelRegistry.fromConfig(loadConfig({ MODEL_REGISTRY_ROOT: root, MODEL_REGISTRY_STRICT_VERIFY: "1" }));
    expect(registry.backend.kind).toBe("local");
    expect(registry.strictVerify).toBe(true);

    const memory = ModelRegistry.fromConfig(loadConfig({ MODEL_REGISTRY_ROOT: root, MODEL_REGISTRY_BACKEND: "memory" }));
    expect(memory.backend.kind).toBe("object");
  });
});
