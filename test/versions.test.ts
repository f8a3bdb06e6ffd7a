import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { LocalFsBackend } from "../src/backend/local.js";
import { MemoryObjectStore } from "../src/backend/memory-object-store.js";
import { ObjectStoreBackend } from "../src/backend/object-store.js";
import type { StorageBackend } from "../src/backend/types.js";
import { AlreadyExistsError, NotFoundError, ValidationError } from "../src/errors.js";
import { computeManifest, parseManifest, serializeManifest } from "../src/integrity.js";
import { silentLogger } from "../src/logger.js";
import { VersionStore } from "../src/versions.js";
import { CREATOR, createTempRoot, file, sampleArtifacts, steppingClock } from "./helpers.js";

const backends: [string, () => Promise<StorageBackend>][] = [
  ["local", async () => new LocalFsBackend(await createTempRoot("versions"))],
  ["memory", async () => new ObjectStoreBackend(new MemoryObjectStore())],
];

describe.each(backends)("VersionStore on %s backend", (_name, makeBackend) => {
  async function createStore(): Promise<{ backend: StorageBackend; store: VersionStore }> {
    const backend = await makeBackend();
    return { backend, store: new VersionStore(backend, silentLogger(), steppingClock()) };
  }

  it("stores artifacts, metadata and a manifest covering both", async () => {
    const { backend, store } = await createStore();
    const artifacts = sampleArtifacts();

    const registered = await store.register({ task: "ct", model: "pbmc", version: "v1", files: artifacts, metadata: CREATOR });

    const base = "tasks/ct/models/pbmc/versions/v1";
    expect(await backend.listChildren(base)).toEqual(["config.json", "manifest.sha256", "metadata.json", "model.bin"]);
    for (const artifact of artifacts) {
      expect(Buffer.compare(await backend.readAll(`${base}/${artifact.name}`), Buffer.from(artifact.content))).toBe(0);
    }

    const manifest = parseManifest((await backend.readAll(`${base}/manifest.sha256`)).toString("utf8"));
    expect(manifest).toEqual(registered.manifest);
    const { "metadata.json": metadataDigest, ...artifactDigests } = manifest;
    expect(artifactDigests).toEqual(computeManifest(artifacts));
    expect(metadataDigest).toMatch(/^[0-9a-f]{64}$/);
    expect(await store.verify("ct", "pbmc", "v1")).toEqual([]);
  });

  it("records provenance in metadata.json", async () => {
    const { store } = await createStore();
    await store.register({
      task: "ct",
      model: "pbmc",
      version: "v1",
      files: sampleArtifacts(),
      metadata: { creator: "test-user", framework: "pytorch", hyperparameters: { lr: 0.001 }, extra: { seed: 7 } },
    });

    expect(await store.readMetadata("ct", "pbmc", "v1")).toEqual({
      task: "ct",
      model: "pbmc",
      version: "v1",
      createdAt: "2024-05-01T12:00:00.000Z",
      creator: "test-user",
      framework: "pytorch",
      hyperparameters: { lr: 0.001 },
      artifacts: [
        { name: "model.bin", bytes: 10, kind: "weights", mediaType: "application/octet-stream" },
        { name: "config.json", bytes: 13, kind: "json", mediaType: "application/json" },
      ],
      extra: { seed: 7 },
    });
  });

  it("writes derived metadata files under the manifest", async () => {
    const { store } = await createStore();
    const registered = await store.register({
      task: "ct",
      model: "pbmc",
      version: "v1",
      files: [file("model.bin", "A")],
      metadata: CREATOR,
      derived: { metrics: { f1: 0.91 }, featureSchema: { genes: 2000 } },
    });

    expect(Object.keys(registered.manifest)).toEqual(["feature_schema.json", "metadata.json", "metrics.json", "model.bin"]);
  });

  it("rejects a second registration of the same version, even with identical content", async () => {
    const { backend, store } = await createStore();
    const input = { task: "ct", model: "pbmc", version: "v1", files: sampleArtifacts(), metadata: CREATOR };
    await store.register(input);
    const before = await backend.readAll("tasks/ct/models/pbmc/versions/v1/manifest.sha256");

    await expect(store.register(input)).rejects.toBeInstanceOf(AlreadyExistsError);
    await expect(
      store.register({ ...input, files: [file("model.bin", "other")] }),
    ).rejects.toMatchObject({ kind: "AlreadyExists", context: { task: "ct", model: "pbmc", version: "v1" } });

    expect(await backend.readAll("tasks/ct/models/pbmc/versions/v1/manifest.sha256")).toEqual(before);
  });

  it("lets exactly one of two concurrent identical registrations win", async () => {
    const { store } = await createStore();
    const input = { task: "ct", model: "pbmc", version: "v1", metadata: CREATOR };

    const results = await Promise.allSettled([
      store.register({ ...input, files: [file("model.bin", "first")] }),
      store.register({ ...input, files: [file("model.bin", "second")] }),
    ]);

    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((result) => result.status === "rejected");
    expect(rejected?.status === "rejected" ? rejected.reason : null).toBeInstanceOf(AlreadyExistsError);
    expect(await store.verify("ct", "pbmc", "v1")).toEqual([]);
    expect(await store.listVersions("ct", "pbmc")).toEqual(["v1"]);
  });

  it("registers distinct versions concurrently", async () => {
    const { store } = await createStore();
    await Promise.all(
      ["v1", "v2"].map((version) =>
        store.register({ task: "ct", model: "pbmc", version, files: [file("model.bin", version)], metadata: CREATOR }),
      ),
    );

    expect(await store.listVersions("ct", "pbmc")).toEqual(["v1", "v2"]);
    expect(await store.listModels("ct")).toEqual(["pbmc"]);
    expect(await store.listTasks()).toEqual(["ct"]);
  });

  it("leaves nothing behind when validation fails", async () => {
    const { backend, store } = await createStore();
    const base = { task: "ct", model: "pbmc", version: "v1", metadata: CREATOR };

    await expect(store.register({ ...base, files: [] })).rejects.toMatchObject({ context: { field: "artifacts" } });
    await expect(store.register({ ...base, files: [file("manifest.sha256", "x")] })).rejects.toBeInstanceOf(ValidationError);
    await expect(store.register({ ...base, files: [file("dir/model.bin", "x")] })).rejects.toMatchObject({
      context: { field: "artifact" },
    });
    await expect(store.register({ ...base, version: "v 1", files: [file("a", "x")] })).rejects.toMatchObject({
      context: { field: "version" },
    });
    await expect(
      store.register({ ...base, metadata: { creator: " " }, files: [file("a", "x")] }),
    ).rejects.toMatchObject({ code: "INVALID_METADATA", context: { field: "metadata.creator" } });

    expect(await backend.listChildren("")).toEqual([]);
  });

  it("reports unknown versions", async () => {
    const { store } = await createStore();
    expect(await store.exists("ct", "pbmc", "v9")).toBe(false);
    await expect(store.getVersionPath("ct", "pbmc", "v9")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.readManifest("ct", "pbmc", "v9")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.verify("ct", "pbmc", "v9")).rejects.toBeInstanceOf(NotFoundError);
    expect(await store.listVersions("ct", "pbmc")).toEqual([]);
  });

  it("detects a tampered artifact", async () => {
    const { backend, store } = await createStore();
    await store.register({ task: "ct", model: "pbmc", version: "v1", files: sampleArtifacts(), metadata: CREATOR });

    await backend.writeAtomic("tasks/ct/models/pbmc/versions/v1/model.bin", Buffer.from("tampered"));
    await backend.writeNew("tasks/ct/models/pbmc/versions/v1/injected.py", Buffer.from("print()"));

    const mismatches = await store.verify("ct", "pbmc", "v1");
    expect(mismatches.map((m) => `${m.kind}:${m.file}`)).toEqual(["extra:injected.py", "digest:model.bin"]);
  });
});

describe("VersionStore on a local filesystem", () => {
  it("writes a manifest that sha256sum can check", async () => {
    const root = await createTempRoot("versions");
    const store = new VersionStore(new LocalFsBackend(root), silentLogger());
    const registered = await store.register({
      task: "ct",
      model: "pbmc",
      version: "v1",
      files: [file("model.bin", "A")],
      metadata: CREATOR,
    });

    const dir = path.join(root, "tasks", "ct", "models", "pbmc", "versions", "v1");
    expect(registered.path).toBe(dir);
    expect(await readFile(path.join(dir, "manifest.sha256"), "utf8")).toBe(serializeManifest(registered.manifest));
    expect(await readdir(path.join(root, ".staging"))).toEqual([]);
  });
});
