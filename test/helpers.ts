import { mkdtemp, mkdir, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { LocalFsBackend } from "../src/backend/local.js";
import { MemoryObjectStore } from "../src/backend/memory-object-store.js";
import { ObjectStoreBackend } from "../src/backend/object-store.js";
import type { StorageBackend } from "../src/backend/types.js";
import type { ArtifactFile } from "../src/integrity.js";
import { createLogger, type Logger } from "../src/logger.js";
import { ModelRegistry, type ModelRegistryOptions } from "../src/registry.js";

export const CREATOR = { creator: "test-user" };

export async function createTempRoot(label = "registry"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `model-registry-${label}-`));
}

export function file(name: string, content: string): ArtifactFile {
  return { name, content: Buffer.from(content, "utf8") };
}

export function sampleArtifacts(): ArtifactFile[] {
  return [file("model.bin", "weights-v1"), file("config.json", '{"layers":2}\n')];
}

/** Writes a flat artifact directory and returns its path. */
export async function writeArtifactDir(files: ArtifactFile[]): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "model-registry-artifacts-"));
  await mkdir(dir, { recursive: true });
  for (const entry of files) await writeFile(path.join(dir, entry.name), entry.content);
  return dir;
}

/** Clock that advances one second per call, starting at `start`. */
export function steppingClock(start = "2024-05-01T12:00:00.000Z", stepMs = 1000): () => Date {
  let current = Date.parse(start) - stepMs;
  return () => {
    current += stepMs;
    return new Date(current);
  };
}

export function captureLogger(component = "test"): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger(component, { level: "debug", json: true, sink: { write: (line) => lines.push(line) } });
  return { logger, lines };
}

export async function createLocalRegistry(
  options: Partial<Omit<ModelRegistryOptions, "backend">> = {},
): Promise<{ root: string; backend: LocalFsBackend; registry: ModelRegistry }> {
  const root = await createTempRoot();
  const backend = new LocalFsBackend(root);
  return { root, backend, registry: new ModelRegistry({ backend, ...options }) };
}

export function createMemoryRegistry(
  options: Partial<Omit<ModelRegistryOptions, "backend">> = {},
): { store: MemoryObjectStore; backend: StorageBackend; registry: ModelRegistry } {
  const store = new MemoryObjectStore();
  const backend = new ObjectStoreBackend(store);
  return { store, backend, registry: new ModelRegistry({ backend, ...options }) };
}
