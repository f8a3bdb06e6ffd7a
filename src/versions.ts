import { randomUUID } from "node:crypto";

import type { StorageBackend } from "./backend/types.js";
import { AlreadyExistsError, IntegrityError, NotFoundError, ValidationError, describeError, type IntegrityMismatch } from "./errors.js";
import {
  computeManifest,
  parseManifest,
  serializeManifest,
  verifyManifest,
  type ArtifactFile,
  type Manifest,
} from "./integrity.js";
import {
  FEATURE_SCHEMA_FILE,
  MANIFEST_FILE,
  METADATA_FILE,
  METRICS_FILE,
  RESERVED_FILES,
  STAGING_DIR,
  assertIdentifier,
  joinKey,
  modelsKey,
  tasksKey,
  versionKey,
  versionsKey,
} from "./layout.js";
import type { Logger } from "./logger.js";
import {
  buildMetadata,
  encodeJson,
  parseMetadata,
  validateMetadataInput,
  type MetadataInput,
  type VersionMetadata,
} from "./metadata.js";

export interface DerivedMetadata {
  metrics?: Record<string, unknown>;
  featureSchema?: Record<string, unknown>;
}

export interface RegisterVersionInput {
  task: string;
  model: string;
  version: string;
  files: readonly ArtifactFile[];
  metadata: MetadataInput;
  derived?: DerivedMetadata;
}

export interface RegisteredVersion {
  task: string;
  model: string;
  version: string;
  path: string;
  manifest: Manifest;
  metadata: VersionMetadata;
}

function validateArtifactNames(files: readonly ArtifactFile[]): void {
  if (files.length === 0) {
    throw new ValidationError("Artifact set is empty", { field: "artifacts" });
  }
  const seen = new Set<string>();
  for (const file of files) {
    assertIdentifier("artifact", file.name);
    if (RESERVED_FILES.includes(file.name)) {
      throw new ValidationError(`Artifact name "${file.name}" is reserved by the registry`, { field: "artifact" });
    }
    if (seen.has(file.name)) {
      throw new ValidationError(`Duplicate artifact name "${file.name}"`, { field: "artifact" });
    }
    seen.add(file.name);
  }
}

/**
 * Write-once store of version bundles under
 * `tasks/<task>/models/<model>/versions/<version>/`.
 *
 * A version exists once its manifest is visible; everything is staged under
 * `.staging/` first and published with a single commitDirectory.
 */
export class VersionStore {
  private readonly backend: StorageBackend;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(backend: StorageBackend, logger: Logger, now: () => Date = () => new Date()) {
    this.backend = backend;
    this.logger = logger;
    this.now = now;
  }

  async register(input: RegisterVersionInput): Promise<RegisteredVersion> {
    const { task, model, version } = input;
    assertIdentifier("task", task);
    assertIdentifier("model", model);
    assertIdentifier("version", version);
    const metadataInput = validateMetadataInput(input.metadata);
    validateArtifactNames(input.files);

    const context = { task, model, version };
    const finalKey = versionKey(task, model, version);
    if (await this.exists(task, model, version)) {
      this.logger.warn("register rejected: version already exists", context);
      throw new AlreadyExistsError(`Version already exists: ${task}/${model}/${version}`, context);
    }

    const metadata = buildMetadata(metadataInput, context, input.files, this.now());
    const staged: ArtifactFile[] = [...input.files, { name: METADATA_FILE, content: encodeJson(metadata) }];
    if (input.derived?.metrics !== undefined) {
      staged.push({ name: METRICS_FILE, content: encodeJson(input.derived.metrics) });
    }
    if (input.derived?.featureSchema !== undefined) {
      staged.push({ name: FEATURE_SCHEMA_FILE, content: encodeJson(input.derived.featureSchema) });
    }
    const manifest = computeManifest(staged);

    const stagingKey = joinKey(STAGING_DIR, randomUUID());
    try {
      for (const file of staged) {
        await this.backend.writeNew(joinKey(stagingKey, file.name), file.content);
      }
      // Written last: on object stores the manifest is the commit marker.
      await this.backend.writeNew(joinKey(stagingKey, MANIFEST_FILE), Buffer.from(serializeManifest(manifest), "utf8"));
      await this.backend.commitDirectory(stagingKey, finalKey);
    } catch (error) {
      await this.discardStaging(stagingKey);
      if (error instanceof AlreadyExistsError) {
        this.logger.warn("register lost commit race: version already exists", context);
        throw new AlreadyExistsError(`Version already exists: ${task}/${model}/${version}`, context);
      }
      throw error;
    }

    const path = this.backend.locate(finalKey);
    this.logger.info("version registered", { ...context, files: staged.length, path });
    return { task, model, version, path, manifest, metadata };
  }

  async exists(task: string, model: string, version: string): Promise<boolean> {
    return this.backend.exists(joinKey(versionKey(task, model, version), MANIFEST_FILE));
  }

  /** Locator of a committed version; NotFoundError otherwise. */
  async getVersionPath(task: string, model: string, version: string): Promise<string> {
    assertIdentifier("task", task);
    assertIdentifier("model", model);
    assertIdentifier("version", version);
    if (!(await this.exists(task, model, version))) {
      throw new NotFoundError(`Version not found: ${task}/${model}/${version}`, { task, model, version });
    }
    return this.backend.locate(versionKey(task, model, version));
  }

  async readManifest(task: string, model: string, version: string): Promise<Manifest> {
    const key = joinKey(versionKey(task, model, version), MANIFEST_FILE);
    let bytes: Buffer;
    try {
      bytes = await this.backend.readAll(key);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFoundError(`Version not found: ${task}/${model}/${version}`, { task, model, version });
      }
      throw error;
    }
    try {
      return parseManifest(bytes.toString("utf8"));
    } catch (error) {
      if (error instanceof IntegrityError) {
        throw new IntegrityError(error.message, { task, model, version, file: MANIFEST_FILE }, [], error.code);
      }
      throw error;
    }
  }

  async readMetadata(task: string, model: string, version: string): Promise<VersionMetadata> {
    await this.getVersionPath(task, model, version);
    const key = joinKey(versionKey(task, model, version), METADATA_FILE);
    let bytes: Buffer;
    try {
      bytes = await this.backend.readAll(key);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new IntegrityError(`metadata.json is missing from ${task}/${model}/${version}`, { task, model, version }, [
          { file: METADATA_FILE, kind: "missing", expected: null, actual: null },
        ]);
      }
      throw error;
    }
    return parseMetadata(bytes, { task, model, version });
  }

  /**
   * Every stored file of a version except the manifest. Entries that cannot
   * be read as files (e.g. a directory dropped in by hand) come back in
   * `unreadable`.
   */
  async readFiles(task: string, model: string, version: string): Promise<{ files: ArtifactFile[]; unreadable: string[] }> {
    const base = versionKey(task, model, version);
    const names = (await this.backend.listChildren(base)).filter((name) => name !== MANIFEST_FILE);
    const files: ArtifactFile[] = [];
    const unreadable: string[] = [];
    for (const name of names) {
      try {
        files.push({ name, content: await this.backend.readAll(joinKey(base, name)) });
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        unreadable.push(name);
      }
    }
    return { files, unreadable };
  }

  /** Recompute every digest; an empty list means the version is intact. */
  async verify(task: string, model: string, version: string): Promise<IntegrityMismatch[]> {
    const manifest = await this.readManifest(task, model, version);
    const { files, unreadable } = await this.readFiles(task, model, version);
    const mismatches = verifyManifest(files, manifest);
    for (const name of unreadable) {
      if (!Object.hasOwn(manifest, name)) mismatches.push({ file: name, kind: "extra", expected: null, actual: null });
    }
    if (mismatches.length > 0) {
      this.logger.error("integrity check failed", {
        task,
        model,
        version,
        files: mismatches.map((m) => `${m.kind}:${m.file}`),
      });
    }
    return mismatches;
  }

  async listTasks(): Promise<string[]> {
    return this.backend.listChildren(tasksKey());
  }

  async listModels(task: string): Promise<string[]> {
    assertIdentifier("task", task);
    return this.backend.listChildren(modelsKey(task));
  }

  /** Committed versions only, sorted. */
  async listVersions(task: string, model: string): Promise<string[]> {
    assertIdentifier("task", task);
    assertIdentifier("model", model);
    const candidates = await this.backend.listChildren(versionsKey(task, model));
    const committed: string[] = [];
    for (const version of candidates) {
      if (await this.exists(task, model, version)) committed.push(version);
    }
    return committed;
  }

  private async discardStaging(stagingKey: string): Promise<void> {
    try {
      await this.backend.remove(stagingKey);
    } catch (error) {
      this.logger.warn("failed to remove staging area", { staging: stagingKey, error: describeError(error) });
    }
  }
}
