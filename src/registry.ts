import { AliasResolver, type AliasListing, type Resolution } from "./aliases.js";
import { readArtifactDir } from "./artifacts.js";
import { AuditLog, type AuditEntry } from "./audit.js";
import { createBackend } from "./backend/index.js";
import type { StorageBackend } from "./backend/types.js";
import { DEFAULT_LOCK, type LockSettings, type RegistryConfig } from "./config.js";
import { ValidationError, describeError, type IntegrityMismatch } from "./errors.js";
import type { ArtifactFile, Manifest } from "./integrity.js";
import { assertIdentifier, tasksKey } from "./layout.js";
import { AdvisoryLock } from "./lock.js";
import { createLogger, silentLogger, type Logger } from "./logger.js";
import type { MetadataInput, VersionMetadata } from "./metadata.js";
import { PromotionEngine, type PromoteInput, type PromotionResult } from "./promotion.js";
import { VersionStore, type DerivedMetadata } from "./versions.js";

export interface ModelRegistryOptions {
  backend: StorageBackend;
  logger?: Logger;
  /** Verify integrity on every resolve, whatever the caller asks for. */
  strictVerify?: boolean;
  lock?: LockSettings;
  now?: () => Date;
}

export interface RegisterInput {
  task: string;
  model: string;
  version: string;
  /** In-memory files, or a flat directory to read them from. */
  artifacts: readonly ArtifactFile[] | { dir: string };
  metadata: MetadataInput;
  derived?: DerivedMetadata;
  /** Alias to point at the new version once it is committed. */
  alias?: string | null;
  /** Actor for the alias promotion; defaults to `metadata.creator`. */
  actor?: string;
  reason?: string | null;
}

export interface RegisterResult {
  task: string;
  model: string;
  version: string;
  path: string;
  manifest: Manifest;
  metadata: VersionMetadata;
  promotion: PromotionResult | null;
}

export interface ShowResult extends Resolution {
  metadata: VersionMetadata;
  manifest: Manifest;
  /** Aliases currently pointing at this version. */
  aliases: string[];
}

export interface VerifyReport {
  ok: boolean;
  task: string;
  model: string;
  version: string;
  path: string;
  mismatches: IntegrityMismatch[];
}

export interface HealthReport {
  ok: boolean;
  backend: string;
  root: string;
  error?: string;
}

/**
 * Entry point for front ends: one instance per registry root, holding no
 * state beyond its collaborators. Every operation goes back to storage.
 */
export class ModelRegistry {
  readonly backend: StorageBackend;
  readonly versions: VersionStore;
  readonly aliases: AliasResolver;
  readonly auditLog: AuditLog;
  readonly promotions: PromotionEngine;
  readonly strictVerify: boolean;
  private readonly logger: Logger;

  constructor(options: ModelRegistryOptions) {
    this.backend = options.backend;
    this.logger = options.logger ?? silentLogger();
    this.strictVerify = options.strictVerify ?? false;
    const now = options.now ?? (() => new Date());
    const lock = new AdvisoryLock(this.backend, this.logger.child("lock"), options.lock ?? DEFAULT_LOCK);

    this.versions = new VersionStore(this.backend, this.logger.child("versions"), now);
    this.aliases = new AliasResolver(this.backend, this.versions, this.logger.child("aliases"));
    this.auditLog = new AuditLog(this.backend, lock, now);
    this.promotions = new PromotionEngine({
      versions: this.versions,
      aliases: this.aliases,
      audit: this.auditLog,
      lock,
      logger: this.logger.child("promotion"),
      now,
    });
  }

  static fromConfig(config: RegistryConfig, logger?: Logger): ModelRegistry {
    const log = logger ?? createLogger("registry", config.log);
    return new ModelRegistry({
      backend: createBackend(config, log.child("storage")),
      logger: log,
      strictVerify: config.strictVerify,
      lock: config.lock,
    });
  }

  async register(input: RegisterInput): Promise<RegisterResult> {
    const alias = input.alias ?? null;
    const actor = input.actor ?? input.metadata.creator;
    // checked up front: the version cannot be taken back once committed
    if (alias !== null) {
      assertIdentifier("alias", alias);
      if (actor.trim() === "") {
        throw new ValidationError("Setting an alias requires an actor", {
          task: input.task,
          model: input.model,
          alias,
          field: "actor",
        });
      }
    }
    const files = "dir" in input.artifacts ? await readArtifactDir(input.artifacts.dir) : input.artifacts;
    const registered = await this.versions.register({
      task: input.task,
      model: input.model,
      version: input.version,
      files,
      metadata: input.metadata,
      derived: input.derived,
    });

    let promotion: PromotionResult | null = null;
    if (alias !== null) {
      promotion = await this.promotions.promote({
        task: input.task,
        model: input.model,
        alias,
        version: input.version,
        actor,
        reason: input.reason ?? "register",
      });
    }
    return { ...registered, promotion };
  }

  async resolve(task: string, ref: string, options: { verify?: boolean } = {}): Promise<Resolution> {
    return this.aliases.resolve(task, ref, { verify: this.strictVerify || (options.verify ?? false) });
  }

  async show(task: string, ref: string, options: { verify?: boolean } = {}): Promise<ShowResult> {
    const resolution = await this.resolve(task, ref, options);
    const { model, version } = resolution;
    const [metadata, manifest, aliases] = await Promise.all([
      this.versions.readMetadata(task, model, version),
      this.versions.readManifest(task, model, version),
      this.aliases.listAliases(task, model),
    ]);
    return {
      ...resolution,
      metadata,
      manifest,
      aliases: aliases.filter((entry) => entry.version === version).map((entry) => entry.alias),
    };
  }

  async promote(input: PromoteInput): Promise<PromotionResult> {
    return this.promotions.promote(input);
  }

  /** Integrity report for a reference; mismatches are reported, not thrown. */
  async verify(task: string, ref: string): Promise<VerifyReport> {
    const resolution = await this.aliases.resolve(task, ref, { verify: false });
    const mismatches = await this.versions.verify(task, resolution.model, resolution.version);
    return {
      ok: mismatches.length === 0,
      task,
      model: resolution.model,
      version: resolution.version,
      path: resolution.path,
      mismatches,
    };
  }

  async audit(task: string, model: string): Promise<AuditEntry[]> {
    assertIdentifier("task", task);
    assertIdentifier("model", model);
    return this.auditLog.readAll(task, model);
  }

  async listTasks(): Promise<string[]> {
    return this.versions.listTasks();
  }

  async listModels(task: string): Promise<string[]> {
    return this.versions.listModels(task);
  }

  async listVersions(task: string, model: string): Promise<string[]> {
    return this.versions.listVersions(task, model);
  }

  async listAliases(task: string, model: string): Promise<AliasListing[]> {
    return this.aliases.listAliases(task, model);
  }

  async health(): Promise<HealthReport> {
    const report = { backend: this.backend.kind, root: this.backend.locate("") };
    try {
      await this.backend.listChildren(tasksKey());
      return { ok: true, ...report };
    } catch (error) {
      this.logger.error("health check failed", { error: describeError(error) });
      return { ok: false, ...report, error: describeError(error) };
    }
  }
}
