import { z } from "zod";

import type { StorageBackend } from "./backend/types.js";
import { IntegrityError, NotFoundError } from "./errors.js";
import { aliasKey, aliasesKey, assertIdentifier } from "./layout.js";
import type { Logger } from "./logger.js";
import { encodeJson } from "./metadata.js";
import { parseReference } from "./refs.js";
import type { VersionStore } from "./versions.js";

export interface AliasRecord {
  version: string;
  updatedAt: string;
  updatedBy: string;
}

export interface AliasListing extends AliasRecord {
  alias: string;
}

export type ManifestStatus = "verified" | "unverified";

export interface Resolution {
  task: string;
  model: string;
  version: string;
  /** Alias that was followed, or null when the qualifier named a version. */
  alias: string | null;
  path: string;
  manifestStatus: ManifestStatus;
}

const AliasRecordSchema = z.object({
  version: z.string().min(1),
  updatedAt: z.string(),
  updatedBy: z.string(),
});

const ALIAS_SUFFIX = ".json";

/**
 * Maps `model[@qualifier]` to a committed version. An alias file wins over a
 * version of the same name; whatever the qualifier lands on must exist at
 * the moment of resolution.
 */
export class AliasResolver {
  private readonly backend: StorageBackend;
  private readonly versions: VersionStore;
  private readonly logger: Logger;

  constructor(backend: StorageBackend, versions: VersionStore, logger: Logger) {
    this.backend = backend;
    this.versions = versions;
    this.logger = logger;
  }

  async readAlias(task: string, model: string, alias: string): Promise<AliasRecord | null> {
    assertIdentifier("alias", alias);
    let bytes: Buffer;
    try {
      bytes = await this.backend.readAll(aliasKey(task, model, alias));
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(bytes.toString("utf8"));
    } catch {
      throw new IntegrityError(`Alias ${alias} is not valid JSON`, { task, model, alias }, [], "ALIAS_MALFORMED");
    }
    const parsed = AliasRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IntegrityError(`Alias ${alias} is malformed`, { task, model, alias }, [], "ALIAS_MALFORMED");
    }
    return parsed.data;
  }

  async writeAlias(task: string, model: string, alias: string, record: AliasRecord): Promise<void> {
    await this.backend.writeAtomic(aliasKey(task, model, alias), encodeJson(record));
  }

  async listAliases(task: string, model: string): Promise<AliasListing[]> {
    assertIdentifier("task", task);
    assertIdentifier("model", model);
    const names = (await this.backend.listChildren(aliasesKey(task, model)))
      .filter((name) => name.endsWith(ALIAS_SUFFIX))
      .map((name) => name.slice(0, -ALIAS_SUFFIX.length));

    const listings: AliasListing[] = [];
    for (const alias of names) {
      const record = await this.readAlias(task, model, alias);
      if (record) listings.push({ alias, ...record });
    }
    return listings;
  }

  async resolve(task: string, ref: string, options: { verify?: boolean } = {}): Promise<Resolution> {
    assertIdentifier("task", task);
    const { model, qualifier } = parseReference(ref);
    const context = { task, model, ref };

    const record = await this.readAlias(task, model, qualifier);
    const version = record ? record.version : qualifier;
    const alias = record ? qualifier : null;

    // Re-checked even for aliases: a stale alias must never resolve.
    if (!(await this.versions.exists(task, model, version))) {
      if (record) {
        this.logger.error("alias points at a missing version", { ...context, alias, version });
        throw new NotFoundError(`Alias ${qualifier} of ${task}/${model} points at missing version ${version}`, {
          ...context,
          alias: qualifier,
          version,
        }, "STALE_ALIAS");
      }
      throw new NotFoundError(`No alias or version "${qualifier}" for ${task}/${model}`, context);
    }

    let manifestStatus: ManifestStatus = "unverified";
    if (options.verify) {
      const mismatches = await this.versions.verify(task, model, version);
      if (mismatches.length > 0) {
        throw new IntegrityError(
          `Integrity check failed for ${task}/${model}/${version}: ${mismatches.map((m) => m.file).join(", ")}`,
          { ...context, version },
          mismatches,
        );
      }
      manifestStatus = "verified";
    }

    return {
      task,
      model,
      version,
      alias,
      path: await this.versions.getVersionPath(task, model, version),
      manifestStatus,
    };
  }
}
