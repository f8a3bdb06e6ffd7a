import { randomUUID } from "node:crypto";

import type { AliasResolver } from "./aliases.js";
import type { AuditEntry, AuditLog } from "./audit.js";
import { backoff, sleep, type RetryPolicy } from "./backend/retry.js";
import { NotFoundError, StorageError, ValidationError, describeError, errnoCode } from "./errors.js";
import { aliasLockKey, assertIdentifier } from "./layout.js";
import type { AdvisoryLock } from "./lock.js";
import type { Logger } from "./logger.js";
import type { VersionStore } from "./versions.js";

export interface PromoteInput {
  task: string;
  model: string;
  alias: string;
  version: string;
  actor: string;
  reason?: string | null;
}

export interface PromotionResult {
  alias: string;
  previous: string | null;
  new: string;
  entry: AuditEntry;
}

const AUDIT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 50, maxDelayMs: 500 };

/**
 * Repoints an alias and journals the change. Promotions of one
 * `(task, model, alias)` are serialized by an advisory lock, so the
 * previous target recorded in the audit entry is the one actually replaced.
 */
export class PromotionEngine {
  private readonly versions: VersionStore;
  private readonly aliases: AliasResolver;
  private readonly audit: AuditLog;
  private readonly lock: AdvisoryLock;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: {
    versions: VersionStore;
    aliases: AliasResolver;
    audit: AuditLog;
    lock: AdvisoryLock;
    logger: Logger;
    now?: () => Date;
  }) {
    this.versions = deps.versions;
    this.aliases = deps.aliases;
    this.audit = deps.audit;
    this.lock = deps.lock;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  async promote(input: PromoteInput): Promise<PromotionResult> {
    const { task, model, alias, version } = input;
    assertIdentifier("task", task);
    assertIdentifier("model", model);
    assertIdentifier("alias", alias);
    assertIdentifier("version", version);
    const actor = input.actor.trim();
    if (!actor) throw new ValidationError("Promotion requires an actor", { task, model, alias, field: "actor" });
    const reason = input.reason?.trim() || null;
    const context = { task, model, alias, version };

    return this.lock.withLock(aliasLockKey(task, model, alias), actor, async () => {
      if (!(await this.versions.exists(task, model, version))) {
        throw new NotFoundError(`Cannot promote missing version ${task}/${model}/${version}`, context);
      }

      const current = await this.aliases.readAlias(task, model, alias);
      const previous = current ? current.version : null;

      await this.aliases.writeAlias(task, model, alias, {
        version,
        updatedAt: this.now().toISOString(),
        updatedBy: actor,
      });

      const entry = await this.appendAudit(task, model, {
        id: randomUUID(),
        actor,
        action: previous === null ? "create" : "update",
        alias,
        from: previous,
        to: version,
        reason,
      });

      this.logger.info("alias promoted", { ...context, previous, actor });
      return { alias, previous, new: version, entry };
    });
  }

  /**
   * The alias is already written: retry, and if it still fails say so loudly.
   * Every attempt carries the same entry id, so a retry after an append that
   * landed but reported failure does not journal the promotion twice.
   */
  private async appendAudit(
    task: string,
    model: string,
    input: Omit<AuditEntry, "ts">,
  ): Promise<AuditEntry> {
    let lastError: unknown;
    for (let attempt = 0; attempt < AUDIT_RETRY.attempts; attempt += 1) {
      try {
        return await this.audit.append(task, model, input);
      } catch (error) {
        lastError = error;
        this.logger.warn("audit append failed", { task, model, alias: input.alias, attempt: attempt + 1, error: describeError(error) });
        if (attempt + 1 < AUDIT_RETRY.attempts) await sleep(backoff(attempt, AUDIT_RETRY));
      }
    }
    this.logger.error("alias changed without an audit entry", { task, model, alias: input.alias, to: input.to });
    throw new StorageError(
      `Alias ${input.alias} of ${task}/${model} now points at ${input.to}, but the audit entry could not be written`,
      { task, model, alias: input.alias, version: input.to, aliasWritten: true, causeCode: errnoCode(lastError) ?? null },
      { cause: lastError, code: "AUDIT_APPEND_FAILED" },
    );
  }
}
