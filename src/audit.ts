import { z } from "zod";

import type { StorageBackend } from "./backend/types.js";
import { IntegrityError, NotFoundError } from "./errors.js";
import { auditKey, auditLockKey } from "./layout.js";
import type { AdvisoryLock } from "./lock.js";

export type AuditAction = "create" | "update";

export interface AuditEntry {
  ts: string;
  /** One per promotion; a retried append carries the same id. */
  id: string;
  actor: string;
  action: AuditAction;
  alias: string;
  from: string | null;
  to: string;
  reason: string | null;
}

export type AuditEntryInput = Omit<AuditEntry, "ts">;

export const AuditEntrySchema = z.object({
  ts: z.string().datetime(),
  id: z.string().min(1),
  actor: z.string(),
  action: z.enum(["create", "update"]),
  alias: z.string(),
  from: z.string().nullable(),
  to: z.string(),
  reason: z.string().nullable(),
});

export function parseAuditLog(text: string, context: { task: string; model: string }): AuditEntry[] {
  const entries: AuditEntry[] = [];
  const lines = text.split("\n");
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    if (line.trim() === "") continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw new IntegrityError(`Audit log line ${String(index + 1)} is not valid JSON`, { ...context, line: index + 1 }, [], "AUDIT_MALFORMED");
    }
    const parsed = AuditEntrySchema.safeParse(raw);
    if (!parsed.success) {
      throw new IntegrityError(
        `Audit log line ${String(index + 1)} is malformed: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        { ...context, line: index + 1 },
        [],
        "AUDIT_MALFORMED",
      );
    }
    entries.push(parsed.data);
  }
  return entries;
}

/**
 * Append-only promotion journal, one per model, stored as JSON lines.
 *
 * Appends for one model are serialized by a model-scoped lock and stamped
 * inside it, so the file is strictly time-ordered even across processes.
 */
export class AuditLog {
  private readonly backend: StorageBackend;
  private readonly lock: AdvisoryLock;
  private readonly now: () => Date;

  constructor(backend: StorageBackend, lock: AdvisoryLock, now: () => Date = () => new Date()) {
    this.backend = backend;
    this.lock = lock;
    this.now = now;
  }

  async append(task: string, model: string, input: AuditEntryInput): Promise<AuditEntry> {
    return this.lock.withLock(auditLockKey(task, model), input.actor, async () => {
      const previous = await this.readAll(task, model);
      // an earlier attempt may have landed even though it reported failure
      const landed = previous.find((entry) => entry.id === input.id);
      if (landed) return landed;
      const last = previous.at(-1);
      let stamp = this.now().getTime();
      if (last && stamp <= Date.parse(last.ts)) stamp = Date.parse(last.ts) + 1;

      const entry: AuditEntry = { ts: new Date(stamp).toISOString(), ...input };
      await this.backend.appendLine(auditKey(task, model), Buffer.from(`${JSON.stringify(entry)}\n`, "utf8"));
      return entry;
    });
  }

  /** Entries oldest first; a model that was never promoted has none. */
  async readAll(task: string, model: string): Promise<AuditEntry[]> {
    let bytes: Buffer;
    try {
      bytes = await this.backend.readAll(auditKey(task, model));
    } catch (error) {
      if (error instanceof NotFoundError) return [];
      throw error;
    }
    return parseAuditLog(bytes.toString("utf8"), { task, model });
  }
}
