import chokidar, { type FSWatcher } from "chokidar";

import type { AuditEntry, AuditLog } from "./audit.js";
import type { StorageBackend } from "./backend/types.js";
import { ValidationError } from "./errors.js";
import { assertIdentifier, auditKey } from "./layout.js";

export interface AuditFollowerOptions {
  /** stat-polling instead of inotify; needed on NFS and other shared mounts. */
  usePolling?: boolean;
  intervalMs?: number;
}

/**
 * Tails one model's audit log and hands over every entry appended after
 * `start()`. Only filesystem backends have something to watch.
 */
export class AuditFollower {
  private readonly backend: StorageBackend;
  private readonly auditLog: AuditLog;
  private readonly task: string;
  private readonly model: string;
  private readonly path: string;
  private readonly onEntry: (entry: AuditEntry) => void;
  private readonly onError: (error: unknown) => void;
  private readonly options: AuditFollowerOptions;
  private watcher: FSWatcher | null = null;
  private seen = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    backend: StorageBackend,
    auditLog: AuditLog,
    target: { task: string; model: string },
    handlers: { onEntry: (entry: AuditEntry) => void; onError: (error: unknown) => void },
    options: AuditFollowerOptions = {},
  ) {
    const { task, model } = target;
    assertIdentifier("task", task);
    assertIdentifier("model", model);
    if (backend.kind !== "local" && backend.kind !== "shared") {
      throw new ValidationError(
        `Following the audit log needs a filesystem backend, not "${backend.kind}"`,
        { task, model, field: "backend" },
        "FOLLOW_UNSUPPORTED",
      );
    }
    this.backend = backend;
    this.auditLog = auditLog;
    this.task = task;
    this.model = model;
    this.path = backend.locate(auditKey(task, model));
    this.onEntry = handlers.onEntry;
    this.onError = handlers.onError;
    this.options = options;
  }

  async start(): Promise<void> {
    this.seen = (await this.auditLog.readAll(this.task, this.model)).length;

    const watcher = chokidar.watch(this.path, {
      ignoreInitial: true,
      usePolling: this.options.usePolling ?? this.backend.kind === "shared",
      interval: this.options.intervalMs ?? 100,
    });
    this.watcher = watcher;

    watcher.on("add", () => this.schedule());
    watcher.on("change", () => this.schedule());
    watcher.on("error", (error) => this.onError(error));

    await new Promise<void>((resolve) => {
      watcher.once("ready", () => resolve());
    });
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    await this.pending;
  }

  private schedule(): void {
    // reads are chained so entries come out once and in order
    this.pending = this.pending.then(() => this.drain()).catch((error: unknown) => this.onError(error));
  }

  private async drain(): Promise<void> {
    const entries = await this.auditLog.readAll(this.task, this.model);
    const fresh = entries.slice(this.seen);
    this.seen = entries.length;
    for (const entry of fresh) this.onEntry(entry);
  }
}
