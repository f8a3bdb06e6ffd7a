import { randomUUID } from "node:crypto";
import os from "node:os";

import { z } from "zod";

import type { StorageBackend } from "./backend/types.js";
import { DEFAULT_LOCK, type LockSettings } from "./config.js";
import { AlreadyExistsError, NotFoundError, StorageError, describeError, errnoCode } from "./errors.js";
import type { Logger } from "./logger.js";
import { backoff, sleep } from "./backend/retry.js";

export interface LockHandle {
  key: string;
  token: string;
}

const LockRecordSchema = z.object({
  token: z.string(),
  owner: z.string(),
  host: z.string(),
  pid: z.number().int(),
  acquiredAtMs: z.number(),
});

type LockRecord = z.infer<typeof LockRecordSchema>;

const LOCK_RETRY = { attempts: Number.POSITIVE_INFINITY, baseDelayMs: 25, maxDelayMs: 500 };

function processAlive(pid: number): boolean {
  try {
    // signal 0 only checks that the process exists
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === "EPERM";
  }
}

/**
 * Advisory lock built from the backend's create-if-absent primitive, so it
 * works the same on every backend. A lock older than `staleMs`, or owned by
 * a dead process on this host, is taken over.
 */
export class AdvisoryLock {
  private readonly backend: StorageBackend;
  private readonly settings: LockSettings;
  private readonly logger: Logger;

  constructor(backend: StorageBackend, logger: Logger, settings: LockSettings = DEFAULT_LOCK) {
    this.backend = backend;
    this.settings = settings;
    this.logger = logger;
  }

  async acquire(key: string, owner: string): Promise<LockHandle> {
    const started = Date.now();
    let attempt = 0;
    // when the record was first seen unreadable, reset whenever it parses
    let unreadableSince: number | null = null;

    while (true) {
      const record: LockRecord = {
        token: randomUUID(),
        owner,
        host: os.hostname(),
        pid: process.pid,
        acquiredAtMs: Date.now(),
      };
      try {
        await this.backend.writeNew(key, Buffer.from(JSON.stringify(record), "utf8"));
        return { key, token: record.token };
      } catch (error) {
        if (!(error instanceof AlreadyExistsError)) throw error;
      }

      const state = await this.breakIfStale(key, unreadableSince);
      if (state === "broken") continue;
      unreadableSince = state === "unreadable" ? (unreadableSince ?? Date.now()) : null;

      const elapsed = Date.now() - started;
      if (elapsed >= this.settings.timeoutMs) {
        throw new StorageError(`Timed out after ${String(elapsed)}ms waiting for lock ${key}`, { path: key }, {
          code: "LOCK_TIMEOUT",
        });
      }
      const wait = backoff(attempt, LOCK_RETRY);
      attempt += 1;
      this.logger.debug("lock busy, waiting", { key, waitMs: wait });
      await sleep(wait);
    }
  }

  /** Release only if we still own it; a taken-over lock is left alone. */
  async release(handle: LockHandle): Promise<void> {
    const current = await this.readRecord(handle.key);
    if (current !== null && current !== "corrupt" && current.token !== handle.token) {
      this.logger.warn("lock was taken over before release", { key: handle.key });
      return;
    }
    await this.backend.remove(handle.key);
  }

  async withLock<T>(key: string, owner: string, fn: () => Promise<T>): Promise<T> {
    const handle = await this.acquire(key, owner);
    try {
      return await fn();
    } finally {
      await this.release(handle);
    }
  }

  private async readRecord(key: string): Promise<LockRecord | "corrupt" | null> {
    let bytes: Buffer;
    try {
      bytes = await this.backend.readAll(key);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
    try {
      const parsed = LockRecordSchema.safeParse(JSON.parse(bytes.toString("utf8")));
      return parsed.success ? parsed.data : "corrupt";
    } catch {
      return "corrupt";
    }
  }

  /**
   * A record that does not parse may be one still being written, so it only
   * counts as stale once it has stayed unreadable for `staleMs`.
   */
  private async breakIfStale(key: string, unreadableSince: number | null): Promise<"broken" | "held" | "unreadable"> {
    const record = await this.readRecord(key);
    if (record === null) return "broken";

    let reason: string | null = null;
    if (record === "corrupt") {
      if (unreadableSince === null || Date.now() - unreadableSince <= this.settings.staleMs) return "unreadable";
      reason = "unreadable";
    } else if (Date.now() - record.acquiredAtMs > this.settings.staleMs) {
      reason = "age";
    } else if (record.host === os.hostname() && !processAlive(record.pid)) {
      reason = "owner_dead";
    }
    if (reason === null) return "held";

    // Someone else may have broken it and re-acquired since we looked.
    const again = await this.readRecord(key);
    if (again === null) return "broken";
    if (record === "corrupt" ? again !== "corrupt" : again === "corrupt" || again.token !== record.token) return "held";

    this.logger.warn("taking over stale lock", {
      key,
      reason,
      owner: record === "corrupt" ? null : record.owner,
    });
    try {
      await this.backend.remove(key);
    } catch (error) {
      this.logger.warn("failed to remove stale lock", { key, error: describeError(error) });
      return "held";
    }
    return "broken";
  }
}
