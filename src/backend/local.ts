import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

import { AlreadyExistsError, NotFoundError, errnoCode, toStorageError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { isHiddenName, keySegments } from "./paths.js";
import type { StorageBackend } from "./types.js";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

export interface LocalFsBackendOptions {
  logger?: Logger;
}

function isFatalBestEffort(code?: string): boolean {
  return code === "ENOSPC" || code === "EIO";
}

function tempSibling(target: string): string {
  return path.join(path.dirname(target), `.${path.basename(target)}.tmp.${randomBytes(4).toString("hex")}`);
}

/**
 * Backend over a local POSIX filesystem.
 *
 * - writeNew: temp file + link(2), which fails with EEXIST instead of replacing
 * - writeAtomic: temp file + fdatasync + rename(2) + directory fsync
 * - commitDirectory: rename(2) of the staging directory; a non-empty target
 *   makes the kernel refuse with ENOTEMPTY/EEXIST
 */
export class LocalFsBackend implements StorageBackend {
  readonly kind: string = "local";
  readonly root: string;
  protected readonly fsyncMode: FsyncMode = "BEST_EFFORT";
  protected readonly logger: Logger;

  constructor(root: string, options: LocalFsBackendOptions = {}) {
    this.root = path.resolve(root);
    this.logger = options.logger ?? silentLogger();
  }

  locate(key: string): string {
    return path.join(this.root, ...keySegments(key));
  }

  /** Wraps a filesystem operation; subclasses layer retries on top. */
  protected run<T>(operation: string, key: string, fn: () => Promise<T>, _idempotent: boolean): Promise<T> {
    return fn().catch((error: unknown) => {
      throw toStorageError(error, { path: key, operation });
    });
  }

  async exists(key: string): Promise<boolean> {
    const target = this.locate(key);
    return this.run("exists", key, async () => {
      try {
        await fs.access(target);
        return true;
      } catch (error) {
        if (errnoCode(error) === "ENOENT") return false;
        throw error;
      }
    }, true);
  }

  async readAll(key: string): Promise<Buffer> {
    const target = this.locate(key);
    return this.run("readAll", key, async () => {
      try {
        return await fs.readFile(target);
      } catch (error) {
        const code = errnoCode(error);
        if (code === "ENOENT" || code === "EISDIR" || code === "ENOTDIR") {
          throw new NotFoundError(`Nothing stored at ${key}`, { path: key });
        }
        throw error;
      }
    }, true);
  }

  async writeNew(key: string, bytes: Uint8Array): Promise<void> {
    const target = this.locate(key);
    await this.run("writeNew", key, async () => {
      await fs.mkdir(path.dirname(target), { recursive: true });
      const tmp = tempSibling(target);
      try {
        await this.writeFileSynced(tmp, bytes);
        try {
          await fs.link(tmp, target);
        } catch (error) {
          const code = errnoCode(error);
          if (code === "EEXIST") throw new AlreadyExistsError(`Already exists: ${key}`, { path: key });
          if (code !== "EPERM" && code !== "ENOTSUP" && code !== "EOPNOTSUPP") throw error;
          // no hard links on this filesystem: fall back to O_CREAT|O_EXCL
          await this.writeExclusive(key, target, bytes);
        }
      } finally {
        await fs.rm(tmp, { force: true });
      }
      await this.syncDir(path.dirname(target));
    }, false);
  }

  async listChildren(key: string): Promise<string[]> {
    const target = this.locate(key);
    return this.run("listChildren", key, async () => {
      try {
        const names = await fs.readdir(target);
        return names.filter((name) => !isHiddenName(name)).sort();
      } catch (error) {
        const code = errnoCode(error);
        if (code === "ENOENT" || code === "ENOTDIR") return [];
        throw error;
      }
    }, true);
  }

  async commitDirectory(stagingKey: string, finalKey: string): Promise<void> {
    const staging = this.locate(stagingKey);
    const final = this.locate(finalKey);
    let attempts = 0;
    await this.run("commitDirectory", finalKey, async () => {
      attempts += 1;
      if (await this.pathExists(final)) {
        // Only a retry may find its own earlier rename already landed.
        if (attempts > 1 && !(await this.pathExists(staging))) return;
        throw new AlreadyExistsError(`Already exists: ${finalKey}`, { path: finalKey });
      }
      await fs.mkdir(path.dirname(final), { recursive: true });
      try {
        await fs.rename(staging, final);
      } catch (error) {
        const code = errnoCode(error);
        if (code === "ENOTEMPTY" || code === "EEXIST") {
          throw new AlreadyExistsError(`Already exists: ${finalKey}`, { path: finalKey });
        }
        throw error;
      }
      await this.syncDir(path.dirname(final));
    }, true);
  }

  async writeAtomic(key: string, bytes: Uint8Array): Promise<void> {
    const target = this.locate(key);
    await this.run("writeAtomic", key, async () => {
      await fs.mkdir(path.dirname(target), { recursive: true });
      const tmp = tempSibling(target);
      try {
        await this.writeFileSynced(tmp, bytes);
        await fs.rename(tmp, target);
      } catch (error) {
        await fs.rm(tmp, { force: true });
        throw error;
      }
      await this.syncDir(path.dirname(target));
    }, true);
  }

  async appendLine(key: string, bytes: Uint8Array): Promise<void> {
    const target = this.locate(key);
    await this.run("appendLine", key, async () => {
      await fs.mkdir(path.dirname(target), { recursive: true });
      const handle = await fs.open(target, "a");
      try {
        // one write(2) under O_APPEND: concurrent appenders never interleave
        await handle.write(bytes);
        await this.syncHandle(handle, target);
      } finally {
        await handle.close();
      }
    }, false);
  }

  async remove(key: string): Promise<void> {
    const target = this.locate(key);
    await this.run("remove", key, () => fs.rm(target, { recursive: true, force: true }), true);
  }

  private async pathExists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return false;
      throw error;
    }
  }

  private async writeExclusive(key: string, target: string, bytes: Uint8Array): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await fs.open(target, "wx");
    } catch (error) {
      if (errnoCode(error) === "EEXIST") throw new AlreadyExistsError(`Already exists: ${key}`, { path: key });
      throw error;
    }
    try {
      await handle.writeFile(bytes);
      await this.syncHandle(handle, target);
    } finally {
      await handle.close();
    }
  }

  private async writeFileSynced(target: string, bytes: Uint8Array): Promise<void> {
    const handle = await fs.open(target, "w", 0o644);
    try {
      await handle.writeFile(bytes);
      await this.syncHandle(handle, target);
    } finally {
      await handle.close();
    }
  }

  private async syncHandle(handle: FileHandle, target: string): Promise<void> {
    try {
      await handle.datasync();
    } catch (error) {
      this.onSyncFailure(error, target);
    }
  }

  private async syncDir(dir: string): Promise<void> {
    let handle: FileHandle | undefined;
    try {
      handle = await fs.open(dir, "r");
      await handle.sync();
    } catch (error) {
      this.onSyncFailure(error, dir);
    } finally {
      await handle?.close();
    }
  }

  private onSyncFailure(error: unknown, target: string): void {
    const code = errnoCode(error);
    if (this.fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw error;
    this.logger.debug("fsync skipped", { path: target, code: code ?? "UNKNOWN" });
  }
}
