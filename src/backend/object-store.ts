import { AlreadyExistsError, NotFoundError, StorageError, describeError, toStorageError } from "../errors.js";
import { MANIFEST_FILE } from "../layout.js";
import { silentLogger, type Logger } from "../logger.js";
import { isHiddenName, keySegments } from "./paths.js";
import { DEFAULT_RETRY, backoff, sleep, withRetry, type RetryPolicy } from "./retry.js";
import type { StorageBackend } from "./types.js";

export interface StoredObject {
  body: Buffer;
  etag: string;
}

export type PutCondition = { ifNoneMatch: "*" } | { ifMatch: string };

export type PutResult = { ok: true; etag: string } | { ok: false; reason: "precondition_failed" };

/**
 * Minimal client surface the registry needs from an object store. Matches
 * S3/GCS/Azure conditional-write semantics.
 */
export interface ObjectStoreClient {
  /** `<scheme>://<bucket>` used when locating keys. */
  readonly location: string;
  getObject(key: string): Promise<StoredObject | null>;
  putObject(key: string, body: Uint8Array, condition?: PutCondition): Promise<PutResult>;
  /** Every key starting with `prefix`, in any order. */
  listKeys(prefix: string): Promise<string[]>;
  deleteObject(key: string): Promise<void>;
}

/** Thrown by clients for failures worth retrying (throttling, 5xx, resets). */
export class TransientObjectStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransientObjectStoreError";
  }
}

export function isTransientObjectError(error: unknown): boolean {
  return error instanceof TransientObjectStoreError;
}

export interface ObjectStoreBackendOptions {
  /** Key prefix inside the bucket that acts as the registry root. */
  prefix?: string;
  /** Object written last by commitDirectory; its presence means committed. */
  commitMarker?: string;
  retry?: RetryPolicy;
  appendAttempts?: number;
  logger?: Logger;
}

const CLAIM_OBJECT = ".commit-claim";

/**
 * Backend over an object store. There are no directories or renames, so a
 * committed directory is signalled by a marker object written after every
 * other object; a hidden claim object written with `ifNoneMatch: "*"` decides
 * which of several racing commits gets to copy.
 */
export class ObjectStoreBackend implements StorageBackend {
  readonly kind = "object";
  private readonly client: ObjectStoreClient;
  private readonly prefix: string;
  private readonly commitMarker: string;
  private readonly retry: RetryPolicy;
  private readonly appendAttempts: number;
  private readonly logger: Logger;

  constructor(client: ObjectStoreClient, options: ObjectStoreBackendOptions = {}) {
    this.client = client;
    this.prefix = options.prefix ? keySegments(options.prefix).join("/") : "";
    this.commitMarker = options.commitMarker ?? MANIFEST_FILE;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.appendAttempts = options.appendAttempts ?? 8;
    this.logger = options.logger ?? silentLogger();
  }

  locate(key: string): string {
    return `${this.client.location}/${this.objectKey(key)}`;
  }

  async exists(key: string): Promise<boolean> {
    return this.call("exists", key, async () => {
      const objectKey = this.objectKey(key);
      if ((await this.client.getObject(objectKey)) !== null) return true;
      return (await this.client.listKeys(`${objectKey}/`)).length > 0;
    });
  }

  async readAll(key: string): Promise<Buffer> {
    const stored = await this.call("readAll", key, () => this.client.getObject(this.objectKey(key)));
    if (stored === null) throw new NotFoundError(`Nothing stored at ${key}`, { path: key });
    return stored.body;
  }

  async writeNew(key: string, bytes: Uint8Array): Promise<void> {
    const result = await this.call("writeNew", key, () =>
      this.client.putObject(this.objectKey(key), bytes, { ifNoneMatch: "*" }),
    );
    if (!result.ok) throw new AlreadyExistsError(`Already exists: ${key}`, { path: key });
  }

  async listChildren(key: string): Promise<string[]> {
    const base = this.objectKey(key);
    const keys = await this.call("listChildren", key, () => this.client.listKeys(base ? `${base}/` : ""));
    const names = new Set<string>();
    for (const full of keys) {
      const rest = base ? full.slice(base.length + 1) : full;
      const name = rest.split("/")[0];
      if (name && !isHiddenName(name)) names.add(name);
    }
    return Array.from(names).sort();
  }

  async commitDirectory(stagingKey: string, finalKey: string): Promise<void> {
    const staging = this.objectKey(stagingKey);
    const final = this.objectKey(finalKey);
    const marker = `${final}/${this.commitMarker}`;

    const claim = await this.call("commitDirectory", finalKey, () =>
      this.client.putObject(`${final}/${CLAIM_OBJECT}`, Buffer.from(staging, "utf8"), { ifNoneMatch: "*" }),
    );
    if (!claim.ok) {
      const holder = await this.call("commitDirectory", finalKey, () =>
        this.client.getObject(`${final}/${CLAIM_OBJECT}`),
      );
      // Our own claim from an attempt whose reply was lost.
      if (holder === null || holder.body.toString("utf8") !== staging) {
        throw new AlreadyExistsError(`Already exists: ${finalKey}`, { path: finalKey });
      }
    }

    try {
      const staged = await this.call("commitDirectory", stagingKey, () => this.client.listKeys(`${staging}/`));
      const markerSource = `${staging}/${this.commitMarker}`;
      if (!staged.includes(markerSource)) {
        throw new StorageError(`Staging area ${stagingKey} has no ${this.commitMarker}`, { path: stagingKey });
      }

      for (const source of staged.filter((k) => k !== markerSource).sort()) {
        await this.copy(source, `${final}/${source.slice(staging.length + 1)}`, finalKey);
      }
      await this.copy(markerSource, marker, finalKey);
    } catch (error) {
      await this.abandonClaim(finalKey);
      throw error;
    }
    await this.remove(stagingKey);
  }

  async writeAtomic(key: string, bytes: Uint8Array): Promise<void> {
    await this.call("writeAtomic", key, () => this.client.putObject(this.objectKey(key), bytes));
  }

  /** Read-modify-write guarded by the object's etag, retried on conflict. */
  async appendLine(key: string, bytes: Uint8Array): Promise<void> {
    const objectKey = this.objectKey(key);
    for (let attempt = 0; attempt < this.appendAttempts; attempt += 1) {
      const current = await this.call("appendLine", key, () => this.client.getObject(objectKey));
      const body = current ? Buffer.concat([current.body, bytes]) : Buffer.from(bytes);
      const condition: PutCondition = current ? { ifMatch: current.etag } : { ifNoneMatch: "*" };
      const result = await this.call("appendLine", key, () => this.client.putObject(objectKey, body, condition));
      if (result.ok) return;
      this.logger.debug("append conflict, retrying", { path: key, attempt });
      await sleep(backoff(attempt, this.retry));
    }
    throw new StorageError(`Append to ${key} kept conflicting with concurrent writers`, { path: key }, {
      code: "APPEND_CONFLICT",
    });
  }

  async remove(key: string): Promise<void> {
    const objectKey = this.objectKey(key);
    await this.call("remove", key, async () => {
      const nested = await this.client.listKeys(`${objectKey}/`);
      for (const child of nested) await this.client.deleteObject(child);
      await this.client.deleteObject(objectKey);
    });
  }

  /** Without a marker nothing under the prefix is committed; clear it so a later commit can claim it. */
  private async abandonClaim(finalKey: string): Promise<void> {
    try {
      await this.remove(finalKey);
    } catch (error) {
      this.logger.error("failed to release commit claim", { path: finalKey, error: describeError(error) });
    }
  }

  private async copy(source: string, target: string, key: string): Promise<void> {
    const stored = await this.call("commitDirectory", key, () => this.client.getObject(source));
    if (stored === null) throw new StorageError(`Staged object vanished: ${source}`, { path: key });
    await this.call("commitDirectory", key, () => this.client.putObject(target, stored.body));
  }

  private objectKey(key: string): string {
    const relative = keySegments(key).join("/");
    if (!this.prefix) return relative;
    return relative ? `${this.prefix}/${relative}` : this.prefix;
  }

  private call<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, isTransientObjectError, this.retry, (error, attempt, delayMs) => {
      this.logger.warn("transient object store error, retrying", {
        operation,
        path: key,
        attempt,
        delayMs,
        error: describeError(error),
      });
    }).catch((error: unknown) => {
      throw toStorageError(error, { path: key, operation });
    });
  }
}
