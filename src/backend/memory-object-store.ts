import { createHash } from "node:crypto";

import type { ObjectStoreClient, PutCondition, PutResult, StoredObject } from "./object-store.js";

/**
 * In-process object store with S3-style conditional writes. Backs the
 * `memory` backend kind: an ephemeral registry for development and tests.
 */
export class MemoryObjectStore implements ObjectStoreClient {
  readonly location: string;
  private readonly objects = new Map<string, StoredObject>();

  constructor(bucket = "registry") {
    this.location = `memory://${bucket}`;
  }

  async getObject(key: string): Promise<StoredObject | null> {
    const stored = this.objects.get(key);
    return stored ? { body: Buffer.from(stored.body), etag: stored.etag } : null;
  }

  async putObject(key: string, body: Uint8Array, condition?: PutCondition): Promise<PutResult> {
    const current = this.objects.get(key);
    if (condition && "ifNoneMatch" in condition && current) return { ok: false, reason: "precondition_failed" };
    if (condition && "ifMatch" in condition && current?.etag !== condition.ifMatch) {
      return { ok: false, reason: "precondition_failed" };
    }
    const copy = Buffer.from(body);
    const etag = createHash("md5").update(copy).digest("hex");
    this.objects.set(key, { body: copy, etag });
    return { ok: true, etag };
  }

  async listKeys(prefix: string): Promise<string[]> {
    return Array.from(this.objects.keys()).filter((key) => key.startsWith(prefix));
  }

  async deleteObject(key: string): Promise<void> {
    this.objects.delete(key);
  }

  get size(): number {
    return this.objects.size;
  }
}
