import { describe, expect, it, vi } from "vitest";

import type { AuditEntry } from "../src/audit.js";
import { AuditFollower } from "../src/watcher.js";
import { CREATOR, createLocalRegistry, createMemoryRegistry, file } from "./helpers.js";

describe("AuditFollower", () => {
  it("hands over entries appended after start, and only those", async () => {
    const { registry, backend } = await createLocalRegistry();
    for (const version of ["v1", "v2"]) {
      await registry.register({ task: "ct", model: "pbmc", version, artifacts: [file("model.bin", version)], metadata: CREATOR });
    }
    await registry.promote({ task: "ct", model: "pbmc", alias: "production", version: "v1", actor: "alice" });

    const received: AuditEntry[] = [];
    const errors: unknown[] = [];
    const follower = new AuditFollower(
      backend,
      registry.auditLog,
      { task: "ct", model: "pbmc" },
      { onEntry: (entry) => received.push(entry), onError: (error) => errors.push(error) },
      { usePolling: true, intervalMs: 50 },
    );
    await follower.start();

    try {
      await registry.promote({ task: "ct", model: "pbmc", alias: "production", version: "v2", actor: "bob", reason: "rollout" });
      await vi.waitFor(() => expect(received).toHaveLength(1), { timeout: 5000, interval: 25 });
    } finally {
      await follower.stop();
    }

    expect(received[0]).toMatchObject({ actor: "bob", action: "update", from: "v1", to: "v2", reason: "rollout" });
    expect(errors).toEqual([]);
  });

  it("needs a filesystem backend", () => {
    const { registry, backend } = createMemoryRegistry();
    const handlers = { onEntry: () => undefined, onError: () => undefined };
    try {
      new AuditFollower(backend, registry.auditLog, { task: "ct", model: "pbmc" }, handlers);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ kind: "ValidationError", code: "FOLLOW_UNSUPPORTED" });
    }
  });
});
