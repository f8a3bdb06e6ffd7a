import { randomUUID } from "node:crypto";

import { describeError } from "./errors.js";
import { DOCTOR_DIR, STAGING_DIR, joinKey } from "./layout.js";
import type { ModelRegistry } from "./registry.js";

type CheckLevel = "required" | "optional";

export interface DoctorCheck {
  id: string;
  level: CheckLevel;
  ok: boolean;
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  summary: {
    required_total: number;
    required_failed: number;
    optional_total: number;
    optional_failed: number;
  };
}

export interface DoctorOptions {
  /** Re-hash every committed version. Reads every byte in the registry. */
  deep?: boolean;
}

function summarizeChecks(checks: DoctorCheck[]): DoctorReport["summary"] {
  const required = checks.filter((check) => check.level === "required");
  const optional = checks.filter((check) => check.level === "optional");

  return {
    required_total: required.length,
    required_failed: required.filter((check) => !check.ok).length,
    optional_total: optional.length,
    optional_failed: optional.filter((check) => !check.ok).length,
  };
}

async function probeWrite(registry: ModelRegistry): Promise<string | null> {
  const probe = joinKey(DOCTOR_DIR, `probe-${randomUUID()}`);
  try {
    await registry.backend.writeNew(probe, Buffer.from("ok", "utf8"));
    await registry.backend.remove(probe);
    return null;
  } catch (error) {
    return describeError(error);
  }
}

async function countStaging(registry: ModelRegistry): Promise<number> {
  // staging areas are hidden from listChildren at the root, but not inside .staging
  return (await registry.backend.listChildren(STAGING_DIR)).length;
}

async function verifyAll(registry: ModelRegistry): Promise<{ checked: number; broken: string[] }> {
  const broken: string[] = [];
  let checked = 0;
  for (const task of await registry.listTasks()) {
    for (const model of await registry.listModels(task)) {
      for (const version of await registry.listVersions(task, model)) {
        checked += 1;
        const mismatches = await registry.versions.verify(task, model, version);
        if (mismatches.length > 0) broken.push(`${task}/${model}/${version}`);
      }
    }
  }
  return { checked, broken };
}

export async function runDoctor(registry: ModelRegistry, options?: DoctorOptions): Promise<DoctorReport> {
  const checks: DoctorCheck[] = [];

  const health = await registry.health();
  checks.push({
    id: "root_reachable",
    level: "required",
    ok: health.ok,
    message: health.ok ? `registry root reachable (${health.root})` : `registry root unreachable: ${health.error ?? "unknown"}`,
  });

  const writeError = await probeWrite(registry);
  checks.push({
    id: "root_writable",
    level: "required",
    ok: writeError === null,
    message: writeError === null ? "registry root is writable" : `registry root is not writable: ${writeError}`,
  });

  try {
    const staging = await countStaging(registry);
    checks.push({
      id: "staging_clean",
      level: "optional",
      ok: staging === 0,
      message:
        staging === 0
          ? "no orphaned staging areas"
          : `${String(staging)} staging area(s) under ${STAGING_DIR} (interrupted registrations or ones in flight)`,
    });
  } catch (error) {
    checks.push({
      id: "staging_clean",
      level: "optional",
      ok: false,
      message: `could not list ${STAGING_DIR}: ${describeError(error)}`,
    });
  }

  if (options?.deep) {
    try {
      const { checked, broken } = await verifyAll(registry);
      checks.push({
        id: "versions_intact",
        level: "optional",
        ok: broken.length === 0,
        message:
          broken.length === 0
            ? `all ${String(checked)} version(s) match their manifests`
            : `integrity failures: ${broken.join(", ")}`,
      });
    } catch (error) {
      checks.push({
        id: "versions_intact",
        level: "optional",
        ok: false,
        message: `integrity sweep failed: ${describeError(error)}`,
      });
    }
  }

  return { checks, summary: summarizeChecks(checks) };
}
