import { ValidationError } from "./errors.js";

export const MANIFEST_FILE = "manifest.sha256";
export const METADATA_FILE = "metadata.json";
export const METRICS_FILE = "metrics.json";
export const FEATURE_SCHEMA_FILE = "feature_schema.json";
export const AUDIT_FILE = "promotions.jsonl";

export const RESERVED_FILES: readonly string[] = [MANIFEST_FILE, METADATA_FILE, METRICS_FILE, FEATURE_SCHEMA_FILE];

export const STAGING_DIR = ".staging";
export const DOCTOR_DIR = ".doctor";

const IDENTIFIER = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export type IdentifierField = "task" | "model" | "version" | "alias" | "artifact";

export function isIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

export function assertIdentifier(field: IdentifierField, value: string): void {
  if (!isIdentifier(value)) {
    throw new ValidationError(
      `Invalid ${field} "${value}": expected 1-128 characters of [A-Za-z0-9._-], starting with a letter or digit`,
      { field },
    );
  }
}

export function joinKey(...segments: string[]): string {
  return segments.join("/");
}

export function modelKey(task: string, model: string): string {
  return joinKey("tasks", task, "models", model);
}

export function tasksKey(): string {
  return "tasks";
}

export function modelsKey(task: string): string {
  return joinKey("tasks", task, "models");
}

export function versionsKey(task: string, model: string): string {
  return joinKey(modelKey(task, model), "versions");
}

export function versionKey(task: string, model: string, version: string): string {
  return joinKey(versionsKey(task, model), version);
}

export function aliasesKey(task: string, model: string): string {
  return joinKey(modelKey(task, model), "aliases");
}

export function aliasKey(task: string, model: string, alias: string): string {
  return joinKey(aliasesKey(task, model), `${alias}.json`);
}

export function auditKey(task: string, model: string): string {
  return joinKey(modelKey(task, model), "audit", AUDIT_FILE);
}

export function aliasLockKey(task: string, model: string, alias: string): string {
  return joinKey(modelKey(task, model), "locks", `${alias}.lock`);
}

export function auditLockKey(task: string, model: string): string {
  return joinKey(modelKey(task, model), "audit", ".append.lock");
}
