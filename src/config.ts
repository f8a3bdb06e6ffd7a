import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ValidationError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export const BACKEND_KINDS = ["local", "shared", "memory"] as const;
export type BackendKind = (typeof BACKEND_KINDS)[number];

export interface LockSettings {
  timeoutMs: number;
  staleMs: number;
}

export interface RegistryConfig {
  root: string;
  backend: BackendKind;
  strictVerify: boolean;
  lock: LockSettings;
  log: { level: LogLevel; json: boolean };
  server: { host: string; port: number };
}

export const DEFAULT_LOCK: LockSettings = { timeoutMs: 10_000, staleMs: 60_000 };

export type EnvMap = Record<string, string | undefined>;

function flag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
    });
}

function integer(defaultValue: number, min: number) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? String(defaultValue) : value.trim()))
    .pipe(z.coerce.number().int().min(min));
}

const EnvSchema = z.object({
  MODEL_REGISTRY_ROOT: z.string().optional(),
  MODEL_REGISTRY_BACKEND: z
    .string()
    .optional()
    .transform((value) => (value?.trim() ? value.trim().toLowerCase() : "local"))
    .pipe(z.enum(BACKEND_KINDS)),
  MODEL_REGISTRY_STRICT_VERIFY: flag(true),
  MODEL_REGISTRY_LOCK_TIMEOUT_MS: integer(DEFAULT_LOCK.timeoutMs, 0),
  MODEL_REGISTRY_LOCK_STALE_MS: integer(DEFAULT_LOCK.staleMs, 1),
  MODEL_REGISTRY_LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => (value?.trim() ? value.trim().toLowerCase() : "info"))
    .pipe(z.enum(["debug", "info", "warn", "error"])),
  MODEL_REGISTRY_LOG_JSON: flag(false),
  MODEL_REGISTRY_HOST: z
    .string()
    .optional()
    .transform((value) => value?.trim() || "127.0.0.1"),
  MODEL_REGISTRY_PORT: integer(8080, 0).pipe(z.number().max(65535)),
});

export function expandHome(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2));
  return value;
}

/**
 * Build a config from an environment map. The map is passed in explicitly;
 * nothing here reads `process.env`.
 */
export function loadConfig(env: EnvMap, overrides: { root?: string } = {}): RegistryConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? String(issue.path[0] ?? "") : "";
    throw new ValidationError(`Invalid configuration ${field}: ${issue?.message ?? "unknown"}`, { field }, "INVALID_CONFIG");
  }
  const values = parsed.data;
  const rawRoot = (overrides.root ?? values.MODEL_REGISTRY_ROOT ?? "").trim();
  if (!rawRoot) {
    throw new ValidationError(
      "MODEL_REGISTRY_ROOT is not set. Example: MODEL_REGISTRY_ROOT=~/registry",
      { field: "MODEL_REGISTRY_ROOT" },
      "REGISTRY_NOT_CONFIGURED",
    );
  }

  return {
    root: path.resolve(expandHome(rawRoot)),
    backend: values.MODEL_REGISTRY_BACKEND,
    strictVerify: values.MODEL_REGISTRY_STRICT_VERIFY,
    lock: { timeoutMs: values.MODEL_REGISTRY_LOCK_TIMEOUT_MS, staleMs: values.MODEL_REGISTRY_LOCK_STALE_MS },
    log: { level: values.MODEL_REGISTRY_LOG_LEVEL, json: values.MODEL_REGISTRY_LOG_JSON },
    server: { host: values.MODEL_REGISTRY_HOST, port: values.MODEL_REGISTRY_PORT },
  };
}
