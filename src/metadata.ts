import path from "node:path";

import { lookup as mimeLookup } from "mime-types";
import { z } from "zod";

import { IntegrityError, ValidationError } from "./errors.js";
import type { ArtifactFile } from "./integrity.js";

export type ArtifactKind = "weights" | "tabular" | "json" | "text" | "file";

export interface ArtifactDescriptor {
  name: string;
  bytes: number;
  kind: ArtifactKind;
  mediaType: string;
}

/** Provenance the caller supplies on register. */
export interface MetadataInput {
  creator: string;
  framework?: string;
  modelType?: string;
  codeRef?: string;
  datasetRef?: string;
  hyperparameters?: Record<string, unknown>;
  extra?: Record<string, unknown>;
}

/** Contents of `metadata.json`. */
export interface VersionMetadata extends MetadataInput {
  task: string;
  model: string;
  version: string;
  createdAt: string;
  artifacts: ArtifactDescriptor[];
}

const WEIGHT_EXTENSIONS = new Set([".pt", ".pth", ".bin", ".ckpt", ".safetensors", ".onnx", ".pkl", ".joblib", ".h5"]);

export function inferArtifactType(fileName: string): { kind: ArtifactKind; mediaType: string } {
  const ext = path.extname(fileName).toLowerCase();
  if (WEIGHT_EXTENSIONS.has(ext)) return { kind: "weights", mediaType: "application/octet-stream" };
  if (ext === ".csv") return { kind: "tabular", mediaType: "text/csv" };
  if (ext === ".tsv") return { kind: "tabular", mediaType: "text/tab-separated-values" };
  if (ext === ".parquet") return { kind: "tabular", mediaType: "application/vnd.apache.parquet" };
  if (ext === ".json") return { kind: "json", mediaType: "application/json" };
  if (ext === ".txt" || ext === ".md") return { kind: "text", mediaType: ext === ".md" ? "text/markdown" : "text/plain" };
  const guessed = mimeLookup(fileName) || "application/octet-stream";
  return { kind: "file", mediaType: guessed };
}

export function describeArtifacts(files: readonly ArtifactFile[]): ArtifactDescriptor[] {
  return files.map((file) => ({ name: file.name, bytes: file.content.byteLength, ...inferArtifactType(file.name) }));
}

const OpenMap = z.record(z.string(), z.unknown());

export const MetadataInputSchema = z.object({
  creator: z.string().trim().min(1, "creator is required"),
  framework: z.string().optional(),
  modelType: z.string().optional(),
  codeRef: z.string().optional(),
  datasetRef: z.string().optional(),
  hyperparameters: OpenMap.optional(),
  extra: OpenMap.optional(),
});

export const VersionMetadataSchema = MetadataInputSchema.extend({
  task: z.string(),
  model: z.string(),
  version: z.string(),
  createdAt: z.string(),
  artifacts: z.array(
    z.object({
      name: z.string(),
      bytes: z.number().int().nonnegative(),
      kind: z.enum(["weights", "tabular", "json", "text", "file"]),
      mediaType: z.string(),
    }),
  ),
});

export function validateMetadataInput(value: unknown): MetadataInput {
  const parsed = MetadataInputSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = ["metadata", ...(issue?.path ?? [])].join(".");
    throw new ValidationError(`Invalid metadata: ${issue?.message ?? "unknown"}`, { field }, "INVALID_METADATA");
  }
  return parsed.data;
}

export function buildMetadata(
  input: MetadataInput,
  identity: { task: string; model: string; version: string },
  files: readonly ArtifactFile[],
  createdAt: Date,
): VersionMetadata {
  return {
    ...identity,
    createdAt: createdAt.toISOString(),
    creator: input.creator,
    ...(input.framework !== undefined ? { framework: input.framework } : {}),
    ...(input.modelType !== undefined ? { modelType: input.modelType } : {}),
    ...(input.codeRef !== undefined ? { codeRef: input.codeRef } : {}),
    ...(input.datasetRef !== undefined ? { datasetRef: input.datasetRef } : {}),
    ...(input.hyperparameters !== undefined ? { hyperparameters: input.hyperparameters } : {}),
    artifacts: describeArtifacts(files),
    extra: input.extra ?? {},
  };
}

export function parseMetadata(bytes: Uint8Array, context: { task: string; model: string; version: string }): VersionMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch {
    throw new IntegrityError("metadata.json is not valid JSON", context, [], "METADATA_MALFORMED");
  }
  const parsed = VersionMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IntegrityError(
      `metadata.json does not match the metadata schema: ${parsed.error.issues[0]?.message ?? "unknown"}`,
      context,
      [],
      "METADATA_MALFORMED",
    );
  }
  return parsed.data;
}

export function encodeJson(value: unknown): Buffer {
  return Buffer.from(`${JSON.stringify(value, null, 2)}\n`, "utf8");
}
