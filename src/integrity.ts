import { createHash } from "node:crypto";

import { IntegrityError, ValidationError, type IntegrityMismatch } from "./errors.js";

export interface ArtifactFile {
  name: string;
  content: Uint8Array;
}

/** File name → lowercase hex SHA-256. */
export type Manifest = Record<string, string>;

const DIGEST = /^[0-9a-f]{64}$/;

export function sha256Hex(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function manifestNames(manifest: Manifest): string[] {
  return Object.keys(manifest).sort(compareNames);
}

export function computeManifest(files: readonly ArtifactFile[]): Manifest {
  const manifest: Manifest = {};
  for (const file of [...files].sort((a, b) => compareNames(a.name, b.name))) {
    if (Object.hasOwn(manifest, file.name)) {
      throw new ValidationError(`Duplicate file name in artifact set: ${file.name}`, { field: "artifact" });
    }
    manifest[file.name] = sha256Hex(file.content);
  }
  return manifest;
}

/** `sha256sum`-compatible text: `<digest>  <name>` per line, sorted by name. */
export function serializeManifest(manifest: Manifest): string {
  return manifestNames(manifest)
    .map((name) => `${manifest[name]}  ${name}\n`)
    .join("");
}

export function parseManifest(text: string): Manifest {
  const manifest: Manifest = {};
  const lines = text.split("\n");
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    if (line.trim() === "") continue;
    const match = /^([0-9a-fA-F]{64}) [ *](.+)$/.exec(line);
    if (!match || !DIGEST.test(match[1].toLowerCase())) {
      throw new IntegrityError(`Malformed manifest line ${String(index + 1)}`, { line: index + 1 }, [], "MANIFEST_MALFORMED");
    }
    const name = match[2];
    if (Object.hasOwn(manifest, name)) {
      throw new IntegrityError(`Manifest lists ${name} twice`, { line: index + 1 }, [], "MANIFEST_MALFORMED");
    }
    manifest[name] = match[1].toLowerCase();
  }
  return manifest;
}

/**
 * Recompute digests and compare against `manifest`. Returns every missing,
 * extra or altered file; an empty list means the set matches.
 */
export function verifyManifest(files: readonly ArtifactFile[], manifest: Manifest): IntegrityMismatch[] {
  const actual = new Map<string, string>();
  for (const file of files) actual.set(file.name, sha256Hex(file.content));

  const mismatches: IntegrityMismatch[] = [];
  const names = new Set([...Object.keys(manifest), ...actual.keys()]);
  for (const name of Array.from(names).sort(compareNames)) {
    const expected = Object.hasOwn(manifest, name) ? manifest[name] : null;
    const got = actual.get(name) ?? null;
    if (expected === null) {
      mismatches.push({ file: name, kind: "extra", expected: null, actual: got });
    } else if (got === null) {
      mismatches.push({ file: name, kind: "missing", expected, actual: null });
    } else if (got !== expected) {
      mismatches.push({ file: name, kind: "digest", expected, actual: got });
    }
  }
  return mismatches;
}
