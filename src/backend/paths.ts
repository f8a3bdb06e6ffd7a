import { ValidationError } from "../errors.js";

/** Split and check a storage key; rejects traversal and empty segments. */
export function keySegments(key: string): string[] {
  if (key.length === 0) return [];
  const segments = key.split("/");
  for (const segment of segments) {
    if (segment.length === 0 || segment === "." || segment === ".." || segment.includes("\\")) {
      throw new ValidationError(`Invalid storage path "${key}"`, { path: key, field: "path" });
    }
  }
  return segments;
}

export function isHiddenName(name: string): boolean {
  return name.startsWith(".");
}
