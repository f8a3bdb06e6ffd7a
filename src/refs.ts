import { ValidationError } from "./errors.js";
import { assertIdentifier } from "./layout.js";

export const DEFAULT_QUALIFIER = "latest";

export interface ModelReference {
  model: string;
  /** Alias name or literal version identifier. */
  qualifier: string;
  /** True when the reference named no qualifier and `latest` was implied. */
  implicit: boolean;
}

/**
 * Parse `model` or `model@qualifier`.
 *
 *   parseReference("pbmc")             // { model: "pbmc", qualifier: "latest", implicit: true }
 *   parseReference("pbmc@production")  // { model: "pbmc", qualifier: "production", implicit: false }
 */
export function parseReference(ref: string): ModelReference {
  const trimmed = ref.trim();
  const parts = trimmed.split("@");
  if (trimmed === "" || parts.length > 2) {
    throw new ValidationError(`Invalid reference "${ref}": expected <model> or <model>@<alias-or-version>`, {
      ref,
      field: "ref",
    });
  }
  const model = parts[0];
  assertIdentifier("model", model);
  if (parts.length === 1) return { model, qualifier: DEFAULT_QUALIFIER, implicit: true };
  const qualifier = parts[1];
  if (qualifier === "") {
    throw new ValidationError(`Invalid reference "${ref}": empty qualifier after "@"`, { ref, field: "ref" });
  }
  assertIdentifier("version", qualifier);
  return { model, qualifier, implicit: false };
}

export function formatReference(model: string, qualifier: string): string {
  return `${model}@${qualifier}`;
}
