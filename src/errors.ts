export type ErrorKind = "ValidationError" | "AlreadyExists" | "NotFound" | "IntegrityError" | "StorageError";

export interface ErrorContext {
  task?: string;
  model?: string;
  version?: string;
  alias?: string;
  ref?: string;
  field?: string;
  path?: string;
  [key: string]: string | number | boolean | null | undefined;
}

export type MismatchKind = "missing" | "extra" | "digest";

export interface IntegrityMismatch {
  file: string;
  kind: MismatchKind;
  expected: string | null;
  actual: string | null;
}

export interface SerializedRegistryError {
  kind: ErrorKind;
  code: string;
  message: string;
  context: ErrorContext;
  mismatches?: IntegrityMismatch[];
}

/**
 * Base class for every failure the registry reports.
 *
 * `kind` is the stable discriminant front ends switch on; `code` narrows it
 * (e.g. `LOCK_TIMEOUT` is a StorageError).
 */
export abstract class RegistryError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly httpStatus: number;
  readonly code: string;
  readonly context: ErrorContext;

  constructor(code: string, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): SerializedRegistryError {
    return { kind: this.kind, code: this.code, message: this.message, context: this.context };
  }
}

/** Malformed identifier, reference or metadata. Caller error, never retried. */
export class ValidationError extends RegistryError {
  readonly kind = "ValidationError" as const;
  readonly httpStatus = 422;

  constructor(message: string, context: ErrorContext = {}, code = "VALIDATION_FAILED") {
    super(code, message, context);
  }
}

export class AlreadyExistsError extends RegistryError {
  readonly kind = "AlreadyExists" as const;
  readonly httpStatus = 409;

  constructor(message: string, context: ErrorContext = {}, code = "ALREADY_EXISTS") {
    super(code, message, context);
  }
}

export class NotFoundError extends RegistryError {
  readonly kind = "NotFound" as const;
  readonly httpStatus = 404;

  constructor(message: string, context: ErrorContext = {}, code = "NOT_FOUND") {
    super(code, message, context);
  }
}

/**
 * Stored bytes disagree with what was committed. Signals tampering or
 * corruption and is never downgraded to a warning.
 */
export class IntegrityError extends RegistryError {
  readonly kind = "IntegrityError" as const;
  readonly httpStatus = 500;
  readonly mismatches: IntegrityMismatch[];

  constructor(message: string, context: ErrorContext = {}, mismatches: IntegrityMismatch[] = [], code = "INTEGRITY_MISMATCH") {
    super(code, message, context);
    this.mismatches = mismatches;
  }

  override toJSON(): SerializedRegistryError {
    return { ...super.toJSON(), mismatches: this.mismatches };
  }
}

/** Backend I/O failure. `cause` holds the underlying error untouched. */
export class StorageError extends RegistryError {
  readonly kind = "StorageError" as const;
  readonly httpStatus = 503;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown; code?: string }) {
    super(options?.code ?? "STORAGE_FAILURE", message, context, { cause: options?.cause });
  }
}

export function isRegistryError(value: unknown): value is RegistryError {
  return value instanceof RegistryError;
}

export function errnoCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const code = error.code;
  return typeof code === "string" ? code : undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toStorageError(error: unknown, context: ErrorContext = {}): RegistryError {
  if (isRegistryError(error)) return error;
  const code = errnoCode(error);
  return new StorageError(`Storage operation failed: ${describeError(error)}`, { ...context, errno: code ?? null }, {
    cause: error,
    code: "STORAGE_FAILURE",
  });
}
