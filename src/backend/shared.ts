import { errnoCode, toStorageError } from "../errors.js";
import { LocalFsBackend, type FsyncMode, type LocalFsBackendOptions } from "./local.js";
import { DEFAULT_RETRY, withRetry, type RetryPolicy } from "./retry.js";

const TRANSIENT_CODES = new Set(["EAGAIN", "EBUSY", "ESTALE", "ETIMEDOUT", "EIO", "EINTR"]);

export function isTransientFsError(error: unknown): boolean {
  const code = errnoCode(error);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

export interface SharedFsBackendOptions extends LocalFsBackendOptions {
  retry?: RetryPolicy;
}

/**
 * Backend for shared network filesystems (NFS, Lustre, GPFS).
 *
 * Same layout and atomicity as {@link LocalFsBackend}, but fsync failures are
 * fatal and transient errno values are retried for idempotent operations.
 * writeNew and appendLine are never retried: a lost reply could turn a
 * success into a duplicate.
 */
export class SharedFsBackend extends LocalFsBackend {
  override readonly kind: string = "shared";
  protected override readonly fsyncMode: FsyncMode = "REQUIRED";
  private readonly retry: RetryPolicy;

  constructor(root: string, options: SharedFsBackendOptions = {}) {
    super(root, options);
    this.retry = options.retry ?? DEFAULT_RETRY;
  }

  protected override run<T>(operation: string, key: string, fn: () => Promise<T>, idempotent: boolean): Promise<T> {
    const policy = idempotent ? this.retry : { ...this.retry, attempts: 1 };
    return withRetry(fn, isTransientFsError, policy, (error, attempt, delayMs) => {
      this.logger.warn("transient storage error, retrying", {
        operation,
        path: key,
        code: errnoCode(error) ?? "UNKNOWN",
        attempt,
        delayMs,
      });
    }).catch((error: unknown) => {
      throw toStorageError(error, { path: key, operation });
    });
  }
}
