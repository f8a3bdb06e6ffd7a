/**
 * Byte-oriented storage contract every registry backend implements.
 *
 * Paths are `/`-separated keys relative to the registry root. Names that
 * start with `.` are backend bookkeeping and never appear in
 * `listChildren`.
 */
export interface StorageBackend {
  /** Short backend name reported by health checks. */
  readonly kind: string;

  exists(path: string): Promise<boolean>;

  /** Throws NotFoundError when nothing is stored at `path`. */
  readAll(path: string): Promise<Buffer>;

  /**
   * Create-if-absent. Throws AlreadyExistsError if `path` already holds
   * content; never overwrites and never exposes a partial file.
   */
  writeNew(path: string, bytes: Uint8Array): Promise<void>;

  /** Sorted child names; empty when `path` is absent. */
  listChildren(path: string): Promise<string[]>;

  /**
   * Make a fully written staging area visible at `finalPath` in one step.
   * Throws AlreadyExistsError, leaving `finalPath` untouched, if it exists.
   */
  commitDirectory(stagingPath: string, finalPath: string): Promise<void>;

  /** Replace a single file so readers see either the old or the new bytes. */
  writeAtomic(path: string, bytes: Uint8Array): Promise<void>;

  /** Append one record in a single write. */
  appendLine(path: string, bytes: Uint8Array): Promise<void>;

  /** Remove a file or a whole subtree. Absent paths are not an error. */
  remove(path: string): Promise<void>;

  /** Externally meaningful locator for `path` (filesystem path or URI). */
  locate(path: string): string;
}
