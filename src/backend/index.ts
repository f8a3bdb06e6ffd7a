import type { RegistryConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { LocalFsBackend } from "./local.js";
import { MemoryObjectStore } from "./memory-object-store.js";
import { ObjectStoreBackend } from "./object-store.js";
import { SharedFsBackend } from "./shared.js";
import type { StorageBackend } from "./types.js";

export function createBackend(config: Pick<RegistryConfig, "root" | "backend">, logger?: Logger): StorageBackend {
  switch (config.backend) {
    case "local":
      return new LocalFsBackend(config.root, { logger });
    case "shared":
      return new SharedFsBackend(config.root, { logger });
    case "memory":
      return new ObjectStoreBackend(new MemoryObjectStore(), { logger });
  }
}

export { LocalFsBackend } from "./local.js";
export { SharedFsBackend, isTransientFsError } from "./shared.js";
export {
  ObjectStoreBackend,
  TransientObjectStoreError,
  type ObjectStoreClient,
  type PutCondition,
  type PutResult,
  type StoredObject,
} from "./object-store.js";
export { MemoryObjectStore } from "./memory-object-store.js";
export type { StorageBackend } from "./types.js";
