export { ModelRegistry } from "./registry.js";
export type {
  HealthReport,
  ModelRegistryOptions,
  RegisterInput,
  RegisterResult,
  ShowResult,
  VerifyReport,
} from "./registry.js";

export { VersionStore } from "./versions.js";
export type { DerivedMetadata, RegisterVersionInput, RegisteredVersion } from "./versions.js";
export { AliasResolver } from "./aliases.js";
export type { AliasListing, AliasRecord, ManifestStatus, Resolution } from "./aliases.js";
export { PromotionEngine } from "./promotion.js";
export type { PromoteInput, PromotionResult } from "./promotion.js";
export { AuditLog, parseAuditLog } from "./audit.js";
export type { AuditAction, AuditEntry, AuditEntryInput } from "./audit.js";
export { AuditFollower } from "./watcher.js";
export type { AuditFollowerOptions } from "./watcher.js";
export { AdvisoryLock } from "./lock.js";
export { readArtifactDir } from "./artifacts.js";
export { DEFAULT_QUALIFIER, formatReference, parseReference } from "./refs.js";
export type { ModelReference } from "./refs.js";

export { computeManifest, parseManifest, serializeManifest, sha256Hex, verifyManifest } from "./integrity.js";
export type { ArtifactFile, Manifest } from "./integrity.js";
export { buildMetadata, inferArtifactType, validateMetadataInput } from "./metadata.js";
export type { ArtifactDescriptor, MetadataInput, VersionMetadata } from "./metadata.js";

export {
  createBackend,
  LocalFsBackend,
  MemoryObjectStore,
  ObjectStoreBackend,
  SharedFsBackend,
  TransientObjectStoreError,
} from "./backend/index.js";
export type { ObjectStoreClient, PutCondition, PutResult, StorageBackend, StoredObject } from "./backend/index.js";

export { loadConfig, DEFAULT_LOCK } from "./config.js";
export type { BackendKind, EnvMap, LockSettings, RegistryConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel, LogSink } from "./logger.js";
export {
  AlreadyExistsError,
  IntegrityError,
  NotFoundError,
  RegistryError,
  StorageError,
  ValidationError,
  isRegistryError,
} from "./errors.js";
export type { ErrorKind, IntegrityMismatch, MismatchKind, SerializedRegistryError } from "./errors.js";

export { runDoctor } from "./doctor.js";
export type { DoctorCheck, DoctorReport } from "./doctor.js";
export { RegistryServer } from "./server.js";
export type { RegistryServerOptions } from "./server.js";
export { runCommand } from "./commands.js";
export type { CommandIO } from "./commands.js";
