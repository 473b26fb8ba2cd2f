export type { StorageBackend } from "./StorageBackend";
export type {
  StorageBackendKind,
  StorageBackendConfig,
  PrimaryBackendConfig,
  LibsqlBackendConfig,
  MemoryBackendConfig,
  FileBackendConfig,
} from "./types";
export { createStorageBackend } from "./createStorageBackend";
export { FileStorageBackend } from "./FileStorageBackend";
export { InMemoryStorageBackend } from "./InMemoryStorageBackend";
export { LibsqlStorageBackend } from "./LibsqlStorageBackend";
