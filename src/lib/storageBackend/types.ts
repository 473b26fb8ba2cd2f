/**
 * Types shared by the storage backends.
 */

export type StorageBackendKind = "libsql" | "file" | "memory";

/** libSQL / Turso database: remote URL, local `file:` database or `:memory:` */
export interface LibsqlBackendConfig {
  kind: "libsql";
  url: string;
  authToken?: string;
}

export interface MemoryBackendConfig {
  kind: "memory";
}

export interface FileBackendConfig {
  kind: "file";
  directory: string;
}

export type StorageBackendConfig =
  | LibsqlBackendConfig
  | MemoryBackendConfig
  | FileBackendConfig;

/** Backends the library can use as its primary store */
export type PrimaryBackendConfig = LibsqlBackendConfig | MemoryBackendConfig;
