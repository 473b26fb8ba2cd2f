/**
 * Factory for StorageBackend. The variant is fixed at construction.
 */

import { UnsupportedBackendError } from "@/lib/errors";
import type { StorageBackend } from "./StorageBackend";
import type { StorageBackendConfig } from "./types";
import { FileStorageBackend } from "./FileStorageBackend";
import { InMemoryStorageBackend } from "./InMemoryStorageBackend";
import { LibsqlStorageBackend } from "./LibsqlStorageBackend";

function unsupported(config: { kind: string }): never {
  throw new UnsupportedBackendError(config.kind);
}

export function createStorageBackend(config: StorageBackendConfig): StorageBackend {
  switch (config.kind) {
    case "libsql":
      return new LibsqlStorageBackend(config);
    case "memory":
      return new InMemoryStorageBackend();
    case "file":
      return new FileStorageBackend(config.directory);
    default:
      // Config that bypassed the type system, e.g. parsed from JSON
      return unsupported(config);
  }
}
