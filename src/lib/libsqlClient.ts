import { createClient, type Client } from "@libsql/client";
import { BackendUnavailableError } from "./errors";
import type { LibsqlBackendConfig } from "./storageBackend/types";

/**
 * Create a libSQL client for a remote Turso database, a local `file:` database or `:memory:`.
 * Malformed or unsupported URLs fail here, before any query is sent.
 */
export function createLibsqlClient(config: Omit<LibsqlBackendConfig, "kind">): Client {
  if (!config.url) {
    throw new BackendUnavailableError("libsql", "Missing libSQL database URL");
  }

  try {
    return createClient({
      url: config.url,
      authToken: config.authToken,
    });
  } catch (error) {
    throw new BackendUnavailableError("libsql", error);
  }
}
