/**
 * Errors that are thrown to the caller.
 * Not-found, duplicate content, permission denial and per-book import
 * failures are not errors here: they come back as null, false or report counters.
 */

export type LibraryErrorCode =
  | "VALIDATION"
  | "BACKEND_UNAVAILABLE"
  | "UNSUPPORTED_BACKEND"
  | "UNKNOWN_ANALYSIS_METHOD"
  | "CONFIG";

export class LibraryError extends Error {
  constructor(
    message: string,
    public readonly code: LibraryErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "LibraryError";
  }
}

/**
 * Unsafe or malformed title, path or search text
 */
export class ValidationError extends LibraryError {
  constructor(message: string, details?: unknown) {
    super(message, "VALIDATION", details);
    this.name = "ValidationError";
  }
}

export class BackendUnavailableError extends LibraryError {
  constructor(backend: string, cause?: unknown) {
    super(`Storage backend "${backend}" is unavailable`, "BACKEND_UNAVAILABLE", cause);
    this.name = "BackendUnavailableError";
  }
}

export class UnsupportedBackendError extends LibraryError {
  constructor(kind: string) {
    super(`Unsupported storage backend: ${kind}`, "UNSUPPORTED_BACKEND");
    this.name = "UnsupportedBackendError";
  }
}

export class UnknownAnalysisMethodError extends LibraryError {
  constructor(method: string) {
    super(`Unknown analysis method: ${method}`, "UNKNOWN_ANALYSIS_METHOD");
    this.name = "UnknownAnalysisMethodError";
  }
}

/**
 * Configuration could not be loaded. Fatal at startup.
 */
export class ConfigError extends LibraryError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIG", details);
    this.name = "ConfigError";
  }
}

export function isLibraryError(input: unknown): input is LibraryError {
  return input instanceof LibraryError;
}
