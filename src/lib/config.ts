import { z } from "zod";
import { ConfigError } from "./errors";
import type { LogLevel } from "./logger";
import type { PrimaryBackendConfig } from "./storageBackend/types";

export type LibraryEnvironment = "development" | "testing" | "production";

export interface LibraryConfig {
  environment: LibraryEnvironment;
  primary: PrimaryBackendConfig;
  libraryDir: string;
  userId: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const environmentSchema = z
  .enum(["development", "testing", "production"])
  .default("development");
const backendSchema = z.enum(["libsql", "memory"]).default("libsql");
const logLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");

function parseEnum<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, key: string, env: Env): T {
  // Empty strings count as unset
  const result = schema.safeParse(env[key] || undefined);
  if (!result.success) {
    throw new ConfigError(`Invalid value for ${key}: ${env[key]}`, result.error.issues);
  }
  return result.data;
}

/**
 * Build the library configuration from environment variables.
 * Throws ConfigError on the first missing or invalid value.
 */
export function loadLibraryConfig(env: Env = process.env): LibraryConfig {
  const required = (key: string): string => {
    const v = env[key];
    if (!v) throw new ConfigError(`Missing required env var: ${key}`);
    return v;
  };

  const backend = parseEnum(backendSchema, "LIBRARY_BACKEND", env);
  const primary: PrimaryBackendConfig =
    backend === "memory"
      ? { kind: "memory" }
      : {
          kind: "libsql",
          url: required("LIBSQL_URL"),
          authToken: env.LIBSQL_AUTH_TOKEN || undefined,
        };

  return {
    environment: parseEnum(environmentSchema, "LIBRARY_ENV", env),
    primary,
    libraryDir: env.LIBRARY_DIR || "./library",
    userId: required("LIBRARY_USER_ID"),
    logLevel: parseEnum(logLevelSchema, "LOG_LEVEL", env),
  };
}
