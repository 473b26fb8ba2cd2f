import { describe, it, expect } from "vitest";
import { loadLibraryConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadLibraryConfig", () => {
  it("should apply defaults", () => {
    const config = loadLibraryConfig({
      LIBSQL_URL: "libsql://library.example.test",
      LIBRARY_USER_ID: "reader",
    });

    expect(config).toEqual({
      environment: "development",
      primary: { kind: "libsql", url: "libsql://library.example.test", authToken: undefined },
      libraryDir: "./library",
      userId: "reader",
      logLevel: "info",
    });
  });

  it("should read every variable", () => {
    const config = loadLibraryConfig({
      LIBRARY_ENV: "production",
      LIBRARY_BACKEND: "libsql",
      LIBSQL_URL: "file:library.db",
      LIBSQL_AUTH_TOKEN: "test-secret",
      LIBRARY_DIR: "/srv/books",
      LIBRARY_USER_ID: "owner",
      LOG_LEVEL: "debug",
    });

    expect(config.environment).toBe("production");
    expect(config.primary).toEqual({
      kind: "libsql",
      url: "file:library.db",
      authToken: "test-secret",
    });
    expect(config.libraryDir).toBe("/srv/books");
    expect(config.logLevel).toBe("debug");
  });

  it("should not need a URL for the memory backend", () => {
    const config = loadLibraryConfig({ LIBRARY_BACKEND: "memory", LIBRARY_USER_ID: "tester" });
    expect(config.primary).toEqual({ kind: "memory" });
  });

  it("should require the acting user", () => {
    expect(() => loadLibraryConfig({ LIBRARY_BACKEND: "memory" })).toThrow(
      "Missing required env var: LIBRARY_USER_ID"
    );
  });

  it("should require a URL for libsql", () => {
    expect(() => loadLibraryConfig({ LIBRARY_USER_ID: "reader" })).toThrow(ConfigError);
  });

  it("should reject unknown values", () => {
    expect(() =>
      loadLibraryConfig({ LIBRARY_BACKEND: "mysql", LIBRARY_USER_ID: "reader" })
    ).toThrow("Invalid value for LIBRARY_BACKEND: mysql");
    expect(() =>
      loadLibraryConfig({ LIBRARY_BACKEND: "memory", LIBRARY_USER_ID: "r", LOG_LEVEL: "loud" })
    ).toThrow(ConfigError);
  });
});
