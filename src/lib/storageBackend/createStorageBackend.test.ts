import { describe, it, expect } from "vitest";
import { createStorageBackend } from "./createStorageBackend";
import { FileStorageBackend } from "./FileStorageBackend";
import { InMemoryStorageBackend } from "./InMemoryStorageBackend";
import { LibsqlStorageBackend } from "./LibsqlStorageBackend";
import { UnsupportedBackendError } from "@/lib/errors";

describe("createStorageBackend", () => {
  it("should build each supported variant", () => {
    expect(createStorageBackend({ kind: "memory" })).toBeInstanceOf(InMemoryStorageBackend);
    expect(createStorageBackend({ kind: "file", directory: "library" })).toBeInstanceOf(
      FileStorageBackend
    );
    expect(createStorageBackend({ kind: "libsql", url: ":memory:" })).toBeInstanceOf(
      LibsqlStorageBackend
    );
  });

  it("should tag each backend with its kind", () => {
    expect(createStorageBackend({ kind: "memory" }).kind).toBe("memory");
  });

  it("should reject an unknown kind at construction", () => {
    const parsed = JSON.parse('{"kind":"mysql"}');
    expect(() => createStorageBackend(parsed)).toThrow(UnsupportedBackendError);
    expect(() => createStorageBackend(parsed)).toThrow("Unsupported storage backend: mysql");
  });
});
