import { describe, it, expect } from "vitest";
import path from "path";
import {
  MAX_FILENAME_LENGTH,
  isPathWithinDirectory,
  resolveBookFilePath,
  sanitizeFilename,
  validateBookTitle,
} from "./pathSecurity";
import { ValidationError } from "./errors";

describe("validateBookTitle", () => {
  it("should accept an ordinary title", () => {
    expect(() => validateBookTitle("Muqaddimah vol. 1")).not.toThrow();
  });

  it.each(["", "   ", "../etc/passwd", "a/b", "a\\b", "x".repeat(256)])(
    "should reject %j",
    (title) => {
      expect(() => validateBookTitle(title)).toThrow(ValidationError);
    }
  );
});

describe("sanitizeFilename", () => {
  it("should replace reserved characters", () => {
    expect(sanitizeFilename('a:b*c?d"e<f>g|h')).toBe("a_b_c_d_e_f_g_h");
  });

  it("should replace control characters", () => {
    expect(sanitizeFilename("tab\there")).toBe("tab_here");
  });

  it("should strip leading and trailing dots and spaces", () => {
    expect(sanitizeFilename(" .hidden. ")).toBe("hidden");
  });

  it("should prefix Windows device names", () => {
    expect(sanitizeFilename("CON")).toBe("_CON");
    expect(sanitizeFilename("lpt1.txt")).toBe("_lpt1.txt");
  });

  it("should cap the length", () => {
    expect(sanitizeFilename("a".repeat(300))).toHaveLength(MAX_FILENAME_LENGTH);
  });

  it("should reject names that sanitize to nothing", () => {
    expect(() => sanitizeFilename("...")).toThrow(ValidationError);
  });
});

describe("isPathWithinDirectory", () => {
  const base = path.resolve("/library");

  it("should accept a child path", () => {
    expect(isPathWithinDirectory(base, path.join(base, "book.json"))).toBe(true);
  });

  it("should reject the directory itself and escapes", () => {
    expect(isPathWithinDirectory(base, base)).toBe(false);
    expect(isPathWithinDirectory(base, path.join(base, "..", "other.json"))).toBe(false);
  });
});

describe("resolveBookFilePath", () => {
  it("should join the sanitized title and extension", () => {
    const base = path.resolve("/library");
    expect(resolveBookFilePath(base, "Notes: Part 1", ".json")).toBe(
      path.join(base, "Notes_ Part 1.json")
    );
  });

  it("should keep the full name within the length limit", () => {
    const base = path.resolve("/library");
    const filePath = resolveBookFilePath(base, "b".repeat(255), "json");
    expect(path.basename(filePath)).toHaveLength(MAX_FILENAME_LENGTH);
  });

  it("should refuse traversal before touching the file system", () => {
    expect(() => resolveBookFilePath("/library", "../../evil", ".json")).toThrow(
      ValidationError
    );
  });
});
