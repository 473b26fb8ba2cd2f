import path from "path";
import { ValidationError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("Library/Path");

export const MAX_FILENAME_LENGTH = 255;

// Path separators, characters Windows refuses and ASCII control characters
const INVALID_FILENAME_CHARS = /[/\\:*?"<>|\x00-\x1F]/g;

const RESERVED_NAMES = new Set([
  "CON", "PRN", "AUX", "NUL",
  "COM1", "COM2", "COM3", "COM4", "COM5", "COM6", "COM7", "COM8", "COM9",
  "LPT1", "LPT2", "LPT3", "LPT4", "LPT5", "LPT6", "LPT7", "LPT8", "LPT9",
]);

/**
 * Reject a title that cannot name a file inside the library directory.
 * Nothing is rewritten here: a bad title is refused, never "fixed".
 */
export function validateBookTitle(title: string): void {
  if (!title || title.trim().length === 0) {
    throw new ValidationError("Book title cannot be empty");
  }
  if (title.length > MAX_FILENAME_LENGTH) {
    throw new ValidationError(
      `Book title too long: ${title.length} characters (max: ${MAX_FILENAME_LENGTH})`
    );
  }
  if (title.includes("..") || title.includes("/") || title.includes("\\")) {
    throw new ValidationError(
      "Book title contains path separators or traversal sequences",
      { title }
    );
  }
}

/**
 * Turn a (validated) title into a portable file name without extension.
 */
export function sanitizeFilename(filename: string): string {
  if (!filename || filename.trim().length === 0) {
    throw new ValidationError("Filename cannot be empty");
  }

  let sanitized = filename.trim();
  sanitized = sanitized.replace(/\.\./g, "");
  sanitized = sanitized.replace(INVALID_FILENAME_CHARS, "_");
  sanitized = sanitized.replace(/^[.\s]+|[.\s]+$/g, "");

  if (sanitized.length === 0) {
    throw new ValidationError(`Filename becomes empty after sanitization: ${filename}`);
  }

  if (sanitized.length > MAX_FILENAME_LENGTH) {
    log.warn(
      `Filename too long, truncating from ${sanitized.length} to ${MAX_FILENAME_LENGTH} characters`
    );
    sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH);
  }

  const stem = sanitized.split(".")[0].toUpperCase();
  if (RESERVED_NAMES.has(stem)) {
    sanitized = `_${sanitized}`;
  }

  if (sanitized !== filename) {
    log.debug(`Filename sanitized: '${filename}' -> '${sanitized}'`);
  }
  return sanitized;
}

export function isPathWithinDirectory(baseDirectory: string, filePath: string): boolean {
  const base = path.resolve(baseDirectory);
  const target = path.resolve(filePath);
  const relative = path.relative(base, target);
  const within =
    relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative);

  if (!within) {
    log.warn(`File path '${target}' is outside allowed directory '${base}'`);
  }
  return within;
}

/**
 * Resolve `<directory>/<sanitized title><extension>` and make sure it stays inside `directory`.
 */
export function resolveBookFilePath(
  directory: string,
  title: string,
  extension: string
): string {
  validateBookTitle(title);

  const ext = extension.startsWith(".") ? extension : `.${extension}`;
  // Leave room for the extension within the file name limit
  const stem = sanitizeFilename(title).slice(0, MAX_FILENAME_LENGTH - ext.length);
  const filePath = path.join(directory, stem + ext);

  if (!isPathWithinDirectory(directory, filePath)) {
    throw new ValidationError(
      `Path traversal detected: '${title}' would resolve outside the library directory`
    );
  }
  return filePath;
}
