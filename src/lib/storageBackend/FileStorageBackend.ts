import { promises as fs } from "fs";
import path from "path";
import { nanoid } from "nanoid";
import type { Book, Page, SearchMatch } from "@/types/book";
import { cloneBook, sortPages } from "@/lib/bookUtils";
import { ValidationError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { resolveBookFilePath, validateBookTitle } from "@/lib/pathSecurity";
import { containsText, validateSearchText } from "@/lib/searchUtils";
import {
  BOOK_RECORD_EXTENSION,
  NOTE_EXTENSIONS,
  fromBookRecord,
  parseBookRecord,
  parseNoteText,
  serializeBookRecord,
  toBookRecord,
} from "./bookFileFormat";
import type { StorageBackend } from "./StorageBackend";

const log = createLogger("Library/File");

const READABLE_EXTENSIONS: readonly string[] = [BOOK_RECORD_EXTENSION, ...NOTE_EXTENSIONS];

interface BookFileEntry {
  filePath: string;
  book: Book;
  /** Plain-text notes are read-only imports; only `.json` records are written back */
  isRecord: boolean;
  degraded: boolean;
}

function hasReadableExtension(filePath: string): boolean {
  return READABLE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

function sameTitle(a: Book, b: Book): boolean {
  return a.title.toLowerCase() === b.title.toLowerCase();
}

/**
 * Title check for lookups: an unsafe title names no stored book.
 */
function isSafeTitle(title: string): boolean {
  try {
    validateBookTitle(title);
    return true;
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    log.warn(`Rejected book title "${title}": ${error.message}`);
    return false;
  }
}

/**
 * File backend: one `<title>.json` record per book inside a directory.
 * Keeps the library usable offline and receives exports.
 */
export class FileStorageBackend implements StorageBackend {
  readonly kind = "file" as const;

  constructor(private readonly directory: string) {}

  async connect(): Promise<boolean> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
      return true;
    } catch (error) {
      log.error(`Cannot create library directory ${this.directory}:`, error);
      return false;
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await fs.access(this.directory);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {}

  /**
   * Every record and note under `scopeHint` (default: the library directory), recursively.
   */
  async listAll(scopeHint?: string): Promise<Book[]> {
    const entries = await this.scan(scopeHint ?? this.directory);
    return entries.map((entry) => entry.book);
  }

  /**
   * Read one `.json` record or `.md`/`.txt` note. Null when missing or malformed.
   */
  async readBookFile(filePath: string): Promise<Book | null> {
    const entry = await this.readEntry(filePath);
    return entry ? entry.book : null;
  }

  async findByTitle(title: string): Promise<Book | null> {
    if (!isSafeTitle(title)) {
      return null;
    }
    const entry = await this.findEntryByTitle(title);
    return entry ? cloneBook(entry.book) : null;
  }

  async findById(id: number): Promise<Book | null> {
    const entries = await this.scan(this.directory);
    const entry = entries.find((candidate) => candidate.isRecord && candidate.book.id === id);
    return entry ? cloneBook(entry.book) : null;
  }

  /**
   * Write a new record. `degraded` marks it for the next sync to the primary backend.
   */
  async insert(book: Book, degraded: boolean): Promise<boolean> {
    const filePath = this.recordPath(book.title);
    if (!filePath) {
      return false;
    }
    if (!book.authorId) {
      log.warn(`Invalid book details provided for storage: "${book.title}" has no author`);
      return false;
    }

    const entries = await this.scan(this.directory);
    if (entries.some((entry) => entry.book.hash === book.hash)) {
      log.info(`Book already exists in library directory, skipping: ${book.title}`);
      return false;
    }
    if (entries.some((entry) => entry.filePath === filePath || sameTitle(entry.book, book))) {
      log.warn(`A different book titled "${book.title}" is already stored`);
      return false;
    }

    const id = entries.reduce((max, entry) => Math.max(max, entry.book.id), 0) + 1;
    const pages: Page[] = sortPages(book.pages ?? []).map((page, index) => ({
      id: index + 1,
      bookId: id,
      pageNumber: page.pageNumber,
      content: page.content,
    }));

    try {
      await this.writeRecord(filePath, { ...book, id, pages }, degraded);
      log.debug(`Stored "${book.title}" at ${filePath}${degraded ? " (degraded)" : ""}`);
      return true;
    } catch (error) {
      log.error(`Error writing book to local storage: ${book.title}`, error);
      return false;
    }
  }

  async update(book: Book): Promise<boolean> {
    const filePath = this.recordPath(book.title);
    if (!filePath) {
      return false;
    }
    const entries = await this.scan(this.directory);
    const current = entries.find((entry) => entry.isRecord && entry.book.id === book.id);

    if (!current) {
      log.warn(`No stored book with id ${book.id}`);
      return false;
    }
    const conflict = entries.find(
      (entry) =>
        entry !== current &&
        (entry.book.hash === book.hash || entry.filePath === filePath || sameTitle(entry.book, book))
    );
    if (conflict) {
      log.warn(`Update of "${book.title}" conflicts with ${conflict.filePath}`);
      return false;
    }

    const pages: Page[] = sortPages(book.pages ?? []).map((page, index) => ({
      id: index + 1,
      bookId: book.id,
      pageNumber: page.pageNumber,
      content: page.content,
    }));

    try {
      await this.writeRecord(filePath, { ...book, pages }, current.degraded);
      if (current.filePath !== filePath) {
        await fs.unlink(current.filePath);
      }
      log.info(`Successfully updated book in local storage: ${book.title}`);
      return true;
    } catch (error) {
      log.error(`Error updating book in local storage: ${book.title}`, error);
      return false;
    }
  }

  /**
   * Delete by file path when `value` names an existing file, otherwise by title.
   */
  async delete(value: string): Promise<boolean> {
    let filePath: string;

    if (await this.isExistingFile(value)) {
      filePath = value;
    } else {
      if (!isSafeTitle(value)) {
        return false;
      }
      const entry = await this.findEntryByTitle(value);
      if (!entry) {
        log.warn(`Book file does not exist for deletion: ${value}`);
        return false;
      }
      filePath = entry.filePath;
    }

    try {
      await fs.unlink(filePath);
      log.info(`Book deleted successfully at path: ${filePath}`);
      return true;
    } catch (error) {
      log.error(`Failed to delete book at path: ${filePath}`, error);
      return false;
    }
  }

  /** An existing file this backend can read as a book */
  async isBookFile(value: string): Promise<boolean> {
    return hasReadableExtension(value) && (await this.isExistingFile(value));
  }

  async isExistingFile(value: string): Promise<boolean> {
    if (!value) {
      return false;
    }
    try {
      const stats = await fs.stat(value);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async isDirectory(value: string): Promise<boolean> {
    try {
      const stats = await fs.stat(value);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  async hashExists(hash: string): Promise<boolean> {
    const entries = await this.scan(this.directory);
    return entries.some((entry) => entry.book.hash === hash);
  }

  async addPage(bookId: number, page: Page): Promise<boolean> {
    const entries = await this.scan(this.directory);
    const entry = entries.find((candidate) => candidate.isRecord && candidate.book.id === bookId);
    if (!entry) {
      return false;
    }

    const pages = entry.book.pages ?? [];
    const nextId = pages.reduce((max, existing) => Math.max(max, existing.id), 0) + 1;
    const updated: Book = {
      ...entry.book,
      pages: sortPages([
        ...pages,
        { id: nextId, bookId, pageNumber: page.pageNumber, content: page.content },
      ]),
    };

    try {
      await this.writeRecord(entry.filePath, updated, entry.degraded);
      return true;
    } catch (error) {
      log.error(`Error adding page to ${entry.filePath}:`, error);
      return false;
    }
  }

  async pagesOf(title: string): Promise<Page[]> {
    const book = await this.findByTitle(title);
    return book?.pages ?? [];
  }

  async deletePagesOf(title: string): Promise<void> {
    if (!isSafeTitle(title)) {
      return;
    }
    const entry = await this.findEntryByTitle(title);
    if (!entry || !entry.isRecord || (entry.book.pages ?? []).length === 0) {
      return;
    }
    try {
      await this.writeRecord(entry.filePath, { ...entry.book, pages: [] }, entry.degraded);
    } catch (error) {
      log.error(`Error deleting pages of "${title}":`, error);
    }
  }

  async searchContent(text: string): Promise<SearchMatch[]> {
    if (!text) {
      return [];
    }
    validateSearchText(text);

    const matches: SearchMatch[] = [];
    for (const book of await this.listAll()) {
      for (const page of book.pages ?? []) {
        if (containsText(page.content, text)) {
          matches.push({ title: book.title, pageNumber: page.pageNumber, content: page.content });
        }
      }
    }
    return matches;
  }

  // ── Degraded-mode bookkeeping ──

  /** Records written while the primary backend was unavailable */
  async listDegraded(): Promise<Book[]> {
    const entries = await this.scan(this.directory);
    return entries.filter((entry) => entry.degraded).map((entry) => entry.book);
  }

  async clearDegraded(book: Book): Promise<boolean> {
    const entries = await this.scan(this.directory);
    const entry = entries.find(
      (candidate) =>
        candidate.degraded && candidate.book.id === book.id && candidate.book.hash === book.hash
    );
    if (!entry) {
      return false;
    }
    try {
      await this.writeRecord(entry.filePath, entry.book, false);
      return true;
    } catch (error) {
      log.error(`Error clearing degraded mark on ${entry.filePath}:`, error);
      return false;
    }
  }

  // ── Internals ──

  private recordPath(title: string): string | null {
    try {
      return resolveBookFilePath(this.directory, title, BOOK_RECORD_EXTENSION);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      log.warn(`Cannot store "${title}": ${error.message}`);
      return null;
    }
  }

  private async findEntryByTitle(title: string): Promise<BookFileEntry | undefined> {
    const needle = title.toLowerCase();
    const entries = await this.scan(this.directory);
    return entries.find((entry) => entry.book.title.toLowerCase() === needle);
  }

  private async scan(root: string): Promise<BookFileEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(root);
    } catch (error) {
      log.warn(`No files found in the directory: ${root}`, error);
      return [];
    }

    const entries: BookFileEntry[] = [];
    for (const name of names.sort()) {
      const fullPath = path.join(root, name);
      const stats = await fs.stat(fullPath).catch((error: unknown) => {
        log.warn(`Cannot stat ${fullPath}:`, error);
        return null;
      });
      if (!stats) {
        continue;
      }
      if (stats.isDirectory()) {
        entries.push(...(await this.scan(fullPath)));
      } else if (stats.isFile() && hasReadableExtension(name)) {
        const entry = await this.readEntry(fullPath);
        if (entry) entries.push(entry);
      }
    }
    return entries;
  }

  private async readEntry(filePath: string): Promise<BookFileEntry | null> {
    const extension = path.extname(filePath).toLowerCase();
    if (!READABLE_EXTENSIONS.includes(extension)) {
      return null;
    }

    let text: string;
    try {
      text = await fs.readFile(filePath, "utf8");
    } catch (error) {
      log.error(`Error reading book from file: ${filePath}`, error);
      return null;
    }

    if (extension !== BOOK_RECORD_EXTENSION) {
      const title = path.basename(filePath, path.extname(filePath));
      return { filePath, book: parseNoteText(title, text), isRecord: false, degraded: false };
    }

    const record = parseBookRecord(text);
    if (!record) {
      log.warn(`Skipping malformed book file: ${filePath}`);
      return null;
    }
    return {
      filePath,
      book: fromBookRecord(record),
      isRecord: true,
      degraded: record.degraded === true,
    };
  }

  /**
   * Write to a temporary sibling, then rename over the target.
   */
  private async writeRecord(filePath: string, book: Book, degraded: boolean): Promise<void> {
    const tempPath = `${filePath}.${nanoid(8)}.tmp`;
    try {
      await fs.writeFile(tempPath, serializeBookRecord(toBookRecord(book, degraded)), "utf8");
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
