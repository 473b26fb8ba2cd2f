import type { Book, Environment, Page, SearchMatch } from "@/types/book";
import {
  defaultAnalyzerFactories,
  isAnalysisMethod,
  type AnalysisMethod,
  type Analyzer,
  type AnalyzerFactories,
} from "./analysis";
import type { LibraryConfig } from "./config";
import { BackendUnavailableError, UnknownAnalysisMethodError } from "./errors";
import { createLogger, setLogLevel } from "./logger";
import {
  FileStorageBackend,
  createStorageBackend,
  type StorageBackend,
} from "./storageBackend";

const log = createLogger("Library");

export const DEFAULT_BATCH_SIZE = 50;

export interface LibraryServiceOptions {
  /** Networked (or in-memory) store the library normally lives in */
  primary: StorageBackend;
  /** Always present: fallback while the primary is down, and export target */
  fileBackend: FileStorageBackend;
  /** Acting user, for author assignment and permission checks */
  userId: string;
  environment?: Environment;
  analyzers?: Partial<AnalyzerFactories>;
  batchSize?: number;
}

export interface ImportReport {
  imported: number;
  skipped: number;
  failed: number;
  /** Size of every flushed batch, in order */
  batches: number[];
}

interface ActiveBackend {
  backend: StorageBackend;
  degraded: boolean;
}

function emptyReport(): ImportReport {
  return { imported: 0, skipped: 0, failed: 0, batches: [] };
}

/**
 * Entry point for every library operation.
 * Picks the primary backend while it answers and the file backend while it does not,
 * deduplicates imports by content hash, and checks author permissions on writes.
 */
export class LibraryService {
  private readonly primary: StorageBackend;
  private readonly fileBackend: FileStorageBackend;
  private readonly userId: string;
  private readonly batchSize: number;
  private readonly analyzerFactories: AnalyzerFactories;
  private readonly analyzers = new Map<AnalysisMethod, Analyzer>();
  private environment: Environment;
  private syncing = false;

  constructor(options: LibraryServiceOptions) {
    this.primary = options.primary;
    this.fileBackend = options.fileBackend;
    this.userId = options.userId;
    this.environment = options.environment ?? "connected";
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.analyzerFactories = { ...defaultAnalyzerFactories, ...options.analyzers };
  }

  // ── Environment ──

  /** Last observed environment, without probing */
  getEnvironment(): Environment {
    return this.environment;
  }

  async isBackendConnected(): Promise<boolean> {
    return (await this.resolveBackend()).backend === this.primary;
  }

  // ── Reads ──

  async getAll(): Promise<Book[]> {
    const { backend } = await this.resolveBackend();
    return backend.listAll();
  }

  async getByTitle(title: string): Promise<Book | null> {
    const { backend } = await this.resolveBackend();
    return backend.findByTitle(title);
  }

  async hasWritePrivileges(title: string): Promise<boolean> {
    const book = await this.getByTitle(title);
    if (!book) {
      log.info(`No book titled "${title}", no write privileges`);
      return false;
    }
    return this.canWrite(book);
  }

  async searchByContent(text: string): Promise<SearchMatch[]> {
    const { backend } = await this.resolveBackend();
    return backend.searchContent(text);
  }

  /**
   * Same primitive as searchByContent until a title index exists.
   */
  async searchByTitle(text: string): Promise<SearchMatch[]> {
    return this.searchByContent(text);
  }

  // ── Writes ──

  async insertBook(book: Book): Promise<boolean> {
    const { backend, degraded } = await this.resolveBackend();
    return backend.insert(this.withAuthor(book), degraded);
  }

  /**
   * Replace the stored book with `book.id`, title included, if the acting user is its author.
   */
  async updateBook(book: Book): Promise<boolean> {
    const { backend } = await this.resolveBackend();
    const stored = await backend.findById(book.id);
    if (!stored) {
      log.warn(`Cannot update "${book.title}": no book with id ${book.id}`);
      return false;
    }
    if (!this.canWrite(stored)) {
      return false;
    }
    return backend.update({ ...book, authorId: book.authorId ?? stored.authorId });
  }

  /**
   * An existing file is deleted through the file backend; anything else is a
   * title deleted from the active backend.
   */
  async deleteBook(value: string): Promise<boolean> {
    if (await this.fileBackend.isExistingFile(value)) {
      return this.fileBackend.delete(value);
    }

    const { backend } = await this.resolveBackend();
    const book = await backend.findByTitle(value);
    if (book && !this.canWrite(book)) {
      return false;
    }
    return backend.delete(value);
  }

  async addPage(title: string, page: Page): Promise<boolean> {
    const { backend } = await this.resolveBackend();
    const book = await backend.findByTitle(title);
    if (!book) {
      log.warn(`Cannot add page: no book titled "${title}"`);
      return false;
    }
    if (!this.canWrite(book)) {
      return false;
    }
    return backend.addPage(book.id, { ...page, bookId: book.id });
  }

  // ── Import / export ──

  /**
   * Import one book file, or every book file under a directory in batches.
   */
  async importBook(filePath: string): Promise<ImportReport> {
    const report = emptyReport();

    if (await this.fileBackend.isBookFile(filePath)) {
      const book = await this.fileBackend.readBookFile(filePath);
      if (!book) {
        log.warn(`Could not read book file: ${filePath}`);
        report.failed++;
        return report;
      }
      const target = await this.resolveBackend();
      await this.importOne(this.withAuthor(book), target, report);
      return report;
    }

    if (!(await this.fileBackend.isDirectory(filePath))) {
      log.warn(`Invalid path, nothing to import: ${filePath}`);
      return report;
    }

    const target = await this.resolveBackend();
    const batch: Book[] = [];
    for (const book of await this.fileBackend.listAll(filePath)) {
      batch.push(this.withAuthor(book));
      if (batch.length >= this.batchSize) {
        await this.flushBatch(batch, target, report);
      }
    }
    if (batch.length > 0) {
      await this.flushBatch(batch, target, report);
    }

    log.info(
      `Import of ${filePath} done: ${report.imported} imported, ${report.skipped} skipped, ${report.failed} failed`
    );
    return report;
  }

  /**
   * Write a book to the file backend. A title is first fetched from the primary backend.
   */
  async exportBook(titleOrBook: string | Book): Promise<boolean> {
    const connected = await this.probePrimary();

    if (typeof titleOrBook !== "string") {
      return this.fileBackend.insert(titleOrBook, !connected);
    }

    if (!connected) {
      log.warn(`Cannot export "${titleOrBook}": primary backend is unavailable`);
      return false;
    }
    const book = await this.primary.findByTitle(titleOrBook);
    if (!book) {
      log.warn(`Cannot export "${titleOrBook}": book not found`);
      return false;
    }
    return this.fileBackend.insert(book, false);
  }

  /**
   * Push books written to the file backend while disconnected into the primary backend.
   */
  async syncDegradedBooks(): Promise<ImportReport> {
    if (!(await this.primary.isAvailable())) {
      this.environment = "disconnected";
      log.warn("Primary backend unavailable, degraded books stay local");
      return emptyReport();
    }
    this.environment = "connected";
    return this.pushDegradedBooks();
  }

  // ── Analysis ──

  async analyze(book: Book, method: string): Promise<string> {
    if (!isAnalysisMethod(method)) {
      throw new UnknownAnalysisMethodError(method);
    }
    return this.analyzerFor(method).analyze(book);
  }

  async close(): Promise<void> {
    await this.primary.close();
    await this.fileBackend.close();
  }

  // ── Internals ──

  private canWrite(book: Book): boolean {
    if (book.authorId === this.userId) {
      return true;
    }
    log.warn(
      `Permission denied: user "${this.userId}" is not the author of "${book.title}" (author: ${book.authorId ?? "none"})`
    );
    return false;
  }

  private withAuthor(book: Book): Book {
    return book.authorId ? book : { ...book, authorId: this.userId };
  }

  private analyzerFor(method: AnalysisMethod): Analyzer {
    let analyzer = this.analyzers.get(method);
    if (!analyzer) {
      analyzer = this.analyzerFactories[method]();
      this.analyzers.set(method, analyzer);
    }
    return analyzer;
  }

  /**
   * Probe the primary backend, retrying connect while it is down, and record the result.
   * Coming back from Disconnected pushes degraded books first.
   */
  private async probePrimary(): Promise<boolean> {
    let connected = await this.primary.isAvailable();
    if (!connected && (await this.primary.connect())) {
      connected = await this.primary.isAvailable();
    }

    const previous = this.environment;
    this.environment = connected ? "connected" : "disconnected";

    if (previous === "disconnected" && connected) {
      log.info("Primary backend is back, syncing degraded books");
      await this.pushDegradedBooks();
    } else if (previous === "connected" && !connected) {
      log.warn("Primary backend unavailable, falling back to the file backend");
    }
    return connected;
  }

  private async resolveBackend(): Promise<ActiveBackend> {
    const connected = await this.probePrimary();
    return connected
      ? { backend: this.primary, degraded: false }
      : { backend: this.fileBackend, degraded: true };
  }

  private async pushDegradedBooks(): Promise<ImportReport> {
    const report = emptyReport();
    if (this.syncing) {
      return report;
    }

    this.syncing = true;
    try {
      for (const book of await this.fileBackend.listDegraded()) {
        try {
          if (await this.primary.hashExists(book.hash)) {
            report.skipped++;
          } else if (await this.primary.insert(this.withAuthor(book), false)) {
            report.imported++;
          } else {
            report.failed++;
            continue;
          }
          await this.fileBackend.clearDegraded(book);
        } catch (error) {
          report.failed++;
          log.error(`Error syncing degraded book "${book.title}":`, error);
        }
      }
    } finally {
      this.syncing = false;
    }

    log.info(
      `Sync done: ${report.imported} pushed, ${report.skipped} already present, ${report.failed} failed`
    );
    return report;
  }

  private async flushBatch(
    batch: Book[],
    target: ActiveBackend,
    report: ImportReport
  ): Promise<void> {
    log.info(`Processing batch of size: ${batch.length}`);
    report.batches.push(batch.length);
    for (const book of batch) {
      await this.importOne(book, target, report);
    }
    batch.length = 0;
  }

  private async importOne(
    book: Book,
    { backend, degraded }: ActiveBackend,
    report: ImportReport
  ): Promise<void> {
    try {
      if (await backend.hashExists(book.hash)) {
        log.info(`Book already exists, skipping: ${book.title}`);
        report.skipped++;
      } else if (await backend.insert(book, degraded)) {
        report.imported++;
      } else {
        log.error(`Failed to import book: ${book.title}`);
        report.failed++;
      }
    } catch (error) {
      log.error(`Error importing book "${book.title}":`, error);
      report.failed++;
    }
  }
}

/**
 * Build the backends from configuration, connect them and return the service.
 * The file backend has no fallback, so failing to open it is fatal.
 */
export async function createLibraryService(config: LibraryConfig): Promise<LibraryService> {
  setLogLevel(config.logLevel);

  const primary = createStorageBackend(config.primary);
  const fileBackend = new FileStorageBackend(config.libraryDir);

  if (!(await fileBackend.connect())) {
    throw new BackendUnavailableError("file", config.libraryDir);
  }

  const connected = await primary.connect();
  if (!connected) {
    log.warn(`Primary ${primary.kind} backend unavailable, starting in degraded mode`);
  }

  return new LibraryService({
    primary,
    fileBackend,
    userId: config.userId,
    environment: connected ? "connected" : "disconnected",
  });
}
