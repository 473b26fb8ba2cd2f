import { LibsqlError, type Client, type InStatement, type Row } from "@libsql/client";
import type { Book, Page, SearchMatch } from "@/types/book";
import { BackendUnavailableError } from "@/lib/errors";
import { createLibsqlClient } from "@/lib/libsqlClient";
import { createLogger } from "@/lib/logger";
import { schemaStatements } from "@/lib/schema";
import { prepareSafeLikePattern } from "@/lib/searchUtils";
import type { StorageBackend } from "./StorageBackend";
import type { LibsqlBackendConfig } from "./types";

const log = createLogger("Library/libSQL");

const BOOK_COLUMNS = "id, title, hash, author_id";
const PAGE_COLUMNS = "id, book_id, page_number, content";
const BOOK_ID_BY_TITLE =
  "(SELECT id FROM books WHERE lower(title) = lower(?) ORDER BY id LIMIT 1)";

function isConstraintError(error: unknown): boolean {
  if (error instanceof LibsqlError && error.code.startsWith("SQLITE_CONSTRAINT")) {
    return true;
  }
  return error instanceof Error && error.message.includes("UNIQUE constraint failed");
}

function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string") return Number(value);
  return 0;
}

function readString(row: Row, column: string): string {
  const value = row[column];
  return typeof value === "string" ? value : "";
}

function readNullableString(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === "string" ? value : null;
}

/**
 * Relational backend on libSQL (Turso).
 * Multi-statement reads and writes go through `client.batch`, which commits or
 * rolls back as a unit and holds nothing open once it settles.
 */
export class LibsqlStorageBackend implements StorageBackend {
  readonly kind = "libsql" as const;

  private client: Client | null = null;
  private schemaReady = false;

  constructor(
    private readonly config: LibsqlBackendConfig,
    client?: Client
  ) {
    this.client = client ?? null;
  }

  /**
   * Open the client (if none was injected) and create the schema. Idempotent.
   */
  async connect(): Promise<boolean> {
    if (this.client && this.schemaReady) {
      return true;
    }

    try {
      const client = this.client ?? createLibsqlClient(this.config);
      this.client = client;
      await client.batch(schemaStatements(), "write");
      this.schemaReady = true;
      log.info(`Connected to ${this.describeUrl()}`);
      return true;
    } catch (error) {
      log.error(`Failed to connect to ${this.describeUrl()}:`, error);
      return false;
    }
  }

  async isAvailable(): Promise<boolean> {
    if (!this.client || !this.schemaReady) {
      return false;
    }
    try {
      await this.client.execute("SELECT 1");
      return true;
    } catch (error) {
      log.debug("Liveness probe failed:", error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      if (!this.client.closed) this.client.close();
      this.client = null;
      this.schemaReady = false;
    }
  }

  async listAll(): Promise<Book[]> {
    const [books, pages] = await this.db().batch(
      [
        `SELECT ${BOOK_COLUMNS} FROM books ORDER BY id`,
        `SELECT ${PAGE_COLUMNS} FROM pages ORDER BY book_id, page_number, id`,
      ],
      "deferred"
    );

    const pagesByBook = new Map<number, Page[]>();
    for (const row of pages.rows) {
      const page = this.rowToPage(row);
      const owned = pagesByBook.get(page.bookId);
      if (owned) {
        owned.push(page);
      } else {
        pagesByBook.set(page.bookId, [page]);
      }
    }

    return books.rows.map((row) => {
      const book = this.rowToBook(row);
      return { ...book, pages: pagesByBook.get(book.id) ?? [] };
    });
  }

  async findByTitle(title: string): Promise<Book | null> {
    const [books, pages] = await this.db().batch(
      [
        {
          sql: `SELECT ${BOOK_COLUMNS} FROM books WHERE id = ${BOOK_ID_BY_TITLE}`,
          args: [title],
        },
        {
          sql: `SELECT ${PAGE_COLUMNS} FROM pages WHERE book_id = ${BOOK_ID_BY_TITLE} ORDER BY page_number, id`,
          args: [title],
        },
      ],
      "deferred"
    );

    if (books.rows.length === 0) {
      return null;
    }
    return {
      ...this.rowToBook(books.rows[0]),
      pages: pages.rows.map((row) => this.rowToPage(row)),
    };
  }

  async findById(id: number): Promise<Book | null> {
    const [books, pages] = await this.db().batch(
      [
        { sql: `SELECT ${BOOK_COLUMNS} FROM books WHERE id = ?`, args: [id] },
        {
          sql: `SELECT ${PAGE_COLUMNS} FROM pages WHERE book_id = ? ORDER BY page_number, id`,
          args: [id],
        },
      ],
      "deferred"
    );

    if (books.rows.length === 0) {
      return null;
    }
    return {
      ...this.rowToBook(books.rows[0]),
      pages: pages.rows.map((row) => this.rowToPage(row)),
    };
  }

  /**
   * Insert a book with its pages. A stored hash or title trips a UNIQUE index
   * and is reported as a duplicate.
   */
  async insert(book: Book, _degraded: boolean): Promise<boolean> {
    const now = Date.now();
    const statements: InStatement[] = [
      {
        sql: `
          INSERT INTO books (title, hash, author_id, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?)
        `,
        args: [book.title, book.hash, book.authorId, now, now],
      },
      ...(book.pages ?? []).map((page) => ({
        sql: `
          INSERT INTO pages (book_id, page_number, content)
          VALUES ((SELECT id FROM books WHERE hash = ?), ?, ?)
        `,
        args: [book.hash, page.pageNumber, page.content],
      })),
    ];

    try {
      await this.db().batch(statements, "write");
      return true;
    } catch (error) {
      if (isConstraintError(error)) {
        log.info(`Book already exists in DB, skipping: ${book.title}`);
      } else {
        log.error(`Error inserting book "${book.title}":`, error);
      }
      return false;
    }
  }

  async update(book: Book): Promise<boolean> {
    const statements: InStatement[] = [
      {
        sql: `
          UPDATE books
          SET title = ?, hash = ?, author_id = ?, updated_at = ?
          WHERE id = ?
        `,
        args: [book.title, book.hash, book.authorId, Date.now(), book.id],
      },
      {
        sql: "DELETE FROM pages WHERE book_id = ?",
        args: [book.id],
      },
      // Guarded so a missing book never gains orphan pages
      ...(book.pages ?? []).map((page) => ({
        sql: `
          INSERT INTO pages (book_id, page_number, content)
          SELECT id, ?, ? FROM books WHERE id = ?
        `,
        args: [page.pageNumber, page.content, book.id],
      })),
    ];

    try {
      const [updated] = await this.db().batch(statements, "write");
      return updated.rowsAffected > 0;
    } catch (error) {
      if (isConstraintError(error)) {
        log.warn(`Cannot update book ${book.id}: title or content belongs to another book`);
      } else {
        log.error(`Error updating book ${book.id}:`, error);
      }
      return false;
    }
  }

  async delete(title: string): Promise<boolean> {
    try {
      const [, deleted] = await this.db().batch(
        [
          {
            sql: `DELETE FROM pages WHERE book_id = ${BOOK_ID_BY_TITLE}`,
            args: [title],
          },
          {
            sql: `DELETE FROM books WHERE id = ${BOOK_ID_BY_TITLE}`,
            args: [title],
          },
        ],
        "write"
      );
      return deleted.rowsAffected > 0;
    } catch (error) {
      log.error(`Error deleting book "${title}":`, error);
      return false;
    }
  }

  async hashExists(hash: string): Promise<boolean> {
    const result = await this.db().execute({
      sql: "SELECT 1 FROM books WHERE hash = ? LIMIT 1",
      args: [hash],
    });
    return result.rows.length > 0;
  }

  async addPage(bookId: number, page: Page): Promise<boolean> {
    try {
      const result = await this.db().execute({
        sql: `
          INSERT INTO pages (book_id, page_number, content)
          SELECT id, ?, ? FROM books WHERE id = ?
        `,
        args: [page.pageNumber, page.content, bookId],
      });
      return result.rowsAffected > 0;
    } catch (error) {
      log.error(`Error adding page to book ${bookId}:`, error);
      return false;
    }
  }

  async pagesOf(title: string): Promise<Page[]> {
    const result = await this.db().execute({
      sql: `
        SELECT ${PAGE_COLUMNS} FROM pages
        WHERE book_id = ${BOOK_ID_BY_TITLE}
        ORDER BY page_number, id
      `,
      args: [title],
    });
    return result.rows.map((row) => this.rowToPage(row));
  }

  async deletePagesOf(title: string): Promise<void> {
    try {
      await this.db().execute({
        sql: `DELETE FROM pages WHERE book_id = ${BOOK_ID_BY_TITLE}`,
        args: [title],
      });
    } catch (error) {
      log.error(`Error deleting pages of "${title}":`, error);
    }
  }

  /**
   * Substring search over page content. Input is LIKE-escaped and length-capped.
   */
  async searchContent(text: string): Promise<SearchMatch[]> {
    if (!text) {
      return [];
    }
    const pattern = prepareSafeLikePattern(text);

    const result = await this.db().execute({
      sql: `
        SELECT b.title, p.page_number, p.content
        FROM pages p
        JOIN books b ON b.id = p.book_id
        WHERE p.content LIKE ? ESCAPE '\\'
        ORDER BY b.title, p.page_number, p.id
      `,
      args: [pattern],
    });

    return result.rows.map((row) => ({
      title: readString(row, "title"),
      pageNumber: readNumber(row, "page_number"),
      content: readString(row, "content"),
    }));
  }

  private db(): Client {
    if (!this.client) {
      throw new BackendUnavailableError("libsql");
    }
    return this.client;
  }

  private describeUrl(): string {
    // Never log credentials embedded in the URL
    return this.config.url.replace(/\/\/[^@/]*@/, "//");
  }

  private rowToBook(row: Row): Omit<Book, "pages"> {
    return {
      id: readNumber(row, "id"),
      title: readString(row, "title"),
      hash: readString(row, "hash"),
      authorId: readNullableString(row, "author_id"),
    };
  }

  private rowToPage(row: Row): Page {
    return {
      id: readNumber(row, "id"),
      bookId: readNumber(row, "book_id"),
      pageNumber: readNumber(row, "page_number"),
      content: readString(row, "content"),
    };
  }
}
