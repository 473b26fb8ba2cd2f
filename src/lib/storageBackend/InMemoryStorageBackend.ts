import type { Book, Page, SearchMatch } from "@/types/book";
import { sortPages } from "@/lib/bookUtils";
import { containsText } from "@/lib/searchUtils";
import type { StorageBackend } from "./StorageBackend";

type BookRecord = Omit<Book, "pages">;

/**
 * In-memory backend for tests and local development.
 * Ids come from two counters starting at 1 and are never reused until clear().
 */
export class InMemoryStorageBackend implements StorageBackend {
  readonly kind = "memory" as const;

  private books = new Map<number, BookRecord>();
  private pages = new Map<number, Page>();
  private nextBookId = 1;
  private nextPageId = 1;

  async connect(): Promise<boolean> {
    return true;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {}

  async listAll(): Promise<Book[]> {
    return [...this.books.values()]
      .sort((a, b) => a.id - b.id)
      .map((record) => this.toBook(record));
  }

  async findByTitle(title: string): Promise<Book | null> {
    const record = this.findRecord(title);
    return record ? this.toBook(record) : null;
  }

  async findById(id: number): Promise<Book | null> {
    const record = this.books.get(id);
    return record ? this.toBook(record) : null;
  }

  async insert(book: Book, _degraded: boolean): Promise<boolean> {
    if ((await this.hashExists(book.hash)) || this.findRecord(book.title)) {
      return false;
    }

    const id = this.nextBookId++;
    this.books.set(id, {
      id,
      title: book.title,
      hash: book.hash,
      authorId: book.authorId,
    });
    for (const page of book.pages ?? []) {
      this.storePage(id, page);
    }
    return true;
  }

  async update(book: Book): Promise<boolean> {
    if (!this.books.has(book.id)) {
      return false;
    }
    // Another book already owns this content or title
    const sameTitle = this.findRecord(book.title);
    if (sameTitle && sameTitle.id !== book.id) {
      return false;
    }
    for (const other of this.books.values()) {
      if (other.id !== book.id && other.hash === book.hash) {
        return false;
      }
    }

    this.books.set(book.id, {
      id: book.id,
      title: book.title,
      hash: book.hash,
      authorId: book.authorId,
    });
    this.removePages(book.id);
    for (const page of book.pages ?? []) {
      this.storePage(book.id, page);
    }
    return true;
  }

  async delete(title: string): Promise<boolean> {
    const record = this.findRecord(title);
    if (!record) {
      return false;
    }
    this.removePages(record.id);
    this.books.delete(record.id);
    return true;
  }

  async hashExists(hash: string): Promise<boolean> {
    for (const record of this.books.values()) {
      if (record.hash === hash) return true;
    }
    return false;
  }

  async addPage(bookId: number, page: Page): Promise<boolean> {
    if (!this.books.has(bookId)) {
      return false;
    }
    this.storePage(bookId, page);
    return true;
  }

  async pagesOf(title: string): Promise<Page[]> {
    const record = this.findRecord(title);
    return record ? this.pagesFor(record.id) : [];
  }

  async deletePagesOf(title: string): Promise<void> {
    const record = this.findRecord(title);
    if (record) {
      this.removePages(record.id);
    }
  }

  async searchContent(text: string): Promise<SearchMatch[]> {
    if (!text) {
      return [];
    }

    const matches: SearchMatch[] = [];
    for (const book of await this.listAll()) {
      for (const page of book.pages ?? []) {
        if (containsText(page.content, text)) {
          matches.push({
            title: book.title,
            pageNumber: page.pageNumber,
            content: page.content,
          });
        }
      }
    }
    return matches;
  }

  /**
   * Reset both maps and both counters. Test isolation only.
   */
  clear(): void {
    this.books.clear();
    this.pages.clear();
    this.nextBookId = 1;
    this.nextPageId = 1;
  }

  private findRecord(title: string): BookRecord | undefined {
    const needle = title.toLowerCase();
    for (const record of this.books.values()) {
      if (record.title.toLowerCase() === needle) return record;
    }
    return undefined;
  }

  private storePage(bookId: number, page: Page): void {
    const id = this.nextPageId++;
    this.pages.set(id, {
      id,
      bookId,
      pageNumber: page.pageNumber,
      content: page.content,
    });
  }

  private removePages(bookId: number): void {
    for (const [id, page] of this.pages) {
      if (page.bookId === bookId) this.pages.delete(id);
    }
  }

  private pagesFor(bookId: number): Page[] {
    const owned: Page[] = [];
    for (const page of this.pages.values()) {
      if (page.bookId === bookId) owned.push({ ...page });
    }
    return sortPages(owned);
  }

  private toBook(record: BookRecord): Book {
    return { ...record, pages: this.pagesFor(record.id) };
  }
}
