/**
 * StorageBackend interface.
 * Capability set shared by the libSQL, file and in-memory backends.
 * Every method returns copies: mutating a returned Book never changes stored state.
 */

import type { Book, Page, SearchMatch } from "@/types/book";
import type { StorageBackendKind } from "./types";

export interface StorageBackend {
  readonly kind: StorageBackendKind;

  // ── Books ──
  /** Every book with pages loaded, `[]` when there are none */
  listAll(scopeHint?: string): Promise<Book[]>;
  /** Case-insensitive title lookup */
  findByTitle(title: string): Promise<Book | null>;
  findById(id: number): Promise<Book | null>;
  /** false when the hash or title is already stored, or the write failed */
  insert(book: Book, degraded: boolean): Promise<boolean>;
  /**
   * Replaces title, hash, author and pages of the book with `book.id`.
   * false when another book owns the new hash or title.
   */
  update(book: Book): Promise<boolean>;
  /** Removes the book and its pages */
  delete(title: string): Promise<boolean>;
  hashExists(hash: string): Promise<boolean>;

  // ── Pages ──
  addPage(bookId: number, page: Page): Promise<boolean>;
  /** Ordered by page number */
  pagesOf(title: string): Promise<Page[]>;
  deletePagesOf(title: string): Promise<void>;

  // ── Search ──
  searchContent(text: string): Promise<SearchMatch[]>;

  // ── Lifecycle ──
  connect(): Promise<boolean>;
  /** Liveness probe; never throws */
  isAvailable(): Promise<boolean>;
  close(): Promise<void>;
}
