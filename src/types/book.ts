/**
 * A single page of a book. `pageNumber` is 1-based reading order.
 */
export interface Page {
  id: number;
  bookId: number;
  pageNumber: number;
  content: string; // Unicode text, may carry lightweight markdown
}

/**
 * A book owned by `authorId`.
 * `id` is assigned by the backend that persists it (0 = not persisted yet).
 * `pages` is null when the pages were not loaded.
 */
export interface Book {
  id: number;
  title: string;
  hash: string;
  authorId: string | null;
  pages: Page[] | null;
}

/** One content-search hit */
export interface SearchMatch {
  title: string;
  pageNumber: number;
  content: string;
}

export type Environment = "connected" | "disconnected";
