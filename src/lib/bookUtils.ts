import { createHash } from "crypto";
import type { Book, Page, SearchMatch } from "@/types/book";

/**
 * Identity-plus-position equality: (id, title)
 */
export function isSameBook(a: Book, b: Book): boolean {
  return a.id === b.id && a.title === b.title;
}

/**
 * Identity-plus-position equality: (id, bookId, pageNumber)
 */
export function isSamePage(a: Page, b: Page): boolean {
  return (
    a.id === b.id && a.bookId === b.bookId && a.pageNumber === b.pageNumber
  );
}

/**
 * Dedup key of a book: SHA-256 (hex) over every page's content followed by a newline.
 */
export function computeContentHash(pages: Pick<Page, "content">[]): string {
  const digest = createHash("sha256");
  for (const page of pages) {
    digest.update(page.content + "\n", "utf8");
  }
  return digest.digest("hex");
}

export interface DraftBookInput {
  title: string;
  authorId?: string | null;
  contents: string[];
}

/**
 * Build a book that has not been persisted yet.
 */
export function createDraftBook({
  title,
  authorId = null,
  contents,
}: DraftBookInput): Book {
  const pages: Page[] = contents.map((content, index) => ({
    id: 0,
    bookId: 0,
    pageNumber: index + 1,
    content,
  }));

  return {
    id: 0,
    title,
    hash: computeContentHash(pages),
    authorId,
    pages,
  };
}

export function cloneBook(book: Book): Book {
  return {
    ...book,
    pages: book.pages ? book.pages.map((page) => ({ ...page })) : null,
  };
}

export function sortPages(pages: Page[]): Page[] {
  return [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
}

export function formatSearchMatch(match: SearchMatch): string {
  return `Title: ${match.title}, Page: ${match.pageNumber}, Content: ${match.content}`;
}
