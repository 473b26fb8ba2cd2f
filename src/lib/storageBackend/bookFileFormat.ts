import { z } from "zod";
import type { Book } from "@/types/book";
import { createDraftBook } from "@/lib/bookUtils";

export const BOOK_RECORD_EXTENSION = ".json";
export const NOTE_EXTENSIONS = [".md", ".txt"] as const;

/** Non-empty lines per page when a plain-text note is split */
export const LINES_PER_PAGE = 20;

const AUTHOR_LINE_PREFIX = "**idauthor**: ";

const pageRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  bookId: z.number().int().nonnegative(),
  pageNumber: z.number().int().positive(),
  content: z.string(),
});

export const bookRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  title: z.string().min(1),
  hash: z.string().min(1),
  authorId: z.string().nullable(),
  degraded: z.boolean().optional(),
  pages: z.array(pageRecordSchema),
});

export type BookRecord = z.infer<typeof bookRecordSchema>;

export function toBookRecord(book: Book, degraded: boolean): BookRecord {
  const record: BookRecord = {
    id: book.id,
    title: book.title,
    hash: book.hash,
    authorId: book.authorId,
    pages: (book.pages ?? []).map((page) => ({ ...page })),
  };
  if (degraded) {
    record.degraded = true;
  }
  return record;
}

export function fromBookRecord(record: BookRecord): Book {
  return {
    id: record.id,
    title: record.title,
    hash: record.hash,
    authorId: record.authorId,
    pages: [...record.pages].sort((a, b) => a.pageNumber - b.pageNumber),
  };
}

export function serializeBookRecord(record: BookRecord): string {
  return JSON.stringify(record, null, 2) + "\n";
}

/**
 * Parse and validate a `.json` book record. Returns null when malformed.
 */
export function parseBookRecord(text: string): BookRecord | null {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  const result = bookRecordSchema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Read a plain-text note as an unpersisted book.
 *
 * An optional first line `**idauthor**: <id>` names the author. The remaining
 * non-empty lines are grouped into pages of {@link LINES_PER_PAGE}; blank lines
 * inside a page are kept.
 */
export function parseNoteText(title: string, text: string): Book {
  const lines = text.split(/\r?\n/);
  let authorId: string | null = null;

  if (lines.length > 0 && lines[0].startsWith(AUTHOR_LINE_PREFIX)) {
    authorId = lines[0].slice(AUTHOR_LINE_PREFIX.length).trim() || null;
    lines.shift();
  }

  const contents: string[] = [];
  let buffer = "";
  let lineCount = 0;

  for (const line of lines) {
    if (line.length === 0) {
      if (buffer.length > 0) buffer += "\n";
      continue;
    }
    buffer += line + "\n";
    lineCount++;
    if (lineCount >= LINES_PER_PAGE) {
      contents.push(buffer.trim());
      buffer = "";
      lineCount = 0;
    }
  }
  if (buffer.trim().length > 0) {
    contents.push(buffer.trim());
  }

  return createDraftBook({ title, authorId, contents });
}
