/**
 * libSQL schema for the relational backend. Every statement is idempotent.
 */
const SCHEMA_SQL = `
  -- Books table
  CREATE TABLE IF NOT EXISTS books (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    hash TEXT NOT NULL UNIQUE,
    author_id TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  -- Titles are unique per library, compared case-insensitively
  DROP INDEX IF EXISTS idx_books_title;
  CREATE UNIQUE INDEX IF NOT EXISTS idx_books_title_lower ON books(lower(title));

  -- Pages table
  CREATE TABLE IF NOT EXISTS pages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    book_id INTEGER NOT NULL REFERENCES books(id) ON DELETE CASCADE,
    page_number INTEGER NOT NULL,
    content TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_pages_book ON pages(book_id, page_number);
`;

export function schemaStatements(): string[] {
  return SCHEMA_SQL.split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
