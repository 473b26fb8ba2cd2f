import type { Book } from "@/types/book";
import type { AnalysisMethod, ScoredTerm } from "./types";

export const DEFAULT_TOP_N = 10;

// Letters with their combining marks (Arabic diacritics) and digits
const WORD_PATTERN = /[\p{L}\p{M}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

/** Token list per page, in page order */
export function tokenizePages(book: Book): string[][] {
  return [...(book.pages ?? [])]
    .sort((a, b) => a.pageNumber - b.pageNumber)
    .map((page) => tokenize(page.content));
}

export function countOccurrences(items: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return counts;
}

/** Contiguous n-word phrases within one page */
export function ngrams(tokens: string[], size: number): string[] {
  const result: string[] = [];
  for (let i = 0; i + size <= tokens.length; i++) {
    result.push(tokens.slice(i, i + size).join(" "));
  }
  return result;
}

/**
 * Highest scores first; ties broken alphabetically so reports are stable.
 */
export function rankTop(scores: Map<string, number>, limit: number = DEFAULT_TOP_N): ScoredTerm[] {
  return [...scores.entries()]
    .map(([term, score]) => ({ term, score }))
    .sort((a, b) => b.score - a.score || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
    .slice(0, limit);
}

export function formatReport(
  method: AnalysisMethod,
  title: string,
  entries: ScoredTerm[],
  formatScore: (score: number) => string = (score) => score.toFixed(4)
): string {
  const lines = [`${method} report for "${title}"`];
  if (entries.length === 0) {
    lines.push("  (no results)");
  }
  for (const entry of entries) {
    lines.push(`  ${entry.term}: ${formatScore(entry.score)}`);
  }
  return lines.join("\n");
}
