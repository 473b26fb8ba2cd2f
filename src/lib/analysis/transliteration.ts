import { z } from "zod";
import letters from "./transliteration.json";
import type { Analyzer } from "./types";

const SHADDA = "\u0651";

const LETTER_TABLE: Readonly<Record<string, string>> = z
  .record(z.string(), z.string())
  .parse(letters);

/**
 * Arabic script to plain Latin letters. A shadda doubles the consonant before it;
 * characters outside the table pass through unchanged.
 */
export function transliterate(text: string): string {
  let result = "";
  let previous = "";
  for (const char of text) {
    if (char === SHADDA) {
      result += previous;
      continue;
    }
    const mapped = LETTER_TABLE[char] ?? char;
    result += mapped;
    previous = mapped;
  }
  return result;
}

/**
 * Romanized text of every page, one line per page.
 */
export function createTransliterationAnalyzer(): Analyzer {
  return {
    analyze(book) {
      const lines = [`Transliteration report for "${book.title}"`];
      const pages = [...(book.pages ?? [])].sort((a, b) => a.pageNumber - b.pageNumber);
      if (pages.length === 0) {
        lines.push("  (no results)");
      }
      for (const page of pages) {
        lines.push(`  ${page.pageNumber}: ${transliterate(page.content)}`);
      }
      return lines.join("\n");
    },
  };
}
