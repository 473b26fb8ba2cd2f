import type { Analyzer } from "./types";
import { DEFAULT_TOP_N, countOccurrences, formatReport, rankTop, tokenizePages } from "./textStats";

/**
 * TF-IDF with pages as documents: score(t) = sum over pages of tf(t, page) * ln(N / df(t)),
 * where tf is the term's share of the page's tokens. Terms found on every page score 0
 * and are left out.
 */
export function createTfIdfAnalyzer(limit: number = DEFAULT_TOP_N): Analyzer {
  return {
    analyze(book) {
      const pages = tokenizePages(book).filter((tokens) => tokens.length > 0);
      const documentFrequency = countOccurrences(pages.flatMap((tokens) => [...new Set(tokens)]));

      const scores = new Map<string, number>();
      for (const tokens of pages) {
        for (const [term, count] of countOccurrences(tokens)) {
          const idf = Math.log(pages.length / (documentFrequency.get(term) ?? 1));
          const score = (count / tokens.length) * idf;
          scores.set(term, (scores.get(term) ?? 0) + score);
        }
      }

      for (const [term, score] of scores) {
        if (score <= 0) scores.delete(term);
      }
      return formatReport("TF-IDF", book.title, rankTop(scores, limit));
    },
  };
}
