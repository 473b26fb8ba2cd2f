import type { Analyzer } from "./types";
import {
  DEFAULT_TOP_N,
  countOccurrences,
  formatReport,
  ngrams,
  rankTop,
  tokenizePages,
} from "./textStats";

export const MIN_PHRASE_COUNT = 2;

/**
 * Quality phrase mining: repeated 2- and 3-word phrases scored by count * length.
 */
export function createPhraseAnalyzer(limit: number = DEFAULT_TOP_N): Analyzer {
  return {
    analyze(book) {
      const pages = tokenizePages(book);
      const scores = new Map<string, number>();

      for (const size of [2, 3]) {
        const counts = countOccurrences(pages.flatMap((tokens) => ngrams(tokens, size)));
        for (const [phrase, count] of counts) {
          if (count >= MIN_PHRASE_COUNT) scores.set(phrase, count * size);
        }
      }
      return formatReport("Paper", book.title, rankTop(scores, limit), (score) =>
        String(score)
      );
    },
  };
}
