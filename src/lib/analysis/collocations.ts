import type { Analyzer, AnalysisMethod } from "./types";
import {
  DEFAULT_TOP_N,
  countOccurrences,
  formatReport,
  ngrams,
  rankTop,
  tokenizePages,
} from "./textStats";
import type { Book } from "@/types/book";

/** Bigrams seen fewer times than this are too sparse to score */
export const MIN_BIGRAM_COUNT = 2;

interface BigramStats {
  unigrams: Map<string, number>;
  unigramTotal: number;
  bigrams: Map<string, number>;
  bigramTotal: number;
}

function collectBigramStats(book: Book): BigramStats {
  const pages = tokenizePages(book);
  const pairs = pages.flatMap((tokens) => ngrams(tokens, 2));
  return {
    unigrams: countOccurrences(pages.flat()),
    unigramTotal: pages.reduce((sum, tokens) => sum + tokens.length, 0),
    bigrams: countOccurrences(pairs),
    bigramTotal: pairs.length,
  };
}

type BigramScore = (pxy: number, px: number, py: number) => number;

function createBigramAnalyzer(
  method: AnalysisMethod,
  scoreOf: BigramScore,
  limit: number
): Analyzer {
  return {
    analyze(book) {
      const stats = collectBigramStats(book);
      const scores = new Map<string, number>();

      for (const [pair, count] of stats.bigrams) {
        if (count < MIN_BIGRAM_COUNT) continue;
        const [x, y] = pair.split(" ");
        const pxy = count / stats.bigramTotal;
        const px = (stats.unigrams.get(x) ?? 0) / stats.unigramTotal;
        const py = (stats.unigrams.get(y) ?? 0) / stats.unigramTotal;
        scores.set(pair, scoreOf(pxy, px, py));
      }
      return formatReport(method, book.title, rankTop(scores, limit));
    },
  };
}

/** Pointwise mutual information of adjacent words: log2(p(xy) / (p(x) p(y))) */
export function createPmiAnalyzer(limit: number = DEFAULT_TOP_N): Analyzer {
  return createBigramAnalyzer("PMI", (pxy, px, py) => Math.log2(pxy / (px * py)), limit);
}

/** PMI weighted by the bigram's probability: p(xy) * log2(p(xy) / (p(x) p(y))) */
export function createPklAnalyzer(limit: number = DEFAULT_TOP_N): Analyzer {
  return createBigramAnalyzer("PKL", (pxy, px, py) => pxy * Math.log2(pxy / (px * py)), limit);
}
