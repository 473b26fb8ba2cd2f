import type { Book } from "@/types/book";

export const ANALYSIS_METHODS = ["Paper", "PMI", "PKL", "TF-IDF", "Transliteration"] as const;

export type AnalysisMethod = (typeof ANALYSIS_METHODS)[number];

/**
 * Pure text analysis over a book's pages, rendered as a report.
 */
export interface Analyzer {
  analyze(book: Book): string;
}

export type AnalyzerFactory = () => Analyzer;

export type AnalyzerFactories = Record<AnalysisMethod, AnalyzerFactory>;

export interface ScoredTerm {
  term: string;
  score: number;
}
