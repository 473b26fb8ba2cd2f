import { ANALYSIS_METHODS, type AnalysisMethod, type AnalyzerFactories } from "./types";
import { createPklAnalyzer, createPmiAnalyzer } from "./collocations";
import { createPhraseAnalyzer } from "./phrases";
import { createTfIdfAnalyzer } from "./tfidf";
import { createTransliterationAnalyzer } from "./transliteration";

export type { AnalysisMethod, Analyzer, AnalyzerFactory, AnalyzerFactories } from "./types";
export { ANALYSIS_METHODS } from "./types";

export const defaultAnalyzerFactories: AnalyzerFactories = {
  Paper: () => createPhraseAnalyzer(),
  PMI: () => createPmiAnalyzer(),
  PKL: () => createPklAnalyzer(),
  "TF-IDF": () => createTfIdfAnalyzer(),
  Transliteration: () => createTransliterationAnalyzer(),
};

export function isAnalysisMethod(value: string): value is AnalysisMethod {
  return ANALYSIS_METHODS.some((method) => method === value);
}
