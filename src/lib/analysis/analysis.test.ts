import { describe, it, expect } from "vitest";
import { createDraftBook } from "@/lib/bookUtils";
import { ANALYSIS_METHODS, defaultAnalyzerFactories, isAnalysisMethod } from "./index";
import { createPklAnalyzer, createPmiAnalyzer } from "./collocations";
import { createPhraseAnalyzer } from "./phrases";
import { createTfIdfAnalyzer } from "./tfidf";
import { formatReport, ngrams, rankTop, tokenize } from "./textStats";
import { createTransliterationAnalyzer, transliterate } from "./transliteration";

function book(title: string, contents: string[]) {
  return createDraftBook({ title, contents });
}

describe("textStats", () => {
  it("should tokenize Latin and Arabic words in lower case", () => {
    expect(tokenize("Hello, World! مرحبا 2024")).toEqual(["hello", "world", "مرحبا", "2024"]);
  });

  it("should keep Arabic diacritics inside words", () => {
    expect(tokenize("كَتَبَ الدَّرْسَ")).toEqual(["كَتَبَ", "الدَّرْسَ"]);
  });

  it("should build contiguous n-grams", () => {
    expect(ngrams(["a", "b", "c"], 2)).toEqual(["a b", "b c"]);
    expect(ngrams(["a"], 2)).toEqual([]);
  });

  it("should rank by score and break ties alphabetically", () => {
    const scores = new Map([
      ["beta", 1],
      ["alpha", 1],
      ["gamma", 3],
    ]);
    expect(rankTop(scores, 2)).toEqual([
      { term: "gamma", score: 3 },
      { term: "alpha", score: 1 },
    ]);
  });

  it("should format an empty report", () => {
    expect(formatReport("PMI", "Empty", [])).toBe('PMI report for "Empty"\n  (no results)');
  });
});

describe("TF-IDF", () => {
  it("should score terms that distinguish pages", () => {
    const report = createTfIdfAnalyzer().analyze(
      book("Fruit", ["apple banana", "apple cherry"])
    );
    expect(report).toBe('TF-IDF report for "Fruit"\n  banana: 0.3466\n  cherry: 0.3466');
  });

  it("should report nothing for a single page", () => {
    expect(createTfIdfAnalyzer().analyze(book("One", ["just one page"]))).toBe(
      'TF-IDF report for "One"\n  (no results)'
    );
  });

  it("should honor the limit", () => {
    const report = createTfIdfAnalyzer(1).analyze(book("Fruit", ["apple banana", "apple cherry"]));
    expect(report.split("\n")).toEqual(['TF-IDF report for "Fruit"', "  banana: 0.3466"]);
  });
});

describe("collocations", () => {
  const city = book("City", ["new york new york big apple"]);

  it("should score repeated bigrams by PMI", () => {
    expect(createPmiAnalyzer().analyze(city)).toBe('PMI report for "City"\n  new york: 1.8480');
  });

  it("should weight PMI by probability for PKL", () => {
    expect(createPklAnalyzer().analyze(city)).toBe('PKL report for "City"\n  new york: 0.7392');
  });

  it("should not pair words across pages", () => {
    const split = book("Split", ["end", "start", "end", "start"]);
    expect(createPmiAnalyzer().analyze(split)).toBe('PMI report for "Split"\n  (no results)');
  });
});

describe("phrases", () => {
  it("should score repeated phrases by count times length", () => {
    expect(createPhraseAnalyzer().analyze(book("City", ["new york new york big apple"]))).toBe(
      'Paper report for "City"\n  new york: 4'
    );
  });
});

describe("transliteration", () => {
  it("should romanize Arabic letters and keep other characters", () => {
    expect(transliterate("كتاب")).toBe("ktab");
    expect(transliterate("Hello سلام!")).toBe("Hello slam!");
  });

  it("should double a consonant under shadda", () => {
    expect(transliterate("محمّد")).toBe("mhmmd");
  });

  it("should report each page in page order", () => {
    const report = createTransliterationAnalyzer().analyze(book("Kutub", ["كتاب", "قلم ٣"]));
    expect(report).toBe('Transliteration report for "Kutub"\n  1: ktab\n  2: qlm 3');
  });
});

describe("analysis registry", () => {
  it("should provide a factory for every method", () => {
    for (const method of ANALYSIS_METHODS) {
      expect(defaultAnalyzerFactories[method]().analyze(book("T", ["a"]))).toMatch(
        new RegExp(`^${method} report for "T"`)
      );
    }
  });

  it("should recognize method names exactly", () => {
    expect(isAnalysisMethod("TF-IDF")).toBe(true);
    expect(isAnalysisMethod("tf-idf")).toBe(false);
    expect(isAnalysisMethod("LDA")).toBe(false);
  });
});
