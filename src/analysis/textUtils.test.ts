import { describe, it, expect } from "vitest";
import {
  countSyllables,
  movingAverageTtr,
  ngramRepeatRatio,
  ngrams,
  normalizeText,
  splitSentences,
  tokenizeWords,
  variance,
} from "./textUtils.js";

describe("normalizeText", () => {
  it("unifies line endings, collapses spaces and blank lines", () => {
    expect(normalizeText("  a\r\n\r\n\r\n\r\nb \t c  ")).toBe("a\n\nb c");
  });

  it("drops spaces around newlines and non-breaking spaces", () => {
    expect(normalizeText("one \n two\u00A0\u00A0three")).toBe("one\ntwo three");
  });
});

describe("splitSentences", () => {
  it("splits after terminal punctuation, keeping closing quotes", () => {
    expect(splitSentences('He left. "Why?" she asked! Then quiet.')).toEqual([
      "He left.",
      '"Why?"',
      "she asked!",
      "Then quiet.",
    ]);
  });

  it("treats blank lines as boundaries and drops punctuation-only pieces", () => {
    expect(splitSentences("A heading\n\nBody text here. ...")).toEqual(["A heading", "Body text here."]);
  });
});

describe("tokenizeWords", () => {
  it("lowercases and strips surrounding punctuation", () => {
    expect(tokenizeWords('"Hello," World... 42!')).toEqual(["hello", "world", "42"]);
    expect(tokenizeWords("a — b")).toEqual(["a", "b"]);
  });
});

describe("countSyllables", () => {
  it.each([
    ["cat", 1],
    ["table", 2],
    ["make", 1],
    ["jumped", 1],
    ["wanted", 2],
    ["beautiful", 3],
  ])("%s has %i syllable(s)", (word, n) => {
    expect(countSyllables(word)).toBe(n);
  });
});

describe("n-gram helpers", () => {
  it("builds space-joined n-grams", () => {
    expect(ngrams(["a", "b", "c", "d"], 3)).toEqual(["a b c", "b c d"]);
  });

  it("counts repeated n-grams", () => {
    expect(ngramRepeatRatio(["a", "b", "c", "a", "b", "c"], 3)).toBe(0.25);
    expect(ngramRepeatRatio(["a", "b", "c"], 3)).toBe(0);
  });

  it("averages type/token ratio over a sliding window", () => {
    expect(movingAverageTtr(["a", "a", "b", "b"], 2)).toBeCloseTo(2 / 3, 10);
    expect(movingAverageTtr(["a", "a", "b"], 5)).toBeCloseTo(2 / 3, 10);
    expect(movingAverageTtr([], 5)).toBe(0);
  });

  it("uses population variance", () => {
    expect(variance([2, 4, 4, 4, 5, 5, 7, 9])).toBe(4);
  });
});
