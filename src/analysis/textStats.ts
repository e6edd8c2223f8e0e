import { InsufficientTextError } from "../pipeline/errors.js";
import type { TextMetrics } from "../report/schema.js";
import {
  countSyllables,
  mean,
  movingAverageTtr,
  ngramRepeatRatio,
  round2,
  splitSentences,
  splitWords,
  tokenizeWords,
  variance,
} from "./textUtils.js";

const TTR_WINDOW = 50;
const READABILITY_WINDOW = 3;

type Readability = { readingEase: number; grade: number };

function readability(words: string[], sentenceCount: number): Readability {
  if (!words.length || !sentenceCount) return { readingEase: 0, grade: 0 };
  const syllables = words.reduce((a, w) => a + countSyllables(w), 0);
  const wordsPerSentence = words.length / sentenceCount;
  const syllablesPerWord = syllables / words.length;
  return {
    readingEase: 206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord,
    grade: 0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59,
  };
}

/** 相邻 3 句为一个窗口，各窗口 Flesch Reading Ease 的标准差。 */
function readabilitySpread(sentences: string[]): number {
  if (sentences.length < READABILITY_WINDOW + 1) return 0;
  const scores: number[] = [];
  for (let i = 0; i <= sentences.length - READABILITY_WINDOW; i += 1) {
    const windowWords = sentences.slice(i, i + READABILITY_WINDOW).flatMap(splitWords);
    scores.push(readability(windowWords, READABILITY_WINDOW).readingEase);
  }
  return Math.sqrt(variance(scores));
}

/**
 * 计算文本统计量与可读性指标（纯函数，结果确定）。
 *
 * 词数少于 `minWords`（以及 0 词）时抛出 `InsufficientTextError`。
 */
export function computeTextMetrics(text: string, opts: { minWords: number }): TextMetrics {
  const words = splitWords(text);
  if (words.length === 0 || words.length < opts.minWords) {
    throw new InsufficientTextError(words.length, opts.minWords);
  }

  const sentences = splitSentences(text);
  const sentenceCount = Math.max(1, sentences.length);
  const sentenceLens = sentences.length ? sentences.map((s) => splitWords(s).length) : [words.length];
  const avgLen = mean(sentenceLens);
  const lenVariance = variance(sentenceLens);

  const tokens = tokenizeWords(text);
  const { readingEase, grade } = readability(words, sentenceCount);

  return {
    totalWords: words.length,
    totalCharacters: text.length,
    totalSentences: sentenceCount,
    avgSentenceLength: round2(avgLen),
    sentenceLengthVariance: round2(lenVariance),
    sentenceLengthCv: round2(avgLen ? Math.sqrt(lenVariance) / avgLen : 0),
    uniqueWordRatio: round2(tokens.length ? new Set(tokens).size / tokens.length : 0),
    windowedUniqueWordRatio: round2(movingAverageTtr(tokens, TTR_WINDOW)),
    trigramRepeatRatio: round2(ngramRepeatRatio(tokens, 3)),
    fleschReadingEase: round2(readingEase),
    fleschKincaidGrade: round2(grade),
    readabilitySpread: round2(readabilitySpread(sentences)),
  };
}
