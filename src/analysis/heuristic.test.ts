import { describe, it, expect } from "vitest";
import { DEFAULT_ANALYSIS_CONFIG } from "../config/index.js";
import type { TextMetrics } from "../report/schema.js";
import { ramp, scoreHeuristic } from "./heuristic.js";

const cfg = DEFAULT_ANALYSIS_CONFIG.heuristic;

function metrics(overrides: Partial<TextMetrics> = {}): TextMetrics {
  return {
    totalWords: 300,
    totalCharacters: 1800,
    totalSentences: 15,
    avgSentenceLength: 20,
    sentenceLengthVariance: 16,
    sentenceLengthCv: 0.2,
    uniqueWordRatio: 0.5,
    windowedUniqueWordRatio: 0.3,
    trigramRepeatRatio: 0.2,
    fleschReadingEase: 65,
    fleschKincaidGrade: 10,
    readabilitySpread: 5,
    ...overrides,
  };
}

describe("ramp", () => {
  it("maps the ai end to 1 and the human end to 0", () => {
    const bounds = { ai: 0.25, human: 0.55 };
    expect(ramp(0.25, bounds)).toBe(1);
    expect(ramp(0.1, bounds)).toBe(1);
    expect(ramp(0.55, bounds)).toBe(0);
    expect(ramp(0.9, bounds)).toBe(0);
    expect(ramp(0.4, bounds)).toBeCloseTo(0.5, 10);
  });

  it("works when the ai end is the larger value", () => {
    expect(ramp(0.15, { ai: 0.15, human: 0.02 })).toBe(1);
    expect(ramp(0, { ai: 0.15, human: 0.02 })).toBe(0);
  });
});

describe("scoreHeuristic", () => {
  it("scores uniform, repetitive, smooth text at 100", () => {
    expect(scoreHeuristic(metrics(), cfg)).toEqual({
      score: 100,
      uniformity: 1,
      repetition: 1,
      smoothness: 1,
    });
  });

  it("scores varied, diverse, uneven text at 0", () => {
    const result = scoreHeuristic(
      metrics({
        sentenceLengthCv: 0.7,
        windowedUniqueWordRatio: 0.7,
        trigramRepeatRatio: 0,
        readabilitySpread: 30,
        fleschReadingEase: 95,
        fleschKincaidGrade: 3,
      }),
      cfg
    );
    expect(result).toEqual({ score: 0, uniformity: 0, repetition: 0, smoothness: 0 });
  });

  it("uses neutral structure scores for very short texts", () => {
    const result = scoreHeuristic(
      metrics({ totalSentences: 2, sentenceLengthCv: 0, windowedUniqueWordRatio: 0.7, trigramRepeatRatio: 0 }),
      cfg
    );
    expect(result.uniformity).toBe(0.5);
    expect(result.smoothness).toBe(0.5);
    expect(result.repetition).toBe(0);
    expect(result.score).toBe(35);
  });

  it("normalizes by the configured weights", () => {
    const onlyUniformity = { ...cfg, weights: { uniformity: 2, repetition: 0, smoothness: 0 } };
    const result = scoreHeuristic(metrics({ sentenceLengthCv: 0.55 }), onlyUniformity);
    expect(result.score).toBe(0);
  });

  it("is deterministic", () => {
    const m = metrics({ sentenceLengthCv: 0.37, windowedUniqueWordRatio: 0.52 });
    expect(scoreHeuristic(m, cfg)).toEqual(scoreHeuristic(m, cfg));
  });
});
