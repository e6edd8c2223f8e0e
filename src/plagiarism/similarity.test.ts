import { describe, it, expect } from "vitest";
import { DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig } from "../config/index.js";
import type { Chunk } from "../report/schema.js";
import { scorePlagiarism, similarity } from "./similarity.js";
import type { ChunkSearchOutcome } from "./types.js";

const params = DEFAULT_ANALYSIS_CONFIG.similarity;

function chunk(index: number, text: string): Chunk {
  return { index, text, start: 0, end: text.length };
}

function ok(chunkIndex: number, hits: Array<{ url: string; snippet: string }>): ChunkSearchOutcome {
  return {
    chunkIndex,
    query: "q",
    status: "ok",
    hits: hits.map((h) => ({ title: h.url, ...h })),
  };
}

describe("similarity", () => {
  it("scores an exact duplicate at 100 and unrelated text at 0", () => {
    const a = "The committee approved the budget after a long debate about school funding.";
    expect(similarity(a, a, params)).toBe(100);
    expect(similarity(a, "Penguins huddle together through the polar night to keep warm.", params)).toBe(0);
  });

  it("ignores case and punctuation", () => {
    expect(similarity("Hello, brave new world!", "hello brave new world", params)).toBe(100);
  });

  it("weights containment of the shorter text", () => {
    const chunkText = "the quick brown fox jumps over the lazy dog near the river bank";
    const snippet = "quick brown fox jumps over";
    expect(similarity(chunkText, snippet, params)).toBeCloseTo(85.45, 5);
    expect(similarity(snippet, chunkText, params)).toBe(similarity(chunkText, snippet, params));
  });

  it("shrinks the shingle size for very short texts", () => {
    expect(similarity("hello world", "hello world", params)).toBe(100);
    expect(similarity("", "hello world", params)).toBe(0);
  });

  it("scores a few common words found inside a long text by Jaccard only", () => {
    const text = "The results of the study show that the climate of the region changed over three decades.";
    expect(similarity(text, "of the", params)).toBe(7.14);
    expect(similarity(text, "of the", params)).toBeLessThan(params.minRelevance);
  });
});

describe("scorePlagiarism", () => {
  const config = DEFAULT_ANALYSIS_CONFIG;
  const c0 = chunk(0, "alpha beta gamma delta epsilon");
  const c1 = chunk(1, "one two three four five sixty!");

  it("weights each chunk's best match by chunk length", () => {
    const result = scorePlagiarism({
      chunks: [c0, c1],
      outcomes: [
        ok(0, [
          { url: "https://example.org/unrelated", snippet: "nothing in common at all here" },
          { url: "https://example.org/greek", snippet: c0.text },
        ]),
        ok(1, [{ url: "https://example.org/other", snippet: "completely different words here" }]),
      ],
      config,
    });
    expect(result.score).toBe(50);
    expect(result.status).toBe("complete");
    expect(result.chunksChecked).toBe(2);
    expect(result.chunksFailed).toBe(0);
    expect(result.sources).toEqual([
      {
        title: "https://example.org/greek",
        url: "https://example.org/greek",
        snippet: c0.text,
        similarity: 100,
        chunkIndex: 0,
      },
    ]);
  });

  it("counts failed searches as no match and leaves aborted ones out", () => {
    const c2 = chunk(2, "a chunk that never got searched");
    const result = scorePlagiarism({
      chunks: [c0, c1, c2],
      outcomes: [
        ok(0, [{ url: "https://example.org/greek", snippet: c0.text }]),
        { chunkIndex: 1, query: "q", status: "failed", hits: [], error: "boom" },
        { chunkIndex: 2, query: "q", status: "aborted", hits: [] },
      ],
      config,
    });
    expect(result.score).toBe(50);
    expect(result.status).toBe("partial");
    expect(result.chunksTotal).toBe(3);
    expect(result.chunksChecked).toBe(1);
    expect(result.chunksFailed).toBe(1);
  });

  it("deduplicates sources by URL keeping the best match", () => {
    const result = scorePlagiarism({
      chunks: [c0, c1],
      outcomes: [
        ok(0, [{ url: "https://example.org/shared", snippet: c0.text }]),
        ok(1, [
          {
            url: "https://example.org/shared",
            snippet: "one two three four five sixty! plus extra words appended at the end",
          },
        ]),
      ],
      config,
    });
    expect(result.sources).toHaveLength(1);
    expect(result.sources[0].chunkIndex).toBe(0);
    expect(result.sources[0].similarity).toBe(100);
  });

  it("drops matches below the relevance floor and caps the source list", () => {
    const strict = resolveAnalysisConfig({ similarity: { minRelevance: 101 } });
    const none = scorePlagiarism({
      chunks: [c0],
      outcomes: [ok(0, [{ url: "https://example.org/greek", snippet: c0.text }])],
      config: strict,
    });
    expect(none.score).toBe(0);
    expect(none.sources).toEqual([]);

    const capped = scorePlagiarism({
      chunks: [c0, c1],
      outcomes: [
        ok(0, [{ url: "https://example.org/a", snippet: c0.text }]),
        ok(1, [{ url: "https://example.org/b", snippet: c1.text }]),
      ],
      config: resolveAnalysisConfig({ similarity: { maxSources: 1 } }),
    });
    expect(capped.sources.map((s) => s.url)).toEqual(["https://example.org/a"]);
  });

  it("marks the result partial when every search failed", () => {
    const failed = (chunkIndex: number): ChunkSearchOutcome => ({
      chunkIndex,
      query: "q",
      status: "failed",
      hits: [],
      error: "quota exceeded",
    });
    const c2 = chunk(2, "red orange yellow green blue");
    const result = scorePlagiarism({ chunks: [c0, c1, c2], outcomes: [failed(0), failed(1), failed(2)], config });

    expect(result).toEqual({
      score: 0,
      sources: [],
      status: "partial",
      chunksTotal: 3,
      chunksChecked: 0,
      chunksFailed: 3,
    });
  });

  it("scores zero when nothing was searched", () => {
    const result = scorePlagiarism({ chunks: [c0], outcomes: [], config });
    expect(result.score).toBe(0);
    expect(result.status).toBe("complete");
  });
});
