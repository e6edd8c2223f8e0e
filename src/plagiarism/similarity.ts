import type { AnalysisConfig } from "../config/index.js";
import type { Chunk, PlagiarismResult, SourceMatch } from "../report/schema.js";
import { ngrams, round2, tokenizeWords } from "../analysis/textUtils.js";
import type { ChunkSearchOutcome } from "./types.js";

export type SimilarityParams = Pick<AnalysisConfig["similarity"], "shingleSize" | "containmentWeight">;

/**
 * 词 n-gram 相似度（0..100，对称）：
 * `100 · (w · |A∩B| / min(|A|,|B|) + (1 − w) · |A∩B| / |A∪B|)`。
 *
 * 检索摘要通常比片段短，所以以包含度为主、Jaccard 为辅。
 * 任何一侧不足 n 个词时退化为更短的 n-gram，且只计 Jaccard：几个常见词被长文本包含不算相似。
 */
export function similarity(a: string, b: string, params: SimilarityParams): number {
  const ta = tokenizeWords(a);
  const tb = tokenizeWords(b);
  const n = Math.min(params.shingleSize, ta.length, tb.length);
  if (n <= 0) return 0;
  const degenerate = n < params.shingleSize;

  const sa = new Set(ngrams(ta, n));
  const sb = new Set(ngrams(tb, n));
  let inter = 0;
  for (const g of sa) if (sb.has(g)) inter += 1;
  if (!inter) return 0;

  const overlap = inter / Math.min(sa.size, sb.size);
  const jaccard = inter / (sa.size + sb.size - inter);
  const w = degenerate ? 0 : params.containmentWeight;
  return round2(100 * (w * overlap + (1 - w) * jaccard));
}

export function compareMatches(a: SourceMatch, b: SourceMatch): number {
  return b.similarity - a.similarity || a.chunkIndex - b.chunkIndex;
}

/**
 * 汇总检索结果：
 * - 每个片段只保留相似度 ≥ `minRelevance` 的最佳一条；
 * - 总分 = 已检索片段按字符长度加权的最佳分均值（无匹配 / 检索失败记 0，未完成的不计入）；
 * - 来源按 URL 去重（保留最高分），按相似度降序、片段序号升序，截取前 `maxSources` 条；
 * - 有片段失败或未完成时状态为 partial，此时 0 分不代表“未发现抄袭”。
 */
export function scorePlagiarism(params: {
  chunks: Chunk[];
  outcomes: ChunkSearchOutcome[];
  config: AnalysisConfig;
}): PlagiarismResult {
  const cfg = params.config.similarity;
  const byIndex = new Map(params.chunks.map((c) => [c.index, c]));

  let weighted = 0;
  let totalLen = 0;
  const matches: SourceMatch[] = [];

  for (const outcome of params.outcomes) {
    const chunk = byIndex.get(outcome.chunkIndex);
    if (!chunk || outcome.status === "aborted") continue;
    totalLen += chunk.text.length;

    let best: SourceMatch | undefined;
    for (const hit of outcome.hits) {
      const s = similarity(chunk.text, hit.snippet, cfg);
      if (s < cfg.minRelevance) continue;
      if (!best || s > best.similarity) {
        best = { ...hit, similarity: s, chunkIndex: chunk.index };
      }
    }
    if (best) {
      weighted += chunk.text.length * best.similarity;
      matches.push(best);
    }
  }

  const dedup = new Map<string, SourceMatch>();
  for (const m of matches) {
    const cur = dedup.get(m.url);
    if (!cur || compareMatches(m, cur) < 0) dedup.set(m.url, m);
  }
  const sources = Array.from(dedup.values()).sort(compareMatches).slice(0, cfg.maxSources);

  const checked = params.outcomes.filter((o) => o.status === "ok").length;
  const failed = params.outcomes.filter((o) => o.status === "failed").length;
  const aborted = params.outcomes.filter((o) => o.status === "aborted").length;

  return {
    score: totalLen ? round2(weighted / totalLen) : 0,
    sources,
    status: aborted || failed ? "partial" : "complete",
    chunksTotal: params.chunks.length,
    chunksChecked: checked,
    chunksFailed: failed,
  };
}
