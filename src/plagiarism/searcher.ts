import type { AnalysisConfig } from "../config/index.js";
import type { AppLogger } from "../logger/logger.js";
import {
  ProviderAbortedError,
  ProviderPermanentError,
  describeError,
} from "../pipeline/errors.js";
import { callWithTimeout, retryTransient } from "../pipeline/providerCall.js";
import type { Chunk } from "../report/schema.js";
import { splitSentences } from "../analysis/textUtils.js";
import type { ChunkSearchOutcome, SearchProvider } from "./types.js";

/**
 * 长文档只抽样检索：等距取 `max` 个片段（总是包含第一个，以及最后一个）。
 */
export function selectChunksForSearch(chunks: Chunk[], max: number): Chunk[] {
  if (chunks.length <= max) return chunks;
  if (max <= 1) return chunks.slice(0, Math.max(0, max));
  const picked = new Set<number>();
  for (let i = 0; i < max; i += 1) {
    picked.add(Math.round((i * (chunks.length - 1)) / (max - 1)));
  }
  return Array.from(picked)
    .sort((a, b) => a - b)
    .map((i) => chunks[i]);
}

/**
 * 检索词：片段中最长的一句，按词边界截到 `maxChars`，外加双引号做精确短语检索。
 */
export function buildSearchQuery(chunkText: string, maxChars: number): string {
  const sentences = splitSentences(chunkText);
  let best = sentences.length ? sentences[0] : chunkText.trim();
  for (const s of sentences) if (s.length > best.length) best = s;

  let phrase = best.replace(/["“”]/g, "").replace(/\s+/g, " ").trim();
  if (phrase.length > maxChars) {
    const cut = phrase.slice(0, maxChars + 1);
    const lastSpace = cut.lastIndexOf(" ");
    phrase = (lastSpace > 0 ? cut.slice(0, lastSpace) : cut.slice(0, maxChars)).trim();
  }
  return `"${phrase}"`;
}

export type SearchChunksParams = {
  chunks: Chunk[];
  provider: SearchProvider;
  config: AnalysisConfig;
  logger: AppLogger;
  signal?: AbortSignal;
};

/**
 * 逐片段检索，分批并发（每批 `fanOut` 个，`Promise.allSettled`）。
 *
 * 单个片段失败只记为“无匹配”；永久性错误后本次请求不再调用该检索服务；
 * 请求被中止后不再发起新批次，未完成的片段记为 aborted。
 */
export async function searchChunks(params: SearchChunksParams): Promise<ChunkSearchOutcome[]> {
  const { provider, config, logger: log, signal } = params;
  const { fanOut, resultsPerQuery, maxQueryChars } = config.search;
  const outcomes: ChunkSearchOutcome[] = [];
  let providerDisabled = false;

  const searchOne = async (chunk: Chunk): Promise<ChunkSearchOutcome> => {
    const query = buildSearchQuery(chunk.text, maxQueryChars);
    if (providerDisabled) {
      return { chunkIndex: chunk.index, query, status: "failed", hits: [], error: "provider disabled" };
    }
    try {
      const hits = await retryTransient(
        () =>
          callWithTimeout({
            provider: provider.name,
            timeoutMs: config.timeouts.providerTimeoutMs,
            signal,
            run: (s) => provider.search(query, { signal: s, limit: resultsPerQuery }),
          }),
        { logger: log, provider: provider.name, retries: config.search.retries, signal }
      );
      return { chunkIndex: chunk.index, query, status: "ok", hits: hits.slice(0, resultsPerQuery) };
    } catch (err) {
      const error = describeError(err).message;
      if (err instanceof ProviderAbortedError) {
        return { chunkIndex: chunk.index, query, status: "aborted", hits: [], error };
      }
      if (err instanceof ProviderPermanentError) providerDisabled = true;
      log.warn("Chunk search failed; recorded as no matches", { chunkIndex: chunk.index, error });
      return { chunkIndex: chunk.index, query, status: "failed", hits: [], error };
    }
  };

  for (let bi = 0; bi < params.chunks.length; bi += fanOut) {
    const batch = params.chunks.slice(bi, bi + fanOut);
    if (signal?.aborted) {
      for (const chunk of batch) {
        outcomes.push({
          chunkIndex: chunk.index,
          query: buildSearchQuery(chunk.text, maxQueryChars),
          status: "aborted",
          hits: [],
        });
      }
      continue;
    }

    const settled = await Promise.allSettled(batch.map(searchOne));
    settled.forEach((r, j) => {
      if (r.status === "fulfilled") {
        outcomes.push(r.value);
      } else {
        const chunk = batch[j];
        outcomes.push({
          chunkIndex: chunk.index,
          query: buildSearchQuery(chunk.text, maxQueryChars),
          status: "failed",
          hits: [],
          error: describeError(r.reason).message,
        });
      }
    });
  }

  return outcomes;
}
