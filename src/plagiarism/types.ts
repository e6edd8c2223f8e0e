import type { SearchHit } from "../report/schema.js";

/**
 * 外部网页检索。返回至多 `limit` 条结果；失败时抛出 `ProviderTransientError` / `ProviderPermanentError`。
 */
export interface SearchProvider {
  readonly name: string;
  search(query: string, ctx: { signal: AbortSignal; limit: number }): Promise<SearchHit[]>;
}

export type ChunkSearchOutcome = {
  chunkIndex: number;
  query: string;
  /** aborted：请求预算耗尽时尚未完成 */
  status: "ok" | "failed" | "aborted";
  hits: SearchHit[];
  error?: string;
};
