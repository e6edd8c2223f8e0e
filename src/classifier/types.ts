export type ClassifierOutput = {
  probability: number; // 0..100
  label: string;
  rawConfidence: number | null;
  metrics: Record<string, number>;
};

/**
 * 外部 AI 文本分类器。
 *
 * - `llm`：通用大模型按提示词打分（主 / 备）；
 * - `specialized`：专用检测服务，除在链尾兜底外，还可为其它结果做佐证。
 *
 * 失败时抛出 `ProviderTransientError` / `ProviderPermanentError`。
 */
export interface ClassifierProvider {
  readonly name: string;
  readonly kind: "llm" | "specialized";
  classify(excerpt: string, ctx: { signal: AbortSignal }): Promise<ClassifierOutput>;
}
