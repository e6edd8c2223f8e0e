export type RiskLevel = "low" | "medium" | "high";

export type Confidence = "low" | "medium" | "high";

export type AiVerdict = "likely_human" | "uncertain" | "likely_ai";

export type DetectionSource = "heuristic_only" | "classifier_primary" | "classifier_fallback";

export type TextMetrics = {
  totalWords: number;
  totalCharacters: number;
  totalSentences: number;
  avgSentenceLength: number;
  sentenceLengthVariance: number;
  /** 句长（词数）变异系数 = 标准差 / 均值 */
  sentenceLengthCv: number;
  uniqueWordRatio: number;
  /** 50 词滑动窗口的 type/token ratio，受文本长度影响较小 */
  windowedUniqueWordRatio: number;
  trigramRepeatRatio: number;
  fleschReadingEase: number;
  fleschKincaidGrade: number;
  /** 3 句滑动窗口 Flesch Reading Ease 的标准差（越小行文越“平滑”） */
  readabilitySpread: number;
};

export type HeuristicBreakdown = {
  score: number; // 0..100
  uniformity: number; // 0..1
  repetition: number; // 0..1
  smoothness: number; // 0..1
};

export type ClassifierFinding = {
  provider: string;
  probability: number; // 0..100
  label: string;
  rawConfidence: number | null;
  metrics: Record<string, number>;
  /** 专用检测服务的佐证结果（若启用且可用） */
  corroboration?: {
    provider: string;
    probability: number;
  };
};

type AiDetectionBase = {
  probability: number; // 0..100
  confidence: Confidence;
  verdict: AiVerdict;
  metrics: TextMetrics;
  heuristic: HeuristicBreakdown;
  /** 请求预算耗尽、分类器未返回时为 true（置信度已下调） */
  degraded: boolean;
};

/**
 * AI 检测结果：要么只有启发式，要么有分类器背书。
 * 用 `basis` 区分，调用方必须显式处理两种情况。
 */
export type AIDetectionResult =
  | (AiDetectionBase & { basis: "heuristic"; source: "heuristic_only" })
  | (AiDetectionBase & {
      basis: "classifier";
      source: "classifier_primary" | "classifier_fallback";
      classifier: ClassifierFinding;
    });

export type Chunk = {
  index: number;
  text: string;
  /** [start, end) 字符偏移 */
  start: number;
  end: number;
};

export type SearchHit = {
  title: string;
  url: string;
  snippet: string;
};

export type SourceMatch = SearchHit & {
  similarity: number; // 0..100
  chunkIndex: number;
};

export type PlagiarismStatus = "complete" | "partial" | "skipped";

export type PlagiarismResult = {
  score: number; // 0..100
  sources: SourceMatch[];
  status: PlagiarismStatus;
  chunksTotal: number;
  chunksChecked: number;
  chunksFailed: number;
  note?: string;
};

export type Verdict = {
  riskLevel: RiskLevel;
  aiGenerated: boolean;
  plagiarized: boolean;
  /** 面向用户的文字结论，两个信号并列陈述，不合成一个数值 */
  summary: string;
};

export type Report = {
  reportId: string;
  documentId: string;
  sourceName: string | null;
  analyzedAt: string;
  textStats: TextMetrics;
  aiDetection: AIDetectionResult;
  plagiarism: PlagiarismResult;
  overallVerdict: Verdict;
  completeness: {
    aiDetection: "complete" | "degraded";
    plagiarism: PlagiarismStatus;
  };
  /**
   * 固定输出的局限说明，避免用户把风险分当作定性结论。
   */
  limitations: string[];
};
