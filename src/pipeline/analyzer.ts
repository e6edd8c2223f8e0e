import {
  loadAnalysisConfigFromEnv,
  loadProviderCredentialsFromEnv,
  type AnalysisConfig,
} from "../config/index.js";
import type { AppLogger } from "../logger/logger.js";
import { fuseAiDetection } from "../analysis/aiDetection.js";
import { scoreHeuristic } from "../analysis/heuristic.js";
import { computeTextMetrics } from "../analysis/textStats.js";
import { normalizeText } from "../analysis/textUtils.js";
import { ClassifierGateway, type GatewayResult } from "../classifier/gateway.js";
import { buildClassifierChain } from "../classifier/registry.js";
import { DefaultTextExtractor, type TextExtractor } from "../extraction/index.js";
import { chunkAll } from "../plagiarism/chunker.js";
import { buildSearchProvider } from "../plagiarism/googleSearch.js";
import { searchChunks, selectChunksForSearch } from "../plagiarism/searcher.js";
import { scorePlagiarism } from "../plagiarism/similarity.js";
import type { SearchProvider } from "../plagiarism/types.js";
import type { Chunk, PlagiarismResult, Report } from "../report/schema.js";
import { PipelineTimeoutError } from "./errors.js";
import { ReportCache, fingerprintText, systemClock, type Clock } from "./reportCache.js";
import { fuseVerdict } from "./verdict.js";

export type AnalyzeInput =
  | { text: string; sourceName?: string }
  | { bytes: Uint8Array; filename: string };

export type AnalyzeOptions = {
  /** 跳过缓存读取（结果仍会写入缓存） */
  bypassCache?: boolean;
  /** 请求级 logger（带 requestId） */
  logger?: AppLogger;
};

export type DocumentAnalyzerDeps = {
  config: AnalysisConfig;
  logger: AppLogger;
  classifiers: ClassifierGateway;
  /** 未配置检索服务时为 null，抄袭分支直接跳过 */
  searchProvider: SearchProvider | null;
  cache: ReportCache;
  extractor?: TextExtractor;
  clock?: Clock;
};

export const REPORT_LIMITATIONS: readonly string[] = [
  "Scores are risk signals, not proof: a high score does not establish that AI was used or that text was copied.",
  "Formulaic academic writing, heavy editing and non-native writing can raise the AI score; deep paraphrasing can lower both scores.",
  "Plagiarism search samples a limited number of passages against a public web index and cannot see paywalled or private sources.",
];

/** 截取前 `maxChars` 个字符并回退到词边界。 */
export function takeExcerpt(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const cut = text.slice(0, maxChars + 1);
  const lastSpace = cut.search(/\s\S*$/);
  return (lastSpace > 0 ? cut.slice(0, lastSpace) : text.slice(0, maxChars)).trim();
}

/**
 * 文档分析流水线：统计 → 启发式 / 分片 → （并发）分类器与检索 → 融合 → 缓存。
 *
 * 整个请求有墙钟预算（`timeouts.requestTimeoutMs`），到期后通过 AbortSignal 中止所有外部调用，
 * 用已完成的部分生成报告；两个分支都没有产出时抛出 `PipelineTimeoutError`。
 * 不完整的报告不写缓存。
 */
export class DocumentAnalyzer {
  private readonly config: AnalysisConfig;
  private readonly logger: AppLogger;
  private readonly classifiers: ClassifierGateway;
  private readonly searchProvider: SearchProvider | null;
  private readonly cache: ReportCache;
  private readonly extractor: TextExtractor;
  private readonly clock: Clock;

  constructor(deps: DocumentAnalyzerDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.classifiers = deps.classifiers;
    this.searchProvider = deps.searchProvider;
    this.cache = deps.cache;
    this.extractor = deps.extractor ?? new DefaultTextExtractor();
    this.clock = deps.clock ?? systemClock;
  }

  async analyze(input: AnalyzeInput, options: AnalyzeOptions = {}): Promise<Report> {
    const log = options.logger ?? this.logger;
    const t0 = Date.now();

    const { text, sourceName } = await this.resolveText(input);
    const normalized = normalizeText(text);
    const metrics = computeTextMetrics(normalized, { minWords: this.config.minWords });
    const fingerprint = fingerprintText(normalized);

    if (!options.bypassCache) {
      const cached = this.cache.get(fingerprint);
      if (cached) {
        log.info("Report cache hit", { fingerprint });
        return cached;
      }
    }

    log.info("Analysis started", {
      fingerprint,
      words: metrics.totalWords,
      chars: metrics.totalCharacters,
      classifiers: this.classifiers.providerNames,
      search: this.searchProvider?.name ?? null,
    });

    const heuristic = scoreHeuristic(metrics, this.config.heuristic);
    const chunks = chunkAll(normalized, this.config.chunking);

    const budgetMs = this.config.timeouts.requestTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), budgetMs);

    let classifier: GatewayResult;
    let plagiarism: PlagiarismResult;
    try {
      [classifier, plagiarism] = await Promise.all([
        this.runClassifierBranch(normalized, controller.signal, log),
        this.runPlagiarismBranch(chunks, controller.signal, log),
      ]);
    } finally {
      clearTimeout(timer);
    }

    const classifierCutShort = classifier.status === "unavailable" && classifier.aborted;
    const searchProducedNothing =
      plagiarism.status === "partial" && plagiarism.chunksChecked + plagiarism.chunksFailed === 0;
    if (classifierCutShort && searchProducedNothing) {
      log.error("Analysis budget exhausted with no branch finished", { fingerprint, budgetMs });
      throw new PipelineTimeoutError(budgetMs);
    }

    const aiDetection = fuseAiDetection({ metrics, heuristic, classifier, config: this.config });
    const overallVerdict = fuseVerdict(aiDetection.probability, plagiarism.score, this.config.thresholds);

    const report: Report = {
      reportId: fingerprint,
      documentId: fingerprint,
      sourceName: sourceName ?? null,
      analyzedAt: new Date(this.clock.now()).toISOString(),
      textStats: metrics,
      aiDetection,
      plagiarism,
      overallVerdict,
      completeness: {
        aiDetection: aiDetection.degraded ? "degraded" : "complete",
        plagiarism: plagiarism.status,
      },
      limitations: [...REPORT_LIMITATIONS],
    };

    const complete = !aiDetection.degraded && plagiarism.status !== "partial";
    if (complete) this.cache.set(fingerprint, report);

    log.info("Analysis finished", {
      fingerprint,
      ms: Date.now() - t0,
      aiProbability: aiDetection.probability,
      aiSource: aiDetection.source,
      plagiarismScore: plagiarism.score,
      riskLevel: overallVerdict.riskLevel,
      cached: complete,
    });
    return report;
  }

  getCachedReport(fingerprint: string): Report | undefined {
    return this.cache.get(fingerprint);
  }

  private async resolveText(input: AnalyzeInput): Promise<{ text: string; sourceName?: string }> {
    if ("text" in input) return { text: input.text, sourceName: input.sourceName };
    const text = await this.extractor.extract(input.bytes, input.filename);
    return { text, sourceName: input.filename };
  }

  private async runClassifierBranch(text: string, signal: AbortSignal, log: AppLogger): Promise<GatewayResult> {
    const t0 = Date.now();
    const excerpt = takeExcerpt(text, this.config.classifier.excerptChars);
    const result = await this.classifiers.classify(excerpt, { signal, logger: log });
    log.debug("Classifier branch done", {
      ms: Date.now() - t0,
      status: result.status,
      attempts: result.attempts,
    });
    return result;
  }

  private async runPlagiarismBranch(chunks: Chunk[], signal: AbortSignal, log: AppLogger): Promise<PlagiarismResult> {
    if (!this.searchProvider) {
      return {
        score: 0,
        sources: [],
        status: "skipped",
        chunksTotal: chunks.length,
        chunksChecked: 0,
        chunksFailed: 0,
        note: "Web search provider not configured",
      };
    }

    const t0 = Date.now();
    const selected = selectChunksForSearch(chunks, this.config.search.maxChunksSearched);
    const outcomes = await searchChunks({
      chunks: selected,
      provider: this.searchProvider,
      config: this.config,
      logger: log,
      signal,
    });
    const result = scorePlagiarism({ chunks, outcomes, config: this.config });
    log.debug("Plagiarism branch done", {
      ms: Date.now() - t0,
      chunksTotal: chunks.length,
      chunksSearched: selected.length,
      chunksChecked: result.chunksChecked,
      chunksFailed: result.chunksFailed,
      score: result.score,
    });
    return result;
  }
}

/**
 * 按环境变量装配分析器：分析配置、供应商凭据、分类器链、检索服务与缓存。
 */
export function createDocumentAnalyzerFromEnv(params: {
  logger: AppLogger;
  env?: NodeJS.ProcessEnv;
}): DocumentAnalyzer {
  const env = params.env ?? process.env;
  const config = loadAnalysisConfigFromEnv(env);
  const creds = loadProviderCredentialsFromEnv(env);
  const classifiers = new ClassifierGateway({
    providers: buildClassifierChain(creds, params.logger),
    logger: params.logger,
    timeoutMs: config.timeouts.providerTimeoutMs,
    retries: config.classifier.retries,
    corroborate: config.classifier.corroborate,
  });
  return new DocumentAnalyzer({
    config,
    logger: params.logger,
    classifiers,
    searchProvider: buildSearchProvider(creds),
    cache: new ReportCache({ ...config.cache, logger: params.logger }),
  });
}
