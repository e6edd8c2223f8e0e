import { z } from "zod";

/** 线性坡度的两端：`ai` 端得 1 分，`human` 端得 0 分。 */
export type RampBounds = { ai: number; human: number };

export type HeuristicWeights = {
  uniformity: number;
  repetition: number;
  smoothness: number;
};

export type HeuristicConfig = {
  weights: HeuristicWeights;
  sentenceLengthCv: RampBounds;
  windowedUniqueWordRatio: RampBounds;
  trigramRepeatRatio: RampBounds;
  readabilitySpread: RampBounds;
  /** 句子数低于此值时，均匀度与平滑度取中性 0.5 */
  minSentences: number;
};

export type RiskThresholds = {
  /** ai 概率 > aiHigh：高风险、判为 AI 生成、likely_ai */
  aiHigh: number;
  /** ai 概率 > aiMedium：中风险；≤ aiMedium：likely_human */
  aiMedium: number;
  plagiarismHigh: number;
  /** 抄袭分 > plagiarismMedium：中风险、判为抄袭 */
  plagiarismMedium: number;
};

export type AnalysisConfig = {
  minWords: number;
  chunking: { minChunkChars: number; maxChunkChars: number };
  search: {
    maxChunksSearched: number;
    fanOut: number;
    resultsPerQuery: number;
    maxQueryChars: number;
    retries: number;
  };
  timeouts: { providerTimeoutMs: number; requestTimeoutMs: number };
  cache: { ttlMs: number; maxEntries: number };
  thresholds: RiskThresholds;
  heuristic: HeuristicConfig;
  fusion: { classifierWeight: number; agreementTolerance: number };
  classifier: { excerptChars: number; corroborate: boolean; retries: number };
  similarity: {
    shingleSize: number;
    containmentWeight: number;
    minRelevance: number;
    maxSources: number;
  };
};

export type AnalysisConfigOverrides = {
  minWords?: number;
  chunking?: Partial<AnalysisConfig["chunking"]>;
  search?: Partial<AnalysisConfig["search"]>;
  timeouts?: Partial<AnalysisConfig["timeouts"]>;
  cache?: Partial<AnalysisConfig["cache"]>;
  thresholds?: Partial<RiskThresholds>;
  heuristic?: Partial<Omit<HeuristicConfig, "weights">> & { weights?: Partial<HeuristicWeights> };
  fusion?: Partial<AnalysisConfig["fusion"]>;
  classifier?: Partial<AnalysisConfig["classifier"]>;
  similarity?: Partial<AnalysisConfig["similarity"]>;
};

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  minWords: 50,
  chunking: { minChunkChars: 80, maxChunkChars: 200 },
  search: { maxChunksSearched: 5, fanOut: 3, resultsPerQuery: 3, maxQueryChars: 128, retries: 1 },
  timeouts: { providerTimeoutMs: 15_000, requestTimeoutMs: 60_000 },
  cache: { ttlMs: 24 * HOUR_MS, maxEntries: 500 },
  thresholds: { aiHigh: 60, aiMedium: 40, plagiarismHigh: 50, plagiarismMedium: 30 },
  heuristic: {
    weights: { uniformity: 0.4, repetition: 0.3, smoothness: 0.3 },
    sentenceLengthCv: { ai: 0.25, human: 0.55 },
    windowedUniqueWordRatio: { ai: 0.35, human: 0.6 },
    trigramRepeatRatio: { ai: 0.15, human: 0.02 },
    readabilitySpread: { ai: 8, human: 25 },
    minSentences: 3,
  },
  fusion: { classifierWeight: 0.7, agreementTolerance: 20 },
  classifier: { excerptChars: 2000, corroborate: true, retries: 1 },
  similarity: { shingleSize: 3, containmentWeight: 0.8, minRelevance: 35, maxSources: 10 },
};

/**
 * 在默认值（或给定 base）之上按分组合并覆盖项，并做基本一致性校验。
 */
export function resolveAnalysisConfig(
  overrides: AnalysisConfigOverrides = {},
  base: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): AnalysisConfig {
  const cfg: AnalysisConfig = {
    minWords: overrides.minWords ?? base.minWords,
    chunking: mergeDefined(base.chunking, overrides.chunking),
    search: mergeDefined(base.search, overrides.search),
    timeouts: mergeDefined(base.timeouts, overrides.timeouts),
    cache: mergeDefined(base.cache, overrides.cache),
    thresholds: mergeDefined(base.thresholds, overrides.thresholds),
    heuristic: {
      ...mergeDefined(base.heuristic, omitWeights(overrides.heuristic)),
      weights: mergeDefined(base.heuristic.weights, overrides.heuristic?.weights),
    },
    fusion: mergeDefined(base.fusion, overrides.fusion),
    classifier: mergeDefined(base.classifier, overrides.classifier),
    similarity: mergeDefined(base.similarity, overrides.similarity),
  };

  if (cfg.minWords < 1) throw new Error("minWords must be at least 1");
  if (cfg.chunking.minChunkChars < 1 || cfg.chunking.minChunkChars > cfg.chunking.maxChunkChars) {
    throw new Error("chunking.minChunkChars must be within [1, maxChunkChars]");
  }
  if (cfg.thresholds.aiMedium > cfg.thresholds.aiHigh) {
    throw new Error("thresholds.aiMedium must not exceed thresholds.aiHigh");
  }
  if (cfg.thresholds.plagiarismMedium > cfg.thresholds.plagiarismHigh) {
    throw new Error("thresholds.plagiarismMedium must not exceed thresholds.plagiarismHigh");
  }
  if (cfg.fusion.classifierWeight < 0 || cfg.fusion.classifierWeight > 1) {
    throw new Error("fusion.classifierWeight must be within [0, 1]");
  }
  return cfg;
}

/** 只拷贝已定义的覆盖项（环境变量未设置时对应字段为 undefined）。 */
function mergeDefined<T extends object>(base: T, over: Partial<T> | undefined): T {
  const out = { ...base };
  if (!over) return out;
  for (const key in over) {
    const value = over[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function omitWeights(
  h: AnalysisConfigOverrides["heuristic"]
): Partial<Omit<HeuristicConfig, "weights">> | undefined {
  if (!h) return undefined;
  const { weights: _weights, ...rest } = h;
  return rest;
}

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const optionalNumber = (schema: z.ZodNumber) => z.preprocess(blankToUndefined, schema.optional());

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const optionalBoolean = z.preprocess(
  blankToUndefined,
  z
    .enum(["true", "false", "1", "0"])
    .transform((v) => v === "true" || v === "1")
    .optional()
);

const envSchema = z.object({
  MIN_WORDS: optionalNumber(z.coerce.number().int().min(1)),
  MIN_CHUNK_CHARS: optionalNumber(z.coerce.number().int().min(1)),
  MAX_CHUNK_CHARS: optionalNumber(z.coerce.number().int().min(20)),
  MAX_CHUNKS_SEARCHED: optionalNumber(z.coerce.number().int().min(1).max(100)),
  SEARCH_FAN_OUT: optionalNumber(z.coerce.number().int().min(1).max(20)),
  SEARCH_RESULTS_PER_QUERY: optionalNumber(z.coerce.number().int().min(1).max(10)),
  SEARCH_RETRIES: optionalNumber(z.coerce.number().int().min(0).max(3)),
  PROVIDER_TIMEOUT_MS: optionalNumber(z.coerce.number().int().min(100)),
  REQUEST_TIMEOUT_MS: optionalNumber(z.coerce.number().int().min(100)),
  CACHE_TTL_HOURS: optionalNumber(z.coerce.number().positive()),
  CACHE_MAX_ENTRIES: optionalNumber(z.coerce.number().int().min(1)),
  AI_HIGH_THRESHOLD: optionalNumber(z.coerce.number().min(0).max(100)),
  AI_MEDIUM_THRESHOLD: optionalNumber(z.coerce.number().min(0).max(100)),
  PLAGIARISM_HIGH_THRESHOLD: optionalNumber(z.coerce.number().min(0).max(100)),
  PLAGIARISM_MEDIUM_THRESHOLD: optionalNumber(z.coerce.number().min(0).max(100)),
  CLASSIFIER_CORROBORATE: optionalBoolean,
  CLASSIFIER_RETRIES: optionalNumber(z.coerce.number().int().min(0).max(3)),
});

/**
 * 从环境变量读取分析配置（未设置的项取默认值）。非法取值直接抛出 ZodError，让进程在启动时失败。
 */
export function loadAnalysisConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const e = envSchema.parse(env);
  return resolveAnalysisConfig({
    minWords: e.MIN_WORDS,
    chunking: { minChunkChars: e.MIN_CHUNK_CHARS, maxChunkChars: e.MAX_CHUNK_CHARS },
    search: {
      maxChunksSearched: e.MAX_CHUNKS_SEARCHED,
      fanOut: e.SEARCH_FAN_OUT,
      resultsPerQuery: e.SEARCH_RESULTS_PER_QUERY,
      retries: e.SEARCH_RETRIES,
    },
    timeouts: {
      providerTimeoutMs: e.PROVIDER_TIMEOUT_MS,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    cache: {
      ttlMs: e.CACHE_TTL_HOURS === undefined ? undefined : e.CACHE_TTL_HOURS * HOUR_MS,
      maxEntries: e.CACHE_MAX_ENTRIES,
    },
    thresholds: {
      aiHigh: e.AI_HIGH_THRESHOLD,
      aiMedium: e.AI_MEDIUM_THRESHOLD,
      plagiarismHigh: e.PLAGIARISM_HIGH_THRESHOLD,
      plagiarismMedium: e.PLAGIARISM_MEDIUM_THRESHOLD,
    },
    classifier: { corroborate: e.CLASSIFIER_CORROBORATE, retries: e.CLASSIFIER_RETRIES },
  });
}

export type OpenAiCompatibleConfig = {
  apiKey: string;
  baseURL: string;
  model: string;
};

export type ProviderCredentials = {
  openai?: OpenAiCompatibleConfig;
  gemini?: OpenAiCompatibleConfig;
  gptzero?: { apiKey: string; baseURL: string };
  googleSearch?: { apiKey: string; engineId: string; baseURL: string };
};

const credentialsSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: optionalString,
  GEMINI_API_KEY: optionalString,
  GEMINI_BASE_URL: optionalString,
  GEMINI_MODEL: optionalString,
  GPTZERO_API_KEY: optionalString,
  GPTZERO_BASE_URL: optionalString,
  GOOGLE_SEARCH_API_KEY: optionalString,
  GOOGLE_SEARCH_ENGINE_ID: optionalString,
  GOOGLE_SEARCH_BASE_URL: optionalString,
});

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * 读取外部供应商凭据。缺少 key 的供应商视为“未配置”，不会进入调用链。
 */
export function loadProviderCredentialsFromEnv(env: NodeJS.ProcessEnv = process.env): ProviderCredentials {
  const e = credentialsSchema.parse(env);
  const creds: ProviderCredentials = {};

  if (e.OPENAI_API_KEY) {
    creds.openai = {
      apiKey: e.OPENAI_API_KEY,
      baseURL: trimSlash(e.OPENAI_BASE_URL ?? "https://api.openai.com/v1"),
      model: e.OPENAI_MODEL ?? "gpt-4o-mini",
    };
  }
  if (e.GEMINI_API_KEY) {
    creds.gemini = {
      apiKey: e.GEMINI_API_KEY,
      baseURL: trimSlash(e.GEMINI_BASE_URL ?? "https://generativelanguage.googleapis.com/v1beta/openai"),
      model: e.GEMINI_MODEL ?? "gemini-1.5-flash",
    };
  }
  if (e.GPTZERO_API_KEY) {
    creds.gptzero = {
      apiKey: e.GPTZERO_API_KEY,
      baseURL: trimSlash(e.GPTZERO_BASE_URL ?? "https://api.gptzero.me"),
    };
  }
  if (e.GOOGLE_SEARCH_API_KEY && e.GOOGLE_SEARCH_ENGINE_ID) {
    creds.googleSearch = {
      apiKey: e.GOOGLE_SEARCH_API_KEY,
      engineId: e.GOOGLE_SEARCH_ENGINE_ID,
      baseURL: trimSlash(e.GOOGLE_SEARCH_BASE_URL ?? "https://www.googleapis.com/customsearch/v1"),
    };
  }
  return creds;
}

export type ServerConfig = {
  port: number;
  maxUploadMb: number;
};

const serverEnvSchema = z.object({
  PORT: optionalNumber(z.coerce.number().int().min(0).max(65535)),
  MAX_UPLOAD_MB: optionalNumber(z.coerce.number().positive().max(200)),
});

export function loadServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const e = serverEnvSchema.parse(env);
  return { port: e.PORT ?? 8787, maxUploadMb: e.MAX_UPLOAD_MB ?? 20 };
}

/** 上传大小上限（字节）。multer 只接受整数字节，MB 可以是小数。 */
export function uploadLimitBytes(maxUploadMb: number): number {
  return Math.floor(maxUploadMb * 1024 * 1024);
}
