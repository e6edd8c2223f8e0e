/**
 * 分析流水线的错误分类。
 *
 * - `InputError` 及其子类：直接返回给调用方，流水线不运行、不发起外部调用；
 * - `ProviderTransientError`：超时、限流、5xx、响应格式异常，可重试一次；
 * - `ProviderPermanentError`：鉴权/配置错误，本次请求内不再调用该供应商；
 * - `PipelineTimeoutError`：整体预算耗尽且两个分支都没有产出。
 */
export class AnalysisError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputError extends AnalysisError {
  constructor(message: string, code = "INVALID_INPUT") {
    super(code, message);
  }
}

export class InsufficientTextError extends InputError {
  readonly wordCount: number;
  readonly minWords: number;

  constructor(wordCount: number, minWords: number) {
    super(
      `Insufficient text: ${wordCount} words, at least ${minWords} required`,
      "INSUFFICIENT_TEXT"
    );
    this.wordCount = wordCount;
    this.minWords = minWords;
  }
}

export class ExtractionError extends InputError {
  constructor(message: string) {
    super(message, "EXTRACTION_FAILED");
  }
}

export class ProviderTransientError extends AnalysisError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super("PROVIDER_TRANSIENT", `[${provider}] ${message}`, options);
    this.provider = provider;
  }
}

export class ProviderPermanentError extends AnalysisError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super("PROVIDER_PERMANENT", `[${provider}] ${message}`, options);
    this.provider = provider;
  }
}

/** 请求级 AbortSignal 触发（预算耗尽）时，供应商调用以此结束。 */
export class ProviderAbortedError extends AnalysisError {
  readonly provider: string;

  constructor(provider: string) {
    super("PROVIDER_ABORTED", `[${provider}] request budget exhausted`);
    this.provider = provider;
  }
}

export class PipelineTimeoutError extends AnalysisError {
  readonly budgetMs: number;

  constructor(budgetMs: number) {
    super("PIPELINE_TIMEOUT", `Analysis did not finish within ${budgetMs}ms`);
    this.budgetMs = budgetMs;
  }
}

export function describeError(err: unknown): { name: string; message: string; code?: string } {
  if (err instanceof AnalysisError) return { name: err.name, message: err.message, code: err.code };
  if (err instanceof Error) return { name: err.name, message: err.message };
  return { name: "UnknownError", message: String(err) };
}
