import type { AppLogger } from "../logger/logger.js";
import {
  ProviderAbortedError,
  ProviderPermanentError,
  ProviderTransientError,
  describeError,
} from "../pipeline/errors.js";
import { callWithTimeout, retryTransient } from "../pipeline/providerCall.js";
import type { ClassifierOutput, ClassifierProvider } from "./types.js";

export type ProviderAttempt = {
  provider: string;
  outcome: "ok" | "transient" | "permanent" | "aborted" | "failed";
  ms: number;
  error?: string;
};

export type GatewayResult =
  | {
      status: "available";
      provider: string;
      /** 在调用链中的位置，0 表示主供应商 */
      position: number;
      output: ClassifierOutput;
      corroboration?: { provider: string; output: ClassifierOutput };
      attempts: ProviderAttempt[];
    }
  | {
      status: "unavailable";
      /** 请求预算耗尽导致未完成（而不是所有供应商都失败） */
      aborted: boolean;
      attempts: ProviderAttempt[];
    };

export type ClassifierGatewayParams = {
  providers: ClassifierProvider[];
  logger: AppLogger;
  timeoutMs: number;
  retries: number;
  corroborate: boolean;
};

/**
 * 按顺序尝试分类器：主 → 备 → 专用服务。
 *
 * - 每次调用都有硬超时；暂时性错误最多重试 `retries` 次；
 * - 永久性错误记录日志，本次请求内跳过该供应商；
 * - 全部失败返回 `unavailable`，不抛错，上层退化为纯启发式。
 */
export class ClassifierGateway {
  private readonly providers: ClassifierProvider[];
  private readonly logger: AppLogger;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly corroborate: boolean;

  constructor(params: ClassifierGatewayParams) {
    this.providers = params.providers;
    this.logger = params.logger;
    this.timeoutMs = params.timeoutMs;
    this.retries = params.retries;
    this.corroborate = params.corroborate;
  }

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  async classify(excerpt: string, opts?: { signal?: AbortSignal; logger?: AppLogger }): Promise<GatewayResult> {
    const log = opts?.logger ?? this.logger;
    const signal = opts?.signal;
    const attempts: ProviderAttempt[] = [];
    const disabled = new Set<string>();

    for (let position = 0; position < this.providers.length; position += 1) {
      const provider = this.providers[position];
      const output = await this.attempt(provider, excerpt, { log, signal, attempts, disabled });
      if (output === "aborted") return { status: "unavailable", aborted: true, attempts };
      if (!output) continue;

      const corroboration = await this.corroborateWith(provider, excerpt, { log, signal, attempts, disabled });
      log.info("Classifier result", {
        provider: provider.name,
        position,
        probability: output.probability,
        corroboratedBy: corroboration?.provider,
      });
      return { status: "available", provider: provider.name, position, output, corroboration, attempts };
    }

    if (this.providers.length) {
      log.warn("All classifier providers failed; heuristic only", { attempts });
    }
    return { status: "unavailable", aborted: false, attempts };
  }

  private async corroborateWith(
    winner: ClassifierProvider,
    excerpt: string,
    ctx: AttemptContext
  ): Promise<{ provider: string; output: ClassifierOutput } | undefined> {
    if (!this.corroborate || winner.kind === "specialized") return undefined;
    const specialized = this.providers.find((p) => p.kind === "specialized" && !ctx.disabled.has(p.name));
    if (!specialized) return undefined;

    const output = await this.attempt(specialized, excerpt, ctx);
    if (!output || output === "aborted") return undefined;
    return { provider: specialized.name, output };
  }

  /** 调用单个供应商；失败返回 undefined，请求被中止返回 "aborted"。 */
  private async attempt(
    provider: ClassifierProvider,
    excerpt: string,
    ctx: AttemptContext
  ): Promise<ClassifierOutput | "aborted" | undefined> {
    if (ctx.disabled.has(provider.name)) return undefined;
    const t0 = Date.now();
    try {
      const output = await retryTransient(
        () =>
          callWithTimeout({
            provider: provider.name,
            timeoutMs: this.timeoutMs,
            signal: ctx.signal,
            run: (s) => provider.classify(excerpt, { signal: s }),
          }),
        { logger: ctx.log, provider: provider.name, retries: this.retries, signal: ctx.signal }
      );
      ctx.attempts.push({ provider: provider.name, outcome: "ok", ms: Date.now() - t0 });
      return output;
    } catch (err) {
      const ms = Date.now() - t0;
      const error = describeError(err).message;
      if (err instanceof ProviderAbortedError) {
        ctx.attempts.push({ provider: provider.name, outcome: "aborted", ms, error });
        return "aborted";
      }
      if (err instanceof ProviderPermanentError) {
        ctx.disabled.add(provider.name);
        ctx.attempts.push({ provider: provider.name, outcome: "permanent", ms, error });
        ctx.log.error("Classifier provider unusable for this request", { provider: provider.name, error });
        return undefined;
      }
      const outcome = err instanceof ProviderTransientError ? "transient" : "failed";
      ctx.attempts.push({ provider: provider.name, outcome, ms, error });
      ctx.log.warn("Classifier provider failed; falling through", { provider: provider.name, outcome, error });
      return undefined;
    }
  }
}

type AttemptContext = {
  log: AppLogger;
  signal?: AbortSignal;
  attempts: ProviderAttempt[];
  disabled: Set<string>;
};
