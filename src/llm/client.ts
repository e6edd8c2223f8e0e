import OpenAI from "openai";
import type { z } from "zod";
import type { OpenAiCompatibleConfig } from "../config/index.js";
import type { AppLogger } from "../logger/logger.js";
import { ProviderPermanentError, ProviderTransientError } from "../pipeline/errors.js";

/**
 * 创建 OpenAI 兼容客户端。
 *
 * OpenAI 与 Gemini（`/v1beta/openai` 兼容端点）共用同一个 SDK，只换 `baseURL/model`。
 * SDK 自带的重试关闭，重试与超时统一由 ClassifierGateway 控制。
 */
export function createOpenAiCompatibleClient(cfg: OpenAiCompatibleConfig): OpenAI {
  return new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL, maxRetries: 0 });
}

export type ChatJsonOptions<T> = {
  logger: AppLogger;
  client: OpenAI;
  model: string;
  messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[];
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** 供应商名，用于日志与错误归类 */
  provider: string;
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
};

/**
 * 调用 Chat Completions 并返回经 zod 校验的 JSON。
 *
 * 先带 `response_format: json_object`；端点不支持该参数（400）时去掉它再试一次。
 * 输出无法解析或不符合 schema → `ProviderTransientError`。
 */
export async function chatJson<T>(opts: ChatJsonOptions<T>): Promise<{ rawText: string; json: T }> {
  const t0 = Date.now();
  const log = opts.logger;

  const basePayload: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
    model: opts.model,
    messages: opts.messages,
    temperature: opts.temperature ?? 0.2,
    max_tokens: opts.maxTokens,
  };

  let resp: OpenAI.Chat.Completions.ChatCompletion;
  try {
    resp = await opts.client.chat.completions.create(
      { ...basePayload, response_format: { type: "json_object" } },
      { signal: opts.signal }
    );
  } catch (err) {
    if (!(err instanceof OpenAI.BadRequestError)) throw toProviderError(opts.provider, err);
    log.warn("LLM chatJson response_format rejected; fallback", {
      provider: opts.provider,
      ms: Date.now() - t0,
      error: { name: err.name, message: err.message },
    });
    try {
      resp = await opts.client.chat.completions.create(basePayload, { signal: opts.signal });
    } catch (err2) {
      throw toProviderError(opts.provider, err2);
    }
  }

  const rawText = resp.choices[0]?.message?.content ?? "";
  const parsed = opts.schema.safeParse(safeParseJson(rawText));
  if (!parsed.success) {
    throw new ProviderTransientError(opts.provider, "malformed classifier response");
  }

  log.debug("LLM chatJson ok", {
    provider: opts.provider,
    ms: Date.now() - t0,
    usage: resp.usage,
  });
  return { rawText, json: parsed.data };
}

/**
 * SDK 错误 → 供应商错误：鉴权 / 权限 / 资源不存在 / 参数错误视为永久，其余（限流、5xx、网络、中止）视为暂时。
 */
export function toProviderError(provider: string, err: unknown): ProviderTransientError | ProviderPermanentError {
  if (err instanceof ProviderTransientError || err instanceof ProviderPermanentError) return err;
  if (err instanceof OpenAI.APIError && err.status !== undefined) {
    const status = err.status;
    if (status === 400 || status === 401 || status === 403 || status === 404) {
      return new ProviderPermanentError(provider, `HTTP ${status}: ${err.message}`, { cause: err });
    }
    return new ProviderTransientError(provider, `HTTP ${status}: ${err.message}`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderTransientError(provider, message, { cause: err });
}

/** 允许模型在 JSON 前后带少量解释文本，尽量提取最外层对象；失败返回 undefined。 */
function safeParseJson(raw: string): unknown {
  const trimmed = raw.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const first = trimmed.indexOf("{");
    const last = trimmed.lastIndexOf("}");
    if (first === -1 || last <= first) return undefined;
    try {
      return JSON.parse(trimmed.slice(first, last + 1));
    } catch {
      return undefined;
    }
  }
}
