import { z } from "zod";
import type { ProviderCredentials } from "../config/index.js";
import { ProviderPermanentError, ProviderTransientError } from "../pipeline/errors.js";
import type { SearchHit } from "../report/schema.js";
import type { SearchProvider } from "./types.js";

const googleResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().catch("Unknown"),
        link: z.string(),
        snippet: z.string().catch(""),
      })
    )
    .optional(),
});

export type GoogleCustomSearchParams = {
  apiKey: string;
  engineId: string;
  baseURL: string;
  fetchImpl?: typeof fetch;
};

/**
 * Google Custom Search JSON API。
 * 429 与 `rateLimitExceeded/dailyLimitExceeded`（403）视为暂时性，其余 4xx 视为配置错误。
 */
export class GoogleCustomSearchProvider implements SearchProvider {
  readonly name = "google-custom-search";
  private readonly apiKey: string;
  private readonly engineId: string;
  private readonly baseURL: string;
  private readonly fetchImpl: typeof fetch;

  constructor(params: GoogleCustomSearchParams) {
    this.apiKey = params.apiKey;
    this.engineId = params.engineId;
    this.baseURL = params.baseURL;
    this.fetchImpl = params.fetchImpl ?? fetch;
  }

  async search(query: string, ctx: { signal: AbortSignal; limit: number }): Promise<SearchHit[]> {
    const url = new URL(this.baseURL);
    url.searchParams.set("key", this.apiKey);
    url.searchParams.set("cx", this.engineId);
    url.searchParams.set("q", query);
    url.searchParams.set("num", String(Math.min(10, Math.max(1, ctx.limit))));

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: ctx.signal });
    } catch (err) {
      throw new ProviderTransientError(this.name, err instanceof Error ? err.message : String(err), {
        cause: err,
      });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      if (response.status === 429 || response.status >= 500 || /rateLimitExceeded|dailyLimitExceeded|quota/i.test(detail)) {
        throw new ProviderTransientError(this.name, `HTTP ${response.status}`);
      }
      throw new ProviderPermanentError(this.name, `HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ProviderTransientError(this.name, "response is not JSON", { cause: err });
    }
    const parsed = googleResponseSchema.safeParse(body);
    if (!parsed.success) throw new ProviderTransientError(this.name, "malformed response");

    return (parsed.data.items ?? []).slice(0, ctx.limit).map((item) => ({
      title: item.title,
      url: item.link,
      snippet: item.snippet,
    }));
  }
}

/** 配置了 Google 检索凭据时返回检索服务，否则为 null（抄袭检测跳过）。 */
export function buildSearchProvider(creds: ProviderCredentials): SearchProvider | null {
  return creds.googleSearch ? new GoogleCustomSearchProvider(creds.googleSearch) : null;
}
