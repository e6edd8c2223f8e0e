import { z } from "zod";
import { ProviderPermanentError, ProviderTransientError } from "../pipeline/errors.js";
import type { ClassifierOutput, ClassifierProvider } from "./types.js";

const gptZeroResponseSchema = z.object({
  documents: z
    .array(
      z.object({
        average_generated_prob: z.number().min(0).max(1),
        completely_generated_prob: z.number().min(0).max(1),
        overall_burstiness: z.number().optional(),
        confidence_score: z.number().min(0).max(1).optional(),
      })
    )
    .min(1),
});

export type GptZeroClassifierParams = {
  apiKey: string;
  baseURL: string;
  fetchImpl?: typeof fetch;
};

/**
 * GPTZero `/v2/predict/text`。概率取 `average_generated_prob`（0..1 → 0..100）。
 */
export class GptZeroClassifier implements ClassifierProvider {
  readonly name = "gptzero";
  readonly kind = "specialized" as const;
  private readonly apiKey: string;
  private readonly baseURL: string;
  private readonly fetchImpl: typeof fetch;

  constructor(params: GptZeroClassifierParams) {
    this.apiKey = params.apiKey;
    this.baseURL = params.baseURL;
    this.fetchImpl = params.fetchImpl ?? fetch;
  }

  async classify(excerpt: string, ctx: { signal: AbortSignal }): Promise<ClassifierOutput> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseURL}/v2/predict/text`, {
        method: "POST",
        headers: { "Content-Type": "application/json", "x-api-key": this.apiKey },
        body: JSON.stringify({ document: excerpt }),
        signal: ctx.signal,
      });
    } catch (err) {
      throw new ProviderTransientError(this.name, err instanceof Error ? err.message : String(err), {
        cause: err,
      });
    }

    if (response.status === 401 || response.status === 403 || response.status === 400) {
      throw new ProviderPermanentError(this.name, `HTTP ${response.status}`);
    }
    if (!response.ok) {
      throw new ProviderTransientError(this.name, `HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ProviderTransientError(this.name, "response is not JSON", { cause: err });
    }
    const parsed = gptZeroResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderTransientError(this.name, "malformed response");
    }

    const doc = parsed.data.documents[0];
    const probability = doc.average_generated_prob * 100;
    const label = doc.completely_generated_prob > 0.7 ? "ai" : doc.completely_generated_prob > 0.3 ? "mixed" : "human";
    const metrics: Record<string, number> = {
      averageGeneratedProb: doc.average_generated_prob,
      completelyGeneratedProb: doc.completely_generated_prob,
    };
    if (doc.overall_burstiness !== undefined) metrics.burstiness = doc.overall_burstiness;

    return {
      probability,
      label,
      rawConfidence: doc.confidence_score ?? null,
      metrics,
    };
  }
}
