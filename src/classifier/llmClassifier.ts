import type OpenAI from "openai";
import type { AppLogger } from "../logger/logger.js";
import { chatJson } from "../llm/client.js";
import { buildClassifierMessages, classifierOutputSchema } from "../llm/prompts.js";
import type { ClassifierOutput, ClassifierProvider } from "./types.js";

export type LlmClassifierParams = {
  name: string;
  client: OpenAI;
  model: string;
  logger: AppLogger;
};

export class LlmClassifier implements ClassifierProvider {
  readonly name: string;
  readonly kind = "llm" as const;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly logger: AppLogger;

  constructor(params: LlmClassifierParams) {
    this.name = params.name;
    this.client = params.client;
    this.model = params.model;
    this.logger = params.logger;
  }

  async classify(excerpt: string, ctx: { signal: AbortSignal }): Promise<ClassifierOutput> {
    const { json } = await chatJson({
      logger: this.logger,
      client: this.client,
      model: this.model,
      provider: this.name,
      schema: classifierOutputSchema,
      messages: buildClassifierMessages(excerpt),
      temperature: 0.1,
      maxTokens: 60,
      signal: ctx.signal,
    });

    return {
      probability: json.probability,
      label: json.label,
      rawConfidence: json.confidence ?? null,
      metrics: {},
    };
  }
}
