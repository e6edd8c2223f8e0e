import type { ProviderCredentials } from "../config/index.js";
import { createOpenAiCompatibleClient } from "../llm/client.js";
import type { AppLogger } from "../logger/logger.js";
import { GptZeroClassifier } from "./gptZeroClassifier.js";
import { LlmClassifier } from "./llmClassifier.js";
import type { ClassifierProvider } from "./types.js";

/**
 * 按已配置的凭据组装分类器链：OpenAI → Gemini → GPTZero。未配置的供应商不进入链。
 */
export function buildClassifierChain(creds: ProviderCredentials, logger: AppLogger): ClassifierProvider[] {
  const chain: ClassifierProvider[] = [];
  if (creds.openai) {
    chain.push(
      new LlmClassifier({
        name: "openai",
        client: createOpenAiCompatibleClient(creds.openai),
        model: creds.openai.model,
        logger,
      })
    );
  }
  if (creds.gemini) {
    chain.push(
      new LlmClassifier({
        name: "gemini",
        client: createOpenAiCompatibleClient(creds.gemini),
        model: creds.gemini.model,
        logger,
      })
    );
  }
  if (creds.gptzero) {
    chain.push(new GptZeroClassifier(creds.gptzero));
  }
  return chain;
}
