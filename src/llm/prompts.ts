import type OpenAI from "openai";
import { z } from "zod";

export const classifierOutputSchema = z.object({
  probability: z.coerce.number().min(0).max(100),
  label: z.string().trim().min(1).catch("unknown"),
  confidence: z.coerce.number().min(0).max(1).nullable().optional(),
});

export function buildClassifierMessages(excerpt: string): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  return [
    {
      role: "system",
      content: [
        "You are an expert at detecting AI-generated text.",
        "Judge the writing itself: style consistency, vocabulary, flow and transitions,",
        "generic or overly formal phrasing, and human traces such as anecdotes, unique",
        "perspectives and small inconsistencies.",
        "Reply with a single JSON object and nothing else.",
      ].join(" "),
    },
    {
      role: "user",
      content: [
        "Estimate how likely the following text was written by an AI model.",
        "",
        'Output JSON: {"probability": <0-100>, "label": "human" | "mixed" | "ai", "confidence": <0-1>}',
        "- 0-30: definitely human; 31-50: likely human; 51-70: uncertain or mixed;",
        "  71-90: likely AI; 91-100: definitely AI.",
        "",
        "Text:",
        '"""',
        excerpt,
        '"""',
      ].join("\n"),
    },
  ];
}
