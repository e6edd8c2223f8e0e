import { describe, it, expect } from "vitest";
import { ProviderPermanentError, ProviderTransientError } from "../pipeline/errors.js";
import { GptZeroClassifier } from "./gptZeroClassifier.js";

type Seen = { url: string; headers: Headers; body: unknown };

function fakeFetch(status: number, body: unknown, seen: Seen[] = []): typeof fetch {
  return async (input, init) => {
    seen.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return new Response(JSON.stringify(body), { status });
  };
}

function classifier(fetchImpl: typeof fetch) {
  return new GptZeroClassifier({ apiKey: "test-secret", baseURL: "https://detector.example.test", fetchImpl });
}

const ctx = () => ({ signal: new AbortController().signal });

describe("GptZeroClassifier", () => {
  it("maps the document probabilities", async () => {
    const seen: Seen[] = [];
    const output = await classifier(
      fakeFetch(
        200,
        {
          documents: [
            {
              average_generated_prob: 0.75,
              completely_generated_prob: 0.875,
              overall_burstiness: 12.5,
              confidence_score: 0.9,
            },
          ],
        },
        seen
      )
    ).classify("some excerpt", ctx());

    expect(output).toEqual({
      probability: 75,
      label: "ai",
      rawConfidence: 0.9,
      metrics: { averageGeneratedProb: 0.75, completelyGeneratedProb: 0.875, burstiness: 12.5 },
    });
    expect(seen[0].url).toBe("https://detector.example.test/v2/predict/text");
    expect(seen[0].headers.get("x-api-key")).toBe("test-secret");
    expect(seen[0].body).toEqual({ document: "some excerpt" });
  });

  it("labels mixed and human documents", async () => {
    const mixed = await classifier(
      fakeFetch(200, { documents: [{ average_generated_prob: 0.5, completely_generated_prob: 0.4 }] })
    ).classify("x", ctx());
    expect(mixed.label).toBe("mixed");
    expect(mixed.rawConfidence).toBeNull();

    const human = await classifier(
      fakeFetch(200, { documents: [{ average_generated_prob: 0.125, completely_generated_prob: 0.05 }] })
    ).classify("x", ctx());
    expect(human.label).toBe("human");
    expect(human.probability).toBe(12.5);
  });

  it("separates permanent and transient failures", async () => {
    await expect(classifier(fakeFetch(401, {})).classify("x", ctx())).rejects.toBeInstanceOf(ProviderPermanentError);
    await expect(classifier(fakeFetch(502, {})).classify("x", ctx())).rejects.toBeInstanceOf(ProviderTransientError);
    await expect(classifier(fakeFetch(200, { documents: [] })).classify("x", ctx())).rejects.toBeInstanceOf(
      ProviderTransientError
    );
  });
});
