import { describe, it, expect } from "vitest";
import { createSilentLogger } from "../logger/logger.js";
import { delay } from "../testing/fakes.js";
import { ProviderAbortedError, ProviderPermanentError, ProviderTransientError } from "./errors.js";
import { callWithTimeout, retryTransient } from "./providerCall.js";

const logger = createSilentLogger();

describe("callWithTimeout", () => {
  it("returns the provider result", async () => {
    await expect(callWithTimeout({ provider: "p", timeoutMs: 100, run: async () => "done" })).resolves.toBe("done");
  });

  it("times out even when the provider ignores its signal", async () => {
    const run = async () => {
      await delay(200);
      return "late";
    };
    await expect(callWithTimeout({ provider: "p", timeoutMs: 10, run })).rejects.toThrow("[p] timed out after 10ms");
  });

  it("aborts the provider's own signal on timeout", async () => {
    let seen: AbortSignal | undefined;
    await expect(
      callWithTimeout({
        provider: "p",
        timeoutMs: 10,
        run: (signal) => {
          seen = signal;
          return delay(50).then(() => 1);
        },
      })
    ).rejects.toBeInstanceOf(ProviderTransientError);
    expect(seen?.aborted).toBe(true);
  });

  it("rejects with an abort error when the request signal fires", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);
    await expect(
      callWithTimeout({ provider: "p", timeoutMs: 1000, signal: controller.signal, run: () => delay(200) })
    ).rejects.toBeInstanceOf(ProviderAbortedError);
  });

  it("does not start when the request is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;
    await expect(
      callWithTimeout({
        provider: "p",
        timeoutMs: 1000,
        signal: controller.signal,
        run: async () => {
          started = true;
        },
      })
    ).rejects.toBeInstanceOf(ProviderAbortedError);
    expect(started).toBe(false);
  });
});

describe("retryTransient", () => {
  it("retries transient errors up to the limit", async () => {
    let calls = 0;
    const fn = async () => {
      calls += 1;
      throw new ProviderTransientError("p", "HTTP 500");
    };
    await expect(retryTransient(fn, { logger, provider: "p", retries: 2 })).rejects.toBeInstanceOf(
      ProviderTransientError
    );
    expect(calls).toBe(3);
  });

  it("does not retry permanent errors", async () => {
    let calls = 0;
    const fn = async () => {
      calls += 1;
      throw new ProviderPermanentError("p", "HTTP 401");
    };
    await expect(retryTransient(fn, { logger, provider: "p", retries: 1 })).rejects.toBeInstanceOf(ProviderPermanentError);
    expect(calls).toBe(1);
  });
});
