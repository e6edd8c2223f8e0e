import type { AppLogger } from "../logger/logger.js";
import {
  ProviderAbortedError,
  ProviderTransientError,
  describeError,
} from "./errors.js";

export type ProviderCallParams<T> = {
  provider: string;
  timeoutMs: number;
  /** 请求级信号：整体预算耗尽时中止 */
  signal?: AbortSignal;
  run: (signal: AbortSignal) => Promise<T>;
};

/**
 * 给一次外部调用加上硬超时，并与请求级信号联动。
 *
 * 供应商实现可能忽略 signal，所以这里用 `Promise.race` 兜底：
 * 超时 → `ProviderTransientError`；请求中止 → `ProviderAbortedError`。
 */
export async function callWithTimeout<T>(params: ProviderCallParams<T>): Promise<T> {
  const parent = params.signal;
  if (parent?.aborted) throw new ProviderAbortedError(params.provider);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new ProviderTransientError(params.provider, `timed out after ${params.timeoutMs}ms`));
      controller.abort();
    }, params.timeoutMs);

    if (parent) {
      onParentAbort = () => {
        reject(new ProviderAbortedError(params.provider));
        controller.abort();
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([params.run(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener("abort", onParentAbort);
  }
}

/**
 * 仅对 `ProviderTransientError` 重试，最多 `retries` 次。
 * 其它错误（永久错误、请求中止）原样抛出。
 */
export async function retryTransient<T>(
  fn: () => Promise<T>,
  opts: { logger: AppLogger; provider: string; retries: number; signal?: AbortSignal }
): Promise<T> {
  const { retries } = opts;
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof ProviderTransientError) || attempt >= retries || opts.signal?.aborted) {
        throw err;
      }
      opts.logger.warn("Provider call failed; retrying", {
        provider: opts.provider,
        attempt: attempt + 1,
        error: describeError(err),
      });
    }
  }
}
