import { createHash } from "node:crypto";
import type { AppLogger } from "../logger/logger.js";
import type { Report } from "../report/schema.js";
import { describeError } from "./errors.js";

export type Clock = { now(): number };

export const systemClock: Clock = { now: () => Date.now() };

export type CacheEntry = {
  report: Report;
  storedAt: number;
  expiresAt: number;
};

/**
 * 报告存储。默认是进程内 Map；保持同样接口即可换成其它实现（测试里也可注入会出错的存储）。
 */
export type ReportStore = {
  get(key: string): CacheEntry | undefined;
  set(key: string, entry: CacheEntry): void;
  delete(key: string): void;
  keys(): Iterable<string>;
  readonly size: number;
};

export class InMemoryReportStore implements ReportStore {
  private readonly entries = new Map<string, CacheEntry>();

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  set(key: string, entry: CacheEntry): void {
    // 重新插入以更新 Map 的插入顺序（最旧的在前）
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  keys(): Iterable<string> {
    return this.entries.keys();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** 文本指纹：规范化文本的 SHA-256（hex）。 */
export function fingerprintText(normalizedText: string): string {
  return createHash("sha256").update(normalizedText, "utf8").digest("hex");
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

export type ReportCacheOptions = {
  ttlMs: number;
  maxEntries: number;
  logger: AppLogger;
  clock?: Clock;
  store?: ReportStore;
};

/**
 * 按指纹缓存完整报告，固定 TTL。
 *
 * - 读时被动过期；存储满时先清理过期项，仍满则淘汰最旧的一条；
 * - 报告整体冻结后一次写入，并发请求最后写入者生效；
 * - 存储读写异常只记日志，按未命中处理。
 */
export class ReportCache {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly logger: AppLogger;
  private readonly clock: Clock;
  private readonly store: ReportStore;

  constructor(opts: ReportCacheOptions) {
    this.ttlMs = opts.ttlMs;
    this.maxEntries = opts.maxEntries;
    this.logger = opts.logger;
    this.clock = opts.clock ?? systemClock;
    this.store = opts.store ?? new InMemoryReportStore();
  }

  get(fingerprint: string): Report | undefined {
    let entry: CacheEntry | undefined;
    try {
      entry = this.store.get(fingerprint);
    } catch (err) {
      this.logger.warn("Report cache read failed; treating as miss", { fingerprint, error: describeError(err) });
      return undefined;
    }
    if (!entry) return undefined;
    if (this.clock.now() >= entry.expiresAt) {
      this.safeDelete(fingerprint);
      return undefined;
    }
    return entry.report;
  }

  set(fingerprint: string, report: Report): void {
    const now = this.clock.now();
    const entry: CacheEntry = { report: deepFreeze(report), storedAt: now, expiresAt: now + this.ttlMs };
    try {
      if (this.store.get(fingerprint) === undefined && this.store.size >= this.maxEntries) {
        this.sweepExpired();
        this.evictOldest();
      }
      this.store.set(fingerprint, entry);
    } catch (err) {
      this.logger.warn("Report cache write failed", { fingerprint, error: describeError(err) });
    }
  }

  /** 主动清理过期项，返回清理数量。 */
  sweepExpired(): number {
    const now = this.clock.now();
    const expired: string[] = [];
    for (const key of this.store.keys()) {
      const entry = this.store.get(key);
      if (!entry || now >= entry.expiresAt) expired.push(key);
    }
    for (const key of expired) this.store.delete(key);
    return expired.length;
  }

  get size(): number {
    return this.store.size;
  }

  private evictOldest(): void {
    while (this.store.size >= this.maxEntries) {
      const oldest = this.store.keys()[Symbol.iterator]().next();
      if (oldest.done) return;
      this.store.delete(oldest.value);
    }
  }

  private safeDelete(fingerprint: string): void {
    try {
      this.store.delete(fingerprint);
    } catch (err) {
      this.logger.warn("Report cache delete failed", { fingerprint, error: describeError(err) });
    }
  }
}
