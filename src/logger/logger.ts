import winston from "winston";

export type AppLogger = winston.Logger;

export type AppLoggerOptions = {
  serviceName?: string;
  level?: string;
  /** 测试里关闭输出 */
  silent?: boolean;
};

/**
 * 创建应用级 Logger（Winston）。
 *
 * 分析链路是“抽取 → 统计 → 分类器 / 检索 → 融合 → 缓存”，每一步的耗时、
 * 供应商重试与降级都要能从日志里还原出来，所以统一用结构化日志。
 *
 * 实现方式：
 * - 开发环境：控制台彩色输出 + 关键字段；
 * - 生产环境：JSON 结构化输出；
 * - `requestId` 通过 child logger 注入（见 server/requestContext.ts）。
 *
 * 注意：日志里只记录长度与指纹，不写正文。
 */
export function createAppLogger(opts?: AppLoggerOptions): AppLogger {
  const serviceName = opts?.serviceName ?? "doc-integrity-scan";
  const isProd = process.env.NODE_ENV === "production";

  const baseFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.metadata({
      fillExcept: ["message", "level", "timestamp", "service"],
    })
  );

  const consoleFormat = isProd
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info) => {
          const metadata: unknown = info.metadata;
          const meta =
            metadata && typeof metadata === "object" && Object.keys(metadata).length
              ? ` ${JSON.stringify(metadata)}`
              : "";
          return `${info.timestamp} ${info.level} [${serviceName}] ${info.message}${meta}`;
        })
      );

  return winston.createLogger({
    level: opts?.level ?? process.env.LOG_LEVEL ?? (isProd ? "info" : "debug"),
    silent: opts?.silent ?? false,
    defaultMeta: { service: serviceName },
    format: baseFormat,
    transports: [new winston.transports.Console({ format: consoleFormat })],
  });
}

/** 测试与脚本用的静默 logger。 */
export function createSilentLogger(): AppLogger {
  return createAppLogger({ silent: true });
}
