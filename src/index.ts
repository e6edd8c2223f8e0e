import "dotenv/config";
import { loadServerConfigFromEnv } from "./config/index.js";
import { createAppLogger } from "./logger/logger.js";
import { createDocumentAnalyzerFromEnv } from "./pipeline/analyzer.js";
import { createApp } from "./server/app.js";

/**
 * 应用入口：只负责装配（logger、配置、分析器、server）。
 */
async function main() {
  const logger = createAppLogger();
  const server = loadServerConfigFromEnv();
  const analyzer = createDocumentAnalyzerFromEnv({ logger });
  const { app } = createApp({ logger, analyzer, maxUploadMb: server.maxUploadMb });

  app.listen(server.port, () => {
    logger.info("Server started", { port: server.port, env: process.env.NODE_ENV ?? "development" });
  });
}

main().catch((err) => {
  // 入口异常通常属于不可恢复错误，直接打印并退出。
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
