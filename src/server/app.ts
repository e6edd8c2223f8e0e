import express from "express";
import type { AppLogger } from "../logger/logger.js";
import type { DocumentAnalyzer } from "../pipeline/analyzer.js";
import { requestContextMiddleware } from "./requestContext.js";
import { errorHandler } from "./errors.js";
import { createApiRouter } from "./routes/api.js";

/**
 * 创建 Express 应用。路由只做参数校验与装配，分析逻辑都在 `DocumentAnalyzer` 里。
 */
export function createApp(params: { logger: AppLogger; analyzer: DocumentAnalyzer; maxUploadMb?: number }) {
  const app = express();
  const maxUploadMb = params.maxUploadMb ?? 20;

  app.disable("x-powered-by");
  app.use(requestContextMiddleware(params.logger));
  app.use(express.json({ limit: "2mb" }));

  app.use("/api", createApiRouter({ logger: params.logger, analyzer: params.analyzer, maxUploadMb }));

  // 统一错误处理应放在最后
  app.use(errorHandler(params.logger, { maxUploadMb }));

  return { app };
}
