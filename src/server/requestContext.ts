import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import type { AppLogger } from "../logger/logger.js";

export type RequestContext = {
  requestId: string;
};

declare module "express-serve-static-core" {
  interface Request {
    ctx?: RequestContext;
    log?: AppLogger;
  }
}

/**
 * 注入请求上下文与链路日志。
 *
 * 每个请求生成 `requestId`（或沿用调用方传入的 `x-request-id`），并在 `req.log` 上挂一个
 * 自动携带 requestId 的 child logger，分析器的分支日志因此能和请求对上。
 */
export function requestContextMiddleware(baseLogger: AppLogger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id")?.trim() || randomUUID();
    req.ctx = { requestId };
    req.log = baseLogger.child({ requestId });
    res.setHeader("x-request-id", requestId);
    next();
  };
}
