import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * 让 Express 4 路由可直接使用 async/await，异常交给统一错误处理中间件。
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
