import express from "express";
import multer from "multer";
import { z } from "zod";
import { uploadLimitBytes } from "../../config/index.js";
import type { AppLogger } from "../../logger/logger.js";
import type { DocumentAnalyzer } from "../../pipeline/analyzer.js";
import { HttpError } from "../errors.js";
import { asyncHandler } from "./asyncHandler.js";

const analyzeTextBodySchema = z.object({
  text: z.string(),
  sourceName: z.string().trim().min(1).max(256).optional(),
});

const reportIdSchema = z.string().regex(/^[0-9a-f]{64}$/);

/**
 * API 路由：上传文档 / 提交文本 → 报告；按 reportId 取回缓存的报告。
 */
export function createApiRouter(params: {
  logger: AppLogger;
  analyzer: DocumentAnalyzer;
  maxUploadMb: number;
}) {
  const router = express.Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: uploadLimitBytes(params.maxUploadMb), files: 1 },
  });

  router.get("/health", (_req, res) => res.json({ ok: true }));

  router.post(
    "/analyze",
    upload.single("file"),
    asyncHandler(async (req, res) => {
      const log = req.log ?? params.logger;
      const file = req.file;
      if (!file) throw new HttpError(400, "NO_FILE", "Please upload a .pdf, .docx, .txt or .md file (field name: file)");

      const filename = decodeMulterFilename(file.originalname);
      log.info("Document uploaded", { filename, size: file.size });

      const report = await params.analyzer.analyze(
        { bytes: file.buffer, filename },
        { logger: log, bypassCache: req.query.fresh === "1" }
      );
      res.json({ ok: true, report });
    })
  );

  router.post(
    "/analyze-text",
    asyncHandler(async (req, res) => {
      const log = req.log ?? params.logger;
      const body = analyzeTextBodySchema.parse(req.body);
      log.info("Text submitted", { chars: body.text.length });

      const report = await params.analyzer.analyze(
        { text: body.text, sourceName: body.sourceName },
        { logger: log, bypassCache: req.query.fresh === "1" }
      );
      res.json({ ok: true, report });
    })
  );

  router.get("/report/:reportId", (req, res) => {
    const parsed = reportIdSchema.safeParse(req.params.reportId);
    const report = parsed.success ? params.analyzer.getCachedReport(parsed.data) : undefined;
    if (!report) {
      throw new HttpError(404, "REPORT_NOT_FOUND", "Report not found or expired");
    }
    res.json({ ok: true, report });
  });

  return router;
}

/**
 * multer 把 multipart 文件名按 latin1 解出，中文等 UTF-8 文件名需要还原；不是合法 UTF-8 时保持原样。
 */
function decodeMulterFilename(raw: string): string {
  try {
    const bytes = Uint8Array.from(raw, (c) => c.charCodeAt(0));
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return raw;
  }
}
