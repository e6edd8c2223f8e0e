import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { z } from "zod";
import { readFileSync } from "node:fs";
import type { Server } from "node:http";
import { ClassifierGateway } from "../classifier/gateway.js";
import type { ClassifierOutput } from "../classifier/types.js";
import { resolveAnalysisConfig, type AnalysisConfigOverrides } from "../config/index.js";
import { createSilentLogger } from "../logger/logger.js";
import { DocumentAnalyzer } from "../pipeline/analyzer.js";
import { ReportCache } from "../pipeline/reportCache.js";
import type { SearchHit } from "../report/schema.js";
import { ScriptedClassifier, ScriptedSearchProvider, hangUntilAborted } from "../testing/fakes.js";
import { createApp } from "./app.js";

const logger = createSilentLogger();
const HUMAN_ESSAY = readFileSync(new URL("../../fixtures/human-essay.txt", import.meta.url), "utf8");

type Running = { server: Server; baseUrl: string };

const reportBodySchema = z.object({
  ok: z.literal(true),
  report: z.object({
    reportId: z.string(),
    sourceName: z.string().nullable(),
    analyzedAt: z.string(),
    overallVerdict: z.object({ riskLevel: z.string() }),
  }),
});

const errorBodySchema = z.object({
  ok: z.literal(false),
  error: z.object({ code: z.string(), message: z.string(), requestId: z.string().optional() }),
});

async function readReport(res: Response) {
  return reportBodySchema.parse(await res.json()).report;
}

async function readError(res: Response) {
  return errorBodySchema.parse(await res.json()).error;
}

async function start(
  opts: { withHangingProviders?: boolean; overrides?: AnalysisConfigOverrides; maxUploadMb?: number } = {}
): Promise<Running> {
  const config = resolveAnalysisConfig(opts.overrides ?? {});
  const analyzer = new DocumentAnalyzer({
    config,
    logger,
    classifiers: new ClassifierGateway({
      providers: opts.withHangingProviders
        ? [new ScriptedClassifier("primary", ({ signal }) => hangUntilAborted<ClassifierOutput>(signal))]
        : [],
      logger,
      timeoutMs: config.timeouts.providerTimeoutMs,
      retries: 1,
      corroborate: false,
    }),
    searchProvider: opts.withHangingProviders
      ? new ScriptedSearchProvider("stuck", ({ signal }) => hangUntilAborted<SearchHit[]>(signal))
      : null,
    cache: new ReportCache({ ...config.cache, logger }),
  });
  const { app } = createApp({ logger, analyzer, maxUploadMb: opts.maxUploadMb });

  return new Promise((resolve) => {
    const server = app.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr ? addr.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });
}

function stop(running: Running): Promise<void> {
  return new Promise((resolve, reject) => running.server.close((err) => (err ? reject(err) : resolve())));
}

function postJson(baseUrl: string, path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

function upload(baseUrl: string, filename: string, content: string | Uint8Array): Promise<Response> {
  const form = new FormData();
  const type = filename.endsWith(".pdf") ? "application/pdf" : "text/plain";
  form.append("file", new Blob([content], { type }), filename);
  return fetch(`${baseUrl}/api/analyze`, { method: "POST", body: form });
}

describe("HTTP API", () => {
  let running: Running;

  beforeAll(async () => {
    running = await start({ maxUploadMb: 0.01 });
  });

  afterAll(async () => {
    await stop(running);
  });

  it("reports health and echoes the request id", async () => {
    const res = await fetch(`${running.baseUrl}/api/health`, { headers: { "x-request-id": "req-123" } });
    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toBe("req-123");
    expect(await res.json()).toEqual({ ok: true });
  });

  it("analyzes submitted text and serves the cached report by id", async () => {
    const res = await postJson(running.baseUrl, "/api/analyze-text", { text: HUMAN_ESSAY, sourceName: "essay" });
    expect(res.status).toBe(200);
    const report = await readReport(res);
    expect(report.overallVerdict.riskLevel).toBe("low");
    expect(report.sourceName).toBe("essay");

    const again = await fetch(`${running.baseUrl}/api/report/${report.reportId}`);
    expect(again.status).toBe(200);
    expect((await readReport(again)).analyzedAt).toBe(report.analyzedAt);
  });

  it("returns 404 for unknown reports", async () => {
    const res = await fetch(`${running.baseUrl}/api/report/${"0".repeat(64)}`);
    expect(res.status).toBe(404);
    expect((await readError(res)).code).toBe("REPORT_NOT_FOUND");
  });

  it("maps input problems to 400", async () => {
    const short = await postJson(running.baseUrl, "/api/analyze-text", { text: "Too short." });
    expect(short.status).toBe(400);
    expect((await readError(short)).code).toBe("INSUFFICIENT_TEXT");

    const wrongType = await postJson(running.baseUrl, "/api/analyze-text", { text: 42 });
    expect(wrongType.status).toBe(400);
    expect((await readError(wrongType)).code).toBe("INVALID_REQUEST");

    const broken = await fetch(`${running.baseUrl}/api/analyze-text`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(broken.status).toBe(400);
    expect((await readError(broken)).code).toBe("INVALID_JSON");
  });

  it("analyzes an uploaded text file", async () => {
    const excerpt = HUMAN_ESSAY.slice(0, 2000);
    const res = await upload(running.baseUrl, "notes.txt", excerpt);
    expect(res.status).toBe(200);
    expect((await readReport(res)).sourceName).toBe("notes.txt");
  });

  it("extracts pdf uploads before checking the word count", async () => {
    const pdf = readFileSync(new URL("../../fixtures/tide-notes.pdf", import.meta.url));
    const res = await upload(running.baseUrl, "tide-notes.pdf", pdf);
    expect(res.status).toBe(400);
    expect((await readError(res)).code).toBe("INSUFFICIENT_TEXT");
  });

  it("rejects missing, unsupported and oversized uploads", async () => {
    const none = await postJson(running.baseUrl, "/api/analyze", {});
    expect(none.status).toBe(400);
    expect((await readError(none)).code).toBe("NO_FILE");

    const pdf = await upload(running.baseUrl, "paper.pdf", "%PDF-1.7");
    expect(pdf.status).toBe(400);
    expect((await readError(pdf)).code).toBe("EXTRACTION_FAILED");

    const big = await upload(running.baseUrl, "big.txt", "word ".repeat(5000));
    expect(big.status).toBe(413);
    expect((await readError(big)).code).toBe("UPLOAD_TOO_LARGE");
  });
});

describe("HTTP API under a tight time budget", () => {
  it("answers 504 when nothing finishes in time", async () => {
    const running = await start({
      withHangingProviders: true,
      overrides: { timeouts: { requestTimeoutMs: 30, providerTimeoutMs: 1000 } },
    });
    try {
      const res = await postJson(running.baseUrl, "/api/analyze-text", { text: HUMAN_ESSAY });
      expect(res.status).toBe(504);
      const error = await readError(res);
      expect(error.code).toBe("PIPELINE_TIMEOUT");
      expect(typeof error.requestId).toBe("string");
    } finally {
      await stop(running);
    }
  });
});
