import fs from "node:fs";
import path from "node:path";
import { resolveAnalysisConfig } from "../src/config/index.js";
import { ClassifierGateway } from "../src/classifier/gateway.js";
import { createAppLogger } from "../src/logger/logger.js";
import { DocumentAnalyzer } from "../src/pipeline/analyzer.js";
import { ReportCache } from "../src/pipeline/reportCache.js";

/**
 * 本地端到端验证脚本（不调用任何外部服务）。
 *
 * 用法：
 * - `npx tsx scripts/e2e.ts /path/to/input.docx`（也支持 .txt / .md）
 *
 * 不配置分类器与检索服务，跑通“提取→统计→启发式→融合→报告”，报告写到 out/e2e-report.json。
 */
async function main() {
  const inputPath = process.argv[2];
  if (!inputPath) {
    throw new Error("Usage: npx tsx scripts/e2e.ts /path/to/input.docx");
  }

  const abs = path.resolve(process.cwd(), inputPath);
  const buf = fs.readFileSync(abs);

  const logger = createAppLogger({ serviceName: "doc-integrity-scan-e2e" });
  const config = resolveAnalysisConfig({});
  const analyzer = new DocumentAnalyzer({
    config,
    logger,
    classifiers: new ClassifierGateway({
      providers: [],
      logger,
      timeoutMs: config.timeouts.providerTimeoutMs,
      retries: config.classifier.retries,
      corroborate: false,
    }),
    searchProvider: null,
    cache: new ReportCache({ ...config.cache, logger }),
  });

  const report = await analyzer.analyze({ bytes: buf, filename: path.basename(abs) });

  const outDir = path.resolve(process.cwd(), "out");
  fs.mkdirSync(outDir, { recursive: true });
  const outPath = path.join(outDir, "e2e-report.json");
  fs.writeFileSync(outPath, JSON.stringify(report, null, 2));

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        input: abs,
        words: report.textStats.totalWords,
        sentences: report.textStats.totalSentences,
        aiDetection: {
          probability: report.aiDetection.probability,
          verdict: report.aiDetection.verdict,
          confidence: report.aiDetection.confidence,
          heuristic: report.aiDetection.heuristic,
        },
        plagiarism: { status: report.plagiarism.status, note: report.plagiarism.note },
        verdict: report.overallVerdict,
        output: outPath,
      },
      null,
      2
    )
  );
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
