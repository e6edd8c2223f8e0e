import type { AnalysisConfig, RiskThresholds } from "../config/index.js";
import type { GatewayResult } from "../classifier/gateway.js";
import type {
  AIDetectionResult,
  AiVerdict,
  ClassifierFinding,
  Confidence,
  HeuristicBreakdown,
  TextMetrics,
} from "../report/schema.js";
import { clamp, round2 } from "./textUtils.js";

export function aiVerdictFor(probability: number, thresholds: RiskThresholds): AiVerdict {
  if (probability > thresholds.aiHigh) return "likely_ai";
  if (probability <= thresholds.aiMedium) return "likely_human";
  return "uncertain";
}

export function lowerConfidence(c: Confidence): Confidence {
  return c === "high" ? "medium" : "low";
}

function toFinding(result: Extract<GatewayResult, { status: "available" }>): ClassifierFinding {
  const finding: ClassifierFinding = {
    provider: result.provider,
    probability: round2(clamp(result.output.probability, 0, 100)),
    label: result.output.label,
    rawConfidence: result.output.rawConfidence,
    metrics: result.output.metrics,
  };
  if (result.corroboration) {
    finding.corroboration = {
      provider: result.corroboration.provider,
      probability: round2(clamp(result.corroboration.output.probability, 0, 100)),
    };
  }
  return finding;
}

/** 有佐证时取两者均值。 */
export function classifierProbability(finding: ClassifierFinding): number {
  if (!finding.corroboration) return finding.probability;
  return (finding.probability + finding.corroboration.probability) / 2;
}

export type FuseAiDetectionParams = {
  metrics: TextMetrics;
  heuristic: HeuristicBreakdown;
  classifier: GatewayResult;
  config: AnalysisConfig;
};

/**
 * 启发式分与分类器结果融合为一个 AI 检测结论。
 *
 * - 有分类器：`w·分类器 + (1−w)·启发式`，两者差距在容差内为 high，否则 medium；
 * - 无分类器：仅启发式，置信度最高 medium（句子过少为 low）；
 * - 请求预算耗尽导致分类器未返回：置信度再降一级，`degraded = true`。
 */
export function fuseAiDetection(params: FuseAiDetectionParams): AIDetectionResult {
  const { metrics, heuristic, classifier, config } = params;

  if (classifier.status === "available") {
    const finding = toFinding(classifier);
    const c = classifierProbability(finding);
    const w = config.fusion.classifierWeight;
    const probability = round2(clamp(w * c + (1 - w) * heuristic.score, 0, 100));
    const agree = Math.abs(c - heuristic.score) <= config.fusion.agreementTolerance;
    return {
      basis: "classifier",
      source: classifier.position === 0 ? "classifier_primary" : "classifier_fallback",
      classifier: finding,
      probability,
      confidence: agree ? "high" : "medium",
      verdict: aiVerdictFor(probability, config.thresholds),
      metrics,
      heuristic,
      degraded: false,
    };
  }

  const probability = round2(heuristic.score);
  let confidence: Confidence = metrics.totalSentences < config.heuristic.minSentences ? "low" : "medium";
  if (classifier.aborted) confidence = lowerConfidence(confidence);
  return {
    basis: "heuristic",
    source: "heuristic_only",
    probability,
    confidence,
    verdict: aiVerdictFor(probability, config.thresholds),
    metrics,
    heuristic,
    degraded: classifier.aborted,
  };
}
