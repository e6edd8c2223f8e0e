import type { RiskThresholds } from "../config/index.js";
import type { RiskLevel, Verdict } from "../report/schema.js";

export function riskLevelFor(aiProbability: number, plagiarismScore: number, t: RiskThresholds): RiskLevel {
  if (aiProbability > t.aiHigh || plagiarismScore > t.plagiarismHigh) return "high";
  if (aiProbability > t.aiMedium || plagiarismScore > t.plagiarismMedium) return "medium";
  return "low";
}

function narrative(v: Omit<Verdict, "summary">, aiProbability: number, plagiarismScore: number): string {
  const ai = v.aiGenerated
    ? `likely AI-generated (${aiProbability.toFixed(0)}%)`
    : `not flagged as AI-generated (${aiProbability.toFixed(0)}%)`;
  const plag = v.plagiarized
    ? `overlaps with existing sources (${plagiarismScore.toFixed(0)}%)`
    : `shows no significant source overlap (${plagiarismScore.toFixed(0)}%)`;
  return `Overall risk ${v.riskLevel}: the text is ${ai} and ${plag}.`;
}

/**
 * 合成最终结论。两个分数各自独立判定，只派生风险等级和文字说明，不混成一个数值。
 */
export function fuseVerdict(aiProbability: number, plagiarismScore: number, t: RiskThresholds): Verdict {
  const base = {
    riskLevel: riskLevelFor(aiProbability, plagiarismScore, t),
    aiGenerated: aiProbability > t.aiHigh,
    plagiarized: plagiarismScore > t.plagiarismMedium,
  };
  return Object.freeze({ ...base, summary: narrative(base, aiProbability, plagiarismScore) });
}
