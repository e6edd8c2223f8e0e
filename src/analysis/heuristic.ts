import type { HeuristicConfig, RampBounds } from "../config/index.js";
import type { HeuristicBreakdown, TextMetrics } from "../report/schema.js";
import { clamp, round2 } from "./textUtils.js";

/**
 * 线性坡度：value 落在 `ai` 端得 1，落在 `human` 端得 0，中间线性插值。
 * 两端大小关系任意（例如变异系数越小越像 AI，重复率越大越像 AI）。
 */
export function ramp(value: number, bounds: RampBounds): number {
  if (bounds.ai === bounds.human) return value === bounds.ai ? 1 : 0;
  return clamp((value - bounds.human) / (bounds.ai - bounds.human), 0, 1);
}

/** Flesch 指标落在“机器偏好”的区间内得 1，宽区间得 0.5。 */
function bandScore(value: number, core: [number, number], wide: [number, number]): number {
  if (value >= core[0] && value <= core[1]) return 1;
  if (value >= wide[0] && value <= wide[1]) return 0.5;
  return 0;
}

const NEUTRAL = 0.5;

/**
 * 结构性 AI 似然分（0..100），只依赖 TextStats 的输出。
 *
 * - uniformity：句长变异系数越低越像机器文本；
 * - repetition：窗口词汇多样性低、三元组重复多；
 * - smoothness：可读性在相邻句窗口间几乎不变，且落在 Flesch 的“标准”区间。
 */
export function scoreHeuristic(m: TextMetrics, cfg: HeuristicConfig): HeuristicBreakdown {
  const enoughSentences = m.totalSentences >= cfg.minSentences;

  const uniformity = enoughSentences ? ramp(m.sentenceLengthCv, cfg.sentenceLengthCv) : NEUTRAL;

  const repetition = Math.max(
    ramp(m.windowedUniqueWordRatio, cfg.windowedUniqueWordRatio),
    ramp(m.trigramRepeatRatio, cfg.trigramRepeatRatio)
  );

  let smoothness = NEUTRAL;
  if (enoughSentences) {
    const stability = ramp(m.readabilitySpread, cfg.readabilitySpread);
    const band =
      (bandScore(m.fleschReadingEase, [55, 75], [45, 85]) +
        bandScore(m.fleschKincaidGrade, [8, 12], [6, 14])) /
      2;
    smoothness = (stability + band) / 2;
  }

  const w = cfg.weights;
  const totalWeight = w.uniformity + w.repetition + w.smoothness;
  const weighted = totalWeight
    ? (uniformity * w.uniformity + repetition * w.repetition + smoothness * w.smoothness) / totalWeight
    : 0;

  return {
    score: round2(clamp(weighted * 100, 0, 100)),
    uniformity: round2(uniformity),
    repetition: round2(repetition),
    smoothness: round2(smoothness),
  };
}
