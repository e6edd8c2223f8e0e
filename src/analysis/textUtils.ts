export function normalizeText(input: string): string {
  return input
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t\u00A0]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** 按空白切分的“词”，保留标点（用于计数）。 */
export function splitWords(input: string): string[] {
  return input.split(/\s+/g).filter(Boolean);
}

/**
 * 小写化、去掉首尾标点后的词形（用于多样性 / 重复 / 相似度统计）。
 * 纯标点的 token 会被丢弃。
 */
export function tokenizeWords(input: string): string[] {
  const out: string[] = [];
  for (const raw of splitWords(input.toLowerCase())) {
    const t = raw.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "");
    if (t) out.push(t);
  }
  return out;
}

/**
 * 英文断句：句末标点（可带右引号/括号）后接空白处断开；空行也视为边界。
 */
export function splitSentences(input: string): string[] {
  const text = normalizeText(input);
  if (!text) return [];
  const raw = text.split(/(?<=[.!?]["'”’)\]]*)\s+|\n\n/g);
  return raw.map((s) => s.trim()).filter((s) => /[\p{L}\p{N}]/u.test(s));
}

/**
 * 音节数近似：元音组计数；词尾不发音的 `e` / `-ed` 不计（辅音 + `le` 结尾保留）。
 */
export function countSyllables(word: string): number {
  const w = word.toLowerCase().replace(/[^a-z]/g, "");
  if (w.length <= 3) return 1;
  let count = w.match(/[aeiouy]+/g)?.length ?? 0;
  if (w.endsWith("e") && !/[^aeiouy]le$/.test(w) && count > 1) count -= 1;
  if (w.endsWith("ed") && !/[td]ed$/.test(w) && count > 1) count -= 1;
  return Math.max(1, count);
}

export function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function mean(xs: number[]): number {
  if (!xs.length) return 0;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

export function variance(xs: number[]): number {
  if (xs.length <= 1) return 0;
  const m = mean(xs);
  return xs.reduce((a, b) => a + (b - m) ** 2, 0) / xs.length;
}

export function ngrams(tokens: string[], n: number): string[] {
  const grams: string[] = [];
  for (let i = 0; i <= tokens.length - n; i += 1) {
    grams.push(tokens.slice(i, i + n).join(" "));
  }
  return grams;
}

/**
 * 计算 token n-gram 的重复比例（0..1）。
 * 机器文本常见局部句式复用，重复 n-gram 占比是一个稳定、可解释的信号。
 */
export function ngramRepeatRatio(tokens: string[], n: number): number {
  if (tokens.length < n + 2) return 0;
  const grams = ngrams(tokens, n);
  const total = grams.length;
  const uniq = new Set(grams).size;
  return total ? clamp((total - uniq) / total, 0, 1) : 0;
}

/**
 * 滑动窗口 type/token ratio（MATTR）。文本短于窗口时退化为整体比例。
 */
export function movingAverageTtr(tokens: string[], windowSize: number): number {
  if (!tokens.length) return 0;
  if (tokens.length <= windowSize) return new Set(tokens).size / tokens.length;

  const counts = new Map<string, number>();
  for (let i = 0; i < windowSize; i += 1) {
    counts.set(tokens[i], (counts.get(tokens[i]) ?? 0) + 1);
  }
  let sum = counts.size / windowSize;
  let windows = 1;
  for (let i = windowSize; i < tokens.length; i += 1) {
    const out = tokens[i - windowSize];
    const left = (counts.get(out) ?? 0) - 1;
    if (left > 0) counts.set(out, left);
    else counts.delete(out);
    counts.set(tokens[i], (counts.get(tokens[i]) ?? 0) + 1);
    sum += counts.size / windowSize;
    windows += 1;
  }
  return sum / windows;
}
