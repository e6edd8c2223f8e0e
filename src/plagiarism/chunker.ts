import type { Chunk } from "../report/schema.js";

export type ChunkBounds = {
  minChunkChars: number;
  maxChunkChars: number;
};

const WS = /\s/;

function isWs(ch: string | undefined): boolean {
  return ch !== undefined && WS.test(ch);
}

/** `cut` 是否紧跟在一段空白之后、且该空白之前是句末标点或其中含换行。 */
function isSentenceBoundary(text: string, cut: number): boolean {
  if (!isWs(text[cut - 1]) || isWs(text[cut])) return false;
  let j = cut - 1;
  let sawNewline = false;
  while (j >= 0 && isWs(text[j])) {
    if (text[j] === "\n") sawNewline = true;
    j -= 1;
  }
  if (sawNewline) return true;
  while (j >= 0 && /["'”’)\]]/.test(text[j])) j -= 1;
  return j >= 0 && /[.!?]/.test(text[j]);
}

function isWordBoundary(text: string, cut: number): boolean {
  return isWs(text[cut - 1]) && !isWs(text[cut]);
}

function lastCut(text: string, lo: number, hi: number, test: (text: string, cut: number) => boolean): number | undefined {
  for (let c = hi; c >= lo; c -= 1) {
    if (test(text, c)) return c;
  }
  return undefined;
}

/**
 * 把文本切成有序、不重叠、首尾相接的片段（惰性生成）。
 *
 * 在 `[min, max]` 窗口内优先切在最后一个句子边界（句末标点及其后空白归前一段），
 * 其次是最后一个空白，最后才硬切。窗口上限会预留 `min` 给剩余部分，避免尾段过短。
 * 所有片段按序拼接等于原文。
 */
export function* chunkText(text: string, bounds: ChunkBounds): Generator<Chunk> {
  const { minChunkChars: min, maxChunkChars: max } = bounds;
  let pos = 0;
  let index = 0;

  while (pos < text.length) {
    const remaining = text.length - pos;
    if (remaining <= max) {
      yield { index, text: text.slice(pos), start: pos, end: text.length };
      return;
    }

    let lo = pos + min;
    let hi = pos + Math.min(max, remaining - min);
    if (hi < lo) {
      lo = pos + 1;
      hi = pos + max;
    }

    let cut =
      lastCut(text, lo, hi, isSentenceBoundary) ??
      lastCut(text, lo, hi, isWordBoundary) ??
      pos + max;

    // 硬切时不要拆开代理对
    const code = text.charCodeAt(cut - 1);
    if (code >= 0xd800 && code <= 0xdbff && cut - 1 > pos) cut -= 1;

    yield { index, text: text.slice(pos, cut), start: pos, end: cut };
    index += 1;
    pos = cut;
  }
}

export function chunkAll(text: string, bounds: ChunkBounds): Chunk[] {
  return Array.from(chunkText(text, bounds));
}
