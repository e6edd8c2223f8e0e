import { decodeXmlText } from "./xmlText.js";

export type DocxParagraph = {
  index: number;
  /**
   * 段落纯文本（已反转义）。
   * - `\t` 来自 `<w:tab/>`
   * - `\n` 来自 `<w:br/>` / `<w:cr/>`
   */
  text: string;
  /** 是否位于表格单元格内 */
  inTable: boolean;
};

/**
 * 从 `word/document.xml` 中按顺序提取段落（含表格单元格内段落）。
 *
 * 实现方式：正则流式扫描 `<w:p>...</w:p>`；用 `w:tc` 深度粗略判断是否来自表格。
 * 这不是完整的 XML 解析，但对抽取可读文本足够。
 */
export function extractDocumentParagraphs(documentXml: string): DocxParagraph[] {
  const paragraphs: DocxParagraph[] = [];
  const paragraphRe = /<w:p\b[^>]*\/>|<w:p\b[\s\S]*?<\/w:p>/g;

  let lastIndex = 0;
  let tcDepth = 0;

  function updateTableCellDepth(xmlChunk: string) {
    tcDepth += (xmlChunk.match(/<w:tc\b/g) ?? []).length;
    tcDepth = Math.max(0, tcDepth - (xmlChunk.match(/<\/w:tc>/g) ?? []).length);
  }

  let match: RegExpExecArray | null;
  while ((match = paragraphRe.exec(documentXml))) {
    updateTableCellDepth(documentXml.slice(lastIndex, match.index));
    paragraphs.push({
      index: paragraphs.length,
      text: extractParagraphText(match[0]),
      inTable: tcDepth > 0,
    });
    updateTableCellDepth(match[0]);
    lastIndex = paragraphRe.lastIndex;
  }

  return paragraphs;
}

/**
 * 从 `<w:p>...</w:p>` 中按出现顺序拼接 `<w:t>`、`<w:tab/>`、`<w:br/>`、`<w:cr/>`。
 */
export function extractParagraphText(paragraphXml: string): string {
  const tokenRe =
    /<w:t\b[^>]*\/>|<w:t\b[^>]*>([\s\S]*?)<\/w:t>|<w:tab\s*\/>|<w:br\b[^>]*\/>|<w:cr\s*\/>/g;

  let out = "";
  let m: RegExpExecArray | null;
  while ((m = tokenRe.exec(paragraphXml))) {
    if (m[1] !== undefined) {
      out += decodeXmlText(m[1]);
    } else {
      const token = m[0];
      if (token.startsWith("<w:tab")) out += "\t";
      else if (token.startsWith("<w:br") || token.startsWith("<w:cr")) out += "\n";
    }
  }

  return out.replace(/\s+$/g, "");
}
