import JSZip from "jszip";
import { ExtractionError } from "../pipeline/errors.js";
import { extractDocumentParagraphs, type DocxParagraph } from "./documentXml.js";

export type ParsedDocx = {
  /** 段落列表（按出现顺序，含空段落） */
  paragraphs: DocxParagraph[];
  /** 非空段落以空行连接的纯文本 */
  text: string;
};

/**
 * 解析 `.docx`：用 jszip 解压并读取 `word/document.xml`，抽取段落文本。
 * 压缩包损坏或缺少正文时抛出 `ExtractionError`。
 */
export async function parseDocx(buffer: Uint8Array): Promise<ParsedDocx> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (err) {
    throw new ExtractionError(`Invalid docx: ${err instanceof Error ? err.message : String(err)}`);
  }

  const docXmlFile = zip.file("word/document.xml");
  if (!docXmlFile) {
    throw new ExtractionError("Invalid docx: missing word/document.xml");
  }

  const documentXml = await docXmlFile.async("text");
  const paragraphs = extractDocumentParagraphs(documentXml);
  const text = paragraphs
    .map((p) => p.text.trim())
    .filter(Boolean)
    .join("\n\n");

  return { paragraphs, text };
}
