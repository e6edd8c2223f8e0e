import { PDFParse } from "pdf-parse";
import { ExtractionError } from "../pipeline/errors.js";

export type ParsedPdf = {
  pageCount: number;
  /** 非空页面以空行连接的纯文本 */
  text: string;
};

/**
 * 解析 PDF：用 pdf-parse 逐页抽取文本层。
 * 文件损坏或加密时抛出 `ExtractionError`；扫描件没有文本层，得到空文本，由调用方判断。
 */
export async function parsePdf(buffer: Uint8Array): Promise<ParsedPdf> {
  // pdf.js 可能转移底层 ArrayBuffer，传副本
  const parser = new PDFParse({ data: new Uint8Array(buffer) });
  try {
    const result = await parser.getText();
    const text = result.pages
      .map((p) => p.text.trim())
      .filter(Boolean)
      .join("\n\n");
    return { pageCount: result.total, text };
  } catch (err) {
    throw new ExtractionError(`Invalid pdf: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    await parser.destroy();
  }
}
