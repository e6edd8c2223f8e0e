import { parseDocx } from "../docx/parser.js";
import { parsePdf } from "../pdf/parser.js";
import { ExtractionError } from "../pipeline/errors.js";

/**
 * 文本抽取服务：原始字节 → UTF-8 纯文本。失败抛出 `ExtractionError`。
 */
export interface TextExtractor {
  extract(bytes: Uint8Array, filename: string): Promise<string>;
}

const PLAIN_TEXT_EXTENSIONS = [".txt", ".md"];

/**
 * 默认抽取器：`.pdf`（pdf-parse）、`.docx`（jszip）与纯文本（`.txt` / `.md`）。
 */
export class DefaultTextExtractor implements TextExtractor {
  async extract(bytes: Uint8Array, filename: string): Promise<string> {
    const lower = filename.toLowerCase();
    if (!bytes.length) throw new ExtractionError("Empty file");

    if (lower.endsWith(".pdf")) {
      const { text } = await parsePdf(bytes);
      if (!text.trim()) throw new ExtractionError("PDF has no text layer (scanned or empty pages)");
      return text;
    }

    if (lower.endsWith(".docx")) {
      const { text } = await parseDocx(bytes);
      if (!text.trim()) throw new ExtractionError("Document contains no extractable text");
      return text;
    }

    if (PLAIN_TEXT_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
      let text: string;
      try {
        text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
      } catch {
        throw new ExtractionError("File is not valid UTF-8 text");
      }
      return text.replace(/^\uFEFF/, "");
    }

    throw new ExtractionError(`Unsupported file type: ${filename}`);
  }
}
