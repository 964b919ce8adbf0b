/**
 * Plain-text extraction per declared document format.
 *
 * Supported formats:
 *   - text / markdown / csv : strict UTF-8 decode (BOM dropped)
 *   - html                  : scripts, styles and tags removed, common entities decoded
 *   - pdf                   : text layer via pdf-parse
 *   - docx                  : raw paragraph text via mammoth
 *
 * Anything else (legacy .doc, unknown extensions) is rejected with UnsupportedFormat. Bytes that do not
 * decode in the declared format are rejected with CorruptInput; callers isolate the owning
 * document as failed.
 */
import mammoth from "mammoth";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { CorruptInputError, UnsupportedFormatError, errorMessage } from "./errors";
import type { DocumentFormat } from "./types";

/** Opaque extraction capability: file bytes + declared format -> plain text. */
export interface Extractor {
  extract(bytes: Uint8Array, format: DocumentFormat): Promise<string>;
}

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  txt: "text",
  text: "text",
  log: "text",
  md: "markdown",
  markdown: "markdown",
  csv: "csv",
  html: "html",
  htm: "html",
  pdf: "pdf",
  docx: "docx",
};

/**
 * Resolve the declared format of a path or URL from its extension. URLs whose path has no known
 * extension are served pages, so they count as html.
 */
export function detectFormat(location: string, isUrl = false): DocumentFormat {
  let pathname = location;
  if (isUrl) {
    try {
      pathname = new URL(location).pathname;
    } catch {
      return "unknown";
    }
  }
  const ext = path.posix.extname(pathname.replace(/\\/g, "/")).toLowerCase().slice(1);
  const format = EXTENSION_FORMATS[ext];
  if (format) return format;
  return isUrl ? "html" : "unknown";
}

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

/** Reduce an HTML page to readable text, one block per line. */
export function htmlToText(html: string): string {
  const stripped = html
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<(script|style|noscript|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, " ")
    .replace(/<(br|\/p|\/div|\/li|\/h[1-6]|\/tr|\/section|\/article)\b[^>]*>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole: string, entity: string) => {
      if (entity.startsWith("#x") || entity.startsWith("#X")) {
        return String.fromCodePoint(parseInt(entity.slice(2), 16));
      }
      if (entity.startsWith("#")) return String.fromCodePoint(parseInt(entity.slice(1), 10));
      return ENTITIES[entity.toLowerCase()] ?? whole;
    });
  return stripped
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v\r]+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (e) {
    throw new CorruptInputError(`Input is not valid UTF-8: ${errorMessage(e)}`, e);
  }
}

/** Default extractor used by the server. */
export class DefaultExtractor implements Extractor {
  private readonly verbose: boolean;

  public constructor(verbose = false) {
    this.verbose = verbose;
  }

  public async extract(bytes: Uint8Array, format: DocumentFormat): Promise<string> {
    switch (format) {
      case "text":
      case "markdown":
      case "csv":
        return decodeUtf8(bytes);
      case "html":
        return htmlToText(decodeUtf8(bytes));
      case "pdf":
        return this.extractPdf(bytes);
      case "docx":
        return this.extractDocx(bytes);
      case "unknown":
        throw new UnsupportedFormatError(format);
      default: {
        const exhaustiveCheck: never = format;
        throw new UnsupportedFormatError(String(exhaustiveCheck));
      }
    }
  }

  private async extractPdf(bytes: Uint8Array): Promise<string> {
    if (this.verbose) console.error(`[PDF] Extracting text from ${bytes.byteLength} bytes...`);
    const parser = new PDFParse({ data: bytes });
    try {
      const textResult = await parser.getText();
      if (this.verbose) console.error(`[PDF] Extracted ${textResult.pages.length} page(s)`);
      return textResult.text;
    } catch (e) {
      throw new CorruptInputError(`Unreadable PDF: ${errorMessage(e)}`, e);
    } finally {
      await parser.destroy();
    }
  }

  private async extractDocx(bytes: Uint8Array): Promise<string> {
    if (this.verbose) console.error(`[DOCX] Extracting text from ${bytes.byteLength} bytes...`);
    try {
      const result = await mammoth.extractRawText({
        buffer: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength),
      });
      if (this.verbose && result.messages.length > 0) {
        console.error(`[DOCX] ${result.messages.length} conversion warning(s)`);
      }
      return result.value.trim();
    } catch (e) {
      throw new CorruptInputError(`Unreadable DOCX: ${errorMessage(e)}`, e);
    }
  }
}
