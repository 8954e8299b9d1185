import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";

import type { ContractDocument } from "./document";
import { DecodeError, UnsupportedFormatError } from "./errors";

/** Text of each page in page order; `null` or "" for pages without text. */
export type PdfPageReader = (
  content: Buffer,
) => Promise<Array<string | null>>;

/** Paragraph texts in document order, empty paragraphs included. */
export type DocxParagraphReader = (content: Buffer) => Promise<string[]>;

export interface ExtractorDependencies {
  readPdfPages: PdfPageReader;
  readDocxParagraphs: DocxParagraphReader;
}

export interface ContractTextExtractor {
  extract(document: ContractDocument): Promise<string>;
}

// mammoth terminates every paragraph, empty ones included, with a blank line.
const RAW_PARAGRAPH_SEPARATOR = "\n\n";

/**
 * Splits mammoth raw text back into paragraphs.
 *
 * Two consecutive line breaks (`<w:br/>`) inside one paragraph also render as
 * a blank line, so such a paragraph is split in two and the joined text loses
 * one of the breaks.
 */
export function splitRawTextParagraphs(raw: string): string[] {
  if (!raw) return [];
  const paragraphs = raw.split(RAW_PARAGRAPH_SEPARATOR);
  if (raw.endsWith(RAW_PARAGRAPH_SEPARATOR)) {
    paragraphs.pop();
  }
  return paragraphs;
}

const readPdfPagesWithPdfParse: PdfPageReader = async (content) => {
  const parser = new PDFParse({ data: content });
  try {
    const result = await parser.getText();
    return result.pages.map((page) => page.text);
  } finally {
    await parser.destroy();
  }
};

const readDocxParagraphsWithMammoth: DocxParagraphReader = async (content) => {
  const { value } = await mammoth.extractRawText({ buffer: content });
  return splitRawTextParagraphs(value);
};

export function decodeUtf8(content: Buffer): string {
  // ignoreBOM keeps a leading byte-order mark in the output.
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(content);
  } catch (err) {
    if (err instanceof TypeError) {
      throw new DecodeError();
    }
    throw err;
  }
}

export function createExtractor(
  dependencies: Partial<ExtractorDependencies> = {},
): ContractTextExtractor {
  const readPdfPages = dependencies.readPdfPages ?? readPdfPagesWithPdfParse;
  const readDocxParagraphs =
    dependencies.readDocxParagraphs ?? readDocxParagraphsWithMammoth;

  const extractPdf = async (content: Buffer): Promise<string> => {
    const pages = await readPdfPages(content);
    let text = "";
    for (const pageText of pages) {
      if (pageText) {
        text += `${pageText}\n`;
      }
    }
    return text;
  };

  const extractDocx = async (content: Buffer): Promise<string> => {
    const paragraphs = await readDocxParagraphs(content);
    return paragraphs.join("\n");
  };

  return {
    async extract(document) {
      const { content, format } = document;
      switch (format) {
        case "pdf":
          return extractPdf(content);
        case "docx":
          return extractDocx(content);
        case "plain-text":
          return decodeUtf8(content);
        default: {
          const unknownFormat: never = format;
          throw new UnsupportedFormatError(String(unknownFormat));
        }
      }
    },
  };
}

export const defaultExtractor = createExtractor();

export const extractText = (document: ContractDocument): Promise<string> =>
  defaultExtractor.extract(document);
