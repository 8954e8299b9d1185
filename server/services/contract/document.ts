import path from "node:path";

import { UnsupportedFormatError } from "./errors";

export type DocumentFormat = "pdf" | "docx" | "plain-text";

export interface ContractDocument {
  readonly content: Buffer;
  readonly format: DocumentFormat;
}

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".txt": "plain-text",
};

export interface ResolveFormatOptions {
  /**
   * Reject suffixes outside the known set instead of reading them as text.
   */
  strict?: boolean;
}

export function resolveDocumentFormat(
  filename: string,
  options: ResolveFormatOptions = {},
): DocumentFormat {
  const extension = path.extname(filename || "").toLowerCase();
  const format = FORMAT_BY_EXTENSION[extension];
  if (format) return format;

  if (options.strict) {
    throw new UnsupportedFormatError(extension);
  }
  return "plain-text";
}
