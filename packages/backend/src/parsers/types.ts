import type { DocumentType } from "@docent/shared";

export type SupportedFileType = Exclude<DocumentType, "transcript">;

export interface ParsedDocumentResult {
  text: string;
  metadata: {
    pageCount?: number;
    wordCount: number;
    lineCount?: number;
  };
}

export interface DocumentParser {
  parse(buffer: Buffer): Promise<ParsedDocumentResult>;
}

export function countWords(input: string): number {
  const normalized = input.trim();
  if (normalized.length === 0) {
    return 0;
  }

  return normalized.split(/\s+/).length;
}

export function countLines(input: string): number {
  return input.length > 0 ? input.split(/\r?\n/).length : 0;
}
