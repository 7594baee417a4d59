import { DocxParser } from "./DocxParser.js";
import { MarkdownParser } from "./MarkdownParser.js";
import { PDFParser } from "./PDFParser.js";
import { TextParser } from "./TextParser.js";
import type { DocumentParser, SupportedFileType } from "./types.js";

export type DocumentParserRegistry = Record<SupportedFileType, DocumentParser>;

export function createDefaultParsers(): DocumentParserRegistry {
  return {
    pdf: new PDFParser(),
    docx: new DocxParser(),
    md: new MarkdownParser(),
    txt: new TextParser()
  };
}

export { DocumentProcessingError, FileValidationError } from "./errors.js";
export { supportedFileTypes, validateUploadedFile, sanitizeFilename } from "./fileValidator.js";
export type { ValidatedFile, UploadedFileLike } from "./fileValidator.js";
export type { DocumentParser, ParsedDocumentResult, SupportedFileType } from "./types.js";
