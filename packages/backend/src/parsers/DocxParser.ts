import mammoth from "mammoth";
import { logger } from "../utils/logger.js";
import { countLines, countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";

export class DocxParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const result = await mammoth.extractRawText({ buffer });
    if (result.messages.length > 0) {
      logger.debug({ messages: result.messages.map((message) => message.message) }, "DOCX conversion messages");
    }

    const text = result.value
      .split("\n")
      .map((line) => line.trimEnd())
      .join("\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();

    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(text)
      }
    };
  }
}
