import { countLines, countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";

export class TextParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    // Strip a UTF-8 byte order mark so it does not end up in the first chunk.
    const text = buffer.toString("utf8").replace(/^\uFEFF/, "");
    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(text)
      }
    };
  }
}
