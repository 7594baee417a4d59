import { unified } from "unified";
import remarkParse from "remark-parse";
import { visit } from "unist-util-visit";
import { countLines, countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";

/** Reduces Markdown to its literal text: headings, paragraphs, list items and code. */
export class MarkdownParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const source = buffer.toString("utf8").replace(/^\uFEFF/, "");
    const tree = unified().use(remarkParse).parse(source);
    const fragments: string[] = [];

    visit(tree, (node) => {
      if ("value" in node && typeof node.value === "string") {
        const value = node.value.trim();
        if (value.length > 0) {
          fragments.push(value);
        }
      }
    });

    const text = fragments.join("\n");
    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(source)
      }
    };
  }
}
