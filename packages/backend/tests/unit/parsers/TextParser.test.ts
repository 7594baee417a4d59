import { describe, expect, it } from "vitest";
import { TextParser } from "../../../src/parsers/TextParser.js";

describe("TextParser", () => {
  it("returns plain text content and metadata", async () => {
    const parser = new TextParser();
    const result = await parser.parse(Buffer.from("hello reader\nsecond line", "utf8"));

    expect(result.text).toBe("hello reader\nsecond line");
    expect(result.metadata.wordCount).toBe(4);
    expect(result.metadata.lineCount).toBe(2);
  });

  it("strips a UTF-8 byte order mark", async () => {
    const result = await new TextParser().parse(Buffer.from("\uFEFFfirst words", "utf8"));

    expect(result.text).toBe("first words");
    expect(result.metadata.wordCount).toBe(2);
  });
});
