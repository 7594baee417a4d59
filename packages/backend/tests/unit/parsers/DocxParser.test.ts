import { beforeEach, describe, expect, it, vi } from "vitest";
import mammoth from "mammoth";
import { DocxParser } from "../../../src/parsers/DocxParser.js";

vi.mock("mammoth", () => ({
  default: {
    extractRawText: vi.fn()
  }
}));

const mockedExtractRawText = vi.mocked(mammoth.extractRawText);

describe("DocxParser", () => {
  beforeEach(() => {
    mockedExtractRawText.mockReset();
  });

  it("collapses the blank lines mammoth leaves between paragraphs", async () => {
    mockedExtractRawText.mockResolvedValue({
      value: "Title\n\n\n\nBody line   \nEnd\n\n",
      messages: []
    });

    const buffer = Buffer.from("PK\u0003\u0004");
    const result = await new DocxParser().parse(buffer);

    expect(mockedExtractRawText).toHaveBeenCalledWith({ buffer });
    expect(result.text).toBe("Title\n\nBody line\nEnd");
    expect(result.metadata.wordCount).toBe(4);
    expect(result.metadata.lineCount).toBe(4);
  });
});
