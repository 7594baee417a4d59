import { beforeEach, describe, expect, it, vi } from "vitest";
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { PDFParser } from "../../../src/parsers/PDFParser.js";

vi.mock("pdf-parse/lib/pdf-parse.js", () => ({
  default: vi.fn()
}));

const mockedPdfParse = vi.mocked(pdfParse);

describe("PDFParser", () => {
  beforeEach(() => {
    mockedPdfParse.mockReset();
  });

  it("uses pdf-parse output as parsed text and metadata", async () => {
    mockedPdfParse.mockResolvedValue({
      text: "Quarterly report for review",
      numpages: 3
    } as never);

    const parser = new PDFParser();
    const result = await parser.parse(Buffer.from("%PDF-1.7", "utf8"));

    expect(mockedPdfParse).toHaveBeenCalledTimes(1);
    expect(result.text).toBe("Quarterly report for review");
    expect(result.metadata.pageCount).toBe(3);
    expect(result.metadata.wordCount).toBe(4);
  });

  it("propagates parser failures", async () => {
    mockedPdfParse.mockRejectedValue(new Error("bad xref table"));

    await expect(new PDFParser().parse(Buffer.from("%PDF-1.7", "utf8"))).rejects.toThrow("bad xref table");
  });
});
