import { describe, expect, it } from "vitest";
import { buildQuestionPrompt, formatDocumentContext } from "../../../src/prompts/qa.js";
import { buildDocumentAnalysisPrompt, MAX_ANALYSIS_INPUT_CHARS } from "../../../src/prompts/analysis.js";

const at = new Date("2025-01-01T00:00:00.000Z");

describe("question prompt", () => {
  it("labels chunks with their own index", () => {
    expect(
      formatDocumentContext([
        { content: "first", index: 0, startOffset: 0, endOffset: 5 },
        { content: "second", index: 1, startOffset: 4, endOffset: 10 }
      ])
    ).toBe("Chunk 0:\nfirst\n\nChunk 1:\nsecond");
  });

  it("includes the previous conversation only when there is one", () => {
    const chunks = [{ content: "body", index: 0, startOffset: 0, endOffset: 4 }];

    const fresh = buildQuestionPrompt({ question: "What?", chunks, history: [] });
    expect(fresh.startsWith("Document Context:\nChunk 0:\nbody")).toBe(true);
    expect(fresh).not.toContain("Previous conversation:");

    const continued = buildQuestionPrompt({
      question: "And then?",
      chunks,
      history: [
        { role: "user", content: "What?", timestamp: at },
        { role: "assistant", content: "Body.", timestamp: at }
      ]
    });
    expect(continued.startsWith("Previous conversation:\nUser: What?\nAssistant: Body.\n\n")).toBe(true);
    expect(continued).toContain('"relevantChunks"');
  });
});

describe("document analysis prompt", () => {
  it("falls back to the default request and truncates long documents", () => {
    const prompt = buildDocumentAnalysisPrompt({
      fileName: "long.txt",
      text: "a".repeat(MAX_ANALYSIS_INPUT_CHARS + 10),
      analysisRequest: "   "
    });

    expect(prompt).toContain("User Request: Summarize the document and list its key points.");
    expect(prompt).toContain(`only the first ${MAX_ANALYSIS_INPUT_CHARS} of ${MAX_ANALYSIS_INPUT_CHARS + 10} characters`);
  });
});
