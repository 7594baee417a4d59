import express from "express";
import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import type { DocumentAnalysis } from "@docent/shared";
import { DocumentAnalysisPipeline } from "../../src/pipeline/DocumentAnalysisPipeline.js";
import { createTranscriptsRouter } from "../../src/routes/transcripts.js";
import { QuestionAnswerService } from "../../src/services/QuestionAnswerService.js";
import { InMemorySessionStore } from "../../src/services/SessionStore.js";
import type { LLMServiceLike, SummarizeDocumentInput } from "../../src/services/llmTypes.js";
import { InMemoryThreadRegistry } from "../../src/services/ThreadRegistry.js";
import { FakeLLMService } from "../helpers/FakeLLMService.js";
import { ManualClock, sequentialIds } from "../helpers/testClock.js";

function setup(summarizer?: Pick<LLMServiceLike, "summarizeDocument">) {
  const clock = new ManualClock();
  const sessions = new InMemorySessionStore({ clock, idGenerator: sequentialIds("session") });
  const threads = new InMemoryThreadRegistry({ clock, idGenerator: sequentialIds("thread") });
  const llm = new FakeLLMService();
  const questionAnswerService = new QuestionAnswerService({
    sessions,
    threads,
    clock,
    askModel: (input) => llm.answerQuestion(input)
  });
  const pipeline = new DocumentAnalysisPipeline({
    questionAnswerService,
    llmService: summarizer ?? llm,
    clock,
    options: { chunkSize: 4000, chunkOverlap: 400 }
  });

  const app = express();
  app.use(express.json());
  app.use("/api/transcripts", createTranscriptsRouter({ pipeline }));

  return { app, llm, sessions };
}

describe("transcripts api", () => {
  it("analyzes a timed transcript", async () => {
    const { app, llm, sessions } = setup();

    const response = await request(app)
      .post("/api/transcripts/analyze")
      .send({
        title: " Weekly sync ",
        segments: [
          { text: "Welcome everyone.", startSeconds: 0, endSeconds: 3 },
          { text: "Budget is approved.", startSeconds: 3, endSeconds: 7.5 }
        ]
      });

    expect(response.status).toBe(201);
    expect(response.body.metadata).toEqual({
      fileName: "Weekly sync",
      fileType: "transcript",
      fileSizeBytes: 37,
      uploadedAt: "2025-01-01T00:00:00.000Z"
    });
    expect(response.body.chunkCount).toBe(1);
    expect(llm.summaries[0]?.text).toBe("Welcome everyone. Budget is approved.");
    expect(llm.summaries[0]?.signal).toBeInstanceOf(AbortSignal);
    expect(llm.summaries[0]?.signal?.aborted).toBe(false);

    const chunk = sessions.get(response.body.sessionId)?.documentChunks[0];
    expect(chunk?.startTimeSeconds).toBe(0);
    expect(chunk?.endTimeSeconds).toBeCloseTo(3 + 18 * (4.5 / 19), 10);
  });

  it("rejects segments that end before they start", async () => {
    const { app } = setup();

    const response = await request(app)
      .post("/api/transcripts/analyze")
      .send({ segments: [{ text: "Backwards.", startSeconds: 5, endSeconds: 2 }] });

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual([
      { path: "segments.0.endSeconds", message: "endSeconds must not be before startSeconds" }
    ]);
  });

  it("rejects an empty segment list", async () => {
    const { app } = setup();

    const response = await request(app).post("/api/transcripts/analyze").send({ segments: [] });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Validation failed");
  });

  it("returns 422 for a transcript without text", async () => {
    const { app, llm } = setup();

    const response = await request(app)
      .post("/api/transcripts/analyze")
      .send({ segments: [{ text: "  ", startSeconds: 0, endSeconds: 1 }] });

    expect(response.status).toBe(422);
    expect(response.body).toEqual({
      error: "Transcript contains no text.",
      code: "document_processing_failed"
    });
    expect(llm.summaries).toHaveLength(0);
  });

  it("cancels summarization when the client disconnects", async () => {
    const summarizeDocument = vi.fn(
      (input: SummarizeDocumentInput) =>
        new Promise<DocumentAnalysis>((_resolve, reject) => {
          input.signal?.addEventListener("abort", () => {
            reject(input.signal?.reason);
          });
        })
    );
    const { app, sessions } = setup({ summarizeDocument });

    await expect(
      request(app)
        .post("/api/transcripts/analyze")
        .send({ segments: [{ text: "Never finished.", startSeconds: 0, endSeconds: 1 }] })
        .timeout(50)
    ).rejects.toThrow();

    await vi.waitFor(() => {
      expect(summarizeDocument.mock.calls[0]?.[0].signal?.aborted).toBe(true);
    });
    expect(sessions.size()).toBe(0);
  });
});
