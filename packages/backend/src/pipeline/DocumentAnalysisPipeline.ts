import { EventEmitter } from "node:events";
import type { Chunk, DocumentAnalysis, DocumentMetadata, TranscriptSegment } from "@docent/shared";
import { appConfig } from "../config.js";
import { createDefaultParsers, type DocumentParserRegistry } from "../parsers/index.js";
import { DocumentProcessingError } from "../parsers/errors.js";
import type { ParsedDocumentResult, SupportedFileType } from "../parsers/types.js";
import { analysisCacheKey, type AnalysisCache, type CachedAnalysis } from "../services/AnalysisCache.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import type { QuestionAnswerService } from "../services/QuestionAnswerService.js";
import { randomId, systemClock, type Clock } from "../utils/clock.js";
import { logger } from "../utils/logger.js";
import { chunkText, chunkTranscript } from "./chunker.js";
import type {
  AnalyzeDocumentInput,
  AnalyzeTranscriptInput,
  DocumentAnalysisOptions,
  DocumentAnalysisOutcome,
  PipelinePhase,
  PipelineStatusEvent
} from "./types.js";

const defaultOptions: DocumentAnalysisOptions = {
  chunkSize: appConfig.CHUNK_SIZE,
  chunkOverlap: appConfig.CHUNK_OVERLAP
};

export interface DocumentAnalysisPipelineDeps {
  questionAnswerService: QuestionAnswerService;
  llmService: Pick<LLMServiceLike, "summarizeDocument">;
  parsers?: DocumentParserRegistry;
  cache?: AnalysisCache;
  clock?: Clock;
  options?: Partial<DocumentAnalysisOptions>;
}

export function transcriptText(segments: readonly TranscriptSegment[]): string {
  return segments.map((segment) => segment.text).join(" ");
}

/**
 * Turns an upload or a transcript into a live Q&A session: parse, chunk,
 * summarize, then open a session over the chunks. Every call opens a new
 * session, including calls answered from the analysis cache.
 */
export class DocumentAnalysisPipeline {
  private readonly eventEmitter = new EventEmitter();
  private readonly qa: QuestionAnswerService;
  private readonly llmService: Pick<LLMServiceLike, "summarizeDocument">;
  private readonly parsers: DocumentParserRegistry;
  private readonly cache: AnalysisCache | null;
  private readonly clock: Clock;
  private readonly options: DocumentAnalysisOptions;

  constructor(deps: DocumentAnalysisPipelineDeps) {
    this.qa = deps.questionAnswerService;
    this.llmService = deps.llmService;
    this.parsers = deps.parsers ?? createDefaultParsers();
    this.cache = deps.cache ?? null;
    this.clock = deps.clock ?? systemClock;
    this.options = {
      ...defaultOptions,
      ...deps.options
    };
  }

  onStatus(listener: (event: PipelineStatusEvent) => void): () => void {
    this.eventEmitter.on("status", listener);
    return () => {
      this.eventEmitter.off("status", listener);
    };
  }

  async analyzeDocument(input: AnalyzeDocumentInput): Promise<DocumentAnalysisOutcome> {
    const startedAt = Date.now();
    const analysisId = randomId();
    const cacheKey = analysisCacheKey(input.buffer, input.analysisRequest);

    try {
      const cached = this.cache?.get(cacheKey) ?? null;
      let parsed: CachedAnalysis | null = cached;
      if (!parsed) {
        this.emitStatus(analysisId, "parsing", 0);
        const { text, pageCount } = await this.parseFile(input.fileType, input.buffer);

        this.emitStatus(analysisId, "summarizing", 40);
        const analysis = await this.summarize(input.fileName, text, input.analysisRequest, input.signal);
        parsed = pageCount === undefined ? { text, analysis } : { text, pageCount, analysis };
        this.cache?.set(cacheKey, parsed);
      }

      this.emitStatus(analysisId, "chunking", 80);
      const chunks = chunkText(parsed.text, this.options.chunkSize, this.options.chunkOverlap);

      const metadata: DocumentMetadata = {
        fileName: input.fileName,
        fileType: input.fileType,
        fileSizeBytes: input.buffer.length,
        uploadedAt: this.clock.now()
      };
      if (parsed.pageCount !== undefined) {
        metadata.pageCount = parsed.pageCount;
      }

      return this.openSession(analysisId, chunks, parsed.analysis, metadata, cached !== null, startedAt);
    } catch (error) {
      this.emitStatus(analysisId, "error", 100, error instanceof Error ? error.message : "Unknown error");
      throw error;
    }
  }

  async analyzeTranscript(input: AnalyzeTranscriptInput): Promise<DocumentAnalysisOutcome> {
    const startedAt = Date.now();
    const analysisId = randomId();
    const text = transcriptText(input.segments);
    const fileName = input.title?.trim() || "transcript";
    const cacheKey = analysisCacheKey(text, input.analysisRequest);

    try {
      this.emitStatus(analysisId, "chunking", 0);
      const chunks = chunkTranscript(input.segments, this.options.chunkSize, this.options.chunkOverlap);
      if (chunks.length === 0) {
        throw new DocumentProcessingError("Transcript contains no text.");
      }

      const cached = this.cache?.get(cacheKey) ?? null;
      let analysis: DocumentAnalysis;
      if (cached) {
        analysis = cached.analysis;
      } else {
        this.emitStatus(analysisId, "summarizing", 40);
        analysis = await this.summarize(fileName, text, input.analysisRequest, input.signal);
        this.cache?.set(cacheKey, { text, analysis });
      }

      const metadata: DocumentMetadata = {
        fileName,
        fileType: "transcript",
        fileSizeBytes: Buffer.byteLength(text, "utf8"),
        uploadedAt: this.clock.now()
      };

      return this.openSession(analysisId, chunks, analysis, metadata, cached !== null, startedAt);
    } catch (error) {
      this.emitStatus(analysisId, "error", 100, error instanceof Error ? error.message : "Unknown error");
      throw error;
    }
  }

  private openSession(
    analysisId: string,
    chunks: Chunk[],
    analysis: DocumentAnalysis,
    metadata: DocumentMetadata,
    cached: boolean,
    startedAt: number
  ): DocumentAnalysisOutcome {
    const session = this.qa.createSession(chunks, { metadata, analysis });
    this.emitStatus(analysisId, "completed", 100);

    const processingTimeMs = Date.now() - startedAt;
    logger.info(
      {
        analysisId,
        sessionId: session.sessionId,
        fileName: metadata.fileName,
        chunkCount: chunks.length,
        cached,
        processingTimeMs
      },
      "Document analysis completed"
    );

    return {
      session,
      analysis,
      metadata,
      chunkCount: chunks.length,
      processingTimeMs,
      cached
    };
  }

  private async parseFile(
    fileType: SupportedFileType,
    buffer: Buffer
  ): Promise<{ text: string; pageCount?: number }> {
    let result: ParsedDocumentResult;
    try {
      result = await this.parsers[fileType].parse(buffer);
    } catch (error) {
      throw new DocumentProcessingError(`Failed to parse ${fileType} document.`, { cause: error });
    }

    if (result.text.trim().length === 0) {
      throw new DocumentProcessingError("No extractable text found in the document.");
    }

    return result.metadata.pageCount === undefined
      ? { text: result.text }
      : { text: result.text, pageCount: result.metadata.pageCount };
  }

  private summarize(
    fileName: string,
    text: string,
    analysisRequest: string | undefined,
    signal: AbortSignal | undefined
  ): Promise<DocumentAnalysis> {
    return this.llmService.summarizeDocument({
      fileName,
      text,
      ...(analysisRequest !== undefined ? { analysisRequest } : {}),
      ...(signal ? { signal } : {})
    });
  }

  private emitStatus(analysisId: string, phase: PipelinePhase, progress: number, message?: string): void {
    const payload: PipelineStatusEvent = {
      analysisId,
      phase,
      progress
    };
    if (message !== undefined) {
      payload.message = message;
    }

    this.eventEmitter.emit("status", payload);
  }
}
