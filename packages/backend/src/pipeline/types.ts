import type {
  DocumentAnalysis,
  DocumentMetadata,
  DocumentSession,
  TranscriptSegment
} from "@docent/shared";
import type { SupportedFileType } from "../parsers/types.js";

export type PipelinePhase = "parsing" | "chunking" | "summarizing" | "completed" | "error";

export interface PipelineStatusEvent {
  analysisId: string;
  phase: PipelinePhase;
  progress: number;
  message?: string;
}

export interface DocumentAnalysisOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface AnalyzeDocumentInput {
  buffer: Buffer;
  fileName: string;
  fileType: SupportedFileType;
  analysisRequest?: string;
  signal?: AbortSignal;
}

export interface AnalyzeTranscriptInput {
  title?: string;
  segments: readonly TranscriptSegment[];
  analysisRequest?: string;
  signal?: AbortSignal;
}

export interface DocumentAnalysisOutcome {
  session: DocumentSession;
  analysis: DocumentAnalysis;
  metadata: DocumentMetadata;
  chunkCount: number;
  processingTimeMs: number;
  /** True when the summary came from the analysis cache instead of the model. */
  cached: boolean;
}
