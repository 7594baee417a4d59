import type {
  Chunk,
  ConversationMessage,
  DocumentAnalysis,
  DocumentMetadata
} from "./session.js";

export interface ApiErrorResponse {
  error: string;
  code?: string;
  details?: unknown;
}

export interface DocumentAnalysisResponse {
  sessionId: string;
  expiresAt: Date;
  summary: string;
  keyPoints: string[];
  metadata: DocumentMetadata;
  chunkCount: number;
  processingTimeMs: number;
  cached: boolean;
}

export interface TranscriptSegment {
  text: string;
  startSeconds: number;
  endSeconds: number;
}

export interface AnalyzeTranscriptRequest {
  title?: string;
  segments: TranscriptSegment[];
  analysisRequest?: string;
}

export interface AskQuestionRequest {
  question: string;
  threadId?: string;
}

export interface QuestionAnswerResponse {
  answer: string;
  relevantChunkIndices: number[];
  threadId: string;
  conversationHistory: ConversationMessage[];
  totalQuestionsAsked: number;
}

export interface SessionDetailResponse {
  session: {
    sessionId: string;
    createdAt: Date;
    expiresAt: Date;
    totalTokensUsed: number;
    questionCount: number;
    chunkCount: number;
    metadata?: DocumentMetadata;
    analysis?: DocumentAnalysis;
    conversationHistory: ConversationMessage[];
  };
}

export interface SessionChunksResponse {
  sessionId: string;
  chunks: Chunk[];
}

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  activeSessions: number;
  checks: {
    llm: "configured" | "not_configured";
  };
  memoryUsage: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}

export type ModelProvider = "openai" | "openrouter" | "ollama";

export interface ModelSelection {
  provider: ModelProvider;
  model: string;
}

export interface ModelProviderInfo {
  provider: ModelProvider;
  baseURL: string;
  defaultModel: string;
  configured: boolean;
}

export interface ModelProvidersResponse {
  providers: ModelProviderInfo[];
  current: ModelSelection;
}

export interface AvailableModel {
  id: string;
  provider: ModelProvider;
}

export interface DiscoverModelsResponse {
  provider: ModelProvider;
  models: AvailableModel[];
  cached: boolean;
}

export interface SwitchModelRequest {
  provider: ModelProvider;
  model: string;
}

export interface SwitchModelResponse {
  message: string;
  warning: string;
  previous: ModelSelection;
  current: ModelSelection;
  resetThreads: number;
}
