import type { Chunk, ConversationMessage, DocumentAnalysis } from "@docent/shared";

export interface AskModelInput {
  question: string;
  chunks: readonly Chunk[];
  threadId: string;
  history: readonly ConversationMessage[];
  signal?: AbortSignal;
}

/** Sends one question with its document context and returns the raw model text. */
export type AskModel = (input: AskModelInput) => Promise<string>;

export interface SummarizeDocumentInput {
  fileName: string;
  text: string;
  analysisRequest?: string;
  signal?: AbortSignal;
}

export const llmProviders = ["openai", "openrouter", "ollama"] as const;

export type LLMProvider = (typeof llmProviders)[number];

export function isLLMProvider(value: unknown): value is LLMProvider {
  return llmProviders.some((provider) => provider === value);
}

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface LLMChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  temperature: number;
  maxTokens: number;
  jsonResponse: boolean;
  messages: LLMChatMessage[];
}

export interface ChatCompletionResult {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
  };
}

/** The single completion call the service needs from an OpenAI-compatible backend. */
export interface ChatCompletionClient {
  complete(request: ChatCompletionRequest, signal?: AbortSignal): Promise<ChatCompletionResult>;
}

export interface LLMServiceLike {
  answerQuestion(input: AskModelInput): Promise<string>;
  summarizeDocument(input: SummarizeDocumentInput): Promise<DocumentAnalysis>;
  isConfigured(): boolean;
}
