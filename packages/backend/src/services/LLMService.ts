import OpenAI from "openai";
import { z } from "zod";
import type { DocumentAnalysis } from "@docent/shared";
import {
  DOCUMENT_ANALYSIS_SYSTEM_PROMPT,
  QA_SYSTEM_PROMPT,
  buildDocumentAnalysisPrompt,
  buildQuestionPrompt
} from "../prompts/index.js";
import type { AppConfig } from "../config.js";
import { logger } from "../utils/logger.js";
import { readModelJson } from "./answerExtractor.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import type {
  AskModelInput,
  ChatCompletionClient,
  ChatCompletionResult,
  LLMConfig,
  LLMProvider,
  LLMServiceLike,
  SummarizeDocumentInput
} from "./llmTypes.js";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

const documentAnalysisSchema = z.object({
  summary: z.string(),
  keyPoints: z
    .array(z.unknown())
    .default([])
    .transform((points) =>
      points.filter((point): point is string => typeof point === "string" && point.trim().length > 0)
    )
});

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  temperature: number;
  maxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

export function isProviderConfigured(config: Pick<LLMConfig, "provider" | "apiKey">): boolean {
  return config.provider === "ollama" || config.apiKey.length > 0;
}

function clientApiKey(config: Pick<LLMConfig, "provider" | "apiKey">): string {
  // Ollama ignores the key but the SDK refuses to start without one.
  return config.apiKey || (config.provider === "ollama" ? "ollama" : "");
}

/** Lists the model ids an OpenAI-compatible endpoint serves, sorted. */
export async function listProviderModels(
  config: Pick<LLMConfig, "provider" | "apiKey" | "baseURL">,
  signal?: AbortSignal
): Promise<string[]> {
  const client = new OpenAI({
    apiKey: clientApiKey(config),
    baseURL: config.baseURL ?? DEFAULT_OPENAI_BASE_URL
  });

  const ids: string[] = [];
  for await (const model of client.models.list(signal ? { signal } : {})) {
    ids.push(model.id);
  }
  return ids.sort((a, b) => a.localeCompare(b));
}

/** Adapts the `openai` SDK to the one completion call the service makes. */
export function createOpenAIChatClient(options: { apiKey: string; baseURL: string }): ChatCompletionClient {
  const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });

  return {
    async complete(request, signal) {
      const response = await client.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          stream: false,
          ...(request.jsonResponse ? { response_format: { type: "json_object" as const } } : {}),
          messages: request.messages.map((message) =>
            message.role === "system"
              ? { role: "system" as const, content: message.content }
              : message.role === "user"
                ? { role: "user" as const, content: message.content }
                : { role: "assistant" as const, content: message.content }
          )
        },
        signal ? { signal } : {}
      );

      const result: ChatCompletionResult = {
        content: response.choices[0]?.message.content ?? ""
      };
      if (response.usage) {
        result.usage = {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens
        };
      }
      return result;
    }
  };
}

export function parseDocumentAnalysis(raw: string): DocumentAnalysis {
  const parsed = readModelJson(raw, (value) => {
    const result = documentAnalysisSchema.safeParse(value);
    return result.success ? result.data : null;
  });

  return parsed ?? { summary: raw.trim(), keyPoints: [] };
}

export class LLMService implements LLMServiceLike {
  private readonly client: ChatCompletionClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: ChatCompletionClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? DEFAULT_OPENAI_BASE_URL,
      temperature: config.temperature ?? 0.2,
      maxTokens: config.maxTokens ?? 2048,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 120_000
    };

    this.client =
      deps?.client ??
      createOpenAIChatClient({
        apiKey: clientApiKey(this.config),
        baseURL: this.config.baseURL
      });

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  isConfigured(): boolean {
    return isProviderConfigured(this.config);
  }

  async answerQuestion(input: AskModelInput): Promise<string> {
    const prompt = buildQuestionPrompt(input);
    logger.debug(
      { threadId: input.threadId, chunkCount: input.chunks.length, historyLength: input.history.length },
      "Sending question to model"
    );

    const response = await this.rateLimiter.run(
      () =>
        this.client.complete(
          {
            model: this.config.chatModel,
            temperature: this.config.temperature,
            maxTokens: this.config.maxTokens,
            jsonResponse: true,
            messages: [
              { role: "system", content: QA_SYSTEM_PROMPT },
              { role: "user", content: prompt }
            ]
          },
          input.signal
        ),
      input.signal
    );

    return response.content;
  }

  async summarizeDocument(input: SummarizeDocumentInput): Promise<DocumentAnalysis> {
    const prompt = buildDocumentAnalysisPrompt(input);
    const response = await this.rateLimiter.run(
      () =>
        this.client.complete(
          {
            model: this.config.chatModel,
            temperature: this.config.temperature,
            maxTokens: this.config.maxTokens,
            jsonResponse: true,
            messages: [
              { role: "system", content: DOCUMENT_ANALYSIS_SYSTEM_PROMPT },
              { role: "user", content: prompt }
            ]
          },
          input.signal
        ),
      input.signal
    );

    logger.debug(
      {
        fileName: input.fileName,
        promptTokens: response.usage?.promptTokens,
        completionTokens: response.usage?.completionTokens
      },
      "Document summarized"
    );
    return parseDocumentAnalysis(response.content);
  }
}

/** Builds the client settings for `provider`, defaulting to the configured one. */
export function llmConfigFromEnv(env: AppConfig, provider: LLMProvider = env.LLM_PROVIDER): LLMConfig {
  return {
    provider,
    apiKey:
      provider === "openrouter"
        ? env.OPENROUTER_API_KEY
        : provider === "openai"
          ? env.OPENAI_API_KEY
          : "",
    baseURL:
      provider === "openrouter"
        ? env.OPENROUTER_BASE_URL
        : provider === "openai"
          ? env.OPENAI_BASE_URL
          : env.OLLAMA_BASE_URL,
    chatModel:
      provider === "openrouter"
        ? env.OPENROUTER_CHAT_MODEL
        : provider === "openai"
          ? env.OPENAI_CHAT_MODEL
          : env.OLLAMA_CHAT_MODEL,
    maxConcurrent: env.LLM_MAX_CONCURRENT,
    maxRetries: env.LLM_MAX_RETRIES,
    retryDelayMs: env.LLM_RETRY_DELAY_MS,
    requestsPerMinute: env.LLM_REQUESTS_PER_MINUTE,
    timeoutMs: env.LLM_TIMEOUT_MS,
    temperature: 0.2,
    maxTokens: 2048
  };
}
