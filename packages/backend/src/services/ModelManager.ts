import type {
  AvailableModel,
  DocumentAnalysis,
  ModelProviderInfo,
  ModelSelection,
  SwitchModelResponse
} from "@docent/shared";
import type { AppConfig } from "../config.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { logger } from "../utils/logger.js";
import {
  DEFAULT_OPENAI_BASE_URL,
  LLMService,
  isProviderConfigured,
  listProviderModels,
  llmConfigFromEnv
} from "./LLMService.js";
import {
  llmProviders,
  type AskModelInput,
  type LLMConfig,
  type LLMProvider,
  type LLMServiceLike,
  type SummarizeDocumentInput
} from "./llmTypes.js";
import type { ThreadRegistryLike } from "./ThreadRegistry.js";

export const MODEL_SWITCH_WARNING =
  "All conversation threads have been reset due to the model provider switch. " +
  "Continue with a new thread to use the new model.";

/** Lists the model ids one provider serves. */
export type ListModels = (
  config: Pick<LLMConfig, "provider" | "apiKey" | "baseURL">,
  signal?: AbortSignal
) => Promise<string[]>;

/** The request named a provider that cannot be used with the current settings. */
export class ModelSelectionError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "ModelSelectionError";
  }
}

/** The provider's endpoint could not be reached or refused to list its models. */
export class ProviderUnavailableError extends Error {
  readonly statusCode = 503;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProviderUnavailableError";
  }
}

export interface DiscoveredModels {
  models: AvailableModel[];
  cached: boolean;
}

export interface ModelManagerOptions {
  config: AppConfig;
  threads?: Pick<ThreadRegistryLike, "size" | "clear">;
  initialService?: LLMServiceLike;
  createService?: (config: LLMConfig) => LLMServiceLike;
  listModels?: ListModels;
  clock?: Clock;
  discoveryCacheTtlMs?: number;
}

interface DiscoveryEntry {
  models: AvailableModel[];
  expiresAt: number;
}

/**
 * Owns the active model client. Every call is forwarded to whichever client
 * is current when it starts, so a switch takes effect on the next request
 * while requests already in flight finish on the old one.
 */
export class ModelManager implements LLMServiceLike {
  private readonly config: AppConfig;
  private readonly threads: Pick<ThreadRegistryLike, "size" | "clear"> | null;
  private readonly createService: (config: LLMConfig) => LLMServiceLike;
  private readonly listModels: ListModels;
  private readonly clock: Clock;
  private readonly discoveryCacheTtlMs: number;
  private readonly discovered = new Map<LLMProvider, DiscoveryEntry>();
  private service: LLMServiceLike;
  private selection: ModelSelection;

  constructor(options: ModelManagerOptions) {
    this.config = options.config;
    this.threads = options.threads ?? null;
    this.createService = options.createService ?? ((config) => new LLMService(config));
    this.listModels = options.listModels ?? listProviderModels;
    this.clock = options.clock ?? systemClock;
    this.discoveryCacheTtlMs = options.discoveryCacheTtlMs ?? options.config.MODEL_DISCOVERY_CACHE_MS;

    const initialConfig = llmConfigFromEnv(this.config);
    this.service = options.initialService ?? this.createService(initialConfig);
    this.selection = { provider: initialConfig.provider, model: initialConfig.chatModel };
  }

  answerQuestion(input: AskModelInput): Promise<string> {
    return this.service.answerQuestion(input);
  }

  summarizeDocument(input: SummarizeDocumentInput): Promise<DocumentAnalysis> {
    return this.service.summarizeDocument(input);
  }

  isConfigured(): boolean {
    return this.service.isConfigured();
  }

  current(): ModelSelection {
    return { ...this.selection };
  }

  listProviders(): ModelProviderInfo[] {
    return llmProviders.map((provider) => {
      const config = llmConfigFromEnv(this.config, provider);
      return {
        provider,
        baseURL: config.baseURL ?? DEFAULT_OPENAI_BASE_URL,
        defaultModel: config.chatModel,
        configured: isProviderConfigured(config)
      };
    });
  }

  /** Asks the provider which models it serves; results are cached per provider. */
  async discover(provider: LLMProvider, signal?: AbortSignal): Promise<DiscoveredModels> {
    const now = this.clock.now().getTime();
    const entry = this.discovered.get(provider);
    if (entry && entry.expiresAt > now) {
      return { models: entry.models.map((model) => ({ ...model })), cached: true };
    }

    const config = this.requireConfigured(provider);
    let ids: string[];
    try {
      ids = await this.listModels(config, signal);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ err: error, provider }, "Model discovery failed");
      throw new ProviderUnavailableError(`Provider '${provider}' is unavailable: ${reason}`, { cause: error });
    }

    const models = ids.map((id) => ({ id, provider }));
    if (this.discoveryCacheTtlMs > 0) {
      this.discovered.set(provider, { models, expiresAt: now + this.discoveryCacheTtlMs });
    }
    logger.info({ provider, modelCount: models.length }, "Discovered provider models");
    return { models: models.map((model) => ({ ...model })), cached: false };
  }

  /**
   * Replaces the active client. Conversation threads are dropped because they
   * were started against the previous model; session history is kept.
   */
  switchTo(selection: ModelSelection): SwitchModelResponse {
    const model = selection.model.trim();
    if (model.length === 0) {
      throw new ModelSelectionError("Model name cannot be empty");
    }

    const config: LLMConfig = { ...this.requireConfigured(selection.provider), chatModel: model };
    const next = this.createService(config);

    const previous = this.current();
    const resetThreads = this.threads?.size() ?? 0;
    this.threads?.clear();
    this.service = next;
    this.selection = { provider: selection.provider, model };

    logger.info({ previous, current: this.selection, resetThreads }, "Switched model provider");
    return {
      message: `Switched to ${selection.provider} with model ${model}`,
      warning: MODEL_SWITCH_WARNING,
      previous,
      current: this.current(),
      resetThreads
    };
  }

  private requireConfigured(provider: LLMProvider): LLMConfig {
    const config = llmConfigFromEnv(this.config, provider);
    if (!isProviderConfigured(config)) {
      throw new ModelSelectionError(`Provider '${provider}' has no API key configured`);
    }
    return config;
  }
}
