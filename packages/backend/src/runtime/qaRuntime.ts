import { appConfig, sessionTtlMs, type AppConfig } from "../config.js";
import { DocumentAnalysisPipeline } from "../pipeline/DocumentAnalysisPipeline.js";
import { AnalysisCache } from "../services/AnalysisCache.js";
import type { LLMConfig, LLMServiceLike } from "../services/llmTypes.js";
import { ModelManager, type ListModels } from "../services/ModelManager.js";
import { QuestionAnswerService } from "../services/QuestionAnswerService.js";
import { InMemorySessionStore, type SessionStoreLike } from "../services/SessionStore.js";
import { InMemoryThreadRegistry, type ThreadRegistryLike } from "../services/ThreadRegistry.js";
import { systemClock, type Clock, type IdGenerator } from "../utils/clock.js";
import { logger } from "../utils/logger.js";

export interface QARuntime {
  readonly config: AppConfig;
  readonly sessions: SessionStoreLike;
  readonly threads: ThreadRegistryLike;
  readonly llmService: LLMServiceLike;
  readonly models: ModelManager;
  readonly questionAnswerService: QuestionAnswerService;
  readonly analysisPipeline: DocumentAnalysisPipeline;
  readonly analysisCache: AnalysisCache;
  readonly startedAt: number;
  start(): void;
  stop(): void;
}

export interface CreateQARuntimeOptions {
  config?: AppConfig;
  llmService?: LLMServiceLike;
  createLLMService?: (config: LLMConfig) => LLMServiceLike;
  listModels?: ListModels;
  clock?: Clock;
  idGenerator?: IdGenerator;
}

/**
 * Wires the stores, the model client and the services that share them. The
 * returned runtime owns the sweep timer; call `stop()` to release it.
 */
export function createQARuntime(options: CreateQARuntimeOptions = {}): QARuntime {
  const config = options.config ?? appConfig;
  const clock = options.clock ?? systemClock;
  const idOptions = options.idGenerator ? { idGenerator: options.idGenerator } : {};

  const sessions = new InMemorySessionStore({
    clock,
    sweepIntervalMs: config.SESSION_SWEEP_INTERVAL_MS,
    ...idOptions
  });
  const threads = new InMemoryThreadRegistry({ clock, ...idOptions });
  const models = new ModelManager({
    config,
    threads,
    clock,
    ...(options.llmService ? { initialService: options.llmService } : {}),
    ...(options.createLLMService ? { createService: options.createLLMService } : {}),
    ...(options.listModels ? { listModels: options.listModels } : {})
  });
  // Model calls go through the manager so a provider switch reaches every service.
  const llmService: LLMServiceLike = models;

  const questionAnswerService = new QuestionAnswerService({
    sessions,
    threads,
    askModel: (input) => llmService.answerQuestion(input),
    clock,
    settings: {
      maxQuestionsPerSession: config.QA_MAX_QUESTIONS_PER_SESSION,
      maxTokensPerSession: config.QA_MAX_TOKENS_PER_SESSION,
      estimatedTokensPerQuestion: config.QA_ESTIMATED_TOKENS_PER_QUESTION,
      estimatedTokensPerAnswer: config.QA_ESTIMATED_TOKENS_PER_ANSWER,
      sessionTtlMs: sessionTtlMs(config)
    }
  });

  const analysisCache = new AnalysisCache({ ttlMs: config.ANALYSIS_CACHE_TTL_MS, clock });
  const analysisPipeline = new DocumentAnalysisPipeline({
    questionAnswerService,
    llmService,
    cache: analysisCache,
    clock,
    options: {
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP
    }
  });

  let unsubscribe: (() => void) | null = null;

  return {
    config,
    sessions,
    threads,
    llmService,
    models,
    questionAnswerService,
    analysisPipeline,
    analysisCache,
    startedAt: clock.now().getTime(),
    start() {
      if (unsubscribe) {
        return;
      }
      unsubscribe = sessions.onEvicted((session, reason) => {
        const removed = threads.removeBySession(session.sessionId);
        logger.debug({ sessionId: session.sessionId, reason, removedThreads: removed }, "Session evicted");
      });
      sessions.start();
    },
    stop() {
      unsubscribe?.();
      unsubscribe = null;
      sessions.stop();
      threads.clear();
      analysisCache.clear();
    }
  };
}

let runtimeSingleton: QARuntime | null = null;

export function getQARuntimeSingleton(): QARuntime {
  if (!runtimeSingleton) {
    runtimeSingleton = createQARuntime();
  }

  return runtimeSingleton;
}
