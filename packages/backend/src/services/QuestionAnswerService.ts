import type {
  Chunk,
  ConversationMessage,
  DocumentAnalysis,
  DocumentMetadata,
  DocumentSession
} from "@docent/shared";
import { systemClock, type Clock } from "../utils/clock.js";
import { logger } from "../utils/logger.js";
import { estimateTokens } from "../utils/tokens.js";
import { extractAnswer } from "./answerExtractor.js";
import type { AskModel } from "./llmTypes.js";
import { fail, ok, type QAError, type QAResult } from "./qaErrors.js";
import type { SessionStoreLike } from "./SessionStore.js";
import type { ThreadRegistryLike } from "./ThreadRegistry.js";

export interface QuestionAnswerSettings {
  maxQuestionsPerSession: number;
  maxTokensPerSession: number;
  estimatedTokensPerQuestion: number;
  estimatedTokensPerAnswer: number;
  sessionTtlMs: number;
}

export const defaultQuestionAnswerSettings: QuestionAnswerSettings = {
  maxQuestionsPerSession: 50,
  maxTokensPerSession: 100_000,
  estimatedTokensPerQuestion: 200,
  estimatedTokensPerAnswer: 800,
  sessionTtlMs: 15 * 60_000
};

export interface AskQuestionInput {
  sessionId: string;
  question: string;
  threadId?: string;
  signal?: AbortSignal;
}

export interface QuestionAnswerResult {
  answer: string;
  relevantChunkIndices: number[];
  threadId: string;
  conversationHistory: ConversationMessage[];
  totalQuestionsAsked: number;
}

export interface SessionDetails {
  metadata?: DocumentMetadata;
  analysis?: DocumentAnalysis;
}

export interface QuestionAnswerServiceDeps {
  sessions: SessionStoreLike;
  threads: ThreadRegistryLike;
  askModel: AskModel;
  settings?: Partial<QuestionAnswerSettings>;
  clock?: Clock;
}

export function countQuestions(session: DocumentSession): number {
  return session.conversationHistory.filter((message) => message.role === "user").length;
}

type RateLimitError = Extract<QAError, { type: "rate_limit_exceeded" }>;

function abortError(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("The question was cancelled");
}

export class QuestionAnswerService {
  private readonly sessions: SessionStoreLike;
  private readonly threads: ThreadRegistryLike;
  private readonly askModel: AskModel;
  private readonly clock: Clock;
  readonly settings: QuestionAnswerSettings;

  constructor(deps: QuestionAnswerServiceDeps) {
    this.sessions = deps.sessions;
    this.threads = deps.threads;
    this.askModel = deps.askModel;
    this.clock = deps.clock ?? systemClock;
    this.settings = { ...defaultQuestionAnswerSettings, ...deps.settings };
  }

  createSession(
    chunks: readonly Chunk[],
    details: SessionDetails = {},
    ttlMs = this.settings.sessionTtlMs
  ): DocumentSession {
    return this.sessions.create({ chunks, ttlMs, ...details });
  }

  /** Idempotent. Threads bound to the session go with it through the store's eviction listener. */
  removeSession(sessionId: string): boolean {
    return this.sessions.remove(sessionId);
  }

  async askQuestion(input: AskQuestionInput): Promise<QAResult<QuestionAnswerResult>> {
    const { sessionId, question, signal } = input;
    if (question.trim().length === 0) {
      throw new TypeError("Question cannot be empty");
    }

    const session = this.sessions.peek(sessionId);
    if (!session) {
      logger.warn({ sessionId }, "Question for unknown session");
      return fail({ type: "session_not_found", sessionId });
    }
    if (this.isExpired(session)) {
      logger.warn({ sessionId, expiresAt: session.expiresAt }, "Question for expired session");
      return fail({ type: "session_expired", sessionId, expiresAt: session.expiresAt });
    }

    const budgetError = this.checkBudget(session);
    if (budgetError) {
      logger.warn(
        { sessionId, kind: budgetError.kind, limit: budgetError.limit, current: budgetError.current },
        "Session budget exhausted"
      );
      return fail(budgetError);
    }

    const thread = this.resolveThread(sessionId, input.threadId);
    if (!thread.ok) {
      logger.warn({ sessionId, threadId: input.threadId }, "Thread does not belong to session");
      return thread;
    }
    const threadId = thread.value;
    // A thread opened by this call is dropped again if its first question is never recorded.
    const releaseNewThread = (): void => {
      if (input.threadId === undefined) {
        this.threads.remove(threadId);
      }
    };

    const history = [...session.conversationHistory];
    let rawResponse: string;
    try {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      rawResponse = await this.askModel({
        question,
        chunks: session.documentChunks,
        threadId,
        history,
        ...(signal ? { signal } : {})
      });
    } catch (error) {
      releaseNewThread();
      logger.error({ err: error, sessionId, threadId }, "Model call failed");
      return fail({ type: "qa_processing_failed", sessionId, threadId, cause: error });
    }

    const { answer, relevantChunkIndices } = extractAnswer(rawResponse);

    let committed: QAResult<QuestionAnswerResult>;
    try {
      committed = await this.sessions.withSessionLock(sessionId, () =>
        this.commitExchange({ sessionId, threadId, question, answer, relevantChunkIndices, signal })
      );
    } catch (error) {
      releaseNewThread();
      logger.error({ err: error, sessionId, threadId }, "Failed to record question and answer");
      return fail({ type: "qa_processing_failed", sessionId, threadId, cause: error });
    }

    if (!committed.ok) {
      releaseNewThread();
    }
    return committed;
  }

  private commitExchange(exchange: {
    sessionId: string;
    threadId: string;
    question: string;
    answer: string;
    relevantChunkIndices: number[];
    signal: AbortSignal | undefined;
  }): QAResult<QuestionAnswerResult> {
    const { sessionId, threadId, signal } = exchange;

    const current = this.sessions.peek(sessionId);
    if (!current) {
      return fail({ type: "session_not_found", sessionId });
    }
    if (this.isExpired(current)) {
      return fail({ type: "session_expired", sessionId, expiresAt: current.expiresAt });
    }
    const budgetError = this.checkBudget(current);
    if (budgetError) {
      return fail(budgetError);
    }
    if (signal?.aborted) {
      return fail({ type: "qa_processing_failed", sessionId, threadId, cause: abortError(signal) });
    }

    const timestamp = this.clock.now();
    const messages: ConversationMessage[] = [
      { role: "user", content: exchange.question, timestamp },
      {
        role: "assistant",
        content: exchange.answer,
        timestamp,
        chunkReferences: [...exchange.relevantChunkIndices]
      }
    ];
    const tokensUsed = estimateTokens(exchange.question) + estimateTokens(exchange.answer);

    const updated = this.sessions.appendExchange(sessionId, messages, tokensUsed);
    if (!updated) {
      return fail({ type: "session_not_found", sessionId });
    }
    this.sessions.touch(sessionId, this.settings.sessionTtlMs);

    const totalQuestionsAsked = countQuestions(updated);
    logger.info(
      {
        sessionId,
        threadId,
        totalQuestionsAsked,
        totalTokensUsed: updated.totalTokensUsed,
        relevantChunks: exchange.relevantChunkIndices.length
      },
      "Answered question"
    );

    return ok({
      answer: exchange.answer,
      relevantChunkIndices: exchange.relevantChunkIndices,
      threadId,
      conversationHistory: [...updated.conversationHistory],
      totalQuestionsAsked
    });
  }

  private checkBudget(session: DocumentSession): RateLimitError | null {
    const questionsAsked = countQuestions(session);
    if (questionsAsked >= this.settings.maxQuestionsPerSession) {
      return {
        type: "rate_limit_exceeded",
        sessionId: session.sessionId,
        kind: "questions",
        limit: this.settings.maxQuestionsPerSession,
        current: questionsAsked
      };
    }

    const projected =
      session.totalTokensUsed +
      this.settings.estimatedTokensPerQuestion +
      this.settings.estimatedTokensPerAnswer;
    if (projected > this.settings.maxTokensPerSession) {
      return {
        type: "rate_limit_exceeded",
        sessionId: session.sessionId,
        kind: "tokens",
        limit: this.settings.maxTokensPerSession,
        current: session.totalTokensUsed
      };
    }

    return null;
  }

  private resolveThread(sessionId: string, threadId: string | undefined): QAResult<string> {
    if (threadId === undefined) {
      return ok(this.threads.create(sessionId));
    }

    const thread = this.threads.get(threadId);
    if (!thread) {
      return fail({ type: "thread_id_mismatch", threadId, expectedSessionId: sessionId });
    }
    if (thread.sessionId !== sessionId) {
      return fail({
        type: "thread_id_mismatch",
        threadId,
        expectedSessionId: sessionId,
        actualSessionId: thread.sessionId
      });
    }
    return ok(threadId);
  }

  private isExpired(session: DocumentSession): boolean {
    return session.expiresAt.getTime() <= this.clock.now().getTime();
  }
}
