import { Router, type Response } from "express";
import { z } from "zod";
import type {
  ApiErrorResponse,
  AskQuestionRequest,
  DocumentSession,
  QuestionAnswerResponse,
  SessionChunksResponse,
  SessionDetailResponse
} from "@docent/shared";
import { validate } from "../middleware/validator.js";
import { getQARuntimeSingleton } from "../runtime/qaRuntime.js";
import { describeQAError, type QAError } from "../services/qaErrors.js";
import { countQuestions, type QuestionAnswerService } from "../services/QuestionAnswerService.js";
import type { SessionStoreLike } from "../services/SessionStore.js";
import { abortOnClientClose } from "../utils/abortOnClose.js";
import { logger } from "../utils/logger.js";

const sessionParamsSchema = z.object({
  id: z.string().min(1)
});

const askQuestionBodySchema = z.object({
  question: z.string().trim().min(1, "Question cannot be empty").max(4000),
  threadId: z.string().min(1).optional()
});

interface CreateSessionsRouterOptions {
  sessions?: SessionStoreLike;
  questionAnswerService?: QuestionAnswerService;
}

export function qaErrorStatus(error: QAError): number {
  switch (error.type) {
    case "session_not_found":
      return 404;
    case "session_expired":
      return 410;
    case "thread_id_mismatch":
      return 409;
    case "rate_limit_exceeded":
      return 429;
    case "qa_processing_failed":
      return 500;
  }
}

export function toQAErrorResponse(error: QAError): ApiErrorResponse {
  const body: ApiErrorResponse = {
    error: describeQAError(error),
    code: error.type
  };

  switch (error.type) {
    case "session_expired":
      body.details = { expiresAt: error.expiresAt.toISOString() };
      break;
    case "thread_id_mismatch":
      body.details = {
        threadId: error.threadId,
        expectedSessionId: error.expectedSessionId,
        ...(error.actualSessionId !== undefined ? { actualSessionId: error.actualSessionId } : {})
      };
      break;
    case "rate_limit_exceeded":
      body.details = { kind: error.kind, limit: error.limit, current: error.current };
      break;
    default:
      break;
  }

  return body;
}

function sendQAError(res: Response, error: QAError): Response {
  return res.status(qaErrorStatus(error)).json(toQAErrorResponse(error));
}

export function createSessionsRouter(options: CreateSessionsRouterOptions = {}): Router {
  const runtime = options.sessions && options.questionAnswerService ? null : getQARuntimeSingleton();
  const sessions = options.sessions ?? runtime?.sessions;
  const questionAnswerService = options.questionAnswerService ?? runtime?.questionAnswerService;
  if (!sessions || !questionAnswerService) {
    throw new Error("Sessions router requires a session store and a question answer service");
  }

  /** Resolves a live session, or sends the 404/410 that explains why there is none. */
  const findLiveSession = (res: Response, sessionId: string): DocumentSession | null => {
    const session = sessions.get(sessionId);
    if (session) {
      return session;
    }

    const stale = sessions.peek(sessionId);
    sendQAError(
      res,
      stale
        ? { type: "session_expired", sessionId, expiresAt: stale.expiresAt }
        : { type: "session_not_found", sessionId }
    );
    return null;
  };

  const sessionsRouter = Router();

  sessionsRouter.get("/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const session = findLiveSession(res, req.params.id ?? "");
    if (!session) {
      return;
    }

    const response: SessionDetailResponse = {
      session: {
        sessionId: session.sessionId,
        createdAt: session.createdAt,
        expiresAt: session.expiresAt,
        totalTokensUsed: session.totalTokensUsed,
        questionCount: countQuestions(session),
        chunkCount: session.documentChunks.length,
        conversationHistory: session.conversationHistory
      }
    };
    if (session.metadata) {
      response.session.metadata = session.metadata;
    }
    if (session.analysis) {
      response.session.analysis = session.analysis;
    }
    res.json(response);
  });

  sessionsRouter.get("/:id/chunks", validate({ params: sessionParamsSchema }), (req, res) => {
    const session = findLiveSession(res, req.params.id ?? "");
    if (!session) {
      return;
    }

    const response: SessionChunksResponse = {
      sessionId: session.sessionId,
      chunks: [...session.documentChunks]
    };
    res.json(response);
  });

  sessionsRouter.post(
    "/:id/questions",
    validate({
      params: sessionParamsSchema,
      body: askQuestionBodySchema
    }),
    async (req, res) => {
      const sessionId = req.params.id ?? "";
      const body: AskQuestionRequest = req.body;

      // Stop waiting on the model once the client has gone away.
      const signal = abortOnClientClose(res, "Client disconnected before the answer was ready");

      let result: Awaited<ReturnType<QuestionAnswerService["askQuestion"]>>;
      try {
        result = await questionAnswerService.askQuestion({
          sessionId,
          question: body.question,
          signal,
          ...(body.threadId !== undefined ? { threadId: body.threadId } : {})
        });
      } catch (error) {
        logger.error({ err: error, sessionId }, "Question handling failed");
        return res.status(500).json({ error: "Failed to process question" });
      }

      if (signal.aborted) {
        logger.info({ sessionId }, "Question abandoned by client");
        return;
      }

      if (!result.ok) {
        return sendQAError(res, result.error);
      }

      const response: QuestionAnswerResponse = {
        answer: result.value.answer,
        relevantChunkIndices: result.value.relevantChunkIndices,
        threadId: result.value.threadId,
        conversationHistory: result.value.conversationHistory,
        totalQuestionsAsked: result.value.totalQuestionsAsked
      };
      return res.json(response);
    }
  );

  sessionsRouter.delete("/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    questionAnswerService.removeSession(req.params.id ?? "");
    res.status(204).end();
  });

  return sessionsRouter;
}
