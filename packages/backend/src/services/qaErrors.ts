export type RateLimitKind = "questions" | "tokens";

export type QAError =
  | {
      type: "session_not_found";
      sessionId: string;
    }
  | {
      type: "session_expired";
      sessionId: string;
      expiresAt: Date;
    }
  | {
      type: "thread_id_mismatch";
      threadId: string;
      expectedSessionId: string;
      /** Absent when the thread itself is unknown. */
      actualSessionId?: string;
    }
  | {
      type: "rate_limit_exceeded";
      sessionId: string;
      kind: RateLimitKind;
      limit: number;
      current: number;
    }
  | {
      type: "qa_processing_failed";
      sessionId: string;
      threadId?: string;
      cause: unknown;
    };

export type QAErrorType = QAError["type"];

export type QAResult<T> = { ok: true; value: T } | { ok: false; error: QAError };

export function ok<T>(value: T): QAResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: QAError): QAResult<T> {
  return { ok: false, error };
}

export function describeQAError(error: QAError): string {
  switch (error.type) {
    case "session_not_found":
      return `Session '${error.sessionId}' was not found.`;
    case "session_expired":
      return `Session '${error.sessionId}' expired at ${error.expiresAt.toISOString()}.`;
    case "thread_id_mismatch":
      return error.actualSessionId === undefined
        ? `Thread '${error.threadId}' was not found for session '${error.expectedSessionId}'.`
        : `Thread '${error.threadId}' belongs to session '${error.actualSessionId}', not '${error.expectedSessionId}'.`;
    case "rate_limit_exceeded":
      return error.kind === "questions"
        ? `Question limit reached for session '${error.sessionId}': ${error.current} of ${error.limit} questions asked.`
        : `Token limit reached for session '${error.sessionId}': ${error.current} of ${error.limit} tokens used.`;
    case "qa_processing_failed":
      return "An error occurred while processing your question. Please try again later.";
  }
}
