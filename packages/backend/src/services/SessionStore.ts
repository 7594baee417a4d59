import type {
  Chunk,
  ConversationMessage,
  DocumentAnalysis,
  DocumentMetadata,
  DocumentSession
} from "@docent/shared";
import { randomId, systemClock, type Clock, type IdGenerator } from "../utils/clock.js";
import { logger } from "../utils/logger.js";

export interface CreateSessionInput {
  chunks: readonly Chunk[];
  ttlMs: number;
  metadata?: DocumentMetadata;
  analysis?: DocumentAnalysis;
}

export type SessionEvictionReason = "expired" | "removed";

export type SessionEvictionListener = (
  session: DocumentSession,
  reason: SessionEvictionReason
) => void;

export interface SessionStoreLike {
  create(input: CreateSessionInput): DocumentSession;
  /** Live session or null; expired sessions read as absent. Never extends expiry. */
  get(sessionId: string): DocumentSession | null;
  /** Raw lookup that still returns expired sessions not yet swept. */
  peek(sessionId: string): DocumentSession | null;
  touch(sessionId: string, ttlMs: number): boolean;
  appendExchange(
    sessionId: string,
    messages: readonly ConversationMessage[],
    tokensUsed: number
  ): DocumentSession | null;
  remove(sessionId: string): boolean;
  withSessionLock<T>(sessionId: string, work: () => Promise<T> | T): Promise<T>;
  sweepExpired(): number;
  onEvicted(listener: SessionEvictionListener): () => void;
  size(): number;
  start(): void;
  stop(): void;
}

export interface InMemorySessionStoreOptions {
  clock?: Clock;
  idGenerator?: IdGenerator;
  /** 0 disables the periodic sweep; lazy expiry on read still applies. */
  sweepIntervalMs?: number;
}

export class InMemorySessionStore implements SessionStoreLike {
  private readonly sessions = new Map<string, DocumentSession>();
  private readonly lockTails = new Map<string, Promise<void>>();
  private readonly listeners = new Set<SessionEvictionListener>();
  private readonly clock: Clock;
  private readonly idGenerator: IdGenerator;
  private readonly sweepIntervalMs: number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.idGenerator = options.idGenerator ?? randomId;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 0;
  }

  start(): void {
    if (this.sweepTimer || this.sweepIntervalMs <= 0) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      const evicted = this.sweepExpired();
      if (evicted > 0) {
        logger.debug({ evicted, remaining: this.sessions.size }, "Swept expired sessions");
      }
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.sessions.clear();
    this.lockTails.clear();
  }

  create(input: CreateSessionInput): DocumentSession {
    if (!Number.isFinite(input.ttlMs) || input.ttlMs < 0) {
      throw new RangeError(`Session TTL must be a non-negative number of milliseconds. Received ${input.ttlMs}.`);
    }

    const now = this.clock.now();
    const session: DocumentSession = {
      sessionId: this.idGenerator(),
      createdAt: now,
      expiresAt: new Date(now.getTime() + input.ttlMs),
      documentChunks: Object.freeze([...input.chunks]),
      conversationHistory: [],
      totalTokensUsed: 0
    };
    if (input.metadata) {
      session.metadata = input.metadata;
    }
    if (input.analysis) {
      session.analysis = input.analysis;
    }

    this.sessions.set(session.sessionId, session);
    logger.info(
      { sessionId: session.sessionId, chunkCount: session.documentChunks.length },
      "Created document session"
    );
    return session;
  }

  get(sessionId: string): DocumentSession | null {
    const session = this.sessions.get(sessionId);
    if (!session || this.isExpired(session)) {
      return null;
    }
    return session;
  }

  peek(sessionId: string): DocumentSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  touch(sessionId: string, ttlMs: number): boolean {
    const session = this.get(sessionId);
    if (!session) {
      logger.warn({ sessionId }, "Attempted to extend a missing or expired session");
      return false;
    }

    // Expiry slides forward only; a touch within the same millisecond still advances it.
    const previous = session.expiresAt.getTime();
    session.expiresAt = new Date(Math.max(this.clock.now().getTime() + ttlMs, previous + 1));
    return true;
  }

  appendExchange(
    sessionId: string,
    messages: readonly ConversationMessage[],
    tokensUsed: number
  ): DocumentSession | null {
    const session = this.get(sessionId);
    if (!session) {
      return null;
    }

    session.conversationHistory.push(...messages);
    session.totalTokensUsed += Math.max(0, tokensUsed);
    return session;
  }

  remove(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }

    this.sessions.delete(sessionId);
    this.notifyEvicted(session, "removed");
    logger.info({ sessionId }, "Removed document session");
    return true;
  }

  /**
   * Runs `work` after every earlier holder of the same session's lock has
   * finished. Work on different sessions runs independently.
   */
  async withSessionLock<T>(sessionId: string, work: () => Promise<T> | T): Promise<T> {
    const previous = this.lockTails.get(sessionId) ?? Promise.resolve();
    const run = previous.then(() => work());
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.lockTails.set(sessionId, tail);

    try {
      return await run;
    } finally {
      if (this.lockTails.get(sessionId) === tail) {
        this.lockTails.delete(sessionId);
      }
    }
  }

  sweepExpired(): number {
    let evicted = 0;
    for (const [sessionId, session] of this.sessions) {
      if (!this.isExpired(session)) {
        continue;
      }
      this.sessions.delete(sessionId);
      this.notifyEvicted(session, "expired");
      evicted += 1;
    }
    return evicted;
  }

  onEvicted(listener: SessionEvictionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  size(): number {
    return this.sessions.size;
  }

  private isExpired(session: DocumentSession): boolean {
    return session.expiresAt.getTime() <= this.clock.now().getTime();
  }

  private notifyEvicted(session: DocumentSession, reason: SessionEvictionReason): void {
    for (const listener of this.listeners) {
      try {
        listener(session, reason);
      } catch (error) {
        logger.error({ err: error, sessionId: session.sessionId, reason }, "Session eviction listener failed");
      }
    }
  }
}
