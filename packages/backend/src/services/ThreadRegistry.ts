import type { ConversationThread } from "@docent/shared";
import { randomId, systemClock, type Clock, type IdGenerator } from "../utils/clock.js";
import { logger } from "../utils/logger.js";

export interface ThreadRegistryLike {
  create(sessionId: string): string;
  get(threadId: string): ConversationThread | null;
  remove(threadId: string): boolean;
  removeBySession(sessionId: string): number;
  size(): number;
  clear(): void;
}

export interface ThreadRegistryOptions {
  clock?: Clock;
  idGenerator?: IdGenerator;
}

/**
 * Maps opaque thread ids to the session they continue. Threads are kept apart
 * from sessions so per-thread state can later move to its own storage.
 */
export class InMemoryThreadRegistry implements ThreadRegistryLike {
  private readonly threads = new Map<string, ConversationThread>();
  private readonly threadIdsBySession = new Map<string, Set<string>>();
  private readonly clock: Clock;
  private readonly idGenerator: IdGenerator;

  constructor(options: ThreadRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.idGenerator = options.idGenerator ?? randomId;
  }

  create(sessionId: string): string {
    if (sessionId.trim().length === 0) {
      throw new TypeError("sessionId cannot be empty");
    }

    let threadId = this.idGenerator();
    while (this.threads.has(threadId)) {
      threadId = this.idGenerator();
    }

    const thread: ConversationThread = {
      threadId,
      sessionId,
      createdAt: this.clock.now()
    };
    this.threads.set(threadId, thread);

    const sessionThreads = this.threadIdsBySession.get(sessionId) ?? new Set<string>();
    sessionThreads.add(threadId);
    this.threadIdsBySession.set(sessionId, sessionThreads);

    logger.info({ threadId, sessionId }, "Created conversation thread");
    return threadId;
  }

  get(threadId: string): ConversationThread | null {
    return this.threads.get(threadId) ?? null;
  }

  remove(threadId: string): boolean {
    const thread = this.threads.get(threadId);
    if (!thread) {
      return false;
    }

    this.threads.delete(threadId);
    const sessionThreads = this.threadIdsBySession.get(thread.sessionId);
    sessionThreads?.delete(threadId);
    if (sessionThreads && sessionThreads.size === 0) {
      this.threadIdsBySession.delete(thread.sessionId);
    }
    return true;
  }

  removeBySession(sessionId: string): number {
    const threadIds = this.threadIdsBySession.get(sessionId);
    if (!threadIds) {
      return 0;
    }

    for (const threadId of threadIds) {
      this.threads.delete(threadId);
    }
    this.threadIdsBySession.delete(sessionId);

    logger.debug({ sessionId, removed: threadIds.size }, "Removed threads for session");
    return threadIds.size;
  }

  size(): number {
    return this.threads.size;
  }

  clear(): void {
    this.threads.clear();
    this.threadIdsBySession.clear();
  }
}
