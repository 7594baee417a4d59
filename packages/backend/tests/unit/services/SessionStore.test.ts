import { afterEach, describe, expect, it, vi } from "vitest";
import type { Chunk, ConversationMessage } from "@docent/shared";
import { InMemorySessionStore } from "../../../src/services/SessionStore.js";
import { ManualClock, sequentialIds } from "../../helpers/testClock.js";

const TTL = 15 * 60_000;

const chunks: Chunk[] = [
  { content: "alpha", index: 0, startOffset: 0, endOffset: 5 },
  { content: "beta", index: 1, startOffset: 4, endOffset: 8 }
];

function exchange(question: string, answer: string, at: Date): ConversationMessage[] {
  return [
    { role: "user", content: question, timestamp: at },
    { role: "assistant", content: answer, timestamp: at, chunkReferences: [0] }
  ];
}

function createStore(clock = new ManualClock()) {
  return { clock, store: new InMemorySessionStore({ clock, idGenerator: sequentialIds("session") }) };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("InMemorySessionStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates an empty session that expires after the ttl", () => {
    const { clock, store } = createStore();
    const session = store.create({ chunks, ttlMs: TTL });

    expect(session.sessionId).toBe("session-1");
    expect(session.createdAt).toEqual(clock.now());
    expect(session.expiresAt.getTime()).toBe(clock.now().getTime() + TTL);
    expect(session.documentChunks).toEqual(chunks);
    expect(Object.isFrozen(session.documentChunks)).toBe(true);
    expect(session.conversationHistory).toEqual([]);
    expect(session.totalTokensUsed).toBe(0);
    expect(store.size()).toBe(1);
  });

  it("rejects a negative ttl", () => {
    const { store } = createStore();

    expect(() => store.create({ chunks, ttlMs: -1 })).toThrow(RangeError);
  });

  it("hides expired sessions from get but not from peek", () => {
    const { clock, store } = createStore();
    const { sessionId } = store.create({ chunks, ttlMs: TTL });

    clock.advance(TTL - 1);
    expect(store.get(sessionId)?.sessionId).toBe(sessionId);

    clock.advance(1);
    expect(store.get(sessionId)).toBeNull();
    expect(store.peek(sessionId)?.sessionId).toBe(sessionId);
    expect(store.get("missing")).toBeNull();
  });

  it("treats a zero ttl session as already expired", () => {
    const { store } = createStore();
    const { sessionId } = store.create({ chunks, ttlMs: 0 });

    expect(store.get(sessionId)).toBeNull();
  });

  it("does not extend expiry on read", () => {
    const { clock, store } = createStore();
    const session = store.create({ chunks, ttlMs: TTL });
    const expiresAt = session.expiresAt.getTime();

    clock.advance(60_000);
    store.get(session.sessionId);

    expect(store.peek(session.sessionId)?.expiresAt.getTime()).toBe(expiresAt);
  });

  it("touch moves expiry to now plus the ttl", () => {
    const { clock, store } = createStore();
    const { sessionId } = store.create({ chunks, ttlMs: TTL });

    clock.advance(10 * 60_000);
    expect(store.touch(sessionId, TTL)).toBe(true);
    expect(store.get(sessionId)?.expiresAt.getTime()).toBe(clock.now().getTime() + TTL);
    expect(store.touch("missing", TTL)).toBe(false);
  });

  it("touch strictly advances expiry even without elapsed time", () => {
    const { clock, store } = createStore();
    const { sessionId, expiresAt } = store.create({ chunks, ttlMs: TTL });
    const created = expiresAt.getTime();

    expect(store.touch(sessionId, TTL)).toBe(true);
    expect(store.get(sessionId)?.expiresAt.getTime()).toBe(created + 1);

    clock.advance(1_000);
    expect(store.touch(sessionId, 60_000)).toBe(true);
    expect(store.get(sessionId)?.expiresAt.getTime()).toBe(created + 2);
    expect(clock.now().getTime() + 60_000).toBeLessThan(created);
  });

  it("appends exchanges and accumulates token usage", () => {
    const { clock, store } = createStore();
    const { sessionId } = store.create({ chunks, ttlMs: TTL });

    store.appendExchange(sessionId, exchange("q1", "a1", clock.now()), 12);
    const updated = store.appendExchange(sessionId, exchange("q2", "a2", clock.now()), -5);

    expect(updated?.conversationHistory.map((message) => message.content)).toEqual(["q1", "a1", "q2", "a2"]);
    expect(updated?.totalTokensUsed).toBe(12);
    expect(store.appendExchange("missing", [], 1)).toBeNull();
  });

  it("removes sessions idempotently and notifies listeners", () => {
    const { store } = createStore();
    const { sessionId } = store.create({ chunks, ttlMs: TTL });
    const listener = vi.fn();
    store.onEvicted(listener);

    expect(store.remove(sessionId)).toBe(true);
    expect(store.remove(sessionId)).toBe(false);
    expect(store.peek(sessionId)).toBeNull();
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ sessionId }), "removed");
  });

  it("sweeps only expired sessions", () => {
    const { clock, store } = createStore();
    const short = store.create({ chunks, ttlMs: 1_000 });
    const long = store.create({ chunks, ttlMs: TTL });
    const listener = vi.fn();
    const unsubscribe = store.onEvicted(listener);

    clock.advance(1_000);
    expect(store.sweepExpired()).toBe(1);
    expect(store.peek(short.sessionId)).toBeNull();
    expect(store.peek(long.sessionId)).not.toBeNull();
    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ sessionId: short.sessionId }), "expired");

    unsubscribe();
    clock.advance(TTL);
    expect(store.sweepExpired()).toBe(1);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("keeps evicting when a listener throws", () => {
    const { store } = createStore();
    const { sessionId } = store.create({ chunks, ttlMs: TTL });
    const second = vi.fn();
    store.onEvicted(() => {
      throw new Error("listener failure");
    });
    store.onEvicted(second);

    expect(store.remove(sessionId)).toBe(true);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it("sweeps on an interval between start and stop", () => {
    vi.useFakeTimers();
    const clock = new ManualClock();
    const store = new InMemorySessionStore({ clock, sweepIntervalMs: 1_000 });
    const { sessionId } = store.create({ chunks, ttlMs: 500 });

    store.start();
    clock.advance(500);
    vi.advanceTimersByTime(1_000);
    expect(store.peek(sessionId)).toBeNull();

    store.stop();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("serializes work on the same session", async () => {
    const { store } = createStore();
    const order: string[] = [];
    const gate = deferred();

    const first = store.withSessionLock("s1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = store.withSessionLock("s1", () => {
      order.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block other sessions and releases the lock after a failure", async () => {
    const { store } = createStore();
    const gate = deferred();

    const blocked = store.withSessionLock("s1", async () => {
      await gate.promise;
      throw new Error("work failed");
    });
    const other = await store.withSessionLock("s2", () => "independent");
    expect(other).toBe("independent");

    gate.resolve();
    await expect(blocked).rejects.toThrow("work failed");
    await expect(store.withSessionLock("s1", () => "after failure")).resolves.toBe("after failure");
  });
});
