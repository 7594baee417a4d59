import { describe, expect, it } from "vitest";
import { InMemoryThreadRegistry } from "../../../src/services/ThreadRegistry.js";
import { ManualClock, sequentialIds } from "../../helpers/testClock.js";

describe("InMemoryThreadRegistry", () => {
  it("creates threads bound to a session", () => {
    const clock = new ManualClock();
    const registry = new InMemoryThreadRegistry({ clock, idGenerator: sequentialIds("thread") });

    const threadId = registry.create("session-1");

    expect(threadId).toBe("thread-1");
    expect(registry.get(threadId)).toEqual({
      threadId: "thread-1",
      sessionId: "session-1",
      createdAt: clock.now()
    });
    expect(registry.get("unknown")).toBeNull();
  });

  it("regenerates ids that collide with an existing thread", () => {
    const ids = ["dup", "dup", "fresh"];
    const registry = new InMemoryThreadRegistry({ idGenerator: () => ids.shift() ?? "exhausted" });

    expect(registry.create("session-1")).toBe("dup");
    expect(registry.create("session-1")).toBe("fresh");
    expect(registry.size()).toBe(2);
  });

  it("rejects an empty session id", () => {
    const registry = new InMemoryThreadRegistry();

    expect(() => registry.create("  ")).toThrow(TypeError);
  });

  it("removes single threads", () => {
    const registry = new InMemoryThreadRegistry({ idGenerator: sequentialIds("thread") });
    const threadId = registry.create("session-1");

    expect(registry.remove(threadId)).toBe(true);
    expect(registry.remove(threadId)).toBe(false);
    expect(registry.get(threadId)).toBeNull();
    expect(registry.removeBySession("session-1")).toBe(0);
  });

  it("removes every thread of a session and leaves the others", () => {
    const registry = new InMemoryThreadRegistry({ idGenerator: sequentialIds("thread") });
    registry.create("session-1");
    registry.create("session-1");
    const kept = registry.create("session-2");

    expect(registry.removeBySession("session-1")).toBe(2);
    expect(registry.size()).toBe(1);
    expect(registry.get(kept)?.sessionId).toBe("session-2");
    expect(registry.removeBySession("session-1")).toBe(0);
  });
});
