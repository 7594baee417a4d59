import { createHash } from "node:crypto";
import type { DocumentAnalysis } from "@docent/shared";
import { systemClock, type Clock } from "../utils/clock.js";

export interface CachedAnalysis {
  text: string;
  pageCount?: number;
  analysis: DocumentAnalysis;
}

interface CacheEntry {
  value: CachedAnalysis;
  expiresAt: number;
}

export interface AnalysisCacheOptions {
  ttlMs: number;
  clock?: Clock;
  maxEntries?: number;
}

/** Content-addressed key: identical bytes with the same request share an entry. */
export function analysisCacheKey(content: Buffer | string, analysisRequest = ""): string {
  return createHash("sha256")
    .update(content)
    .update("\u0000")
    .update(analysisRequest.trim())
    .digest("hex");
}

/**
 * Memoizes parsed text and model summaries for a fixed time after they are
 * stored. Reads never extend an entry's lifetime.
 */
export class AnalysisCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly maxEntries: number;

  constructor(options: AnalysisCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? systemClock;
    this.maxEntries = options.maxEntries ?? 100;
  }

  get(key: string): CachedAnalysis | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: CachedAnalysis): void {
    if (this.ttlMs <= 0) {
      return;
    }

    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: this.clock.now().getTime() + this.ttlMs });
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
