import type { LLMRateLimitConfig } from "./llmTypes.js";

type QueuedTask = () => Promise<void>;

export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 120_000
    };
  }

  /**
   * Queues `task` behind the concurrency and per-minute limits. Retryable
   * failures are retried with exponential backoff unless `signal` has fired.
   */
  run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      this.queue.push(() => this.executeTask(task, signal).then(resolve, reject));
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const item = this.queue.shift();
      if (!item) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void item().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeTask<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attempt = 0;

    while (true) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }

      try {
        return await this.withTimeout(task(), this.config.timeoutMs);
      } catch (error) {
        const shouldRetry =
          !signal?.aborted && this.isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        const backoff = this.config.retryDelayMs * 2 ** (attempt - 1);
        await this.sleep(backoff);
      }
    }
  }

  private withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) {
      return promise;
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`LLM request timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      promise
        .then((value) => {
          clearTimeout(timer);
          resolve(value);
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  private isRetryableError(error: unknown): boolean {
    if (typeof error !== "object" || error === null) {
      return false;
    }
    if ("status" in error && typeof error.status === "number") {
      return error.status === 429 || error.status >= 500;
    }
    if ("code" in error && typeof error.code === "string") {
      return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(error.code);
    }
    if ("message" in error && typeof error.message === "string") {
      return /timeout|timed out|temporarily unavailable/i.test(error.message);
    }
    return false;
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - 60_000;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (!firstInWindow) {
      return 0;
    }

    const elapsed = Date.now() - firstInWindow;
    return Math.max(0, 60_000 - elapsed);
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("The operation was aborted");
}
