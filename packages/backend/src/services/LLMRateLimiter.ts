import { LLMTimeoutError, RateLimitedError, isAbortError } from "../errors.js";
import type { LLMRateLimitConfig, RunOptions } from "./llmTypes.js";

interface QueuedTask {
  execute: () => Promise<void>;
  cancel: (reason: unknown) => void;
  signal?: AbortSignal;
}

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
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 60_000
    };
  }

  /**
   * Queues `task` behind the concurrency and per-minute limits. The task
   * receives a signal that fires on timeout or when the caller's signal
   * aborts; pass it on to the HTTP client so the request is torn down.
   */
  run<T>(task: (signal: AbortSignal) => Promise<T>, options: RunOptions = {}): Promise<T> {
    const maxRetries = options.maxRetries ?? this.config.maxRetries;
    const { signal } = options;

    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const entry: QueuedTask = {
        execute: async () => {
          try {
            resolve(await this.executeWithRetry(task, maxRetries, signal));
          } catch (error) {
            reject(error);
          }
        },
        cancel: reject
      };
      if (signal) {
        entry.signal = signal;
        signal.addEventListener(
          "abort",
          () => {
            const position = this.queue.indexOf(entry);
            if (position >= 0) {
              this.queue.splice(position, 1);
              entry.cancel(abortReason(signal));
            }
          },
          { once: true }
        );
      }

      this.queue.push(entry);
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
      void item.execute().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeWithRetry<T>(
    task: (signal: AbortSignal) => Promise<T>,
    maxRetries: number,
    signal: AbortSignal | undefined
  ): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await this.runAttempt(task, signal);
      } catch (error) {
        const shouldRetry =
          !signal?.aborted && isTransientLLMError(error) && attempt < maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        await sleep(this.config.retryDelayMs * 2 ** (attempt - 1), signal);
      }
    }
  }

  private runAttempt<T>(
    task: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal | undefined
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs;

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const settle = (finish: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener("abort", onAbort);
        finish();
      };

      const onAbort = (): void => {
        controller.abort();
        settle(() => reject(abortReason(signal)));
      };

      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              controller.abort();
              settle(() => reject(new LLMTimeoutError(timeoutMs)));
            }, timeoutMs)
          : null;

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      task(controller.signal).then(
        (value) => settle(() => resolve(value)),
        (error: unknown) => settle(() => reject(error))
      );
    });
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
}

/** Rate limits, timeouts, 5xx and dropped connections are worth another attempt. */
export function isTransientLLMError(error: unknown): boolean {
  if (error instanceof RateLimitedError || error instanceof LLMTimeoutError) {
    return true;
  }
  if (isAbortError(error) || !(error instanceof Error)) {
    return false;
  }

  const status = errorStatus(error);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }
  if ("code" in error && typeof error.code === "string") {
    if (["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(error.code)) {
      return true;
    }
  }
  return /timeout|timed out|temporarily unavailable/i.test(error.message);
}

export function errorStatus(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  if (signal?.reason instanceof Error && signal.reason.name === "AbortError") {
    return signal.reason;
  }
  return error;
}
