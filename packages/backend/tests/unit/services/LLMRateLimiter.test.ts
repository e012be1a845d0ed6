import { describe, expect, it } from "vitest";
import { LLMTimeoutError } from "../../../src/errors.js";
import { LLMRateLimiter, isTransientLLMError } from "../../../src/services/LLMRateLimiter.js";

function withStatus(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe("LLMRateLimiter", () => {
  it("retries retryable failures with exponential backoff", async () => {
    const limiter = new LLMRateLimiter({
      maxConcurrent: 1,
      maxRetries: 3,
      retryDelayMs: 1,
      requestsPerMinute: 100,
      timeoutMs: 5000
    });

    let attempt = 0;
    const result = await limiter.run(async () => {
      attempt += 1;
      if (attempt < 3) {
        throw withStatus("temporary", 429);
      }
      return "ok";
    });

    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("does not retry client errors", async () => {
    const limiter = new LLMRateLimiter({ maxRetries: 3, retryDelayMs: 1 });

    let attempt = 0;
    await expect(
      limiter.run(async () => {
        attempt += 1;
        throw withStatus("bad request", 400);
      })
    ).rejects.toThrow("bad request");
    expect(attempt).toBe(1);
  });

  it("honors a per-task retry override", async () => {
    const limiter = new LLMRateLimiter({ maxRetries: 3, retryDelayMs: 1 });

    let attempt = 0;
    await expect(
      limiter.run(
        async () => {
          attempt += 1;
          throw withStatus("unavailable", 503);
        },
        { maxRetries: 0 }
      )
    ).rejects.toThrow("unavailable");
    expect(attempt).toBe(1);
  });

  it("honors maxConcurrent", async () => {
    const limiter = new LLMRateLimiter({
      maxConcurrent: 2,
      maxRetries: 0,
      retryDelayMs: 1,
      requestsPerMinute: 100,
      timeoutMs: 5000
    });

    let inFlight = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }).map((_, idx) =>
        limiter.run(async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => {
            setTimeout(resolve, 20 + idx * 2);
          });
          inFlight -= 1;
          return idx;
        })
      )
    );

    expect(peak).toBeLessThanOrEqual(2);
  });

  it("times out a slow attempt and aborts its signal", async () => {
    const limiter = new LLMRateLimiter({ maxRetries: 0, timeoutMs: 10 });
    let taskSignal: AbortSignal | undefined;

    await expect(
      limiter.run(
        (signal) =>
          new Promise<string>((resolve) => {
            taskSignal = signal;
            setTimeout(() => resolve("late"), 200);
          })
      )
    ).rejects.toBeInstanceOf(LLMTimeoutError);
    expect(taskSignal?.aborted).toBe(true);
  });

  it("drops a queued task when its caller aborts", async () => {
    const limiter = new LLMRateLimiter({ maxConcurrent: 1, maxRetries: 0 });
    let release = (): void => undefined;
    const first = limiter.run(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );

    const controller = new AbortController();
    let secondStarted = false;
    const second = limiter.run(
      async () => {
        secondStarted = true;
      },
      { signal: controller.signal }
    );
    controller.abort();

    await expect(second).rejects.toMatchObject({ name: "AbortError" });
    release();
    await first;
    expect(secondStarted).toBe(false);
  });
});

describe("isTransientLLMError", () => {
  it("classifies provider failures", () => {
    expect(isTransientLLMError(withStatus("rate", 429))).toBe(true);
    expect(isTransientLLMError(withStatus("down", 502))).toBe(true);
    expect(isTransientLLMError(withStatus("bad", 400))).toBe(false);
    expect(isTransientLLMError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
    expect(isTransientLLMError(new LLMTimeoutError(10))).toBe(true);
    expect(isTransientLLMError(Object.assign(new Error("aborted"), { name: "AbortError" }))).toBe(false);
  });
});
