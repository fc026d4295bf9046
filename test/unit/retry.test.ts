import { describe, it, expect } from "vitest";
import { StoreUnavailableError } from "../../src/errors.js";
import { retry } from "../../src/utils/retry.js";

describe("retry", () => {
  it("returns on first success", async () => {
    const result = await retry(async () => "ok");
    expect(result).toBe("ok");
  });

  it("retries retryable failures then succeeds", async () => {
    let attempt = 0;
    const result = await retry(
      () => {
        attempt++;
        if (attempt < 3) throw new StoreUnavailableError("save asset");
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 10 },
    );
    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("does not retry errors that are not retryable", async () => {
    let calls = 0;
    await expect(
      retry(
        () => {
          calls++;
          throw new Error("bad input");
        },
        { maxAttempts: 3, baseDelayMs: 10 },
      ),
    ).rejects.toThrow("bad input");
    expect(calls).toBe(1);
  });

  it("throws after max attempts", async () => {
    await expect(
      retry(
        async () => {
          throw new Error("always fails");
        },
        { maxAttempts: 2, baseDelayMs: 10, shouldRetry: () => true },
      ),
    ).rejects.toThrow("always fails");
  });

  it("respects abort signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      retry(
        async () => {
          throw new Error("fail");
        },
        { maxAttempts: 5, baseDelayMs: 10, signal: controller.signal },
      ),
    ).rejects.toThrow();
  });

  it("passes attempt number and reports retries", async () => {
    const attempts: number[] = [];
    const retried: number[] = [];
    await retry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new StoreUnavailableError("read stats");
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 10, onRetry: (_err, attempt) => retried.push(attempt) },
    );
    expect(attempts).toEqual([0, 1, 2]);
    expect(retried).toEqual([0, 1]);
  });
});
