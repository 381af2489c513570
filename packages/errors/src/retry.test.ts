import { describe, it, expect, vi } from "vitest";
import { withRetry, isRetryable } from "./retry.js";
import { ConfigurationError, ExternalServiceError, RateLimitedError } from "./errors.js";

describe("withRetry", () => {
  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after maxRetries exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3); // 1 initial + 2 retries
  });

  it("does NOT retry 4xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(new ExternalServiceError("model not found", "ollama", { statusCode: 404 }));

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow(
      "model not found",
    );

    expect(fn).toHaveBeenCalledOnce();
  });

  it("does NOT retry non-operational errors", async () => {
    const fn = vi.fn().mockRejectedValue(new ConfigurationError("dimension mismatch"));

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow(
      "dimension mismatch",
    );

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries 5xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ExternalServiceError("Bad gateway", "cohere"))
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("retries rate limits only when RATE_LIMITED is listed", async () => {
    const limited = () =>
      vi.fn().mockRejectedValueOnce(new RateLimitedError("slow down", "cohere")).mockResolvedValue("ok");

    const plain = limited();
    await expect(withRetry(plain, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow("slow down");
    expect(plain).toHaveBeenCalledOnce();

    const listed = limited();
    const result = await withRetry(listed, {
      maxRetries: 2,
      baseDelayMs: 1,
      maxDelayMs: 1,
      retryableErrors: ["RATE_LIMITED"],
    });
    expect(result).toBe("ok");
    expect(listed).toHaveBeenCalledTimes(2);
  });

  it("reports each retry through onRetry", async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValue("ok");

    await withRetry(fn, { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 1, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, maxRetries: 3 });
    expect(onRetry.mock.calls[1]?.[0]).toMatchObject({ attempt: 2, maxRetries: 3 });
  });
});

describe("isRetryable", () => {
  it("lets listed codes through the 4xx rule", () => {
    const error = new RateLimitedError("slow down", "cohere");
    expect(isRetryable(error)).toBe(false);
    expect(isRetryable(error, ["RATE_LIMITED"])).toBe(true);
  });

  it("never retries non-operational errors, listed or not", () => {
    expect(isRetryable(new ConfigurationError("bad"), ["CONFIGURATION_ERROR"])).toBe(false);
  });

  it("retries plain errors", () => {
    expect(isRetryable(Object.assign(new Error("refused"), { code: "ECONNREFUSED" }))).toBe(true);
  });
});
