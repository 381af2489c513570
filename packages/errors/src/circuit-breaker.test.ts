import { describe, it, expect, vi } from "vitest";
import { createCircuitBreaker } from "./circuit-breaker.js";

describe("createCircuitBreaker", () => {
  it("passes arguments through and returns the result", async () => {
    const breaker = createCircuitBreaker("echo", async (text: string) => text.toUpperCase());

    await expect(breaker.fire("hello")).resolves.toBe("HELLO");
    breaker.shutdown();
  });

  it("rejects calls that exceed the timeout", async () => {
    const slow = (): Promise<string> =>
      new Promise((resolve) => setTimeout(() => resolve("late"), 200));
    const breaker = createCircuitBreaker("slow", slow, { timeout: 10 });

    await expect(breaker.fire()).rejects.toThrow(/Timed out/);
    breaker.shutdown();
  });

  it("reports opening to the event sink", async () => {
    const warn = vi.fn();
    const failing = (): Promise<string> => Promise.reject(new Error("down"));
    const breaker = createCircuitBreaker(
      "failing",
      failing,
      { volumeThreshold: 1, errorThresholdPercentage: 1 },
      { warn },
    );

    await expect(breaker.fire()).rejects.toThrow("down");

    expect(breaker.opened).toBe(true);
    expect(warn).toHaveBeenCalledWith(
      { breaker: "failing", state: "open" },
      "circuit opened, calls are short-circuited",
    );
    breaker.shutdown();
  });
});
