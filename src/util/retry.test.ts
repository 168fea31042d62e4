import { describe, it, expect, vi } from "vitest";
import { withRetry } from "./retry.js";

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(operation, { maxRetries: 1, backoffMs: 0 })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("throws the last error once retries are exhausted", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(new Error("third"));

    await expect(withRetry(operation, { maxRetries: 2, backoffMs: 0 })).rejects.toThrow("third");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("makes a single attempt when maxRetries is 0", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("down"));

    await expect(withRetry(operation, { maxRetries: 0, backoffMs: 0 })).rejects.toThrow("down");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("stops immediately when shouldRetry rejects the error", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("unauthenticated"));

    await expect(
      withRetry(operation, { maxRetries: 3, backoffMs: 0, shouldRetry: () => false }),
    ).rejects.toThrow("unauthenticated");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("doubles the backoff on each retry", async () => {
    const error = new Error("flaky");
    const operation = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(error)
      .mockRejectedValueOnce(error)
      .mockResolvedValueOnce(42);
    const onRetry = vi.fn();

    await expect(withRetry(operation, { maxRetries: 2, backoffMs: 5, onRetry })).resolves.toBe(42);
    expect(onRetry.mock.calls).toEqual([
      [error, 1, 5],
      [error, 2, 10],
    ]);
  });
});
