import { describe, it, expect, vi } from "vitest";
import { retryWithBackoff } from "../retry";

describe("retryWithBackoff", () => {
  it("retries until the call succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("refused"))
      .mockRejectedValueOnce(new Error("refused"))
      .mockResolvedValue("connected");

    await expect(retryWithBackoff(fn, { maxAttempts: 5, initialDelayMs: 0 })).resolves.toBe("connected");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("rethrows the last error once the attempts run out", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("refused"));

    await expect(retryWithBackoff(fn, { maxAttempts: 3, initialDelayMs: 0 })).rejects.toThrow("refused");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("stops at once when shouldRetry rejects the error", async () => {
    const denied = new Error("access denied");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(denied);
    const shouldRetry = vi.fn((error: unknown) => error !== denied);

    await expect(retryWithBackoff(fn, { maxAttempts: 5, initialDelayMs: 0, shouldRetry })).rejects.toBe(denied);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledWith(denied);
  });
});
