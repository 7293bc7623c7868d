import { describe, expect, it, vi } from "vitest";
import { resolveRetryPolicy, withRetry } from "../src/process/retry.js";

describe("resolveRetryPolicy", () => {
  it("defaults to a single attempt without delay", () => {
    expect(resolveRetryPolicy()).toEqual({ attempts: 1, delayMs: 0 });
  });

  it("rejects invalid attempts and delays", () => {
    expect(() => resolveRetryPolicy({ attempts: 0 })).toThrow("Retry attempts must be an integer greater than or equal to 1.");
    expect(() => resolveRetryPolicy({ delayMs: -1 })).toThrow("Retry delay must be a non-negative number of milliseconds.");
  });
});

describe("withRetry", () => {
  it("retries until the operation succeeds", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const onRetry = vi.fn();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("done");

    await expect(withRetry(operation, { attempts: 3, delayMs: 250 }, { sleep, onRetry })).resolves.toBe("done");

    expect(operation).toHaveBeenNthCalledWith(1, 1);
    expect(operation).toHaveBeenNthCalledWith(2, 2);
    expect(onRetry).toHaveBeenCalledWith(new Error("flaky"), 1, 2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("rethrows the last error once attempts are exhausted", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("still failing"));

    await expect(withRetry(operation, { attempts: 2, delayMs: 0 }, { sleep: vi.fn() })).rejects.toThrow("still failing");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    const operation = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error("aborted mid-run");
    });

    await expect(
      withRetry(operation, { attempts: 5, delayMs: 0 }, { signal: controller.signal, sleep: vi.fn() })
    ).rejects.toThrow("aborted mid-run");
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
