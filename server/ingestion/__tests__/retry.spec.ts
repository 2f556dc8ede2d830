import { describe, expect, it, vi } from "vitest";
import { TransientSourceError, ValidationError } from "../../_core/errors";
import { withRetry } from "../utils/retry";

describe("withRetry", () => {
  it("retries transient failures until one succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientSourceError("stats_api", "HTTP 503", 503))
      .mockRejectedValueOnce(new TransientSourceError("stats_api", "HTTP 503", 503))
      .mockResolvedValue("ok");

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("gives up after the last attempt with the last error", async () => {
    const last = new TransientSourceError("odds_api", "HTTP 429", 429);
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientSourceError("odds_api", "HTTP 503", 503))
      .mockRejectedValueOnce(last);

    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 0 })).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry other errors", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new ValidationError("bad shape"));

    await expect(withRetry(fn, { maxAttempts: 5, baseDelayMs: 0 })).rejects.toBeInstanceOf(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    const reason = new Error("job cancelled");
    controller.abort(reason);
    const fn = vi.fn<() => Promise<string>>().mockResolvedValue("ok");

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toBe(reason);
    expect(fn).not.toHaveBeenCalled();
  });

  it("backs off exponentially between attempts", async () => {
    vi.spyOn(Math, "random").mockReturnValue(0);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    try {
      const fn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new TransientSourceError("stats_api", "down"))
        .mockRejectedValueOnce(new TransientSourceError("stats_api", "down"))
        .mockResolvedValue("ok");

      await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 1, label: "stats" })).resolves.toBe("ok");

      expect(warn.mock.calls.map(([message]) => message)).toEqual([
        "[stats] Attempt 1/3 failed: [stats_api] down. Waiting 1ms...",
        "[stats] Attempt 2/3 failed: [stats_api] down. Waiting 2ms...",
      ]);
    } finally {
      vi.restoreAllMocks();
    }
  });
});
