import { describe, it, expect, vi } from "vitest";
import { EntityConflict, TransientRemoteError } from "../../platform/errors";
import { backoffDelayMs, withRetry, type RetryPolicy } from "../sync/retry";

function policy(overrides: Partial<RetryPolicy> = {}) {
  const sleepFn = vi.fn(async (_ms: number) => {});
  return { sleepFn, policy: { maxAttempts: 3, baseDelayMs: 200, sleepFn, ...overrides } };
}

describe("withRetry", () => {
  it("doubles the delay per attempt", () => {
    const { policy: p } = policy();
    expect([1, 2, 3].map((a) => backoffDelayMs(p, a))).toEqual([200, 400, 800]);
  });

  it("retries transient failures until one succeeds", async () => {
    const { sleepFn, policy: p } = policy();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientRemoteError("busy"))
      .mockRejectedValueOnce(new TransientRemoteError("busy"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, p)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([200, 400]);
  });

  it("gives up after maxAttempts", async () => {
    const { sleepFn, policy: p } = policy();
    const err = new TransientRemoteError("down");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(err);

    await expect(withRetry(fn, p)).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleepFn).toHaveBeenCalledTimes(2);
  });

  it("does not retry other errors", async () => {
    const { sleepFn, policy: p } = policy();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new EntityConflict("nope"));

    await expect(withRetry(fn, p)).rejects.toBeInstanceOf(EntityConflict);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("reports each retry", async () => {
    const onRetry = vi.fn();
    const { policy: p } = policy({ onRetry });
    const fn = vi.fn<() => Promise<number>>().mockRejectedValueOnce(new TransientRemoteError("busy")).mockResolvedValueOnce(1);

    await withRetry(fn, p);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][1]).toBe(200);
  });
});
