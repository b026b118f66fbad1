import { describe, it, expect, vi, afterEach } from "vitest";
import { RootAssetNotFound } from "../../platform/errors";
import {
  isSchedulerRunning,
  runScheduledPass,
  startScheduler,
  stopScheduler,
  type ScheduledReconciler,
} from "../services/schedulerService";
import type { ReconciliationReport } from "../sync/forwardReconciler";
import { makeLogger } from "./syncFixtures";

function fakeReconciler(running = false) {
  const run = vi.fn<() => Promise<ReconciliationReport>>();
  const reconciler: ScheduledReconciler = { run, isRunning: () => running };
  return { run, reconciler };
}

describe("schedulerService", () => {
  afterEach(() => {
    stopScheduler();
    vi.useRealTimers();
  });

  it("skips a tick while a pass is in flight", async () => {
    const { run, reconciler } = fakeReconciler(true);
    const logger = makeLogger();

    expect(await runScheduledPass(reconciler, logger)).toBe("skipped");
    expect(run).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith("Previous reconciliation still running, tick skipped");
  });

  it("reports a failed pass without rejecting", async () => {
    const { run, reconciler } = fakeReconciler();
    run.mockRejectedValueOnce(new RootAssetNotFound("plant"));
    const logger = makeLogger();

    expect(await runScheduledPass(reconciler, logger)).toBe("failed");
    expect(logger.error).toHaveBeenCalledWith("Scheduled reconciliation failed", {
      code: "ROOT_ASSET_NOT_FOUND",
      error: 'Root asset "plant" does not exist in the asset graph',
    });
  });

  it("runs a pass on every interval until stopped", async () => {
    vi.useFakeTimers();
    const { run, reconciler } = fakeReconciler();
    run.mockRejectedValue(new RootAssetNotFound("plant"));

    startScheduler(reconciler, 1000, makeLogger());
    expect(isSchedulerRunning()).toBe(true);
    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(3);

    stopScheduler();
    expect(isSchedulerRunning()).toBe(false);
    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(3);
  });
});
