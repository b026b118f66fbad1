import type { ForwardReconciler } from "../sync/forwardReconciler";
import { createConsoleLogger, type SyncLogger } from "../sync/syncLogger";
import { errorCode, errorMessage } from "../../platform/errors";

export type ScheduledReconciler = Pick<ForwardReconciler, "run" | "isRunning">;

export type TickResult = "skipped" | "succeeded" | "failed";

type SchedulerState = {
  running: boolean;
  intervalHandle: ReturnType<typeof setInterval> | null;
};

const state: SchedulerState = {
  running: false,
  intervalHandle: null,
};

/** One scheduler tick. Never rejects; a pass still in flight is not overlapped. */
export async function runScheduledPass(reconciler: ScheduledReconciler, logger: SyncLogger): Promise<TickResult> {
  if (reconciler.isRunning()) {
    logger.warn("Previous reconciliation still running, tick skipped");
    return "skipped";
  }
  try {
    await reconciler.run();
    return "succeeded";
  } catch (err) {
    logger.error("Scheduled reconciliation failed", { code: errorCode(err), error: errorMessage(err) });
    return "failed";
  }
}

export function startScheduler(
  reconciler: ScheduledReconciler,
  intervalMs: number,
  logger: SyncLogger = createConsoleLogger("scheduler"),
): void {
  if (state.running) return;
  state.running = true;
  state.intervalHandle = setInterval(() => {
    void runScheduledPass(reconciler, logger);
  }, intervalMs);
  logger.info("Scheduler started", { intervalMs });
}

export function stopScheduler(): void {
  if (state.intervalHandle) {
    clearInterval(state.intervalHandle);
    state.intervalHandle = null;
  }
  state.running = false;
}

export function isSchedulerRunning(): boolean {
  return state.running;
}
