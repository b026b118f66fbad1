import type { AssetGraphClient } from "../platform/assetGraph";
import type { TwinGraphClient } from "../platform/twinGraph";
import type { AppConfig } from "./config";
import { createDatabase } from "./db";
import { DatabaseRunStore, InMemoryRunStore, type RunStore } from "./runStore";
import { ForwardReconciler } from "./sync/forwardReconciler";
import { ReverseApplier } from "./sync/reverseApplier";
import type { SyncContext } from "./sync/syncContext";
import { createConsoleLogger, type SyncLogger } from "./sync/syncLogger";

export type SyncRuntime = {
  context: SyncContext;
  runStore: RunStore;
  reconciler: ForwardReconciler;
  applier: ReverseApplier;
};

export function createSyncRuntime(
  config: AppConfig,
  graphs: { assetGraph: AssetGraphClient; twinGraph: TwinGraphClient },
  logger: SyncLogger = createConsoleLogger("graph-sync"),
): SyncRuntime {
  const runStore = config.databaseUrl
    ? new DatabaseRunStore(createDatabase(config.databaseUrl).db)
    : new InMemoryRunStore();

  const context: SyncContext = {
    ...graphs,
    rootExternalId: config.rootExternalId,
    logger,
    retry: {
      ...config.retry,
      onRetry: (attempt, delayMs, err) => logger.warn("Transient failure, retrying", { attempt, delayMs, error: err.message }),
    },
  };

  return {
    context,
    runStore,
    reconciler: new ForwardReconciler(context, { runStore }),
    applier: new ReverseApplier(context),
  };
}
