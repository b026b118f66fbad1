import type { AssetGraphClient } from "../../platform/assetGraph";
import type { TwinGraphClient } from "../../platform/twinGraph";
import type { RetryPolicy } from "./retry";
import type { SyncLogger } from "./syncLogger";

/** Handles shared by both sync directions. Built once at the entrypoint. */
export interface SyncContext {
  assetGraph: AssetGraphClient;
  twinGraph: TwinGraphClient;
  rootExternalId: string;
  logger: SyncLogger;
  retry: RetryPolicy;
}
