import { createDevGraphs } from "../platform/core";
import { TWIN_MODEL_IDS } from "../platform/twinGraph";
import { createSyncRuntime } from "../server/syncRuntime";
import { isEmptyDiff } from "../server/sync/graphDiffService";
import { decodeNotification } from "../server/sync/notificationDecoder";

const ROOT = "plant";

async function main() {
  const graphs = await createDevGraphs(ROOT);
  const { assetGraph, twinGraph } = graphs;

  await assetGraph.createAsset({ externalId: "line:1", name: "Line 1", parentExternalId: ROOT, metadata: { "area.code": "A1" } });
  await assetGraph.createAsset({ externalId: "pump 7", name: "Pump 7", parentExternalId: "line:1", metadata: {} });
  await assetGraph.createTimeSeries({ externalId: "pump 7 pressure", name: "Pressure", assetExternalId: "pump 7", metadata: {}, isString: false });
  await assetGraph.insertDatapoints("pump 7 pressure", [{ timestamp: Date.UTC(2024, 0, 1), value: 4.2 }]);
  await assetGraph.createLabels([{ externalId: "feeds", name: "feeds" }]);
  await assetGraph.createRelationship({ externalId: "rel-1", sourceExternalId: "line:1", targetExternalId: "pump 7", labels: ["feeds"] });

  const runtime = createSyncRuntime(
    { rootExternalId: ROOT, syncIntervalMs: 60_000, port: 0, retry: { maxAttempts: 3, baseDelayMs: 10 } },
    graphs,
  );

  // 1) First pass creates everything
  const first = await runtime.reconciler.run();
  console.log("first pass:", first.counts);
  if (first.counts.twinsCreated !== 4) throw new Error(`Expected 4 twins, got ${first.counts.twinsCreated}`);

  // 2) Second pass is a no-op
  const second = await runtime.reconciler.run();
  if (!isEmptyDiff(second.diff)) throw new Error("Expected the second pass to write nothing.");
  console.log("second pass: no writes");

  // 3) A rename in the twin graph flows back
  await twinGraph.updateTwin("pump_7", [{ op: "replace", path: "/displayName", value: "Pump Seven" }]);
  const outcome = await runtime.applier.apply(
    decodeNotification({
      type: "Twin.Update",
      subject: "pump_7",
      data: { modelId: TWIN_MODEL_IDS.asset, patch: [{ op: "replace", path: "/displayName", value: "Pump Seven" }] },
    }),
  );
  const renamed = await assetGraph.getAsset("pump 7");
  if (outcome.status !== "applied" || renamed?.name !== "Pump Seven") {
    throw new Error(`Expected rename to apply, got ${outcome.status}`);
  }
  console.log("reverse rename applied");

  // 4) The next pass sees nothing to do
  const third = await runtime.reconciler.run();
  if (!isEmptyDiff(third.diff)) throw new Error("Expected the echo to converge.");

  const runs = await runtime.runStore.listRuns(ROOT);
  console.log(`runs recorded: ${runs.length}`);
  console.log("OK");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
