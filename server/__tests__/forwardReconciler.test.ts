import { describe, it, expect, vi } from "vitest";
import {
  QueryLimitExceeded,
  ReconciliationInProgress,
  RootAssetNotFound,
  TransientRemoteError,
} from "../../platform/errors";
import { ForwardReconciler } from "../sync/forwardReconciler";
import { isEmptyDiff } from "../sync/graphDiffService";
import { InMemoryRunStore } from "../runStore";
import { ROOT, makeWorld, seedBranches, seedPlant } from "./syncFixtures";

describe("ForwardReconciler", () => {
  it("projects the asset subtree into an empty twin graph", async () => {
    const { assetGraph, twinGraph, ctx } = makeWorld();
    await seedPlant(assetGraph);

    const report = await new ForwardReconciler(ctx).run();

    expect(report.counts).toEqual({
      twinsCreated: 3,
      twinsUpdated: 0,
      twinsDeleted: 0,
      relationshipsCreated: 2,
      relationshipsUpdated: 0,
      relationshipsDeleted: 0,
    });
    expect(await twinGraph.getTwin("pump")).toEqual({
      twinId: "pump",
      model: "asset",
      properties: { externalId: "pump", internalId: "2", displayName: "Pump", tags: { "vendor^name": "Acme" } },
    });
    expect((await twinGraph.getTwin("pump.temp"))?.properties).toMatchObject({
      latestValue: "20",
      timestamp: "1970-01-01T00:00:01.000Z",
    });
    expect(await twinGraph.getRelationship("pump", "pump->root")).toMatchObject({
      name: "parent",
      targetTwinId: ROOT,
    });
    expect(await twinGraph.getRelationship("pump", "pump->pump.temp")).toMatchObject({
      name: "contains",
      targetTwinId: "pump.temp",
    });
  });

  it("writes nothing on a second pass", async () => {
    const { assetGraph, ctx } = makeWorld();
    await seedPlant(assetGraph);
    const reconciler = new ForwardReconciler(ctx);

    await reconciler.run();
    const second = await reconciler.run();

    expect(isEmptyDiff(second.diff)).toBe(true);
  });

  it("converges a twin graph holding stale state", async () => {
    const { assetGraph, twinGraph, ctx } = makeWorld();
    await seedPlant(assetGraph);
    await twinGraph.upsertTwin({
      twinId: ROOT,
      model: "asset",
      properties: { externalId: ROOT, internalId: "1", displayName: "Root", tags: {} },
    });
    await twinGraph.upsertTwin({
      twinId: "pump",
      model: "asset",
      properties: { externalId: "pump", internalId: "2", displayName: "Old", tags: { stale: "x" } },
    });
    await twinGraph.upsertTwin({
      twinId: "orphan",
      model: "asset",
      properties: { externalId: "orphan", internalId: "99", displayName: "Orphan", tags: {} },
    });
    await twinGraph.upsertRelationship({ relationshipId: "orphan->root", name: "parent", sourceTwinId: "orphan", targetTwinId: ROOT });
    const reconciler = new ForwardReconciler(ctx);

    const first = await reconciler.run();

    expect(first.diff.twins.update).toEqual([
      {
        twinId: "pump",
        patch: [
          { op: "replace", path: "/displayName", value: "Pump" },
          { op: "remove", path: "/tags/values/stale" },
          { op: "add", path: "/tags/values/vendor^name", value: "Acme" },
        ],
      },
    ]);
    expect(first.diff.twins.delete).toEqual(["orphan"]);
    expect(first.diff.relationships.delete).toEqual([{ sourceTwinId: "orphan", relationshipId: "orphan->root" }]);
    expect(await twinGraph.getTwin("orphan")).toBeNull();
    expect((await twinGraph.getTwin("pump"))?.properties.tags).toEqual({ "vendor^name": "Acme" });

    expect(isEmptyDiff((await reconciler.run()).diff)).toBe(true);
  });

  it("propagates a new datapoint as a patch", async () => {
    const { assetGraph, twinGraph, ctx } = makeWorld();
    await seedPlant(assetGraph);
    const reconciler = new ForwardReconciler(ctx);
    await reconciler.run();

    await assetGraph.insertDatapoints("pump.temp", [{ timestamp: 2000, value: 21 }]);
    const report = await reconciler.run();

    expect(report.diff.twins.update).toEqual([
      {
        twinId: "pump.temp",
        patch: [
          { op: "replace", path: "/latestValue", value: "21" },
          { op: "replace", path: "/timestamp", value: "1970-01-01T00:00:02.000Z" },
        ],
      },
    ]);
    expect((await twinGraph.getTwin("pump.temp"))?.properties).toMatchObject({ latestValue: "21" });
  });

  it("logs a differing internalId without patching it", async () => {
    const { assetGraph, twinGraph, logger, ctx } = makeWorld();
    await seedPlant(assetGraph);
    const reconciler = new ForwardReconciler(ctx);
    await reconciler.run();
    await twinGraph.updateTwin("pump", [{ op: "replace", path: "/internalId", value: "99" }]);

    const report = await reconciler.run();

    expect(isEmptyDiff(report.diff)).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("Twin internalId differs from the asset graph, not patched", {
      twinId: "pump",
      expected: "2",
      actual: "99",
    });
    expect((await twinGraph.getTwin("pump"))?.properties.internalId).toBe("99");
  });

  it("leaves an ambiguous parent group untouched", async () => {
    const { assetGraph, twinGraph, logger, ctx } = makeWorld();
    await seedBranches(assetGraph);
    const reconciler = new ForwardReconciler(ctx);
    await reconciler.run();
    await twinGraph.upsertRelationship({ relationshipId: "c->p2", name: "parent", sourceTwinId: "c", targetTwinId: "p2" });

    const report = await reconciler.run();

    expect(isEmptyDiff(report.diff)).toBe(true);
    expect(report.ambiguities).toEqual([
      { kind: "multiple-parents", key: "c", relationshipIds: ["c->p1", "c->p2"] },
    ]);
    expect(logger.warn).toHaveBeenCalledWith("Ambiguous multiple-parents, left unresolved", {
      key: "c",
      relationships: ["c->p1", "c->p2"],
    });
    expect(await twinGraph.getRelationship("c", "c->p2")).not.toBeNull();
  });

  it("reports identifiers that will not map back exactly", async () => {
    const { assetGraph, logger, ctx } = makeWorld();
    await assetGraph.createAsset({ externalId: ROOT, name: "Root", metadata: {} });
    await assetGraph.createAsset({ externalId: "pump_7", name: "Pump", parentExternalId: ROOT, metadata: {} });

    const report = await new ForwardReconciler(ctx).run();

    expect(report.lossyIdentifiers).toEqual(["pump_7"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Identifier contains a reserved placeholder and will not map back exactly",
      { externalId: "pump_7" },
    );
  });

  it("reports an asset and a time series that share a twin id", async () => {
    const { assetGraph, logger, ctx } = makeWorld();
    await assetGraph.createAsset({ externalId: ROOT, name: "Root", metadata: {} });
    await assetGraph.createAsset({ externalId: "pump", name: "Pump", parentExternalId: ROOT, metadata: {} });
    await assetGraph.createTimeSeries({
      externalId: "pump",
      name: "Pump level",
      assetExternalId: "pump",
      metadata: {},
      isString: false,
    });

    const report = await new ForwardReconciler(ctx).run();

    expect(report.lossyIdentifiers).toEqual(["pump"]);
    expect(logger.warn).toHaveBeenCalledWith("Identifiers map to the same twin id, only the last one is projected", {
      twinId: "pump",
      entities: ["asset:pump", "timeseries:pump"],
    });
  });

  it("fails when the root asset does not exist", async () => {
    const { ctx } = makeWorld();
    const runStore = new InMemoryRunStore();

    await expect(new ForwardReconciler(ctx, { runStore }).run()).rejects.toBeInstanceOf(RootAssetNotFound);

    const [run] = await runStore.listRuns(ROOT);
    expect(run.status).toBe("failed");
    expect(run.errorCode).toBe("ROOT_ASSET_NOT_FOUND");
  });

  it("fails the pass when a query batch is too long", async () => {
    const { assetGraph, twinGraph, ctx } = makeWorld();
    await assetGraph.createAsset({ externalId: ROOT, name: "Root", metadata: {} });
    for (let i = 0; i < 120; i++) {
      const externalId = `asset-${String(i).padStart(3, "0")}-${"x".repeat(76)}`;
      await assetGraph.createAsset({ externalId, name: externalId, parentExternalId: ROOT, metadata: {} });
    }
    const upsert = vi.spyOn(twinGraph, "upsertTwin");

    await expect(new ForwardReconciler(ctx).run()).rejects.toBeInstanceOf(QueryLimitExceeded);
    expect(upsert).not.toHaveBeenCalled();
  });

  it("retries transient write failures", async () => {
    const { assetGraph, twinGraph, ctx } = makeWorld();
    await seedPlant(assetGraph);
    const upsert = vi.spyOn(twinGraph, "upsertTwin").mockRejectedValueOnce(new TransientRemoteError("throttled"));

    await new ForwardReconciler(ctx).run();

    expect(upsert).toHaveBeenCalledTimes(4);
    expect(await twinGraph.getTwin(ROOT)).not.toBeNull();
    expect(await twinGraph.getTwin("pump")).not.toBeNull();
    expect(await twinGraph.getTwin("pump.temp")).not.toBeNull();
  });

  it("refuses to start while a pass is running", async () => {
    const { assetGraph, ctx } = makeWorld();
    await seedPlant(assetGraph);
    const reconciler = new ForwardReconciler(ctx);

    const first = reconciler.run();
    expect(reconciler.isRunning()).toBe(true);
    await expect(reconciler.run()).rejects.toBeInstanceOf(ReconciliationInProgress);
    await first;
    expect(reconciler.isRunning()).toBe(false);
  });

  it("records successful runs in the ledger", async () => {
    const { assetGraph, ctx } = makeWorld();
    await seedPlant(assetGraph);
    const runStore = new InMemoryRunStore();
    const reconciler = new ForwardReconciler(ctx, { runStore });

    const report = await reconciler.run();

    const last = await runStore.getLastSuccessfulRun(ROOT);
    expect(last?.id).toBe(report.runId);
    expect(last?.twinsCreated).toBe(3);
    expect(last?.relationshipsCreated).toBe(2);
  });

  it("warns when the root twin vanished after a successful pass", async () => {
    const { assetGraph, twinGraph, logger, ctx } = makeWorld();
    await seedPlant(assetGraph);
    const runStore = new InMemoryRunStore();
    const reconciler = new ForwardReconciler(ctx, { runStore });
    const first = await reconciler.run();

    await twinGraph.deleteTwin(ROOT);
    const second = await reconciler.run();

    expect(logger.warn).toHaveBeenCalledWith(
      "Root twin missing although a previous pass succeeded, it will be recreated",
      { rootTwinId: ROOT, lastRunId: first.runId },
    );
    expect(second.diff.twins.create.map((t) => t.twinId)).toEqual([ROOT]);
    expect(second.diff.relationships.create.map((r) => r.relationshipId)).toEqual(["pump->root"]);
    expect(await twinGraph.getTwin(ROOT)).not.toBeNull();
  });
});
