import { describe, it, expect, vi } from "vitest";
import { EntityConflict, TransientRemoteError } from "../../platform/errors";
import type { Twin } from "../../platform/twinGraph";
import { ForwardReconciler } from "../sync/forwardReconciler";
import { isEmptyDiff } from "../sync/graphDiffService";
import type { ChangeNotification } from "../sync/notificationDecoder";
import { ReverseApplier } from "../sync/reverseApplier";
import { ROOT, makeWorld, seedPlant } from "./syncFixtures";

async function syncedPlant() {
  const world = makeWorld();
  await seedPlant(world.assetGraph);
  const reconciler = new ForwardReconciler(world.ctx);
  await reconciler.run();
  world.logger.warn.mockClear();
  return { ...world, reconciler, applier: new ReverseApplier(world.ctx) };
}

const valveTwin: Twin = {
  twinId: "valve_2",
  model: "asset",
  properties: { externalId: "", internalId: "", displayName: "Valve 2", tags: { "design^rev": "3" } },
};

describe("ReverseApplier: nodes", () => {
  it("creates a new asset under the root", async () => {
    const { assetGraph, applier } = await syncedPlant();

    const outcome = await applier.apply({ kind: "NodeCreated", twin: valveTwin });

    expect(outcome.status).toBe("applied");
    expect(outcome.intents.map((i) => i.kind)).toEqual(["createAsset"]);
    expect(await assetGraph.getAsset("valve 2")).toMatchObject({
      externalId: "valve 2",
      name: "Valve 2",
      metadata: { "design.rev": "3" },
      parentExternalId: ROOT,
    });
  });

  it("creates a new time series with its first datapoint", async () => {
    const { assetGraph, applier } = await syncedPlant();
    const twin: Twin = {
      twinId: "flow_1",
      model: "timeseries",
      properties: {
        externalId: "",
        internalId: "",
        displayName: "Flow",
        tags: {},
        latestValue: "3.5",
        timestamp: "2024-01-01T00:00:00.000Z",
      },
    };

    const outcome = await applier.apply({ kind: "NodeCreated", twin });

    expect(outcome.intents.map((i) => i.kind)).toEqual(["createTimeSeries", "insertDatapoint"]);
    expect(await assetGraph.getTimeSeries("flow 1")).toMatchObject({ assetExternalId: ROOT, isString: false });
    expect(await assetGraph.retrieveLatestDatapoint("flow 1")).toEqual({ timestamp: Date.UTC(2024, 0, 1), value: 3.5 });
  });

  it("treats an echo of the asset graph state as a no-op", async () => {
    const { twinGraph, applier, logger } = await syncedPlant();
    const twin = await twinGraph.getTwin("pump");
    if (!twin) throw new Error("pump twin missing");

    const outcome = await applier.apply({ kind: "NodeCreated", twin });

    expect(outcome).toEqual({ kind: "NodeCreated", subject: "pump", status: "noop", intents: [] });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("renames an asset and stays idempotent on replay", async () => {
    const { assetGraph, twinGraph, applier, reconciler } = await syncedPlant();
    const patch = [{ op: "replace" as const, path: "/displayName", value: "Main pump" }];
    await twinGraph.updateTwin("pump", patch);
    const notification: ChangeNotification = { kind: "NodeUpdated", twinId: "pump", model: "asset", patch };

    expect((await applier.apply(notification)).status).toBe("applied");
    expect((await assetGraph.getAsset("pump"))?.name).toBe("Main pump");
    expect((await applier.apply(notification)).status).toBe("noop");
    expect(isEmptyDiff((await reconciler.run()).diff)).toBe(true);
  });

  it("maps tag keys back to the existing metadata keys", async () => {
    const { assetGraph, applier } = await syncedPlant();

    await applier.apply({
      kind: "NodeUpdated",
      twinId: "pump",
      model: "asset",
      patch: [
        { op: "replace", path: "/tags/values/vendor^name", value: "Globex" },
        { op: "add", path: "/tags/values/site^code", value: "S1" },
      ],
    });

    expect((await assetGraph.getAsset("pump"))?.metadata).toEqual({ "vendor.name": "Globex", "site.code": "S1" });
  });

  it("clears the description on remove", async () => {
    const { assetGraph, applier } = await syncedPlant();
    await assetGraph.updateAsset("pump", { description: "old" });

    const outcome = await applier.apply({
      kind: "NodeUpdated",
      twinId: "pump",
      model: "asset",
      patch: [{ op: "remove", path: "/description" }],
    });

    expect(outcome.intents).toEqual([{ kind: "updateAsset", externalId: "pump", update: { description: null } }]);
    expect((await assetGraph.getAsset("pump"))?.description).toBeUndefined();
  });

  it("refuses to change externalId", async () => {
    const { assetGraph, applier, logger } = await syncedPlant();

    const outcome = await applier.apply({
      kind: "NodeUpdated",
      twinId: "pump",
      model: "asset",
      patch: [{ op: "replace", path: "/externalId", value: "other" }],
    });

    expect(outcome.status).toBe("noop");
    expect(logger.error).toHaveBeenCalledWith("Refusing to modify externalId, it is immutable", {
      notification: "NodeUpdated",
      subject: "pump",
      twinId: "pump",
      op: "replace",
      value: "other",
    });
    expect(await assetGraph.getAsset("other")).toBeNull();
  });

  it("creates an entity that only exists in the twin graph", async () => {
    const { assetGraph, twinGraph, applier } = await syncedPlant();
    await twinGraph.upsertTwin({
      twinId: "ghost",
      model: "asset",
      properties: { externalId: "ghost", internalId: "", displayName: "Ghost", tags: {} },
    });

    const outcome = await applier.apply({
      kind: "NodeUpdated",
      twinId: "ghost",
      model: "asset",
      patch: [{ op: "replace", path: "/displayName", value: "Ghost" }],
    });

    expect(outcome.status).toBe("applied");
    expect(await assetGraph.getAsset("ghost")).toMatchObject({ name: "Ghost", parentExternalId: ROOT });
  });

  it("logs an update for an entity missing from both graphs", async () => {
    const { applier, logger } = await syncedPlant();

    const outcome = await applier.apply({
      kind: "NodeUpdated",
      twinId: "nowhere",
      model: "asset",
      patch: [{ op: "replace", path: "/displayName", value: "X" }],
    });

    expect(outcome.status).toBe("noop");
    expect(logger.error).toHaveBeenCalledWith("Cannot update, entity exists in neither graph", {
      notification: "NodeUpdated",
      subject: "nowhere",
      twinId: "nowhere",
      model: "asset",
    });
  });

  it("deletes the asset of a deleted twin and ignores unknown ones", async () => {
    const { assetGraph, twinGraph, applier } = await syncedPlant();
    const twin = await twinGraph.getTwin("pump");
    if (!twin) throw new Error("pump twin missing");

    expect((await applier.apply({ kind: "NodeDeleted", twin })).status).toBe("applied");
    expect(await assetGraph.getAsset("pump")).toBeNull();
    expect((await applier.apply({ kind: "NodeDeleted", twin })).status).toBe("noop");
  });

  it("retries a transient asset graph failure", async () => {
    const { assetGraph, applier } = await syncedPlant();
    const update = vi.spyOn(assetGraph, "updateAsset").mockRejectedValueOnce(new TransientRemoteError("throttled"));

    const outcome = await applier.apply({
      kind: "NodeUpdated",
      twinId: "pump",
      model: "asset",
      patch: [{ op: "replace", path: "/displayName", value: "Main pump" }],
    });

    expect(outcome.status).toBe("applied");
    expect(update).toHaveBeenCalledTimes(2);
  });

  it("keeps applying after a failed notification", async () => {
    const { assetGraph, applier, logger } = await syncedPlant();
    vi.spyOn(assetGraph, "createAsset").mockRejectedValueOnce(new EntityConflict("asset valve 2 already exists"));

    const outcomes = await applier.applyAll([
      { kind: "NodeCreated", twin: valveTwin },
      {
        kind: "NodeUpdated",
        twinId: "pump",
        model: "asset",
        patch: [{ op: "replace", path: "/displayName", value: "Main pump" }],
      },
    ]);

    expect(outcomes.map((o) => o.status)).toEqual(["failed", "applied"]);
    expect(outcomes[0].message).toBe("asset valve 2 already exists");
    expect(logger.error).toHaveBeenCalledWith("Failed to apply notification", {
      notification: "NodeCreated",
      subject: "valve_2",
      code: "ENTITY_CONFLICT",
      error: "asset valve 2 already exists",
    });
  });
});
