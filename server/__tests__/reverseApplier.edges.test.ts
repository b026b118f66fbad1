import { describe, it, expect } from "vitest";
import type { TwinRelationship } from "../../platform/twinGraph";
import { ForwardReconciler } from "../sync/forwardReconciler";
import { isEmptyDiff } from "../sync/graphDiffService";
import { ReverseApplier } from "../sync/reverseApplier";
import { ROOT, makeWorld, seedBranches } from "./syncFixtures";

async function syncedBranches() {
  const world = makeWorld();
  await seedBranches(world.assetGraph);
  const reconciler = new ForwardReconciler(world.ctx);
  await reconciler.run();
  world.logger.warn.mockClear();
  return { ...world, reconciler, applier: new ReverseApplier(world.ctx) };
}

function removed(
  relationshipId: string,
  name: TwinRelationship["name"],
  sourceTwinId: string,
  targetTwinId: string,
): TwinRelationship {
  return { relationshipId, name, sourceTwinId, targetTwinId, createdAt: "2024-01-02T00:00:00.000Z" };
}

describe("ReverseApplier: implicit edges", () => {
  it("moves a child to the most recent parent and logs the dropped edge", async () => {
    const { assetGraph, twinGraph, applier, logger } = await syncedBranches();
    const relationship = await twinGraph.upsertRelationship({
      relationshipId: "c->p2",
      name: "parent",
      sourceTwinId: "c",
      targetTwinId: "p2",
    });

    const outcome = await applier.apply({ kind: "EdgeCreated", relationship });

    expect(outcome.intents).toEqual([{ kind: "updateAsset", externalId: "c", update: { parentExternalId: "p2" } }]);
    expect((await assetGraph.getAsset("c"))?.parentExternalId).toBe("p2");
    expect(logger.error).toHaveBeenCalledWith("Dropped ambiguous parent relationship", {
      notification: "EdgeCreated",
      subject: "c/relationships/c->p2",
      relationshipId: "c->p1",
      source: "c",
      target: "p1",
    });
  });

  it("resolves a late event for the older edge to the newer parent", async () => {
    const { assetGraph, twinGraph, applier } = await syncedBranches();
    await twinGraph.upsertRelationship({ relationshipId: "c->p2", name: "parent", sourceTwinId: "c", targetTwinId: "p2" });
    const older = await twinGraph.getRelationship("c", "c->p1");
    if (!older) throw new Error("c->p1 missing");

    const first = await applier.apply({ kind: "EdgeCreated", relationship: older });
    const replay = await applier.apply({ kind: "EdgeCreated", relationship: older });

    expect((await assetGraph.getAsset("c"))?.parentExternalId).toBe("p2");
    expect(first.status).toBe("applied");
    expect(replay.status).toBe("noop");
  });

  it("re-homes a child under the root when its only parent edge is deleted", async () => {
    const { assetGraph, twinGraph, applier } = await syncedBranches();
    await twinGraph.deleteRelationship("c", "c->p1");

    const outcome = await applier.apply({ kind: "EdgeDeleted", relationship: removed("c->p1", "parent", "c", "p1") });

    expect(outcome.status).toBe("applied");
    expect((await assetGraph.getAsset("c"))?.parentExternalId).toBe(ROOT);
  });

  it("ignores a deleted parent edge that does not match the asset graph", async () => {
    const { assetGraph, applier, logger } = await syncedBranches();

    const outcome = await applier.apply({ kind: "EdgeDeleted", relationship: removed("c->p2", "parent", "c", "p2") });

    expect(outcome.status).toBe("noop");
    expect(logger.warn).toHaveBeenCalledWith("Deleted parent relationship does not match the asset's parent, not changed", {
      notification: "EdgeDeleted",
      subject: "c/relationships/c->p2",
      externalId: "c",
      parent: "p1",
      deleted: "p2",
    });
    expect((await assetGraph.getAsset("c"))?.parentExternalId).toBe("p1");
  });

  it("re-attaches a series to the root when its contains edge is deleted", async () => {
    const { assetGraph, twinGraph, applier } = await syncedBranches();
    await twinGraph.deleteRelationship("c", "c->c.flow");

    await applier.apply({ kind: "EdgeDeleted", relationship: removed("c->c.flow", "contains", "c", "c.flow") });

    expect((await assetGraph.getTimeSeries("c.flow"))?.assetExternalId).toBe(ROOT);
  });

  it("moves a series to the most recent containing asset", async () => {
    const { assetGraph, twinGraph, applier } = await syncedBranches();
    const relationship = await twinGraph.upsertRelationship({
      relationshipId: "p2->c.flow",
      name: "contains",
      sourceTwinId: "p2",
      targetTwinId: "c.flow",
    });

    const outcome = await applier.apply({ kind: "EdgeCreated", relationship });

    expect(outcome.intents).toEqual([
      { kind: "updateTimeSeries", externalId: "c.flow", update: { assetExternalId: "p2" } },
    ]);
    expect((await assetGraph.getTimeSeries("c.flow"))?.assetExternalId).toBe("p2");
  });

  it("does not move the root", async () => {
    const { assetGraph, twinGraph, applier, logger } = await syncedBranches();
    const relationship = await twinGraph.upsertRelationship({
      relationshipId: "root->p1",
      name: "parent",
      sourceTwinId: ROOT,
      targetTwinId: "p1",
    });

    const outcome = await applier.apply({ kind: "EdgeCreated", relationship });

    expect(outcome.status).toBe("noop");
    expect(logger.warn).toHaveBeenCalledWith("Root asset keeps its parent", {
      notification: "EdgeCreated",
      subject: "root/relationships/root->p1",
      externalId: ROOT,
    });
    expect((await assetGraph.getAsset(ROOT))?.parentExternalId).toBeUndefined();
  });
});

describe("ReverseApplier: explicit relationships", () => {
  it("creates missing labels before the relationship", async () => {
    const { assetGraph, twinGraph, applier } = await syncedBranches();
    const relationship = await twinGraph.upsertRelationship({
      relationshipId: "r1",
      name: "relatesTo",
      sourceTwinId: "c",
      targetTwinId: "p2",
      labels: "feeds,near",
    });

    const outcome = await applier.apply({ kind: "EdgeCreated", relationship });

    expect(outcome.intents.map((i) => i.kind)).toEqual(["createLabels", "createRelationship"]);
    expect(await assetGraph.getRelationship("r1")).toEqual({
      externalId: "r1",
      sourceExternalId: "c",
      targetExternalId: "p2",
      labels: ["feeds", "near"],
    });
    expect((await assetGraph.listLabels(["feeds", "near"])).map((l) => l.externalId)).toEqual(["feeds", "near"]);
  });

  it("updates labels from the current twin graph edge", async () => {
    const { assetGraph, twinGraph, applier, reconciler } = await syncedBranches();
    const relationship = await twinGraph.upsertRelationship({
      relationshipId: "r1",
      name: "relatesTo",
      sourceTwinId: "c",
      targetTwinId: "p2",
      labels: "feeds,near",
    });
    await applier.apply({ kind: "EdgeCreated", relationship });

    const patch = [{ op: "replace" as const, path: "/labels", value: "feeds" }];
    await twinGraph.updateRelationship("c", "r1", patch);
    const outcome = await applier.apply({ kind: "EdgeUpdated", sourceTwinId: "c", relationshipId: "r1", patch });

    expect(outcome.intents).toEqual([{ kind: "updateRelationshipLabels", externalId: "r1", labels: ["feeds"] }]);
    expect((await assetGraph.getRelationship("r1"))?.labels).toEqual(["feeds"]);
    expect(isEmptyDiff((await reconciler.run()).diff)).toBe(true);
  });

  it("keeps a relationship whose deleted edge points elsewhere", async () => {
    const { assetGraph, applier, logger } = await syncedBranches();
    await assetGraph.createRelationship({ externalId: "r1", sourceExternalId: "c", targetExternalId: "p2", labels: [] });

    const outcome = await applier.apply({ kind: "EdgeDeleted", relationship: removed("r1", "relatesTo", "c", "p1") });

    expect(outcome.status).toBe("noop");
    expect(logger.warn).toHaveBeenCalledWith("Deleted relationship endpoints differ from the asset graph, not deleted", {
      notification: "EdgeDeleted",
      subject: "c/relationships/r1",
      relationshipId: "r1",
      source: "c",
      target: "p1",
    });
    expect(await assetGraph.getRelationship("r1")).not.toBeNull();
  });

  it("deletes a matching relationship", async () => {
    const { assetGraph, applier } = await syncedBranches();
    await assetGraph.createRelationship({ externalId: "r1", sourceExternalId: "c", targetExternalId: "p2", labels: [] });

    const outcome = await applier.apply({ kind: "EdgeDeleted", relationship: removed("r1", "relatesTo", "c", "p2") });

    expect(outcome.intents).toEqual([{ kind: "deleteRelationship", externalId: "r1" }]);
    expect(await assetGraph.getRelationship("r1")).toBeNull();
  });

  it("skips an edge whose endpoint is not an asset", async () => {
    const { assetGraph, twinGraph, applier, logger } = await syncedBranches();
    await twinGraph.upsertTwin({
      twinId: "stray",
      model: "asset",
      properties: { externalId: "stray", internalId: "", displayName: "Stray", tags: {} },
    });
    const relationship = await twinGraph.upsertRelationship({
      relationshipId: "r2",
      name: "relatesTo",
      sourceTwinId: "c",
      targetTwinId: "stray",
    });

    const outcome = await applier.apply({ kind: "EdgeCreated", relationship });

    expect(outcome.status).toBe("noop");
    expect(logger.warn).toHaveBeenCalledWith("Relationship endpoint does not exist in the asset graph", {
      notification: "EdgeCreated",
      subject: "c/relationships/r2",
      relationshipId: "r2",
      source: "c",
      target: "stray",
    });
    expect(await assetGraph.getRelationship("r2")).toBeNull();
  });
});
