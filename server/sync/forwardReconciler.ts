import type { Asset, Datapoint, Relationship, TimeSeries } from "../../platform/assetGraph";
import { errorCode, errorMessage, ReconciliationInProgress, RootAssetNotFound } from "../../platform/errors";
import { collectPages } from "../../platform/store";
import {
  CHILDREN_OF,
  CONTAINED_BY,
  RELATIONSHIPS_FROM,
  TWINS_BY_ID,
  type Twin,
  type TwinRelationship,
  type TwinRelationshipInput,
} from "../../platform/twinGraph";
import type { RunCounts, RunStore } from "../runStore";
import { detectAmbiguities, detectLabelAmbiguities, reportAmbiguities, type Ambiguity } from "./ambiguityDetector";
import { mapConcurrent } from "./concurrency";
import {
  containsRelationship,
  mapAssetToTwin,
  mapRelationshipToTwin,
  mapTimeSeriesToTwin,
  parentRelationship,
} from "./entityMapper";
import {
  diffProjections,
  planWriteTiers,
  relationshipKey,
  type CurrentProjection,
  type GraphDiff,
  type TargetProjection,
  type TwinWriteOperation,
} from "./graphDiffService";
import { hasReservedPlaceholder, toTwinId } from "./identityNormalizer";
import { queryRelationshipsInBatches, queryTwinsInBatches } from "./queryBatcher";
import { withRetry } from "./retry";
import type { SyncContext } from "./syncContext";

export type ForwardReconcilerOptions = Readonly<{
  /** Ledger of passes; when absent runs are not recorded. */
  runStore?: RunStore;
  /** Concurrent remote calls within a tier or a read fan-out. */
  concurrency?: number;
}>;

export type AssetGraphSnapshot = Readonly<{
  root: Asset;
  assets: readonly Asset[];
  relationships: readonly Relationship[];
  timeSeries: readonly TimeSeries[];
  latestDatapoints: ReadonlyMap<string, Datapoint | null>;
}>;

export interface ReconciliationReport {
  runId: string | null;
  rootExternalId: string;
  startedAt: Date;
  finishedAt: Date;
  diff: GraphDiff;
  counts: RunCounts;
  ambiguities: Ambiguity[];
  /** Identifiers that will not map back exactly from the twin graph. */
  lossyIdentifiers: string[];
}

const DEFAULT_CONCURRENCY = 16;

/**
 * Projects the asset subtree into twins and relationships. The root's own
 * parent edge is left out since its target lies outside the subtree.
 */
export function buildTargetProjection(snapshot: AssetGraphSnapshot): TargetProjection {
  const twins: Twin[] = [];
  const relationships: TwinRelationshipInput[] = [];

  for (const asset of snapshot.assets) {
    twins.push(mapAssetToTwin(asset));
    if (asset.externalId === snapshot.root.externalId) continue;
    const parent = parentRelationship(asset);
    if (parent) relationships.push(parent);
  }

  for (const ts of snapshot.timeSeries) {
    twins.push(mapTimeSeriesToTwin(ts, snapshot.latestDatapoints.get(ts.externalId) ?? null));
    const contains = containsRelationship(ts);
    if (contains) relationships.push(contains);
  }

  for (const rel of snapshot.relationships) relationships.push(mapRelationshipToTwin(rel));

  return { twins, relationships };
}

export type TwinIdClash = Readonly<{ twinId: string; externalIds: readonly string[]; entities: readonly string[] }>;

/**
 * Entities of either kind whose externalIds map to the same twin id. Only
 * one of them survives in the projection.
 */
export function findTwinIdClashes(snapshot: Pick<AssetGraphSnapshot, "assets" | "timeSeries">): TwinIdClash[] {
  const byTwinId = new Map<string, Array<{ externalId: string; entity: string }>>();
  const add = (externalId: string, kind: string) => {
    const twinId = toTwinId(externalId);
    const group = byTwinId.get(twinId) ?? [];
    group.push({ externalId, entity: `${kind}:${externalId}` });
    byTwinId.set(twinId, group);
  };
  for (const asset of snapshot.assets) add(asset.externalId, "asset");
  for (const ts of snapshot.timeSeries) add(ts.externalId, "timeseries");

  return Array.from(byTwinId.entries())
    .filter(([, group]) => group.length > 1)
    .map(([twinId, group]) => ({
      twinId,
      externalIds: Array.from(new Set(group.map((g) => g.externalId))).sort(),
      entities: group.map((g) => g.entity).sort(),
    }))
    .sort((a, b) => a.twinId.localeCompare(b.twinId));
}

export function countWrites(diff: GraphDiff): RunCounts {
  return {
    twinsCreated: diff.twins.create.length,
    twinsUpdated: diff.twins.update.length,
    twinsDeleted: diff.twins.delete.length,
    relationshipsCreated: diff.relationships.create.length,
    relationshipsUpdated: diff.relationships.update.length,
    relationshipsDeleted: diff.relationships.delete.length,
  };
}

export class ForwardReconciler {
  private running = false;

  constructor(
    private readonly ctx: SyncContext,
    private readonly opts: ForwardReconcilerOptions = {},
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /**
   * One full pass: read the asset subtree, read the twin subtree, diff, write
   * in tiers. Throws on any failure after recording it in the ledger.
   */
  async run(): Promise<ReconciliationReport> {
    const { rootExternalId, logger } = this.ctx;
    if (this.running) throw new ReconciliationInProgress(rootExternalId);
    this.running = true;

    const startedAt = new Date();
    let runId: string | null = null;
    try {
      if (this.opts.runStore) {
        runId = (await this.opts.runStore.createRun({ rootExternalId })).id;
      }
      logger.info("Reconciliation started", { root: rootExternalId, runId });

      const report = await this.reconcile(runId, startedAt);

      if (runId && this.opts.runStore) {
        await this.opts.runStore.finishRun(runId, {
          status: "succeeded",
          counts: report.counts,
          ambiguities: report.ambiguities.length,
        });
      }
      logger.info("Reconciliation finished", { root: rootExternalId, runId, ...report.counts });
      return report;
    } catch (err) {
      logger.error("Reconciliation failed", { root: rootExternalId, runId, code: errorCode(err), error: errorMessage(err) });
      if (runId && this.opts.runStore) await this.recordFailure(runId, err);
      throw err;
    } finally {
      this.running = false;
    }
  }

  private async recordFailure(runId: string, err: unknown): Promise<void> {
    try {
      await this.opts.runStore?.finishRun(runId, {
        status: "failed",
        errorCode: errorCode(err),
        errorMessage: errorMessage(err),
      });
    } catch (ledgerErr) {
      this.ctx.logger.error("Could not record failed run", { runId, error: errorMessage(ledgerErr) });
    }
  }

  private async reconcile(runId: string | null, startedAt: Date): Promise<ReconciliationReport> {
    const { rootExternalId, logger, retry } = this.ctx;

    const snapshot = await this.readAssetGraph();
    const target = buildTargetProjection(snapshot);

    const placeholders = Array.from(
      new Set([...snapshot.assets.map((a) => a.externalId), ...snapshot.timeSeries.map((ts) => ts.externalId)]),
    )
      .filter(hasReservedPlaceholder)
      .sort();
    for (const externalId of placeholders) {
      logger.warn("Identifier contains a reserved placeholder and will not map back exactly", { externalId });
    }
    const clashes = findTwinIdClashes(snapshot);
    for (const clash of clashes) {
      logger.warn("Identifiers map to the same twin id, only the last one is projected", {
        twinId: clash.twinId,
        entities: clash.entities,
      });
    }
    const lossyIdentifiers = Array.from(
      new Set([...placeholders, ...clashes.flatMap((c) => c.externalIds)]),
    ).sort();

    const rootTwinId = toTwinId(rootExternalId);
    const lastRun = this.opts.runStore ? await this.opts.runStore.getLastSuccessfulRun(rootExternalId) : undefined;

    const current = await this.readTwinGraph(
      target.twins.map((t) => t.twinId),
      rootTwinId,
    );

    if (lastRun && !current.twins.some((t) => t.twinId === rootTwinId)) {
      logger.warn("Root twin missing although a previous pass succeeded, it will be recreated", {
        rootTwinId,
        lastRunId: lastRun.id,
      });
    }

    const ambiguities = [...detectAmbiguities(current.relationships), ...detectLabelAmbiguities(snapshot.relationships)];
    reportAmbiguities(logger, ambiguities);

    const diff = diffProjections(target, current, ambiguities);
    for (const mismatch of diff.immutableMismatches) {
      logger.warn(`Twin ${mismatch.field} differs from the asset graph, not patched`, {
        twinId: mismatch.twinId,
        expected: mismatch.expected,
        actual: mismatch.actual,
      });
    }

    const concurrency = this.opts.concurrency ?? DEFAULT_CONCURRENCY;
    for (const tier of planWriteTiers(diff)) {
      if (tier.operations.length === 0) continue;
      await mapConcurrent(tier.operations, concurrency, (op) => withRetry(() => this.execute(op), retry));
      logger.info(`Applied ${tier.label}`, { tier: tier.tier, operations: tier.operations.length });
    }

    return {
      runId,
      rootExternalId,
      startedAt,
      finishedAt: new Date(),
      diff,
      counts: countWrites(diff),
      ambiguities,
      lossyIdentifiers,
    };
  }

  private async readAssetGraph(): Promise<AssetGraphSnapshot> {
    const { assetGraph, rootExternalId, retry } = this.ctx;
    const concurrency = this.opts.concurrency ?? DEFAULT_CONCURRENCY;

    const root = await withRetry(() => assetGraph.getAsset(rootExternalId), retry);
    if (!root) throw new RootAssetNotFound(rootExternalId);

    const assets = await collectPages((page) =>
      withRetry(() => assetGraph.listAssetSubtree(rootExternalId, page), retry),
    );
    const assetIds = assets.map((a) => a.externalId);

    const relationships = await collectPages((page) =>
      withRetry(
        () => assetGraph.listRelationships({ sourceExternalIds: assetIds, targetExternalIds: assetIds }, page),
        retry,
      ),
    );
    const timeSeries = await collectPages((page) =>
      withRetry(() => assetGraph.listTimeSeries(assetIds, page), retry),
    );

    const latest = await mapConcurrent(timeSeries, concurrency, async (ts) => {
      const dp = await withRetry(() => assetGraph.retrieveLatestDatapoint(ts.externalId), retry);
      return [ts.externalId, dp] as const;
    });

    return { root, assets, relationships, timeSeries, latestDatapoints: new Map(latest) };
  }

  /**
   * Twins addressed by the target ids, plus everything reachable from the
   * root twin through `parent` edges and the time series they contain, plus
   * the outgoing relationships of all of them.
   */
  private async readTwinGraph(targetTwinIds: readonly string[], rootTwinId: string): Promise<CurrentProjection> {
    const { twinGraph, retry } = this.ctx;
    const twins = new Map<string, Twin>();
    const add = (list: readonly Twin[]): void => {
      for (const twin of list) twins.set(twin.twinId, twin);
    };

    add(await queryTwinsInBatches(twinGraph, TWINS_BY_ID, targetTwinIds, retry));

    const visited = new Set<string>([rootTwinId]);
    let frontier: string[] = [rootTwinId];
    while (frontier.length > 0) {
      const children = await queryTwinsInBatches(twinGraph, CHILDREN_OF, frontier, retry);
      add(children);
      frontier = [];
      for (const child of children) {
        if (visited.has(child.twinId)) continue;
        visited.add(child.twinId);
        frontier.push(child.twinId);
      }
    }

    const assetTwinIds = Array.from(twins.values())
      .filter((t) => t.model === "asset")
      .map((t) => t.twinId);
    add(await queryTwinsInBatches(twinGraph, CONTAINED_BY, assetTwinIds, retry));

    const relationships = new Map<string, TwinRelationship>();
    for (const rel of await queryRelationshipsInBatches(twinGraph, RELATIONSHIPS_FROM, Array.from(twins.keys()), retry)) {
      relationships.set(relationshipKey(rel), rel);
    }

    return { twins: Array.from(twins.values()), relationships: Array.from(relationships.values()) };
  }

  private async execute(op: TwinWriteOperation): Promise<void> {
    const { twinGraph } = this.ctx;
    switch (op.kind) {
      case "upsertTwin":
        await twinGraph.upsertTwin(op.twin);
        return;
      case "updateTwin":
        await twinGraph.updateTwin(op.twinId, op.patch);
        return;
      case "deleteRelationship":
        await twinGraph.deleteRelationship(op.sourceTwinId, op.relationshipId);
        return;
      case "upsertRelationship":
        await twinGraph.upsertRelationship(op.relationship);
        return;
      case "updateRelationship":
        await twinGraph.updateRelationship(op.sourceTwinId, op.relationshipId, op.patch);
        return;
      case "deleteTwin":
        await twinGraph.deleteTwin(op.twinId);
        return;
    }
  }
}
