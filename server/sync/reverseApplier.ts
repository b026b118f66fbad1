import type { Asset, Relationship, TimeSeries } from "../../platform/assetGraph";
import { errorCode, errorMessage } from "../../platform/errors";
import {
  CONTAINS_EDGES_TO,
  PARENT_EDGES_FROM,
  type Twin,
  type TwinRelationship,
} from "../../platform/twinGraph";
import { splitLabels, twinExternalId } from "./entityMapper";
import { relationshipKey } from "./graphDiffService";
import { fromTwinId } from "./identityNormalizer";
import type { ChangeNotification } from "./notificationDecoder";
import { queryRelationshipsInBatches } from "./queryBatcher";
import { withRetry } from "./retry";
import {
  planWrites,
  type EdgeContext,
  type NodeContext,
  type ReverseContext,
  type WriteIntent,
} from "./reversePlanner";
import type { SyncContext } from "./syncContext";

export type ApplyStatus = "applied" | "noop" | "rejected" | "failed";

export interface ApplyOutcome {
  status: ApplyStatus;
  kind: ChangeNotification["kind"];
  subject: string;
  intents: readonly WriteIntent[];
  message?: string;
}

export function notificationSubject(n: ChangeNotification): string {
  switch (n.kind) {
    case "NodeCreated":
    case "NodeDeleted":
      return n.twin.twinId;
    case "NodeUpdated":
      return n.twinId;
    case "EdgeCreated":
    case "EdgeDeleted":
      return relationshipKey(n.relationship);
    case "EdgeUpdated":
      return relationshipKey(n);
  }
}

/**
 * Applies twin graph change notifications to the asset graph, one at a time.
 * `apply` never throws: every failure is logged and reported in the outcome.
 */
export class ReverseApplier {
  constructor(private readonly ctx: SyncContext) {}

  async apply(notification: ChangeNotification): Promise<ApplyOutcome> {
    const { logger } = this.ctx;
    const subject = notificationSubject(notification);
    const base = { kind: notification.kind, subject };
    let executed: WriteIntent[] = [];

    try {
      const context = await this.resolveContext(notification);
      const plan = planWrites(notification, context);
      for (const note of plan.notes) {
        logger[note.level](note.message, { notification: notification.kind, subject, ...note.fields });
      }

      for (const intent of plan.intents) {
        await this.call(() => this.execute(intent));
        executed = [...executed, intent];
      }

      if (plan.rejected) {
        const reason = plan.notes.find((n) => n.level === "error")?.message;
        return { ...base, status: "rejected", intents: executed, message: reason };
      }
      if (executed.length === 0) return { ...base, status: "noop", intents: executed };

      logger.info("Applied notification", {
        notification: notification.kind,
        subject,
        writes: executed.map((i) => i.kind),
      });
      return { ...base, status: "applied", intents: executed };
    } catch (err) {
      logger.error("Failed to apply notification", {
        notification: notification.kind,
        subject,
        code: errorCode(err),
        error: errorMessage(err),
      });
      return { ...base, status: "failed", intents: executed, message: errorMessage(err) };
    }
  }

  /** Sequential; a failed notification does not stop the ones after it. */
  async applyAll(notifications: readonly ChangeNotification[]): Promise<ApplyOutcome[]> {
    const outcomes: ApplyOutcome[] = [];
    for (const n of notifications) outcomes.push(await this.apply(n));
    return outcomes;
  }

  private call<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, this.ctx.retry);
  }

  async resolveContext(n: ChangeNotification): Promise<ReverseContext> {
    if (n.kind === "NodeCreated" || n.kind === "NodeUpdated" || n.kind === "NodeDeleted") {
      return this.resolveNodeContext(n);
    }
    if (n.kind === "EdgeUpdated") {
      const { sourceTwinId, relationshipId } = n;
      return this.resolveEdgeContext(
        await this.call(() => this.ctx.twinGraph.getRelationship(sourceTwinId, relationshipId)),
      );
    }
    return this.resolveEdgeContext(n.relationship);
  }

  private async resolveNodeContext(
    n: Extract<ChangeNotification, { kind: "NodeCreated" | "NodeUpdated" | "NodeDeleted" }>,
  ): Promise<NodeContext> {
    const { assetGraph, twinGraph, rootExternalId } = this.ctx;

    const model = n.kind === "NodeUpdated" ? n.model : n.twin.model;
    let remoteTwin: Twin | null = null;
    const candidates: string[] = [];
    if (n.kind === "NodeUpdated") {
      // The twin's externalId property wins; its id is the fallback.
      const twinId = n.twinId;
      remoteTwin = await this.call(() => twinGraph.getTwin(twinId));
      if (remoteTwin) candidates.push(twinExternalId(remoteTwin));
      candidates.push(fromTwinId(twinId));
    } else {
      candidates.push(twinExternalId(n.twin));
    }

    let asset: Asset | null = null;
    let timeSeries: TimeSeries | null = null;
    for (const externalId of Array.from(new Set(candidates))) {
      if (model === "asset") asset = await this.call(() => assetGraph.getAsset(externalId));
      else timeSeries = await this.call(() => assetGraph.getTimeSeries(externalId));
      if (asset || timeSeries) break;
    }

    const series = timeSeries;
    const latestDatapoint = series
      ? await this.call(() => assetGraph.retrieveLatestDatapoint(series.externalId))
      : null;

    return { scope: "node", rootExternalId, asset, timeSeries, latestDatapoint, remoteTwin };
  }

  private async resolveEdgeContext(relationship: TwinRelationship | null): Promise<EdgeContext> {
    const { assetGraph, twinGraph, rootExternalId, retry } = this.ctx;
    const empty: EdgeContext = {
      scope: "edge",
      rootExternalId,
      relationship,
      siblings: [],
      externalIds: new Map(),
      existingAssets: new Set(),
      asset: null,
      timeSeries: null,
      explicit: null,
      knownLabels: new Set(),
    };
    if (!relationship) return empty;

    let siblings: TwinRelationship[] = [];
    if (relationship.name === "parent") {
      siblings = await queryRelationshipsInBatches(twinGraph, PARENT_EDGES_FROM, [relationship.sourceTwinId], retry);
    } else if (relationship.name === "contains") {
      siblings = await queryRelationshipsInBatches(twinGraph, CONTAINS_EDGES_TO, [relationship.targetTwinId], retry);
    }

    const twinIds = new Set<string>([relationship.sourceTwinId, relationship.targetTwinId]);
    for (const s of siblings) {
      twinIds.add(s.sourceTwinId);
      twinIds.add(s.targetTwinId);
    }
    const externalIds = new Map<string, string>();
    for (const twinId of Array.from(twinIds)) {
      const twin = await this.call(() => twinGraph.getTwin(twinId));
      externalIds.set(twinId, twin ? twinExternalId(twin) : fromTwinId(twinId));
    }
    const ext = (twinId: string): string => externalIds.get(twinId) ?? fromTwinId(twinId);

    // Endpoints that are assets: both ends of parent/relatesTo, the source of contains.
    const assetCandidates = new Set<string>([rootExternalId]);
    for (const rel of [relationship, ...siblings]) {
      assetCandidates.add(ext(rel.sourceTwinId));
      if (rel.name !== "contains") assetCandidates.add(ext(rel.targetTwinId));
    }
    const existingAssets = new Set<string>();
    for (const externalId of Array.from(assetCandidates)) {
      if (await this.call(() => assetGraph.getAsset(externalId))) existingAssets.add(externalId);
    }

    const sourceId = ext(relationship.sourceTwinId);
    const targetId = ext(relationship.targetTwinId);

    const asset = relationship.name === "parent" ? await this.call(() => assetGraph.getAsset(sourceId)) : null;
    const timeSeries =
      relationship.name === "contains" ? await this.call(() => assetGraph.getTimeSeries(targetId)) : null;

    let explicit: Relationship | null = null;
    let knownLabels = new Set<string>();
    if (relationship.name === "relatesTo") {
      const relationshipId = relationship.relationshipId;
      explicit = await this.call(() => assetGraph.getRelationship(relationshipId));
      const labels = splitLabels(relationship.labels);
      if (labels.length > 0) {
        const defined = await this.call(() => assetGraph.listLabels(labels));
        knownLabels = new Set(defined.map((l) => l.externalId));
      }
    }

    return { ...empty, siblings, externalIds, existingAssets, asset, timeSeries, explicit, knownLabels };
  }

  private async execute(intent: WriteIntent): Promise<void> {
    const { assetGraph } = this.ctx;
    switch (intent.kind) {
      case "createAsset":
        await assetGraph.createAsset(intent.asset);
        return;
      case "updateAsset":
        await assetGraph.updateAsset(intent.externalId, intent.update);
        return;
      case "deleteAsset":
        await assetGraph.deleteAsset(intent.externalId);
        return;
      case "createTimeSeries":
        await assetGraph.createTimeSeries(intent.timeSeries);
        return;
      case "updateTimeSeries":
        await assetGraph.updateTimeSeries(intent.externalId, intent.update);
        return;
      case "deleteTimeSeries":
        await assetGraph.deleteTimeSeries(intent.externalId);
        return;
      case "recreateTimeSeries":
        // A retry after a successful delete must not delete again.
        if (await assetGraph.getTimeSeries(intent.timeSeries.externalId)) {
          await assetGraph.deleteTimeSeries(intent.timeSeries.externalId);
        }
        await assetGraph.createTimeSeries(intent.timeSeries);
        return;
      case "insertDatapoint":
        await assetGraph.insertDatapoints(intent.externalId, [intent.datapoint]);
        return;
      case "createLabels":
        await assetGraph.createLabels(intent.labels);
        return;
      case "createRelationship":
        await assetGraph.createRelationship(intent.relationship);
        return;
      case "updateRelationshipLabels":
        await assetGraph.updateRelationshipLabels(intent.externalId, intent.labels);
        return;
      case "deleteRelationship":
        await assetGraph.deleteRelationship(intent.externalId);
        return;
    }
  }
}
