import type {
  Asset,
  AssetInput,
  AssetUpdate,
  Datapoint,
  LabelDefinition,
  Metadata,
  Relationship,
  TimeSeries,
  TimeSeriesInput,
  TimeSeriesUpdate,
} from "../../platform/assetGraph";
import { tagKeyFromPath, TAG_VALUES_PATH, type PatchOperation, type Twin, type TwinRelationship } from "../../platform/twinGraph";
import { resolveTieBreak } from "./ambiguityDetector";
import { mapTwinToAsset, mapTwinToTimeSeries, splitLabels, type AssetFields } from "./entityMapper";
import { fromMapKey, fromTwinId, toMapKey } from "./identityNormalizer";
import type { ChangeNotification } from "./notificationDecoder";
import type { LogFields } from "./syncLogger";

// --- Write intents ---

export type WriteIntent =
  | { kind: "createAsset"; asset: AssetInput }
  | { kind: "updateAsset"; externalId: string; update: AssetUpdate }
  | { kind: "deleteAsset"; externalId: string }
  | { kind: "createTimeSeries"; timeSeries: TimeSeriesInput }
  | { kind: "updateTimeSeries"; externalId: string; update: TimeSeriesUpdate }
  | { kind: "deleteTimeSeries"; externalId: string }
  /** Delete and re-create under the same externalId; the store assigns a new internalId. */
  | { kind: "recreateTimeSeries"; timeSeries: TimeSeriesInput }
  | { kind: "insertDatapoint"; externalId: string; datapoint: Datapoint }
  | { kind: "createLabels"; labels: LabelDefinition[] }
  | { kind: "createRelationship"; relationship: Relationship }
  | { kind: "updateRelationshipLabels"; externalId: string; labels: string[] }
  | { kind: "deleteRelationship"; externalId: string };

export type PlanNote = Readonly<{
  level: "info" | "warn" | "error";
  message: string;
  fields?: LogFields;
}>;

export type WritePlan = Readonly<{
  intents: readonly WriteIntent[];
  notes: readonly PlanNote[];
  /** A write was refused; nothing should be retried. */
  rejected: boolean;
}>;

// --- Read context ---

export type NodeContext = Readonly<{
  scope: "node";
  rootExternalId: string;
  asset: Asset | null;
  timeSeries: TimeSeries | null;
  latestDatapoint: Datapoint | null;
  /** Current twin, read for updates of entities missing from the asset graph. */
  remoteTwin: Twin | null;
}>;

export type EdgeContext = Readonly<{
  scope: "edge";
  rootExternalId: string;
  /** The edge as it exists now; null when an updated edge has vanished. */
  relationship: TwinRelationship | null;
  /** Current edges of the same implicit group (all parents of a child, all attachments of a series). */
  siblings: readonly TwinRelationship[];
  /** twinId -> asset graph externalId for every endpoint in play. */
  externalIds: ReadonlyMap<string, string>;
  /** Endpoint assets that exist in the asset graph. */
  existingAssets: ReadonlySet<string>;
  /** Child asset of a `parent` edge. */
  asset: Asset | null;
  /** Series of a `contains` edge. */
  timeSeries: TimeSeries | null;
  /** Current asset graph relationship for a `relatesTo` edge. */
  explicit: Relationship | null;
  knownLabels: ReadonlySet<string>;
}>;

export type ReverseContext = NodeContext | EdgeContext;

class PlanBuilder {
  readonly intents: WriteIntent[] = [];
  readonly notes: PlanNote[] = [];
  rejected = false;

  add(intent: WriteIntent): void {
    this.intents.push(intent);
  }

  info(message: string, fields?: LogFields): void {
    this.notes.push({ level: "info", message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.notes.push({ level: "warn", message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.notes.push({ level: "error", message, fields });
  }

  reject(message: string, fields?: LogFields): void {
    this.error(message, fields);
    this.rejected = true;
  }

  build(): WritePlan {
    return { intents: this.intents, notes: this.notes, rejected: this.rejected };
  }
}

// --- Field helpers ---

type CommonFields = Pick<AssetFields, "name" | "description" | "metadata">;
type CommonUpdate = { name?: string; description?: string | null; metadata?: Metadata };

function sameMetadata(a: Metadata, b: Metadata): boolean {
  const ak = Object.keys(a);
  if (ak.length !== Object.keys(b).length) return false;
  return ak.every((k) => Object.prototype.hasOwnProperty.call(b, k) && a[k] === b[k]);
}

function fieldUpdate(current: CommonFields, next: CommonFields): CommonUpdate | null {
  const update: CommonUpdate = {};
  if (current.name !== next.name) update.name = next.name;
  if ((current.description ?? "") !== (next.description ?? "")) update.description = next.description ?? null;
  if (!sameMetadata(current.metadata, next.metadata)) update.metadata = next.metadata;
  return Object.keys(update).length > 0 ? update : null;
}

/** Numeric when the trimmed text is non-empty and parses to a finite number. */
// Non-finite text such as NaN or Infinity counts as a string value.
export function isNumericValue(raw: string): boolean {
  const trimmed = raw.trim();
  return trimmed.length > 0 && Number.isFinite(Number(trimmed));
}

export type ParsedDatapoint = Readonly<{ timestamp: number; raw: string; isString: boolean }>;

/** Null unless both parts are present and the timestamp parses. */
export function parseDatapoint(value: string | undefined, timestamp: string | undefined): ParsedDatapoint | null {
  if (value == null || value.length === 0 || timestamp == null || timestamp.length === 0) return null;
  const ms = Date.parse(timestamp);
  if (Number.isNaN(ms)) return null;
  return { timestamp: ms, raw: value, isString: !isNumericValue(value) };
}

function toDatapoint(dp: ParsedDatapoint): Datapoint {
  return { timestamp: dp.timestamp, value: dp.isString ? dp.raw : Number(dp.raw.trim()) };
}

function planDatapoint(
  b: PlanBuilder,
  ts: TimeSeries,
  latest: Datapoint | null,
  value: string | undefined,
  timestamp: string | undefined,
): void {
  const dp = parseDatapoint(value, timestamp);
  if (!dp) {
    if (value !== undefined || timestamp !== undefined) {
      b.info("Datapoint ignored, latestValue and a valid timestamp are both required", {
        externalId: ts.externalId,
        value,
        timestamp,
      });
    }
    return;
  }
  if (latest && dp.timestamp <= latest.timestamp) {
    b.info("Datapoint not newer than the latest one, skipped", { externalId: ts.externalId, timestamp });
    return;
  }
  if (dp.isString === ts.isString) {
    b.add({ kind: "insertDatapoint", externalId: ts.externalId, datapoint: toDatapoint(dp) });
    return;
  }
  if (latest === null) {
    const { internalId: _internalId, ...input } = ts;
    b.warn(`First datapoint is ${dp.isString ? "a string" : "numeric"}, re-creating the time series`, {
      externalId: ts.externalId,
    });
    b.add({ kind: "recreateTimeSeries", timeSeries: { ...input, isString: dp.isString } });
    b.add({ kind: "insertDatapoint", externalId: ts.externalId, datapoint: toDatapoint(dp) });
    return;
  }
  b.reject(`TypeConflict: ${dp.isString ? "string" : "numeric"} datapoint for a ${ts.isString ? "string" : "numeric"} time series`, {
    externalId: ts.externalId,
    value: dp.raw,
  });
}

// --- Node notifications ---

function planUpsertNode(b: PlanBuilder, twin: Twin, ctx: NodeContext): void {
  if (twin.model === "asset") {
    const fields = mapTwinToAsset(twin);
    if (!ctx.asset) {
      if (fields.externalId === ctx.rootExternalId) {
        b.error("Root asset is missing from the asset graph, not re-created", { externalId: fields.externalId });
        return;
      }
      b.add({ kind: "createAsset", asset: { ...fields, parentExternalId: ctx.rootExternalId } });
      return;
    }
    const update = fieldUpdate(ctx.asset, fields);
    if (update) b.add({ kind: "updateAsset", externalId: ctx.asset.externalId, update });
    return;
  }

  const fields = mapTwinToTimeSeries(twin);
  const { latestValue, timestamp } = twin.properties;
  if (!ctx.timeSeries) {
    const dp = parseDatapoint(latestValue, timestamp);
    b.add({
      kind: "createTimeSeries",
      timeSeries: { ...fields, assetExternalId: ctx.rootExternalId, isString: dp ? dp.isString : false },
    });
    if (dp) b.add({ kind: "insertDatapoint", externalId: fields.externalId, datapoint: toDatapoint(dp) });
    return;
  }
  const update = fieldUpdate(ctx.timeSeries, fields);
  if (update) b.add({ kind: "updateTimeSeries", externalId: ctx.timeSeries.externalId, update });
  planDatapoint(b, ctx.timeSeries, ctx.latestDatapoint, latestValue, timestamp);
}

function stringOf(b: PlanBuilder, op: PatchOperation): string | null {
  if (typeof op.value === "string") return op.value;
  b.warn("Patch value is not a string, ignored", { path: op.path, op: op.op });
  return null;
}

function recordOf(b: PlanBuilder, op: PatchOperation): Record<string, string> | null {
  const value = op.value;
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    const out: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== "string") {
        b.warn("Tag value is not a string, ignored", { path: op.path, key });
        continue;
      }
      out[fromMapKey(key)] = entry;
    }
    return out;
  }
  b.warn("Patch value is not an object, ignored", { path: op.path, op: op.op });
  return null;
}

function planNodeUpdate(
  b: PlanBuilder,
  n: Extract<ChangeNotification, { kind: "NodeUpdated" }>,
  ctx: NodeContext,
): void {
  const entity = n.model === "asset" ? ctx.asset : ctx.timeSeries;
  if (!entity) {
    if (ctx.remoteTwin && ctx.remoteTwin.model === n.model) {
      b.warn("Updated twin has no counterpart in the asset graph, creating it", { twinId: n.twinId });
      planUpsertNode(b, ctx.remoteTwin, ctx);
    } else {
      b.error("Cannot update, entity exists in neither graph", { twinId: n.twinId, model: n.model });
    }
    return;
  }

  let name = entity.name;
  let description: string | undefined = entity.description;
  const metadata: Record<string, string> = { ...entity.metadata };
  let latestValue: string | undefined;
  let timestamp: string | undefined;

  // Twin map keys are matched against the converted existing keys first.
  const keyFor = (twinKey: string): string =>
    Object.keys(metadata).find((k) => toMapKey(k) === twinKey) ?? fromMapKey(twinKey);

  for (const op of n.patch) {
    const tagKey = tagKeyFromPath(op.path);
    if (tagKey !== null) {
      const key = keyFor(tagKey);
      if (op.op === "remove") {
        delete metadata[key];
      } else {
        const value = stringOf(b, op);
        if (value !== null) metadata[key] = value;
      }
      continue;
    }

    switch (op.path) {
      case "/displayName": {
        if (op.op === "remove") break;
        const value = stringOf(b, op);
        if (value !== null) name = value;
        break;
      }
      case "/description": {
        if (op.op === "remove") {
          description = undefined;
          break;
        }
        const value = stringOf(b, op);
        if (value !== null) description = value;
        break;
      }
      case "/externalId":
      case "/internalId": {
        const expected = op.path === "/externalId" ? entity.externalId : String(entity.internalId);
        if (op.op === "add" && op.value === expected) break;
        b.error(`Refusing to modify ${op.path.slice(1)}, it is immutable`, {
          twinId: n.twinId,
          op: op.op,
          value: typeof op.value === "string" ? op.value : undefined,
        });
        break;
      }
      case TAG_VALUES_PATH: {
        if (op.op === "remove") {
          for (const key of Object.keys(metadata)) delete metadata[key];
          break;
        }
        if (Object.keys(entity.metadata).length > 0) {
          b.warn("Whole tag map added while metadata already exists, ignored", { twinId: n.twinId });
          break;
        }
        const value = recordOf(b, op);
        if (value) Object.assign(metadata, value);
        break;
      }
      case "/latestValue":
      case "/timestamp": {
        if (n.model !== "timeseries" || op.op === "remove") break;
        const value = stringOf(b, op);
        if (value === null) break;
        if (op.path === "/latestValue") latestValue = value;
        else timestamp = value;
        break;
      }
      default:
        b.warn("Unsupported patch path, ignored", { twinId: n.twinId, path: op.path });
    }
  }

  const update = fieldUpdate(entity, { name, description, metadata });
  if (update) {
    b.add(
      n.model === "asset"
        ? { kind: "updateAsset", externalId: entity.externalId, update }
        : { kind: "updateTimeSeries", externalId: entity.externalId, update },
    );
  }

  if (ctx.timeSeries && n.model === "timeseries") {
    planDatapoint(b, ctx.timeSeries, ctx.latestDatapoint, latestValue, timestamp);
  }
}

function planNodeDelete(b: PlanBuilder, twin: Twin, ctx: NodeContext): void {
  if (twin.model === "asset") {
    if (ctx.asset) b.add({ kind: "deleteAsset", externalId: ctx.asset.externalId });
    else b.info("Deleted twin has no asset, nothing to do", { twinId: twin.twinId });
    return;
  }
  if (ctx.timeSeries) b.add({ kind: "deleteTimeSeries", externalId: ctx.timeSeries.externalId });
  else b.info("Deleted twin has no time series, nothing to do", { twinId: twin.twinId });
}

// --- Edge notifications ---

function externalIdOf(ctx: EdgeContext, twinId: string): string {
  return ctx.externalIds.get(twinId) ?? fromTwinId(twinId);
}

function logDropped(b: PlanBuilder, dropped: readonly TwinRelationship[], kind: string): void {
  for (const rel of dropped) {
    b.error(`Dropped ambiguous ${kind} relationship`, {
      relationshipId: rel.relationshipId,
      source: rel.sourceTwinId,
      target: rel.targetTwinId,
    });
  }
}

function setParent(b: PlanBuilder, ctx: EdgeContext, asset: Asset, parentExternalId: string): void {
  if (asset.externalId === ctx.rootExternalId) {
    b.warn("Root asset keeps its parent", { externalId: asset.externalId });
    return;
  }
  if (!ctx.existingAssets.has(parentExternalId)) {
    b.warn("Parent asset does not exist in the asset graph", { externalId: asset.externalId, parent: parentExternalId });
    return;
  }
  if (asset.parentExternalId === parentExternalId) return;
  b.add({ kind: "updateAsset", externalId: asset.externalId, update: { parentExternalId } });
}

function setAttachment(b: PlanBuilder, ctx: EdgeContext, ts: TimeSeries, assetExternalId: string): void {
  if (!ctx.existingAssets.has(assetExternalId)) {
    b.warn("Asset does not exist in the asset graph", { externalId: ts.externalId, asset: assetExternalId });
    return;
  }
  if (ts.assetExternalId === assetExternalId) return;
  b.add({ kind: "updateTimeSeries", externalId: ts.externalId, update: { assetExternalId } });
}

function planImplicitUpsert(b: PlanBuilder, rel: TwinRelationship, ctx: EdgeContext): void {
  const decision = resolveTieBreak(ctx.siblings);
  if (!decision) {
    b.info("Relationship no longer exists in the twin graph, nothing to do", { relationshipId: rel.relationshipId });
    return;
  }
  logDropped(b, decision.dropped, rel.name);

  if (rel.name === "parent") {
    if (!ctx.asset) {
      b.warn("Child asset does not exist in the asset graph", { twinId: rel.sourceTwinId });
      return;
    }
    setParent(b, ctx, ctx.asset, externalIdOf(ctx, decision.winner.targetTwinId));
    return;
  }

  if (!ctx.timeSeries) {
    b.warn("Time series does not exist in the asset graph", { twinId: rel.targetTwinId });
    return;
  }
  setAttachment(b, ctx, ctx.timeSeries, externalIdOf(ctx, decision.winner.sourceTwinId));
}

function planImplicitDelete(b: PlanBuilder, rel: TwinRelationship, ctx: EdgeContext): void {
  const remaining = ctx.siblings.filter((s) => s.relationshipId !== rel.relationshipId);
  const decision = resolveTieBreak(remaining);
  if (decision) logDropped(b, decision.dropped, rel.name);

  if (rel.name === "parent") {
    const asset = ctx.asset;
    if (!asset) {
      b.info("Child asset does not exist in the asset graph, nothing to do", { twinId: rel.sourceTwinId });
      return;
    }
    const deletedParent = externalIdOf(ctx, rel.targetTwinId);
    if (asset.parentExternalId !== deletedParent) {
      b.warn("Deleted parent relationship does not match the asset's parent, not changed", {
        externalId: asset.externalId,
        parent: asset.parentExternalId,
        deleted: deletedParent,
      });
      return;
    }
    setParent(b, ctx, asset, decision ? externalIdOf(ctx, decision.winner.targetTwinId) : ctx.rootExternalId);
    return;
  }

  const ts = ctx.timeSeries;
  if (!ts) {
    b.info("Time series does not exist in the asset graph, nothing to do", { twinId: rel.targetTwinId });
    return;
  }
  const deletedAsset = externalIdOf(ctx, rel.sourceTwinId);
  if (ts.assetExternalId !== deletedAsset) {
    b.warn("Deleted contains relationship does not match the series' asset, not changed", {
      externalId: ts.externalId,
      asset: ts.assetExternalId,
      deleted: deletedAsset,
    });
    return;
  }
  setAttachment(b, ctx, ts, decision ? externalIdOf(ctx, decision.winner.sourceTwinId) : ctx.rootExternalId);
}

function planExplicitUpsert(b: PlanBuilder, rel: TwinRelationship, ctx: EdgeContext): void {
  const source = externalIdOf(ctx, rel.sourceTwinId);
  const target = externalIdOf(ctx, rel.targetTwinId);
  if (!ctx.existingAssets.has(source) || !ctx.existingAssets.has(target)) {
    b.warn("Relationship endpoint does not exist in the asset graph", { relationshipId: rel.relationshipId, source, target });
    return;
  }

  const labels = splitLabels(rel.labels);
  const missing = Array.from(new Set(labels.filter((l) => !ctx.knownLabels.has(l))));
  const ensureLabels = (): void => {
    if (missing.length > 0) {
      b.add({ kind: "createLabels", labels: missing.map((l) => ({ externalId: l, name: l })) });
    }
  };
  const relationship: Relationship = { externalId: rel.relationshipId, sourceExternalId: source, targetExternalId: target, labels };

  const existing = ctx.explicit;
  if (!existing) {
    ensureLabels();
    b.add({ kind: "createRelationship", relationship });
    return;
  }
  if (existing.sourceExternalId !== source || existing.targetExternalId !== target) {
    b.add({ kind: "deleteRelationship", externalId: existing.externalId });
    ensureLabels();
    b.add({ kind: "createRelationship", relationship });
    return;
  }
  const sameLabels = existing.labels.length === labels.length && existing.labels.every((l, i) => l === labels[i]);
  if (sameLabels) return;
  ensureLabels();
  b.add({ kind: "updateRelationshipLabels", externalId: existing.externalId, labels });
}

function planExplicitDelete(b: PlanBuilder, rel: TwinRelationship, ctx: EdgeContext): void {
  const existing = ctx.explicit;
  if (!existing) {
    b.info("Relationship does not exist in the asset graph, nothing to do", { relationshipId: rel.relationshipId });
    return;
  }
  const source = externalIdOf(ctx, rel.sourceTwinId);
  const target = externalIdOf(ctx, rel.targetTwinId);
  if (existing.sourceExternalId !== source || existing.targetExternalId !== target) {
    b.warn("Deleted relationship endpoints differ from the asset graph, not deleted", {
      relationshipId: rel.relationshipId,
      source,
      target,
    });
    return;
  }
  b.add({ kind: "deleteRelationship", externalId: existing.externalId });
}

function planEdge(b: PlanBuilder, rel: TwinRelationship, ctx: EdgeContext, deleted: boolean): void {
  if (rel.name === "relatesTo") {
    if (deleted) planExplicitDelete(b, rel, ctx);
    else planExplicitUpsert(b, rel, ctx);
    return;
  }
  if (deleted) planImplicitDelete(b, rel, ctx);
  else planImplicitUpsert(b, rel, ctx);
}

function nodeScope(ctx: ReverseContext): NodeContext {
  if (ctx.scope !== "node") throw new Error(`expected a node context, got ${ctx.scope}`);
  return ctx;
}

function edgeScope(ctx: ReverseContext): EdgeContext {
  if (ctx.scope !== "edge") throw new Error(`expected an edge context, got ${ctx.scope}`);
  return ctx;
}

/**
 * Pure planning step of the reverse path: one decoded notification plus the
 * state read for it, to the asset graph writes that apply it.
 */
export function planWrites(notification: ChangeNotification, context: ReverseContext): WritePlan {
  const b = new PlanBuilder();

  switch (notification.kind) {
    case "NodeCreated":
      planUpsertNode(b, notification.twin, nodeScope(context));
      break;
    case "NodeUpdated":
      planNodeUpdate(b, notification, nodeScope(context));
      break;
    case "NodeDeleted":
      planNodeDelete(b, notification.twin, nodeScope(context));
      break;
    case "EdgeCreated":
    case "EdgeDeleted":
      planEdge(b, notification.relationship, edgeScope(context), notification.kind === "EdgeDeleted");
      break;
    case "EdgeUpdated": {
      const ctx = edgeScope(context);
      if (!ctx.relationship) {
        b.info("Updated relationship no longer exists in the twin graph, nothing to do", {
          relationshipId: notification.relationshipId,
        });
        break;
      }
      planEdge(b, ctx.relationship, ctx, false);
      break;
    }
  }

  return b.build();
}

