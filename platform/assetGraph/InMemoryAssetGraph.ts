import { EntityConflict, EntityNotFound } from "../errors";
import { paginate } from "../store/pagination";
import type { Page, StoreReadOptions } from "../store/types";
import type { AssetGraphClient } from "./AssetGraphClient";
import type {
  Asset,
  AssetInput,
  AssetUpdate,
  Datapoint,
  LabelDefinition,
  Relationship,
  RelationshipFilter,
  TimeSeries,
  TimeSeriesInput,
  TimeSeriesUpdate,
} from "./types";

function resolveDescription(current: string | undefined, next: string | null | undefined): string | undefined {
  if (next === undefined) return current;
  return next ?? undefined;
}

export class InMemoryAssetGraph implements AssetGraphClient {
  private readonly assets = new Map<string, Asset>();
  private readonly timeSeries = new Map<string, TimeSeries>();
  private readonly datapoints = new Map<string, Datapoint[]>();
  private readonly relationships = new Map<string, Relationship>();
  private readonly labels = new Map<string, LabelDefinition>();
  private nextInternalId = 1;

  // ---- Assets ----

  async getAsset(externalId: string): Promise<Asset | null> {
    return this.assets.get(externalId) ?? null;
  }

  async listAssetSubtree(rootExternalId: string, opts?: StoreReadOptions): Promise<Page<Asset>> {
    const root = this.assets.get(rootExternalId);
    if (!root) return { items: [] };

    const childrenByParent = new Map<string, Asset[]>();
    for (const asset of Array.from(this.assets.values())) {
      if (asset.parentExternalId == null) continue;
      const siblings = childrenByParent.get(asset.parentExternalId) ?? [];
      siblings.push(asset);
      childrenByParent.set(asset.parentExternalId, siblings);
    }

    const ordered: Asset[] = [];
    const queue: Asset[] = [root];
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      ordered.push(next);
      queue.push(...(childrenByParent.get(next.externalId) ?? []));
    }

    return paginate(ordered, opts);
  }

  async createAsset(input: AssetInput): Promise<Asset> {
    if (this.assets.has(input.externalId)) {
      throw new EntityConflict(`asset ${input.externalId} already exists`);
    }
    if (input.parentExternalId != null && !this.assets.has(input.parentExternalId)) {
      throw new EntityNotFound(`parent asset ${input.parentExternalId} not found`);
    }
    const asset: Asset = { ...input, internalId: this.nextInternalId++ };
    this.assets.set(asset.externalId, asset);
    return asset;
  }

  async updateAsset(externalId: string, update: AssetUpdate): Promise<Asset> {
    const existing = this.assets.get(externalId);
    if (!existing) throw new EntityNotFound(`asset ${externalId} not found`);

    const parentExternalId = update.parentExternalId ?? existing.parentExternalId;
    if (update.parentExternalId != null) {
      if (update.parentExternalId === externalId || !this.assets.has(update.parentExternalId)) {
        throw new EntityNotFound(`parent asset ${update.parentExternalId} not found`);
      }
    }

    const description = resolveDescription(existing.description, update.description);
    const next: Asset = {
      externalId: existing.externalId,
      internalId: existing.internalId,
      name: update.name ?? existing.name,
      metadata: update.metadata ?? existing.metadata,
      ...(description !== undefined ? { description } : {}),
      ...(parentExternalId !== undefined ? { parentExternalId } : {}),
    };
    this.assets.set(externalId, next);
    return next;
  }

  async deleteAsset(externalId: string): Promise<void> {
    if (!this.assets.has(externalId)) throw new EntityNotFound(`asset ${externalId} not found`);
    for (const asset of Array.from(this.assets.values())) {
      if (asset.parentExternalId === externalId) {
        throw new EntityConflict(`asset ${externalId} still has child ${asset.externalId}`);
      }
    }
    this.assets.delete(externalId);

    for (const ts of Array.from(this.timeSeries.values())) {
      if (ts.assetExternalId !== externalId) continue;
      const { assetExternalId: _detached, ...rest } = ts;
      this.timeSeries.set(ts.externalId, rest);
    }
  }

  // ---- Time series ----

  async getTimeSeries(externalId: string): Promise<TimeSeries | null> {
    return this.timeSeries.get(externalId) ?? null;
  }

  async listTimeSeries(assetExternalIds: readonly string[], opts?: StoreReadOptions): Promise<Page<TimeSeries>> {
    const wanted = new Set(assetExternalIds);
    const all = Array.from(this.timeSeries.values()).filter(
      (ts) => ts.assetExternalId != null && wanted.has(ts.assetExternalId),
    );
    return paginate(all, opts);
  }

  async createTimeSeries(input: TimeSeriesInput): Promise<TimeSeries> {
    if (this.timeSeries.has(input.externalId)) {
      throw new EntityConflict(`time series ${input.externalId} already exists`);
    }
    if (input.assetExternalId != null && !this.assets.has(input.assetExternalId)) {
      throw new EntityNotFound(`asset ${input.assetExternalId} not found`);
    }
    const ts: TimeSeries = { ...input, internalId: this.nextInternalId++ };
    this.timeSeries.set(ts.externalId, ts);
    return ts;
  }

  async updateTimeSeries(externalId: string, update: TimeSeriesUpdate): Promise<TimeSeries> {
    const existing = this.timeSeries.get(externalId);
    if (!existing) throw new EntityNotFound(`time series ${externalId} not found`);
    if (update.assetExternalId != null && !this.assets.has(update.assetExternalId)) {
      throw new EntityNotFound(`asset ${update.assetExternalId} not found`);
    }

    const description = resolveDescription(existing.description, update.description);
    const assetExternalId = update.assetExternalId ?? existing.assetExternalId;
    const next: TimeSeries = {
      externalId: existing.externalId,
      internalId: existing.internalId,
      name: update.name ?? existing.name,
      metadata: update.metadata ?? existing.metadata,
      isString: existing.isString,
      ...(description !== undefined ? { description } : {}),
      ...(assetExternalId !== undefined ? { assetExternalId } : {}),
    };
    this.timeSeries.set(externalId, next);
    return next;
  }

  async deleteTimeSeries(externalId: string): Promise<void> {
    if (!this.timeSeries.delete(externalId)) {
      throw new EntityNotFound(`time series ${externalId} not found`);
    }
    this.datapoints.delete(externalId);
  }

  async retrieveLatestDatapoint(externalId: string): Promise<Datapoint | null> {
    if (!this.timeSeries.has(externalId)) throw new EntityNotFound(`time series ${externalId} not found`);
    const points = this.datapoints.get(externalId) ?? [];
    let latest: Datapoint | null = null;
    for (const dp of points) {
      if (!latest || dp.timestamp > latest.timestamp) latest = dp;
    }
    return latest;
  }

  async insertDatapoints(externalId: string, datapoints: readonly Datapoint[]): Promise<void> {
    const ts = this.timeSeries.get(externalId);
    if (!ts) throw new EntityNotFound(`time series ${externalId} not found`);

    for (const dp of datapoints) {
      if ((typeof dp.value === "string") !== ts.isString) {
        throw new EntityConflict(
          `time series ${externalId} is ${ts.isString ? "string" : "numeric"}, got ${typeof dp.value} value`,
        );
      }
    }

    const points = (this.datapoints.get(externalId) ?? []).filter(
      (existing) => !datapoints.some((dp) => dp.timestamp === existing.timestamp),
    );
    points.push(...datapoints);
    this.datapoints.set(externalId, points);
  }

  // ---- Relationships ----

  async getRelationship(externalId: string): Promise<Relationship | null> {
    return this.relationships.get(externalId) ?? null;
  }

  async listRelationships(filter: RelationshipFilter, opts?: StoreReadOptions): Promise<Page<Relationship>> {
    const sources = filter.sourceExternalIds ? new Set(filter.sourceExternalIds) : null;
    const targets = filter.targetExternalIds ? new Set(filter.targetExternalIds) : null;
    const all = Array.from(this.relationships.values()).filter(
      (rel) =>
        (!sources || sources.has(rel.sourceExternalId)) && (!targets || targets.has(rel.targetExternalId)),
    );
    return paginate(all, opts);
  }

  async createRelationship(input: Relationship): Promise<Relationship> {
    if (this.relationships.has(input.externalId)) {
      throw new EntityConflict(`relationship ${input.externalId} already exists`);
    }
    this.assertLabelsDefined(input.labels);
    const rel: Relationship = { ...input, labels: [...input.labels] };
    this.relationships.set(rel.externalId, rel);
    return rel;
  }

  async updateRelationshipLabels(externalId: string, labels: readonly string[]): Promise<Relationship> {
    const existing = this.relationships.get(externalId);
    if (!existing) throw new EntityNotFound(`relationship ${externalId} not found`);
    this.assertLabelsDefined(labels);
    const next: Relationship = { ...existing, labels: [...labels] };
    this.relationships.set(externalId, next);
    return next;
  }

  async deleteRelationship(externalId: string): Promise<void> {
    if (!this.relationships.delete(externalId)) {
      throw new EntityNotFound(`relationship ${externalId} not found`);
    }
  }

  // ---- Labels ----

  async listLabels(externalIds: readonly string[]): Promise<LabelDefinition[]> {
    const out: LabelDefinition[] = [];
    for (const id of externalIds) {
      const label = this.labels.get(id);
      if (label) out.push(label);
    }
    return out;
  }

  async createLabels(labels: readonly LabelDefinition[]): Promise<void> {
    for (const label of labels) {
      if (this.labels.has(label.externalId)) {
        throw new EntityConflict(`label ${label.externalId} already exists`);
      }
    }
    for (const label of labels) this.labels.set(label.externalId, label);
  }

  private assertLabelsDefined(labels: readonly string[]): void {
    for (const label of labels) {
      if (!this.labels.has(label)) throw new EntityNotFound(`label ${label} is not defined`);
    }
  }
}
