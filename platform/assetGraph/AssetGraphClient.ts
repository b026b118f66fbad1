import type { Page, StoreReadOptions } from "../store/types";
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

/**
 * AssetGraphClient is a storage-only abstraction over the asset graph.
 *
 * Rules:
 * - Entities are addressed by externalId
 * - Listings are cursor-paginated
 * - Writes to a missing entity throw EntityNotFound
 * - Creates of an existing entity throw EntityConflict
 */
export interface AssetGraphClient {
  // ---- Assets ----

  getAsset(externalId: string): Promise<Asset | null>;

  /** The root asset and all of its descendants. */
  listAssetSubtree(rootExternalId: string, opts?: StoreReadOptions): Promise<Page<Asset>>;

  createAsset(input: AssetInput): Promise<Asset>;

  updateAsset(externalId: string, update: AssetUpdate): Promise<Asset>;

  deleteAsset(externalId: string): Promise<void>;

  // ---- Time series ----

  getTimeSeries(externalId: string): Promise<TimeSeries | null>;

  listTimeSeries(assetExternalIds: readonly string[], opts?: StoreReadOptions): Promise<Page<TimeSeries>>;

  createTimeSeries(input: TimeSeriesInput): Promise<TimeSeries>;

  updateTimeSeries(externalId: string, update: TimeSeriesUpdate): Promise<TimeSeries>;

  deleteTimeSeries(externalId: string): Promise<void>;

  retrieveLatestDatapoint(externalId: string): Promise<Datapoint | null>;

  insertDatapoints(externalId: string, datapoints: readonly Datapoint[]): Promise<void>;

  // ---- Relationships ----

  getRelationship(externalId: string): Promise<Relationship | null>;

  /** Both filters apply together when given. */
  listRelationships(filter: RelationshipFilter, opts?: StoreReadOptions): Promise<Page<Relationship>>;

  createRelationship(input: Relationship): Promise<Relationship>;

  updateRelationshipLabels(externalId: string, labels: readonly string[]): Promise<Relationship>;

  deleteRelationship(externalId: string): Promise<void>;

  // ---- Labels ----

  listLabels(externalIds: readonly string[]): Promise<LabelDefinition[]>;

  createLabels(labels: readonly LabelDefinition[]): Promise<void>;
}
