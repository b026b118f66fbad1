/**
 * Asset Graph Module
 *
 * Public exports for the asset graph contract and its in-memory store.
 *
 * @module platform/assetGraph
 */

export type { AssetGraphClient } from "./AssetGraphClient";
export { InMemoryAssetGraph } from "./InMemoryAssetGraph";
export type {
  Asset,
  AssetInput,
  AssetUpdate,
  Datapoint,
  LabelDefinition,
  Metadata,
  Relationship,
  RelationshipFilter,
  TimeSeries,
  TimeSeriesInput,
  TimeSeriesUpdate,
} from "./types";
