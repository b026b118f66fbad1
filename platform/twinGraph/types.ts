/**
 * Twin graph data model.
 *
 * Twins are a closed set of two variants (asset, time series). Relationships
 * are addressed by (sourceTwinId, relationshipId).
 *
 * @module platform/twinGraph
 */

export const TWIN_MODEL_IDS = {
  asset: "dtmi:assetgraph:Asset;1",
  timeseries: "dtmi:assetgraph:TimeSeries;1",
} as const;

export type TwinModel = keyof typeof TWIN_MODEL_IDS;

export type TwinTags = Readonly<Record<string, string>>;

export type TwinProperties = Readonly<{
  externalId: string;
  internalId: string;
  displayName: string;
  description?: string;
  tags: TwinTags;
}>;

export type TimeSeriesTwinProperties = TwinProperties &
  Readonly<{
    latestValue?: string;
    /** ISO-8601. */
    timestamp?: string;
  }>;

export type AssetTwin = Readonly<{
  twinId: string;
  model: "asset";
  properties: TwinProperties;
}>;

export type TimeSeriesTwin = Readonly<{
  twinId: string;
  model: "timeseries";
  properties: TimeSeriesTwinProperties;
}>;

export type Twin = AssetTwin | TimeSeriesTwin;

export type RelationshipName = "parent" | "contains" | "relatesTo";

export type TwinRelationship = Readonly<{
  relationshipId: string;
  name: RelationshipName;
  sourceTwinId: string;
  targetTwinId: string;
  /** Comma-joined label list, relatesTo only. */
  labels?: string;
  /** ISO-8601, assigned by the store. */
  createdAt: string;
}>;

export type TwinRelationshipInput = Omit<TwinRelationship, "createdAt">;

export type PatchOperation = Readonly<{
  op: "add" | "replace" | "remove";
  path: string;
  value?: unknown;
}>;

export type TwinPatch = readonly PatchOperation[];
