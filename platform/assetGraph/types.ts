/**
 * Asset graph data model.
 *
 * The asset graph is the source of truth: a hierarchy of assets, explicit
 * labelled relationships between them, and time series attached to assets.
 *
 * @module platform/assetGraph
 */

export type Metadata = Readonly<Record<string, string>>;

export type Asset = Readonly<{
  externalId: string;
  /** Assigned by the store on create. */
  internalId: number;
  name: string;
  description?: string;
  metadata: Metadata;
  parentExternalId?: string;
}>;

export type AssetInput = Omit<Asset, "internalId">;

/** `description: null` clears the field. */
export type AssetUpdate = Readonly<{
  name?: string;
  description?: string | null;
  metadata?: Metadata;
  parentExternalId?: string;
}>;

export type Relationship = Readonly<{
  externalId: string;
  sourceExternalId: string;
  targetExternalId: string;
  /** Ordered. */
  labels: readonly string[];
}>;

export type TimeSeries = Readonly<{
  externalId: string;
  internalId: number;
  name: string;
  description?: string;
  metadata: Metadata;
  assetExternalId?: string;
  isString: boolean;
}>;

export type TimeSeriesInput = Omit<TimeSeries, "internalId">;

export type TimeSeriesUpdate = Readonly<{
  name?: string;
  description?: string | null;
  metadata?: Metadata;
  assetExternalId?: string;
}>;

export type Datapoint = Readonly<{
  /** Epoch milliseconds. */
  timestamp: number;
  value: number | string;
}>;

export type LabelDefinition = Readonly<{
  externalId: string;
  name: string;
}>;

export type RelationshipFilter = Readonly<{
  sourceExternalIds?: readonly string[];
  targetExternalIds?: readonly string[];
}>;
