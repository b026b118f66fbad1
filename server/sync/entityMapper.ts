import { z } from "zod";
import type { Asset, Datapoint, Relationship, TimeSeries } from "../../platform/assetGraph";
import { InvalidNotification } from "../../platform/errors";
import type {
  AssetTwin,
  TimeSeriesTwin,
  Twin,
  TwinRelationship,
  TwinRelationshipInput,
} from "../../platform/twinGraph";
import { fromTwinId, fromTwinTags, toTwinId, toTwinTags } from "./identityNormalizer";
import { describeIssues } from "./zodIssues";

const LABEL_SEPARATOR = ",";

const twinPropertiesShape = {
  externalId: z.string(),
  internalId: z.string(),
  displayName: z.string(),
  description: z.string().optional(),
  tags: z.record(z.string()),
};

const assetTwinSchema = z.object({
  twinId: z.string().min(1),
  model: z.literal("asset"),
  properties: z.object(twinPropertiesShape).strict(),
}).strict();

const timeSeriesTwinSchema = z.object({
  twinId: z.string().min(1),
  model: z.literal("timeseries"),
  properties: z.object({
    ...twinPropertiesShape,
    latestValue: z.string().optional(),
    timestamp: z.string().optional(),
  }).strict(),
}).strict();

export const twinSchema = z.discriminatedUnion("model", [assetTwinSchema, timeSeriesTwinSchema]);

/** Asset fields owned by the twin side; internalId and parent stay with the asset graph. */
export type AssetFields = Pick<Asset, "externalId" | "name" | "description" | "metadata">;
export type TimeSeriesFields = Pick<TimeSeries, "externalId" | "name" | "description" | "metadata">;

export type RelationshipEndpoints = Readonly<{
  sourceExternalId: string;
  targetExternalId: string;
}>;

/**
 * Validate an untrusted twin. Unknown properties are rejected, so an asset
 * twin carrying time series fields does not decode.
 */
export function parseTwin(raw: unknown): Twin {
  const result = twinSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidNotification(`invalid twin: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function implicitRelationshipId(sourceTwinId: string, targetTwinId: string): string {
  return `${sourceTwinId}->${targetTwinId}`;
}

export function joinLabels(labels: readonly string[]): string {
  return labels.join(LABEL_SEPARATOR);
}

/** Inverse of joinLabels, except that [""] comes back as []. */
export function splitLabels(labels: string | undefined): string[] {
  if (labels == null || labels.length === 0) return [];
  return labels.split(LABEL_SEPARATOR);
}

export function formatDatapointValue(value: number | string): string {
  return typeof value === "string" ? value : String(value);
}

export function formatDatapointTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

export function twinExternalId(twin: Twin): string {
  return twin.properties.externalId.length > 0 ? twin.properties.externalId : fromTwinId(twin.twinId);
}

export function mapAssetToTwin(asset: Asset): AssetTwin {
  return {
    twinId: toTwinId(asset.externalId),
    model: "asset",
    properties: {
      externalId: asset.externalId,
      internalId: String(asset.internalId),
      displayName: asset.name,
      tags: toTwinTags(asset.metadata),
      ...(asset.description ? { description: asset.description } : {}),
    },
  };
}

export function mapTwinToAsset(twin: AssetTwin): AssetFields {
  return {
    externalId: twinExternalId(twin),
    name: twin.properties.displayName,
    metadata: fromTwinTags(twin.properties.tags),
    ...(twin.properties.description ? { description: twin.properties.description } : {}),
  };
}

export function mapTimeSeriesToTwin(timeSeries: TimeSeries, latest: Datapoint | null): TimeSeriesTwin {
  return {
    twinId: toTwinId(timeSeries.externalId),
    model: "timeseries",
    properties: {
      externalId: timeSeries.externalId,
      internalId: String(timeSeries.internalId),
      displayName: timeSeries.name,
      tags: toTwinTags(timeSeries.metadata),
      ...(timeSeries.description ? { description: timeSeries.description } : {}),
      ...(latest
        ? {
            latestValue: formatDatapointValue(latest.value),
            timestamp: formatDatapointTimestamp(latest.timestamp),
          }
        : {}),
    },
  };
}

export function mapTwinToTimeSeries(twin: TimeSeriesTwin): TimeSeriesFields {
  return {
    externalId: twinExternalId(twin),
    name: twin.properties.displayName,
    metadata: fromTwinTags(twin.properties.tags),
    ...(twin.properties.description ? { description: twin.properties.description } : {}),
  };
}

export function mapRelationshipToTwin(relationship: Relationship): TwinRelationshipInput {
  return {
    relationshipId: relationship.externalId,
    name: "relatesTo",
    sourceTwinId: toTwinId(relationship.sourceExternalId),
    targetTwinId: toTwinId(relationship.targetExternalId),
    ...(relationship.labels.length > 0 ? { labels: joinLabels(relationship.labels) } : {}),
  };
}

export function mapTwinToRelationship(
  relationship: TwinRelationship | TwinRelationshipInput,
  endpoints?: RelationshipEndpoints,
): Relationship {
  return {
    externalId: relationship.relationshipId,
    sourceExternalId: endpoints?.sourceExternalId ?? fromTwinId(relationship.sourceTwinId),
    targetExternalId: endpoints?.targetExternalId ?? fromTwinId(relationship.targetTwinId),
    labels: splitLabels(relationship.labels),
  };
}

/** The implicit `parent` edge of a non-root asset. */
export function parentRelationship(asset: Asset): TwinRelationshipInput | null {
  if (asset.parentExternalId == null) return null;
  const sourceTwinId = toTwinId(asset.externalId);
  const targetTwinId = toTwinId(asset.parentExternalId);
  return {
    relationshipId: implicitRelationshipId(sourceTwinId, targetTwinId),
    name: "parent",
    sourceTwinId,
    targetTwinId,
  };
}

/** The implicit `contains` edge from an asset to an attached time series. */
export function containsRelationship(timeSeries: TimeSeries): TwinRelationshipInput | null {
  if (timeSeries.assetExternalId == null) return null;
  const sourceTwinId = toTwinId(timeSeries.assetExternalId);
  const targetTwinId = toTwinId(timeSeries.externalId);
  return {
    relationshipId: implicitRelationshipId(sourceTwinId, targetTwinId),
    name: "contains",
    sourceTwinId,
    targetTwinId,
  };
}
