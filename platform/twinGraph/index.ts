/**
 * Twin Graph Module
 *
 * Public exports for the twin graph contract, its query templates and the
 * in-memory store.
 *
 * @module platform/twinGraph
 */

export type { TwinGraphClient } from "./TwinGraphClient";
export { InMemoryTwinGraph, type InMemoryTwinGraphOptions } from "./InMemoryTwinGraph";
export * from "./queries";
export { escapePointerSegment, unescapePointerSegment, tagKeyFromPath, tagPath, TAG_VALUES_PATH } from "./jsonPointer";
export { TWIN_MODEL_IDS } from "./types";
export type {
  AssetTwin,
  PatchOperation,
  RelationshipName,
  TimeSeriesTwin,
  TimeSeriesTwinProperties,
  Twin,
  TwinModel,
  TwinPatch,
  TwinProperties,
  TwinRelationship,
  TwinRelationshipInput,
  TwinTags,
} from "./types";
