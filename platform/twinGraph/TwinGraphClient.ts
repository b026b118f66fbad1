import type { RelationshipQuery, TwinQuery } from "./queries";
import type { Twin, TwinPatch, TwinRelationship, TwinRelationshipInput } from "./types";

/**
 * TwinGraphClient is a storage-only abstraction over the twin graph.
 *
 * Rules:
 * - Twins are addressed by twinId, relationships by (sourceTwinId, relationshipId)
 * - Traversal happens only through queries, which carry at most
 *   MAX_QUERY_IDS identifiers and MAX_QUERY_LENGTH characters of text
 * - Violating a query limit throws QueryLimitExceeded
 */
export interface TwinGraphClient {
  // ---- Twins ----

  getTwin(twinId: string): Promise<Twin | null>;

  upsertTwin(twin: Twin): Promise<Twin>;

  updateTwin(twinId: string, patch: TwinPatch): Promise<Twin>;

  /** Also removes every relationship touching the twin. */
  deleteTwin(twinId: string): Promise<void>;

  // ---- Relationships ----

  getRelationship(sourceTwinId: string, relationshipId: string): Promise<TwinRelationship | null>;

  upsertRelationship(input: TwinRelationshipInput): Promise<TwinRelationship>;

  updateRelationship(sourceTwinId: string, relationshipId: string, patch: TwinPatch): Promise<TwinRelationship>;

  deleteRelationship(sourceTwinId: string, relationshipId: string): Promise<void>;

  // ---- Queries ----

  queryTwins(query: TwinQuery): Promise<Twin[]>;

  queryRelationships(query: RelationshipQuery): Promise<TwinRelationship[]>;
}
