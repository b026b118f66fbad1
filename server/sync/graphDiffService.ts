import {
  tagPath,
  type PatchOperation,
  type TimeSeriesTwinProperties,
  type Twin,
  type TwinRelationship,
  type TwinRelationshipInput,
} from "../../platform/twinGraph";
import { ambiguityGroupKey, implicitGroupKey, type Ambiguity } from "./ambiguityDetector";

// --- Diff result types ---

export interface TargetProjection {
  twins: readonly Twin[];
  relationships: readonly TwinRelationshipInput[];
}

export interface CurrentProjection {
  twins: readonly Twin[];
  relationships: readonly TwinRelationship[];
}

export interface RelationshipKey {
  sourceTwinId: string;
  relationshipId: string;
}

export interface TwinUpdate {
  twinId: string;
  patch: PatchOperation[];
}

export interface RelationshipUpdate extends RelationshipKey {
  patch: PatchOperation[];
}

export interface ImmutableMismatch {
  twinId: string;
  field: "externalId" | "internalId";
  expected: string;
  actual: string;
}

export interface GraphDiff {
  twins: {
    create: Twin[];
    update: TwinUpdate[];
    delete: string[];
  };
  relationships: {
    create: TwinRelationshipInput[];
    update: RelationshipUpdate[];
    delete: RelationshipKey[];
  };
  /** Logged, never patched. */
  immutableMismatches: ImmutableMismatch[];
  /** Implicit edges left as they are because their group is ambiguous. */
  skippedRelationships: RelationshipKey[];
}

export type TwinWriteOperation =
  | { kind: "upsertTwin"; twin: Twin }
  | { kind: "updateTwin"; twinId: string; patch: PatchOperation[] }
  | { kind: "deleteRelationship"; sourceTwinId: string; relationshipId: string }
  | { kind: "upsertRelationship"; relationship: TwinRelationshipInput }
  | { kind: "updateRelationship"; sourceTwinId: string; relationshipId: string; patch: PatchOperation[] }
  | { kind: "deleteTwin"; twinId: string };

export interface WriteTier {
  tier: 1 | 2 | 3 | 4;
  label: string;
  operations: TwinWriteOperation[];
}

export function relationshipKey(rel: RelationshipKey): string {
  return `${rel.sourceTwinId}/relationships/${rel.relationshipId}`;
}

function compareKeys(a: RelationshipKey, b: RelationshipKey): number {
  return relationshipKey(a).localeCompare(relationshipKey(b));
}

function sameInstant(a: string, b: string): boolean {
  if (a === b) return true;
  const ta = Date.parse(a);
  const tb = Date.parse(b);
  return !Number.isNaN(ta) && ta === tb;
}

function scalarOp(
  path: string,
  target: string | undefined,
  current: string | undefined,
  equal: (a: string, b: string) => boolean = (a, b) => a === b,
): PatchOperation | null {
  if (target === undefined) return current === undefined ? null : { op: "remove", path };
  if (current === undefined) return { op: "add", path, value: target };
  return equal(target, current) ? null : { op: "replace", path, value: target };
}

/**
 * Field-by-field patch turning `current` into `target`. externalId and
 * internalId are only ever filled in when missing; a differing value is
 * reported as a mismatch instead.
 */
export function computeTwinPatch(
  target: Twin,
  current: Twin,
): { patch: PatchOperation[]; mismatches: ImmutableMismatch[] } {
  const patch: PatchOperation[] = [];
  const mismatches: ImmutableMismatch[] = [];
  const t = target.properties;
  const c = current.properties;

  for (const field of ["externalId", "internalId"] as const) {
    if (c[field].length === 0) {
      patch.push({ op: "add", path: `/${field}`, value: t[field] });
    } else if (c[field] !== t[field]) {
      mismatches.push({ twinId: target.twinId, field, expected: t[field], actual: c[field] });
    }
  }

  const displayName = scalarOp("/displayName", t.displayName, c.displayName);
  if (displayName) patch.push(displayName);
  const description = scalarOp("/description", t.description, c.description);
  if (description) patch.push(description);

  const tagKeys = Array.from(new Set([...Object.keys(t.tags), ...Object.keys(c.tags)])).sort();
  for (const key of tagKeys) {
    const op = scalarOp(tagPath(key), t.tags[key], c.tags[key]);
    if (op) patch.push(op);
  }

  if (target.model === "timeseries") {
    const tt: TimeSeriesTwinProperties = target.properties;
    const ct: TimeSeriesTwinProperties = current.model === "timeseries" ? current.properties : c;
    const latestValue = scalarOp("/latestValue", tt.latestValue, ct.latestValue);
    if (latestValue) patch.push(latestValue);
    const timestamp = scalarOp("/timestamp", tt.timestamp, ct.timestamp, sameInstant);
    if (timestamp) patch.push(timestamp);
  }

  return { patch, mismatches };
}

function labelsPatch(target: TwinRelationshipInput, current: TwinRelationship): PatchOperation[] {
  const op = scalarOp("/labels", target.labels, current.labels);
  return op ? [op] : [];
}

/**
 * Compute the writes that turn the current twin graph projection into the
 * target one.
 *
 * Pure function. Implicit edges in an ambiguous group are excluded on both
 * sides. A relationship whose name or target changed under the same key is
 * deleted and re-created. Results are sorted by id.
 */
export function diffProjections(
  target: TargetProjection,
  current: CurrentProjection,
  ambiguities: readonly Ambiguity[] = [],
): GraphDiff {
  // --- Twins ---
  const currentTwins = new Map(current.twins.map((t) => [t.twinId, t]));
  const targetTwins = new Map(target.twins.map((t) => [t.twinId, t]));

  const twinCreates: Twin[] = [];
  const twinUpdates: TwinUpdate[] = [];
  const twinDeletes: string[] = [];
  const immutableMismatches: ImmutableMismatch[] = [];

  for (const [twinId, twin] of targetTwins) {
    const existing = currentTwins.get(twinId);
    if (!existing || existing.model !== twin.model) {
      twinCreates.push(twin);
      continue;
    }
    const { patch, mismatches } = computeTwinPatch(twin, existing);
    immutableMismatches.push(...mismatches);
    if (patch.length > 0) twinUpdates.push({ twinId, patch });
  }

  for (const twinId of currentTwins.keys()) {
    if (!targetTwins.has(twinId)) twinDeletes.push(twinId);
  }

  twinCreates.sort((a, b) => a.twinId.localeCompare(b.twinId));
  twinUpdates.sort((a, b) => a.twinId.localeCompare(b.twinId));
  twinDeletes.sort((a, b) => a.localeCompare(b));

  // --- Relationships ---
  const ambiguousGroups = new Set<string>();
  for (const ambiguity of ambiguities) {
    const key = ambiguityGroupKey(ambiguity);
    if (key) ambiguousGroups.add(key);
  }
  const isAmbiguous = (rel: TwinRelationshipInput): boolean => {
    const group = implicitGroupKey(rel);
    return group !== null && ambiguousGroups.has(group);
  };

  const skipped = new Map<string, RelationshipKey>();
  const currentRels = new Map<string, TwinRelationship>();
  for (const rel of current.relationships) {
    const key = relationshipKey(rel);
    if (isAmbiguous(rel)) skipped.set(key, { sourceTwinId: rel.sourceTwinId, relationshipId: rel.relationshipId });
    else currentRels.set(key, rel);
  }
  const targetRels = new Map<string, TwinRelationshipInput>();
  for (const rel of target.relationships) {
    const key = relationshipKey(rel);
    if (isAmbiguous(rel)) skipped.set(key, { sourceTwinId: rel.sourceTwinId, relationshipId: rel.relationshipId });
    else targetRels.set(key, rel);
  }

  const relCreates: TwinRelationshipInput[] = [];
  const relUpdates: RelationshipUpdate[] = [];
  const relDeletes: RelationshipKey[] = [];

  for (const [key, rel] of targetRels) {
    const existing = currentRels.get(key);
    if (!existing) {
      relCreates.push(rel);
      continue;
    }
    if (existing.name !== rel.name || existing.targetTwinId !== rel.targetTwinId) {
      relDeletes.push({ sourceTwinId: existing.sourceTwinId, relationshipId: existing.relationshipId });
      relCreates.push(rel);
      continue;
    }
    const patch = labelsPatch(rel, existing);
    if (patch.length > 0) {
      relUpdates.push({ sourceTwinId: rel.sourceTwinId, relationshipId: rel.relationshipId, patch });
    }
  }

  for (const [key, rel] of currentRels) {
    if (!targetRels.has(key)) {
      relDeletes.push({ sourceTwinId: rel.sourceTwinId, relationshipId: rel.relationshipId });
    }
  }

  relCreates.sort(compareKeys);
  relUpdates.sort(compareKeys);
  relDeletes.sort(compareKeys);

  return {
    twins: { create: twinCreates, update: twinUpdates, delete: twinDeletes },
    relationships: { create: relCreates, update: relUpdates, delete: relDeletes },
    immutableMismatches,
    skippedRelationships: Array.from(skipped.values()).sort(compareKeys),
  };
}

export function isEmptyDiff(diff: GraphDiff): boolean {
  return (
    diff.twins.create.length === 0 &&
    diff.twins.update.length === 0 &&
    diff.twins.delete.length === 0 &&
    diff.relationships.create.length === 0 &&
    diff.relationships.update.length === 0 &&
    diff.relationships.delete.length === 0
  );
}

/**
 * Orders the diff into dependency tiers: twins before the edges that point
 * at them, edges removed before the twins they touch.
 */
export function planWriteTiers(diff: GraphDiff): WriteTier[] {
  return [
    {
      tier: 1,
      label: "twin upserts",
      operations: [
        ...diff.twins.create.map((twin): TwinWriteOperation => ({ kind: "upsertTwin", twin })),
        ...diff.twins.update.map((u): TwinWriteOperation => ({ kind: "updateTwin", twinId: u.twinId, patch: u.patch })),
      ],
    },
    {
      tier: 2,
      label: "relationship deletes",
      operations: diff.relationships.delete.map((k): TwinWriteOperation => ({ kind: "deleteRelationship", ...k })),
    },
    {
      tier: 3,
      label: "relationship upserts",
      operations: [
        ...diff.relationships.create.map(
          (relationship): TwinWriteOperation => ({ kind: "upsertRelationship", relationship }),
        ),
        ...diff.relationships.update.map(
          (u): TwinWriteOperation => ({
            kind: "updateRelationship",
            sourceTwinId: u.sourceTwinId,
            relationshipId: u.relationshipId,
            patch: u.patch,
          }),
        ),
      ],
    },
    {
      tier: 4,
      label: "twin deletes",
      operations: diff.twins.delete.map((twinId): TwinWriteOperation => ({ kind: "deleteTwin", twinId })),
    },
  ];
}
