import type { Relationship } from "../../platform/assetGraph";
import type { TwinRelationship } from "../../platform/twinGraph";
import type { SyncLogger } from "./syncLogger";

export type AmbiguityKind =
  | "multiple-parents"
  | "multiple-attachments"
  | "label-contains-separator"
  | "single-empty-label";

export type Ambiguity = Readonly<{
  kind: AmbiguityKind;
  /** Twin id for implicit edge groups, relationship externalId for labels. */
  key: string;
  relationshipIds: readonly string[];
}>;

/**
 * Groups implicit edges that must be unique: one `parent` per source twin,
 * one `contains` per target twin. Returns null for `relatesTo`.
 */
export function implicitGroupKey(rel: Pick<TwinRelationship, "name" | "sourceTwinId" | "targetTwinId">): string | null {
  if (rel.name === "parent") return `parent:${rel.sourceTwinId}`;
  if (rel.name === "contains") return `contains:${rel.targetTwinId}`;
  return null;
}

export function ambiguityGroupKey(ambiguity: Ambiguity): string | null {
  if (ambiguity.kind === "multiple-parents") return `parent:${ambiguity.key}`;
  if (ambiguity.kind === "multiple-attachments") return `contains:${ambiguity.key}`;
  return null;
}

export function detectAmbiguities(relationships: readonly TwinRelationship[]): Ambiguity[] {
  const groups = new Map<string, TwinRelationship[]>();
  for (const rel of relationships) {
    const key = implicitGroupKey(rel);
    if (key === null) continue;
    const group = groups.get(key) ?? [];
    group.push(rel);
    groups.set(key, group);
  }

  const out: Ambiguity[] = [];
  for (const group of Array.from(groups.values())) {
    if (group.length < 2) continue;
    const first = group[0];
    const isParent = first.name === "parent";
    out.push({
      kind: isParent ? "multiple-parents" : "multiple-attachments",
      key: isParent ? first.sourceTwinId : first.targetTwinId,
      relationshipIds: group.map((r) => r.relationshipId).sort(),
    });
  }
  return out.sort((a, b) => a.kind.localeCompare(b.kind) || a.key.localeCompare(b.key));
}

function labelAmbiguity(labels: readonly string[], separator: string): AmbiguityKind | null {
  if (labels.some((label) => label.includes(separator))) return "label-contains-separator";
  // [""] joins to "", which reads back as no labels at all.
  if (labels.length === 1 && labels[0] === "") return "single-empty-label";
  return null;
}

/** Label lists that do not survive a join and split unchanged. */
export function detectLabelAmbiguities(relationships: readonly Relationship[], separator = ","): Ambiguity[] {
  const out: Ambiguity[] = [];
  for (const rel of relationships) {
    const kind = labelAmbiguity(rel.labels, separator);
    if (kind) out.push({ kind, key: rel.externalId, relationshipIds: [rel.externalId] });
  }
  return out.sort((a, b) => a.key.localeCompare(b.key));
}

export function reportAmbiguities(logger: SyncLogger, ambiguities: readonly Ambiguity[]): void {
  for (const ambiguity of ambiguities) {
    logger.warn(`Ambiguous ${ambiguity.kind}, left unresolved`, {
      key: ambiguity.key,
      relationships: ambiguity.relationshipIds,
    });
  }
}

export type TieBreakCandidate = Pick<TwinRelationship, "relationshipId" | "createdAt">;

export type TieBreak<T extends TieBreakCandidate> = Readonly<{
  winner: T;
  dropped: readonly T[];
}>;

function compareRecency(a: TieBreakCandidate, b: TieBreakCandidate): number {
  const byTime = Date.parse(b.createdAt) - Date.parse(a.createdAt);
  if (byTime !== 0 && !Number.isNaN(byTime)) return byTime;
  if (a.relationshipId === b.relationshipId) return 0;
  return a.relationshipId > b.relationshipId ? -1 : 1;
}

/**
 * Most recently created candidate wins; equal creation times go to the
 * lexicographically greater relationshipId.
 */
export function resolveTieBreak<T extends TieBreakCandidate>(candidates: readonly T[]): TieBreak<T> | null {
  if (candidates.length === 0) return null;
  const [winner, ...dropped] = [...candidates].sort(compareRecency);
  return { winner, dropped };
}
