import { EntityConflict, EntityNotFound, QueryLimitExceeded } from "../errors";
import { tagKeyFromPath, TAG_VALUES_PATH } from "./jsonPointer";
import {
  MAX_QUERY_IDS,
  MAX_QUERY_LENGTH,
  QUERY_PLACEHOLDER,
  type GraphQuery,
  type RelationshipQuery,
  type TwinQuery,
} from "./queries";
import type { TwinGraphClient } from "./TwinGraphClient";
import type {
  PatchOperation,
  TimeSeriesTwinProperties,
  Twin,
  TwinPatch,
  TwinRelationship,
  TwinRelationshipInput,
} from "./types";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export type InMemoryTwinGraphOptions = Readonly<{
  /** Clock used to stamp relationship `createdAt`. */
  now?: () => Date;
}>;

function assertWithinLimits<K extends string>(query: GraphQuery<K>): void {
  if (query.twinIds.length > MAX_QUERY_IDS) {
    throw new QueryLimitExceeded(
      `query carries ${query.twinIds.length} identifiers, at most ${MAX_QUERY_IDS} are allowed`,
    );
  }
  if (query.text.length > MAX_QUERY_LENGTH) {
    throw new QueryLimitExceeded(
      `query text is ${query.text.length} characters, at most ${MAX_QUERY_LENGTH} are allowed`,
    );
  }
  if (query.text.includes(QUERY_PLACEHOLDER)) {
    throw new EntityConflict(`query text still contains the ${QUERY_PLACEHOLDER} placeholder`);
  }
}

function stringValue(op: PatchOperation): string {
  if (typeof op.value !== "string") {
    throw new EntityConflict(`patch ${op.op} ${op.path} requires a string value`);
  }
  return op.value;
}

function tagsValue(op: PatchOperation): Record<string, string> {
  const value = op.value;
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new EntityConflict(`patch ${op.op} ${op.path} requires an object value`);
  }
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new EntityConflict(`patch ${op.op} ${op.path} tag ${key} must be a string`);
    }
    out[key] = entry;
  }
  return out;
}

function applyPatch(twin: Twin, patch: TwinPatch): Twin {
  const props: Mutable<TimeSeriesTwinProperties> = { ...twin.properties, tags: { ...twin.properties.tags } };
  const tags: Record<string, string> = { ...twin.properties.tags };

  for (const op of patch) {
    const tagKey = tagKeyFromPath(op.path);
    if (tagKey !== null) {
      if (op.op === "remove") delete tags[tagKey];
      else tags[tagKey] = stringValue(op);
      continue;
    }

    switch (op.path) {
      case TAG_VALUES_PATH:
        for (const key of Object.keys(tags)) delete tags[key];
        if (op.op !== "remove") Object.assign(tags, tagsValue(op));
        break;
      case "/displayName":
      case "/externalId":
      case "/internalId": {
        if (op.op === "remove") throw new EntityConflict(`cannot remove required property ${op.path}`);
        const value = stringValue(op);
        if (op.path === "/displayName") props.displayName = value;
        else if (op.path === "/externalId") props.externalId = value;
        else props.internalId = value;
        break;
      }
      case "/description":
        if (op.op === "remove") delete props.description;
        else props.description = stringValue(op);
        break;
      case "/latestValue":
      case "/timestamp": {
        if (twin.model !== "timeseries") {
          throw new EntityConflict(`${op.path} is not a property of asset twins`);
        }
        const key = op.path === "/latestValue" ? "latestValue" : "timestamp";
        if (op.op === "remove") delete props[key];
        else props[key] = stringValue(op);
        break;
      }
      default:
        throw new EntityConflict(`unsupported patch path ${op.path}`);
    }
  }

  const base = {
    externalId: props.externalId,
    internalId: props.internalId,
    displayName: props.displayName,
    tags,
    ...(props.description !== undefined ? { description: props.description } : {}),
  };

  if (twin.model === "asset") {
    return { twinId: twin.twinId, model: "asset", properties: base };
  }
  return {
    twinId: twin.twinId,
    model: "timeseries",
    properties: {
      ...base,
      ...(props.latestValue !== undefined ? { latestValue: props.latestValue } : {}),
      ...(props.timestamp !== undefined ? { timestamp: props.timestamp } : {}),
    },
  };
}

export class InMemoryTwinGraph implements TwinGraphClient {
  private readonly twins = new Map<string, Twin>();
  private readonly relationshipsBySource = new Map<string, Map<string, TwinRelationship>>();
  private readonly now: () => Date;

  constructor(opts?: InMemoryTwinGraphOptions) {
    this.now = opts?.now ?? (() => new Date());
  }

  private outgoing(sourceTwinId: string): Map<string, TwinRelationship> {
    let m = this.relationshipsBySource.get(sourceTwinId);
    if (!m) {
      m = new Map();
      this.relationshipsBySource.set(sourceTwinId, m);
    }
    return m;
  }

  private allRelationships(): TwinRelationship[] {
    const out: TwinRelationship[] = [];
    for (const m of Array.from(this.relationshipsBySource.values())) out.push(...Array.from(m.values()));
    return out;
  }

  // ---- Twins ----

  async getTwin(twinId: string): Promise<Twin | null> {
    return this.twins.get(twinId) ?? null;
  }

  async upsertTwin(twin: Twin): Promise<Twin> {
    if (twin.twinId.length === 0) throw new EntityConflict("twinId must not be empty");
    this.twins.set(twin.twinId, twin);
    return twin;
  }

  async updateTwin(twinId: string, patch: TwinPatch): Promise<Twin> {
    const existing = this.twins.get(twinId);
    if (!existing) throw new EntityNotFound(`twin ${twinId} not found`);
    const next = applyPatch(existing, patch);
    this.twins.set(twinId, next);
    return next;
  }

  async deleteTwin(twinId: string): Promise<void> {
    if (!this.twins.delete(twinId)) throw new EntityNotFound(`twin ${twinId} not found`);
    this.relationshipsBySource.delete(twinId);
    for (const m of Array.from(this.relationshipsBySource.values())) {
      for (const rel of Array.from(m.values())) {
        if (rel.targetTwinId === twinId) m.delete(rel.relationshipId);
      }
    }
  }

  // ---- Relationships ----

  async getRelationship(sourceTwinId: string, relationshipId: string): Promise<TwinRelationship | null> {
    return this.relationshipsBySource.get(sourceTwinId)?.get(relationshipId) ?? null;
  }

  async upsertRelationship(input: TwinRelationshipInput): Promise<TwinRelationship> {
    if (!this.twins.has(input.sourceTwinId)) throw new EntityNotFound(`twin ${input.sourceTwinId} not found`);
    if (!this.twins.has(input.targetTwinId)) throw new EntityNotFound(`twin ${input.targetTwinId} not found`);

    const m = this.outgoing(input.sourceTwinId);
    const existing = m.get(input.relationshipId);
    const sameEdge =
      existing != null && existing.targetTwinId === input.targetTwinId && existing.name === input.name;

    const rel: TwinRelationship = {
      relationshipId: input.relationshipId,
      name: input.name,
      sourceTwinId: input.sourceTwinId,
      targetTwinId: input.targetTwinId,
      ...(input.labels !== undefined ? { labels: input.labels } : {}),
      createdAt: sameEdge && existing ? existing.createdAt : this.now().toISOString(),
    };
    m.set(rel.relationshipId, rel);
    return rel;
  }

  async updateRelationship(
    sourceTwinId: string,
    relationshipId: string,
    patch: TwinPatch,
  ): Promise<TwinRelationship> {
    const m = this.relationshipsBySource.get(sourceTwinId);
    const existing = m?.get(relationshipId);
    if (!m || !existing) {
      throw new EntityNotFound(`relationship ${relationshipId} from ${sourceTwinId} not found`);
    }

    let labels = existing.labels;
    for (const op of patch) {
      if (op.path !== "/labels") throw new EntityConflict(`unsupported relationship patch path ${op.path}`);
      labels = op.op === "remove" ? undefined : stringValue(op);
    }

    const { labels: _previous, ...rest } = existing;
    const next: TwinRelationship = labels !== undefined ? { ...rest, labels } : rest;
    m.set(relationshipId, next);
    return next;
  }

  async deleteRelationship(sourceTwinId: string, relationshipId: string): Promise<void> {
    if (!this.relationshipsBySource.get(sourceTwinId)?.delete(relationshipId)) {
      throw new EntityNotFound(`relationship ${relationshipId} from ${sourceTwinId} not found`);
    }
  }

  // ---- Queries ----

  async queryTwins(query: TwinQuery): Promise<Twin[]> {
    assertWithinLimits(query);
    const ids = new Set(query.twinIds);

    if (query.kind === "twinsById") {
      return query.twinIds.flatMap((id) => {
        const twin = this.twins.get(id);
        return twin ? [twin] : [];
      });
    }

    const matched = new Set<string>();
    for (const rel of this.allRelationships()) {
      if (query.relationshipName && rel.name !== query.relationshipName) continue;
      if (query.kind === "sourcesOf" && ids.has(rel.targetTwinId)) matched.add(rel.sourceTwinId);
      if (query.kind === "targetsOf" && ids.has(rel.sourceTwinId)) matched.add(rel.targetTwinId);
    }

    const out: Twin[] = [];
    for (const id of Array.from(matched)) {
      const twin = this.twins.get(id);
      if (!twin) continue;
      if (query.kind === "targetsOf" && query.relationshipName === "contains" && twin.model !== "timeseries") {
        continue;
      }
      out.push(twin);
    }
    return out;
  }

  async queryRelationships(query: RelationshipQuery): Promise<TwinRelationship[]> {
    assertWithinLimits(query);
    const ids = new Set(query.twinIds);
    return this.allRelationships().filter((rel) => {
      if (query.relationshipName && rel.name !== query.relationshipName) return false;
      return query.kind === "outgoing" ? ids.has(rel.sourceTwinId) : ids.has(rel.targetTwinId);
    });
  }
}
