import { z } from "zod";
import { InvalidNotification } from "../../platform/errors";
import {
  TWIN_MODEL_IDS,
  type PatchOperation,
  type Twin,
  type TwinModel,
  type TwinRelationship,
} from "../../platform/twinGraph";
import { parseTwin } from "./entityMapper";
import { describeIssues } from "./zodIssues";

export type ChangeNotification =
  | { kind: "NodeCreated"; twin: Twin }
  | { kind: "NodeUpdated"; twinId: string; model: TwinModel; patch: PatchOperation[] }
  | { kind: "NodeDeleted"; twin: Twin }
  | { kind: "EdgeCreated"; relationship: TwinRelationship }
  | { kind: "EdgeUpdated"; sourceTwinId: string; relationshipId: string; patch: PatchOperation[] }
  | { kind: "EdgeDeleted"; relationship: TwinRelationship };

export const NOTIFICATION_TYPES = [
  "Twin.Create",
  "Twin.Update",
  "Twin.Delete",
  "Relationship.Create",
  "Relationship.Update",
  "Relationship.Delete",
] as const;

// Envelope attributes beyond these (specversion, source, ...) are ignored.
const envelopeSchema = z.object({
  type: z.enum(NOTIFICATION_TYPES),
  subject: z.string().min(1),
  time: z.string().datetime({ offset: true }).optional(),
  data: z.unknown(),
});

const patchOperationSchema = z.object({
  op: z.enum(["add", "replace", "remove"]),
  path: z.string().startsWith("/"),
  value: z.unknown().optional(),
}).strict();

const patchBodySchema = z.object({
  modelId: z.string().optional(),
  patch: z.array(patchOperationSchema),
}).strict();

const twinBodySchema = z.object({
  $dtId: z.string().min(1),
  $etag: z.string().optional(),
  $metadata: z.object({ $model: z.string().min(1) }).passthrough(),
  externalId: z.string().optional(),
  internalId: z.string().optional(),
  displayName: z.string().optional(),
  description: z.string().optional(),
  tags: z.object({
    $metadata: z.record(z.unknown()).optional(),
    values: z.record(z.string()).optional(),
  }).strict().optional(),
  latestValue: z.string().optional(),
  timestamp: z.string().optional(),
}).strict();

const relationshipBodySchema = z.object({
  $relationshipId: z.string().min(1),
  $relationshipName: z.enum(["parent", "contains", "relatesTo"]),
  $sourceId: z.string().min(1),
  $targetId: z.string().min(1),
  $etag: z.string().optional(),
  labels: z.string().optional(),
}).strict();

const RELATIONSHIP_SUBJECT = /^(.+)\/relationships\/([^/]+)$/;

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidNotification(`invalid ${what}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function modelFromId(modelId: string): TwinModel {
  if (modelId === TWIN_MODEL_IDS.asset) return "asset";
  if (modelId === TWIN_MODEL_IDS.timeseries) return "timeseries";
  throw new InvalidNotification(`unknown twin model ${modelId}`);
}

function decodeTwin(subject: string, raw: unknown): Twin {
  const body = parseWith(twinBodySchema, raw, "twin body");
  if (body.$dtId !== subject) {
    throw new InvalidNotification(`twin body ${body.$dtId} does not match subject ${subject}`);
  }
  const { $dtId, $etag: _etag, $metadata, tags, externalId, internalId, displayName, ...rest } = body;
  return parseTwin({
    twinId: $dtId,
    model: modelFromId($metadata.$model),
    properties: {
      externalId: externalId ?? "",
      internalId: internalId ?? "",
      displayName: displayName ?? $dtId,
      tags: tags?.values ?? {},
      ...rest,
    },
  });
}

function decodeRelationship(raw: unknown, createdAt: string): TwinRelationship {
  const body = parseWith(relationshipBodySchema, raw, "relationship body");
  return {
    relationshipId: body.$relationshipId,
    name: body.$relationshipName,
    sourceTwinId: body.$sourceId,
    targetTwinId: body.$targetId,
    ...(body.labels !== undefined ? { labels: body.labels } : {}),
    createdAt,
  };
}

/**
 * Decode one raw change notification. Throws InvalidNotification for an
 * unknown type, a malformed body or a twin of an unknown model.
 */
export function decodeNotification(raw: unknown, now: () => Date = () => new Date()): ChangeNotification {
  const envelope = parseWith(envelopeSchema, raw, "notification");
  const eventTime = envelope.time ? new Date(envelope.time).toISOString() : now().toISOString();

  switch (envelope.type) {
    case "Twin.Create":
      return { kind: "NodeCreated", twin: decodeTwin(envelope.subject, envelope.data) };
    case "Twin.Delete":
      return { kind: "NodeDeleted", twin: decodeTwin(envelope.subject, envelope.data) };
    case "Twin.Update": {
      const body = parseWith(patchBodySchema, envelope.data, "twin patch");
      if (!body.modelId) throw new InvalidNotification("twin patch is missing modelId");
      return { kind: "NodeUpdated", twinId: envelope.subject, model: modelFromId(body.modelId), patch: body.patch };
    }
    case "Relationship.Create":
      return { kind: "EdgeCreated", relationship: decodeRelationship(envelope.data, eventTime) };
    case "Relationship.Delete":
      return { kind: "EdgeDeleted", relationship: decodeRelationship(envelope.data, eventTime) };
    case "Relationship.Update": {
      const match = RELATIONSHIP_SUBJECT.exec(envelope.subject);
      if (!match) {
        throw new InvalidNotification(`relationship subject ${envelope.subject} is not <twinId>/relationships/<id>`);
      }
      const body = parseWith(patchBodySchema, envelope.data, "relationship patch");
      return { kind: "EdgeUpdated", sourceTwinId: match[1], relationshipId: match[2], patch: body.patch };
    }
  }
}
