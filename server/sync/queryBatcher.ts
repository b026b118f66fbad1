import {
  MAX_QUERY_IDS,
  QUERY_PLACEHOLDER,
  type GraphQuery,
  type QueryTemplate,
  type RelationshipQueryKind,
  type Twin,
  type TwinGraphClient,
  type TwinQueryKind,
  type TwinRelationship,
} from "../../platform/twinGraph";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "./retry";

export function chunk<T>(items: readonly T[], size: number = MAX_QUERY_IDS): T[][] {
  if (size <= 0) throw new RangeError(`chunk size must be positive, got ${size}`);
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

export function renderIdList(ids: readonly string[]): string {
  return `[${ids.map((id) => `'${id.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`).join(", ")}]`;
}

export function buildTwinQuery<K extends string>(template: QueryTemplate<K>, ids: readonly string[]): GraphQuery<K> {
  return {
    ...template,
    twinIds: [...ids],
    text: template.text.split(QUERY_PLACEHOLDER).join(renderIdList(ids)),
  };
}

/**
 * Splits `ids` into batches of at most MAX_QUERY_IDS, issues one query per
 * batch concurrently and concatenates the results in batch order. The text
 * length limit is enforced by the remote; a violation fails the whole call.
 */
export async function runInBatches<T>(
  ids: readonly string[],
  runBatch: (batch: readonly string[]) => Promise<readonly T[]>,
  batchSize: number = MAX_QUERY_IDS,
): Promise<T[]> {
  if (ids.length === 0) return [];
  const results = await Promise.all(chunk(ids, batchSize).map((batch) => runBatch(batch)));
  return results.flat();
}

export function queryTwinsInBatches(
  client: TwinGraphClient,
  template: QueryTemplate<TwinQueryKind>,
  ids: readonly string[],
  retry: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<Twin[]> {
  return runInBatches(ids, (batch) => withRetry(() => client.queryTwins(buildTwinQuery(template, batch)), retry));
}

export function queryRelationshipsInBatches(
  client: TwinGraphClient,
  template: QueryTemplate<RelationshipQueryKind>,
  ids: readonly string[],
  retry: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<TwinRelationship[]> {
  return runInBatches(ids, (batch) =>
    withRetry(() => client.queryRelationships(buildTwinQuery(template, batch)), retry),
  );
}
