import { chunk } from "./queryBatcher";

/** Runs `fn` over `items` with at most `limit` calls in flight, preserving order. */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const out: R[] = [];
  for (const group of chunk(items, Math.max(1, limit))) {
    out.push(...(await Promise.all(group.map(fn))));
  }
  return out;
}
