import type { Page, StoreReadOptions } from "./types";

export function clampLimit(limit?: number): number {
  if (limit == null) return 200;
  if (limit <= 0) return 1;
  return Math.min(limit, 1000);
}

export function decodeCursor(cursor?: string): number {
  if (!cursor) return 0;
  const n = Number.parseInt(cursor, 10);
  return Number.isFinite(n) && n >= 0 ? n : 0;
}

export function encodeCursor(n: number): string {
  return String(n);
}

export function paginate<T>(all: readonly T[], opts?: StoreReadOptions): Page<T> {
  const limit = clampLimit(opts?.limit);
  const offset = decodeCursor(opts?.cursor);

  const items = all.slice(offset, offset + limit);
  const nextOffset = offset + items.length;

  return {
    items,
    nextCursor: nextOffset < all.length ? encodeCursor(nextOffset) : undefined,
  };
}

/**
 * Drains a cursor-paginated listing into a single array.
 */
export async function collectPages<T>(
  fetchPage: (opts: StoreReadOptions) => Promise<Page<T>>,
  pageSize?: number,
): Promise<T[]> {
  const out: T[] = [];
  let cursor: string | undefined;
  do {
    const page = await fetchPage({ limit: pageSize, cursor });
    out.push(...page.items);
    cursor = page.nextCursor;
  } while (cursor);
  return out;
}
