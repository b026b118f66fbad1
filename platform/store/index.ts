export type { Page, StoreCursor, StoreReadOptions } from "./types";
export { clampLimit, collectPages, decodeCursor, encodeCursor, paginate } from "./pagination";
