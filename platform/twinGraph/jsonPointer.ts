// RFC 6901 reference-token escaping for patch paths.

export function escapePointerSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

export function unescapePointerSegment(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

export const TAG_VALUES_PATH = "/tags/values";

export function tagPath(key: string): string {
  return `${TAG_VALUES_PATH}/${escapePointerSegment(key)}`;
}

/** The unescaped tag key, or null when the path does not address a single tag. */
export function tagKeyFromPath(path: string): string | null {
  const prefix = `${TAG_VALUES_PATH}/`;
  if (!path.startsWith(prefix)) return null;
  const rest = path.slice(prefix.length);
  if (rest.length === 0 || rest.includes("/")) return null;
  return unescapePointerSegment(rest);
}
