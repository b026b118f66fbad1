/**
 * Identifier translation between the asset graph and the twin graph.
 *
 * Twin ids may not contain `:` or spaces; twin map keys may not contain `$`,
 * `.` or spaces. Each forbidden character is swapped for a placeholder that
 * is assumed absent from source identifiers. A source identifier that already
 * contains a placeholder does not survive the round trip (see
 * `hasReservedPlaceholder`).
 */

type Substitution = Readonly<{ from: string; to: string }>;

const TWIN_ID_SUBSTITUTIONS: readonly Substitution[] = [
  { from: ":", to: "*" },
  { from: " ", to: "_" },
];

const MAP_KEY_SUBSTITUTIONS: readonly Substitution[] = [
  { from: "$", to: "#" },
  { from: ".", to: "^" },
  { from: " ", to: "_" },
];

function forward(value: string, subs: readonly Substitution[]): string {
  let out = value;
  for (const { from, to } of subs) out = out.split(from).join(to);
  return out;
}

function inverse(value: string, subs: readonly Substitution[]): string {
  let out = value;
  for (const { from, to } of subs) out = out.split(to).join(from);
  return out;
}

function containsAny(value: string, subs: readonly Substitution[]): boolean {
  return subs.some(({ to }) => value.includes(to));
}

export function toTwinId(externalId: string): string {
  return forward(externalId, TWIN_ID_SUBSTITUTIONS);
}

export function fromTwinId(twinId: string): string {
  return inverse(twinId, TWIN_ID_SUBSTITUTIONS);
}

export function toMapKey(key: string): string {
  return forward(key, MAP_KEY_SUBSTITUTIONS);
}

export function fromMapKey(key: string): string {
  return inverse(key, MAP_KEY_SUBSTITUTIONS);
}

/** True when `fromTwinId(toTwinId(externalId))` would not give `externalId` back. */
export function hasReservedPlaceholder(externalId: string): boolean {
  return containsAny(externalId, TWIN_ID_SUBSTITUTIONS);
}

export function hasReservedMapKeyPlaceholder(key: string): boolean {
  return containsAny(key, MAP_KEY_SUBSTITUTIONS);
}

export function toTwinTags(metadata: Readonly<Record<string, string>>): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata)) tags[toMapKey(key)] = value;
  return tags;
}

export function fromTwinTags(tags: Readonly<Record<string, string>>): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) metadata[fromMapKey(key)] = value;
  return metadata;
}
