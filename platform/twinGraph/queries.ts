import type { RelationshipName } from "./types";

/** Substituted with the rendered identifier list. */
export const QUERY_PLACEHOLDER = "<_:_>";

export const MAX_QUERY_IDS = 100;
export const MAX_QUERY_LENGTH = 8000;

export type TwinQueryKind = "twinsById" | "sourcesOf" | "targetsOf";
export type RelationshipQueryKind = "outgoing" | "incoming";

export type QueryTemplate<K extends string> = Readonly<{
  kind: K;
  relationshipName?: RelationshipName;
  text: string;
}>;

export type GraphQuery<K extends string> = QueryTemplate<K> &
  Readonly<{
    twinIds: readonly string[];
  }>;

export type TwinQuery = GraphQuery<TwinQueryKind>;
export type RelationshipQuery = GraphQuery<RelationshipQueryKind>;

export const TWINS_BY_ID: QueryTemplate<"twinsById"> = {
  kind: "twinsById",
  text: `SELECT T FROM DIGITALTWINS T WHERE T.$dtId IN ${QUERY_PLACEHOLDER}`,
};

/** Twins holding a `parent` edge into one of the ids. */
export const CHILDREN_OF: QueryTemplate<"sourcesOf"> = {
  kind: "sourcesOf",
  relationshipName: "parent",
  text: `SELECT C FROM DIGITALTWINS C JOIN P RELATED C.parent WHERE P.$dtId IN ${QUERY_PLACEHOLDER}`,
};

/** Time series twins attached through `contains` to one of the ids. */
export const CONTAINED_BY: QueryTemplate<"targetsOf"> = {
  kind: "targetsOf",
  relationshipName: "contains",
  text: `SELECT TS FROM DIGITALTWINS A JOIN TS RELATED A.contains WHERE A.$dtId IN ${QUERY_PLACEHOLDER}`,
};

export const RELATIONSHIPS_FROM: QueryTemplate<"outgoing"> = {
  kind: "outgoing",
  text: `SELECT R FROM RELATIONSHIPS R WHERE R.$sourceId IN ${QUERY_PLACEHOLDER}`,
};

export const PARENT_EDGES_FROM: QueryTemplate<"outgoing"> = {
  kind: "outgoing",
  relationshipName: "parent",
  text: `SELECT R FROM RELATIONSHIPS R WHERE R.$sourceId IN ${QUERY_PLACEHOLDER} AND R.$relationshipName = 'parent'`,
};

export const CONTAINS_EDGES_TO: QueryTemplate<"incoming"> = {
  kind: "incoming",
  relationshipName: "contains",
  text: `SELECT R FROM RELATIONSHIPS R WHERE R.$targetId IN ${QUERY_PLACEHOLDER} AND R.$relationshipName = 'contains'`,
};
