export class GraphSyncError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "GraphSyncError";
    this.code = code;
  }
}

export class RootAssetNotFound extends GraphSyncError {
  constructor(rootExternalId: string) {
    super("ROOT_ASSET_NOT_FOUND", `Root asset "${rootExternalId}" does not exist in the asset graph`);
    this.name = "RootAssetNotFound";
  }
}

export class QueryLimitExceeded extends GraphSyncError {
  constructor(message: string) {
    super("QUERY_LIMIT_EXCEEDED", message);
    this.name = "QueryLimitExceeded";
  }
}

export class TransientRemoteError extends GraphSyncError {
  constructor(message: string) {
    super("TRANSIENT_REMOTE_FAILURE", message);
    this.name = "TransientRemoteError";
  }
}

export class EntityNotFound extends GraphSyncError {
  constructor(message: string) {
    super("ENTITY_NOT_FOUND", message);
    this.name = "EntityNotFound";
  }
}

export class EntityConflict extends GraphSyncError {
  constructor(message: string) {
    super("ENTITY_CONFLICT", message);
    this.name = "EntityConflict";
  }
}

export class ReconciliationInProgress extends GraphSyncError {
  constructor(rootExternalId: string) {
    super("RECONCILIATION_IN_PROGRESS", `A reconciliation pass for "${rootExternalId}" is already running`);
    this.name = "ReconciliationInProgress";
  }
}

export class InvalidNotification extends GraphSyncError {
  constructor(message: string) {
    super("INVALID_NOTIFICATION", message);
    this.name = "InvalidNotification";
  }
}

export class ConfigError extends GraphSyncError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "ConfigError";
  }
}

export function errorCode(err: unknown): string {
  return err instanceof GraphSyncError ? err.code : "INTERNAL_ERROR";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
