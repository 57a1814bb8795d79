export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export class RemoteIndexError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RemoteIndexError";
  }
}

export class MatchAmbiguityError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly candidateIds: string[]
  ) {
    super(message);
    this.name = "MatchAmbiguityError";
  }
}

/** Timeouts, network failures, 408/429/5xx. Safe to retry. */
export class TransientRemoteError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = "TransientRemoteError";
  }
}

/** The service refused the request (auth, validation, not found). */
export class PermanentRemoteError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = "PermanentRemoteError";
  }
}

export class RemoteOperationFailed extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RemoteOperationFailed";
  }
}

export class MetadataCarryOverFailed extends Error {
  constructor(
    message: string,
    public readonly newRemoteId: string,
    public readonly oldRemoteId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "MetadataCarryOverFailed";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
