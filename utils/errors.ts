/**
 * Error taxonomy shared by the refresh pipeline and the HTTP layer.
 *
 * Each class carries a stable `code` and the HTTP `statusCode` the error
 * middleware answers with.
 */

export type SourceName = "REST Countries API" | "Open Exchange Rate API";

// ============================================================================
// External sources
// ============================================================================

export abstract class ExternalSourceError extends Error {
  abstract readonly code:
    | "SOURCE_UNAVAILABLE"
    | "SOURCE_TIMEOUT"
    | "SOURCE_MALFORMED";
  readonly statusCode = 503;
  readonly source: SourceName;

  constructor(source: SourceName, message: string, options?: ErrorOptions) {
    super(message, options);
    this.source = source;
  }
}

export class SourceUnavailableError extends ExternalSourceError {
  readonly code = "SOURCE_UNAVAILABLE" as const;
  readonly status: number | undefined;

  constructor(source: SourceName, status?: number, options?: ErrorOptions) {
    super(
      source,
      status === undefined
        ? `Could not fetch data from ${source}`
        : `Could not fetch data from ${source} (HTTP ${String(status)})`,
      options
    );
    this.name = "SourceUnavailableError";
    this.status = status;
  }
}

export class SourceTimeoutError extends ExternalSourceError {
  readonly code = "SOURCE_TIMEOUT" as const;
  readonly timeoutMs: number;

  constructor(source: SourceName, timeoutMs: number) {
    super(
      source,
      `${source} did not respond within ${String(timeoutMs)}ms`
    );
    this.name = "SourceTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class SourceMalformedError extends ExternalSourceError {
  readonly code = "SOURCE_MALFORMED" as const;
  readonly issues: string[];

  constructor(source: SourceName, issues: string[]) {
    super(source, `${source} returned an unexpected response`);
    this.name = "SourceMalformedError";
    this.issues = issues;
  }
}

// ============================================================================
// Storage and lookups
// ============================================================================

export class StorageError extends Error {
  readonly code = "STORAGE_FAILURE" as const;
  readonly statusCode = 503;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StorageError";
  }
}

export class NotFoundError extends Error {
  readonly code = "NOT_FOUND" as const;
  readonly statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  readonly code = "VALIDATION_ERROR" as const;
  readonly statusCode = 400;
  readonly details: Record<string, string>;

  constructor(message: string, details: Record<string, string> = {}) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}
