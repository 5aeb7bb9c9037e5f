/**
 * Error taxonomy. Only `LoadError` and `IngestionError` (and configuration
 * problems at startup) cross the core boundary; retrieval and synthesis
 * problems become degraded answers instead.
 */
export enum RagErrorCode {
  LOAD_FAILED = "LOAD_FAILED",
  INGESTION_FAILED = "INGESTION_FAILED",
  CONFIGURATION_INVALID = "CONFIGURATION_INVALID",
  EMBEDDING_MISMATCH = "EMBEDDING_MISMATCH",
  TIMEOUT = "TIMEOUT"
}

export class RagError extends Error {
  constructor(
    public readonly code: RagErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "RagError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** External content could not be fetched or parsed. */
export class LoadError extends RagError {
  constructor(
    public readonly kind: string,
    public readonly locator: string,
    cause: unknown
  ) {
    super(RagErrorCode.LOAD_FAILED, `Failed to load ${kind} ${locator}: ${errorMessage(cause)}`, cause);
    this.name = "LoadError";
  }
}

export class IngestionError extends RagError {
  constructor(
    public readonly title: string,
    cause: unknown
  ) {
    super(RagErrorCode.INGESTION_FAILED, `Failed to ingest "${title}": ${errorMessage(cause)}`, cause);
    this.name = "IngestionError";
  }
}

export class ConfigurationError extends RagError {
  constructor(message: string, code: RagErrorCode = RagErrorCode.CONFIGURATION_INVALID) {
    super(code, message);
    this.name = "ConfigurationError";
  }
}

/** The store was built by a different embedding backend than the active one. */
export class EmbeddingMismatchError extends ConfigurationError {
  constructor(
    public readonly expected: { backend: string; dimension: number },
    public readonly actual: { backend: string; dimension: number }
  ) {
    super(
      `Vector store was built with ${expected.backend} (dim ${expected.dimension}) ` +
        `but the active embedding provider is ${actual.backend} (dim ${actual.dimension})`,
      RagErrorCode.EMBEDDING_MISMATCH
    );
    this.name = "EmbeddingMismatchError";
  }
}

export class TimeoutError extends RagError {
  constructor(label: string, ms: number) {
    super(RagErrorCode.TIMEOUT, `${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
