/**
 * Error taxonomy for the pipeline. Every error carries a stable `code` so the
 * CLI (and tests) can branch without string matching, and a message naming
 * the operation and the input that caused it.
 */
export abstract class RagError extends Error {
  public abstract readonly code: string;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad settings (chunk sizes, budgets, top-k...). Fatal, never retried. */
export class InvalidConfigurationError extends RagError {
  public readonly code = "INVALID_CONFIGURATION";

  public constructor(message: string) {
    super(message);
  }
}

/** A single source could not be turned into text. Siblings are unaffected. */
export class ExtractionError extends RagError {
  public readonly code = "EXTRACTION_FAILED";

  public constructor(
    public readonly source: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to extract text from ${source}: ${reason}`, options);
  }
}

export type GatewayErrorKind = "transient" | "permanent";
export type GatewayOperation = "embed" | "generate";

/**
 * Failure reported by an external gateway. Transient failures are retried by
 * the retry policy; permanent ones surface immediately.
 */
export class GatewayError extends RagError {
  public readonly code = "GATEWAY_ERROR";
  public readonly status?: number;
  /** Number of attempts made before this error escalated (set by the retry policy). */
  public readonly attempts: number;

  public constructor(
    public readonly kind: GatewayErrorKind,
    public readonly operation: GatewayOperation,
    public readonly detail: string,
    options?: { status?: number; attempts?: number; cause?: unknown },
  ) {
    super(`${operation} gateway ${kind} failure: ${detail}`, { cause: options?.cause });
    this.status = options?.status;
    this.attempts = options?.attempts ?? 1;
  }

  public get transient(): boolean {
    return this.kind === "transient";
  }

  /** Copy of this error annotated with the attempt count. */
  public withAttempts(attempts: number): GatewayError {
    return new GatewayError(this.kind, this.operation, this.detail, {
      status: this.status,
      attempts,
      cause: this.cause,
    });
  }
}

/** A vector whose length differs from the index dimensionality. */
export class DimensionMismatchError extends RagError {
  public readonly code = "DIMENSION_MISMATCH";

  public constructor(
    public readonly expected: number,
    public readonly actual: number,
    subject = "vector",
  ) {
    super(`Dimension mismatch for ${subject}: expected ${expected}, got ${actual}`);
  }
}

/** The query could not be embedded; no partial answer is produced. */
export class RetrievalUnavailableError extends RagError {
  public readonly code = "RETRIEVAL_UNAVAILABLE";

  public constructor(
    public readonly query: string,
    cause: GatewayError,
  ) {
    super(`Retrieval unavailable for question "${query}": ${cause.message}`, { cause });
  }
}

/** The caller aborted an ingestion or answer call. */
export class CancelledError extends RagError {
  public readonly code = "CANCELLED";

  public constructor(operation: string) {
    super(`${operation} was cancelled`);
  }
}

/** The persisted index exists but cannot be read or written. */
export class IndexStoreError extends RagError {
  public readonly code = "INDEX_STORE_ERROR";

  public constructor(
    public readonly storePath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Index store ${storePath}: ${reason}`, options);
  }
}

/** An operation was attempted in a lifecycle state that forbids it. */
export class PipelineStateError extends RagError {
  public readonly code = "PIPELINE_STATE";

  public constructor(message: string) {
    super(message);
  }
}

/** Throw {@link CancelledError} when the signal has fired. */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw new CancelledError(operation);
}

/** Render any thrown value as a one-line message. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
