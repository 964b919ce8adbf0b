/** Stable machine-readable codes of the failure taxonomy. */
export type RagErrorCode =
  | "InvalidConfig"
  | "InvalidRequest"
  | "UnsupportedFormat"
  | "CorruptInput"
  | "EmbeddingUnavailable"
  | "DimensionMismatch"
  | "SourceUnavailable"
  | "NoEvidenceAvailable"
  | "SynthesisUnavailable";

/** Base class for every failure raised by the retrieval core. */
export class RagError extends Error {
  public readonly code: RagErrorCode;

  public constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
  }
}

/** Bad chunking / index parameters. Raised before any work starts. */
export class InvalidConfigError extends RagError {
  public constructor(message: string) {
    super("InvalidConfig", message);
  }
}

/** Malformed caller request (empty query, unknown tool tag, ...). */
export class InvalidRequestError extends RagError {
  public constructor(message: string) {
    super("InvalidRequest", message);
  }
}

export class UnsupportedFormatError extends RagError {
  public constructor(format: string) {
    super("UnsupportedFormat", `Unsupported document format: ${format}`);
  }
}

export class CorruptInputError extends RagError {
  public constructor(message: string, cause?: unknown) {
    super("CorruptInput", message, { cause });
  }
}

/** Embedding call still failing after the bounded retry budget. */
export class EmbeddingUnavailableError extends RagError {
  public readonly attempts: number;

  public constructor(attempts: number, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("EmbeddingUnavailable", `Embedding failed after ${attempts} attempt(s): ${reason}`, {
      cause,
    });
    this.attempts = attempts;
  }
}

/** Fatal for the generation being built. */
export class DimensionMismatchError extends RagError {
  public readonly expected: number;
  public readonly actual: number;

  public constructor(expected: number, actual: number) {
    super("DimensionMismatch", `Embedding dimension ${actual} does not match index dimension ${expected}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class SourceUnavailableError extends RagError {
  public constructor(source: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause === undefined ? "" : String(cause);
    super("SourceUnavailable", reason ? `${source} unavailable: ${reason}` : `${source} unavailable`, {
      cause,
    });
  }
}

export class SynthesisUnavailableError extends RagError {
  public constructor(cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("SynthesisUnavailable", `Answer synthesis failed: ${reason}`, { cause });
  }
}

/**
 * No selected tool produced evidence. Not thrown by `ask`, which still answers; reported
 * alongside the answer instead.
 */
export class NoEvidenceAvailableError extends RagError {
  public constructor(tools: number) {
    super("NoEvidenceAvailable", `No evidence from ${tools} selected tool(s)`);
  }
}

/** Narrow an unknown thrown value to a RagError of the given code. */
export function isRagError(err: unknown, code?: RagErrorCode): err is RagError {
  return err instanceof RagError && (code === undefined || err.code === code);
}

/** Human-readable message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
