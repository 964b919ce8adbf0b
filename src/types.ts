/**
 * Shared data model used throughout the ingestion, index and orchestration layers.
 */

/** Where a document's bytes come from. */
export type SourceKind = "local-file" | "remote-url";

/** Declared document format, resolved from the file extension (or html for bare URLs). */
export type DocumentFormat = "text" | "markdown" | "csv" | "html" | "pdf" | "docx" | "unknown";

/** Ingestion lifecycle of a registered document. */
export type IngestionStatus = "unindexed" | "indexing" | "indexed" | "failed";

/**
 * A document known to the registry. Identity is derived from its path or URL and is unique
 * within one registry.
 */
export interface DocumentRecord {
  /** Stable id (absolute POSIX path or normalized URL). */
  readonly id: string;
  readonly source: SourceKind;
  /** Original path or URL as requested by the caller. */
  readonly location: string;
  readonly format: DocumentFormat;
  /** Raw byte length, 0 until the bytes were loaded once. */
  readonly byteLength: number;
  readonly status: IngestionStatus;
  /** Generation the document was last indexed into. */
  readonly generationId?: number;
  /** Last ingestion error message, kept while status is "failed". */
  readonly error?: string;
}

/** Input used to register a document. */
export interface DocumentDescriptor {
  readonly id: string;
  readonly source: SourceKind;
  readonly location: string;
  readonly format: DocumentFormat;
}

/**
 * A single chunk of a document's text. Immutable; a re-index of its document produces new
 * chunk objects instead of mutating these.
 */
export interface Chunk {
  /** `${documentId}#${seq}` */
  readonly id: string;
  readonly documentId: string;
  /** Sequence index within the document (0-based). */
  readonly seq: number;
  /** Character span [start, end) within the extracted document text. */
  readonly start: number;
  readonly end: number;
  readonly text: string;
  /** Embedding vector (populated after generation / load). */
  readonly emb?: Float32Array;
}

/** A chunk that carries its embedding, as stored in the vector index. */
export type EmbeddedChunk = Chunk & { readonly emb: Float32Array };

/** Static capability tag a retrieval tool declares. */
export type CapabilityTag =
  | "document-index"
  | "fast-factual"
  | "deep-contextual"
  | "academic"
  | "web"
  | "fixed-corpus";

/** Where an evidence snippet came from. */
export interface Provenance {
  readonly documentId?: string;
  readonly chunk?: number;
  readonly url?: string;
  readonly title?: string;
}

/** A scored snippet returned by a retrieval tool. Produced per query, never persisted. */
export interface EvidenceItem {
  readonly tool: CapabilityTag;
  readonly text: string;
  readonly score: number;
  readonly provenance?: Provenance;
}

/** One (query, response) exchange of a conversation. */
export interface Turn {
  readonly query: string;
  readonly response: string;
}
